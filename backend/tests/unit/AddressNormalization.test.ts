import { describe, it, expect } from 'vitest';

import { isHexAddress, normalizeAddress, normalizeAddresses } from '../../src/utils/Address.js';

describe('Address Normalization', () => {
  describe('normalizeAddress', () => {
    it('should lowercase and trim', () => {
      expect(normalizeAddress('  0xABCDEF1234567890ABCDEF1234567890ABCDEF12 ')).toBe(
        '0xabcdef1234567890abcdef1234567890abcdef12'
      );
    });

    it('should leave empty input alone', () => {
      expect(normalizeAddress('')).toBe('');
    });
  });

  describe('normalizeAddresses', () => {
    it('should normalize every entry', () => {
      expect(
        normalizeAddresses(['0xAA00000000000000000000000000000000000001', '0xbb00000000000000000000000000000000000002'])
      ).toEqual(['0xaa00000000000000000000000000000000000001', '0xbb00000000000000000000000000000000000002']);
    });
  });

  describe('isHexAddress', () => {
    it('should accept 20-byte hex in lowercase', () => {
      expect(isHexAddress('0x000000000000000000000000000000000000a11c')).toBe(true);
    });

    it('should reject short or non-hex strings', () => {
      expect(isHexAddress('0xabcd')).toBe(false);
      expect(isHexAddress('alice')).toBe(false);
    });
  });
});
