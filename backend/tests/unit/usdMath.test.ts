import { describe, it, expect } from 'vitest';

import { MAX_HEALTH_FACTOR } from '../../src/engine/constants.js';
import { formatHealthFactor, formatWad } from '../../src/utils/usdMath.js';

describe('usdMath', () => {
  describe('formatWad', () => {
    it('should render 1e18-scaled values as decimals', () => {
      expect(formatWad(1500000000000000000n)).toBe('1.5');
      expect(formatWad(30000n * 10n ** 18n)).toBe('30000.0');
      expect(formatWad(1n)).toBe('0.000000000000000001');
    });
  });

  describe('formatHealthFactor', () => {
    it('should render the zero-debt sentinel as max', () => {
      expect(formatHealthFactor(MAX_HEALTH_FACTOR)).toBe('max');
    });

    it('should render other values as decimals', () => {
      expect(formatHealthFactor(9n * 10n ** 17n)).toBe('0.9');
      expect(formatHealthFactor(100n * 10n ** 18n)).toBe('100.0');
    });
  });
});
