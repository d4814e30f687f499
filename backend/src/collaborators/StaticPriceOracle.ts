/**
 * StaticPriceOracle: settable 8-decimal answers per feed, like a mock aggregator.
 */

import { normalizeAddress } from '../utils/Address.js';
import type { PriceOracle } from '../engine/types.js';

export class StaticPriceOracle implements PriceOracle {
  private readonly answers: Map<string, bigint> = new Map();

  constructor(initial: Iterable<readonly [string, bigint]> = []) {
    for (const [feed, answer] of initial) {
      this.updateAnswer(feed, answer);
    }
  }

  updateAnswer(feed: string, answer: bigint): void {
    this.answers.set(normalizeAddress(feed), answer);
  }

  async latestPrice(feed: string): Promise<bigint> {
    const answer = this.answers.get(normalizeAddress(feed));
    if (answer === undefined) {
      throw new Error(`No answer configured for feed ${feed}`);
    }
    return answer;
  }
}
