/**
 * ChainlinkPriceOracle: reads AggregatorV3 feeds over JSON-RPC.
 *
 * Returns the raw `answer` (8 decimals for USD feeds). Round freshness is not
 * checked here; the engine consumes the latest value as-is.
 */

import { Contract, JsonRpcProvider, type ContractRunner } from 'ethers';
import { z } from 'zod';

import type { PriceOracle } from '../engine/types.js';

// AggregatorV3Interface (minimal)
const AGGREGATOR_V3_ABI = [
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)'
];

const roundDataSchema = z.array(z.bigint()).length(5);

export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export type RoundDataReader = (feed: string) => Promise<RoundData>;

/**
 * Decode a latestRoundData() result (ethers Result or plain tuple)
 * @throws ZodError when the shape is not five integers
 */
export function parseRoundData(raw: unknown): RoundData {
  const [roundId, answer, startedAt, updatedAt, answeredInRound] = roundDataSchema.parse(
    Array.isArray(raw) ? [...raw] : raw
  );
  return { roundId, answer, startedAt, updatedAt, answeredInRound };
}

export class ChainlinkPriceOracle implements PriceOracle {
  constructor(private readonly readRound: RoundDataReader) {}

  static fromRunner(runner: ContractRunner): ChainlinkPriceOracle {
    const aggregators = new Map<string, Contract>();

    return new ChainlinkPriceOracle(async feed => {
      let aggregator = aggregators.get(feed);
      if (!aggregator) {
        aggregator = new Contract(feed, AGGREGATOR_V3_ABI, runner);
        aggregators.set(feed, aggregator);
      }
      const raw: unknown = await aggregator.getFunction('latestRoundData').staticCall();
      return parseRoundData(raw);
    });
  }

  static fromRpcUrl(rpcUrl: string): ChainlinkPriceOracle {
    return ChainlinkPriceOracle.fromRunner(new JsonRpcProvider(rpcUrl));
  }

  async latestPrice(feed: string): Promise<bigint> {
    const round = await this.readRound(feed);
    return round.answer;
  }
}
