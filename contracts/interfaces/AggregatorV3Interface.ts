import type { Address } from "../../chain/types.js";

export interface RoundData {
  readonly roundId: bigint;
  readonly answer: bigint;
  readonly startedAt: bigint;
  readonly updatedAt: bigint;
  readonly answeredInRound: bigint;
}

/** Chainlink price feed, the oracle FundMe prices contributions with. */
export interface AggregatorV3Interface {
  readonly address: Address;
  decimals(): Promise<number>;
  description(): Promise<string>;
  version(): Promise<bigint>;
  getRoundData(roundId: bigint): Promise<RoundData>;
  latestRoundData(): Promise<RoundData>;
}
