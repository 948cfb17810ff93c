import { Contract as EthersContract, getAddress, type ContractRunner } from "ethers";

import { ChainError } from "../chain/errors.js";
import type { Address } from "../chain/types.js";
import { aggregatorV3Abi } from "./abi/aggregatorV3Abi.js";
import type { AggregatorV3Interface, RoundData } from "./interfaces/AggregatorV3Interface.js";

function expectBigInt(value: unknown, field: string): bigint {
  if (typeof value !== "bigint") {
    throw new ChainError(`Price feed returned a non-integer ${field}: ${String(value)}`);
  }
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new ChainError(`Price feed returned a non-string ${field}`);
  }
  return value;
}

function toRoundData(result: unknown): RoundData {
  if (!Array.isArray(result) || result.length < 5) {
    throw new ChainError("Price feed returned malformed round data");
  }
  const [roundId, answer, startedAt, updatedAt, answeredInRound]: unknown[] = result;
  return {
    roundId: expectBigInt(roundId, "roundId"),
    answer: expectBigInt(answer, "answer"),
    startedAt: expectBigInt(startedAt, "startedAt"),
    updatedAt: expectBigInt(updatedAt, "updatedAt"),
    answeredInRound: expectBigInt(answeredInRound, "answeredInRound"),
  };
}

/** A Chainlink feed deployed on a live network, read through an RPC runner. */
export class RemoteAggregator implements AggregatorV3Interface {
  readonly address: Address;
  private readonly feed: EthersContract;

  constructor(address: Address, runner: ContractRunner) {
    this.address = getAddress(address);
    this.feed = new EthersContract(this.address, aggregatorV3Abi, runner);
  }

  async decimals(): Promise<number> {
    const decimals: unknown = await this.feed.getFunction("decimals").staticCall();
    return Number(expectBigInt(decimals, "decimals"));
  }

  async description(): Promise<string> {
    const description: unknown = await this.feed.getFunction("description").staticCall();
    return expectString(description, "description");
  }

  async version(): Promise<bigint> {
    const version: unknown = await this.feed.getFunction("version").staticCall();
    return expectBigInt(version, "version");
  }

  async getRoundData(roundId: bigint): Promise<RoundData> {
    const result: unknown = await this.feed.getFunction("getRoundData").staticCall(roundId);
    return toRoundData(result);
  }

  async latestRoundData(): Promise<RoundData> {
    const result: unknown = await this.feed.getFunction("latestRoundData").staticCall();
    return toRoundData(result);
  }
}
