import { Contract, type DeployContext, type Restore } from "../../chain/Contract.js";
import type { ChainSigner, TransactionReceipt } from "../../chain/types.js";
import type { AggregatorV3Interface, RoundData } from "../interfaces/AggregatorV3Interface.js";

interface Round {
  answer: bigint;
  timestamp: bigint;
  startedAt: bigint;
}

export interface MockV3AggregatorSession {
  updateAnswer(answer: bigint): Promise<TransactionReceipt>;
  updateRoundData(roundId: bigint, answer: bigint, timestamp: bigint, startedAt: bigint): Promise<TransactionReceipt>;
}

/**
 * Price feed for local chains. Anyone may push answers; every answer opens a
 * new round stamped with the block it is mined in.
 */
export class MockV3Aggregator extends Contract implements AggregatorV3Interface {
  static readonly VERSION = 4n;
  static readonly DESCRIPTION = "v0.8/tests/MockV3Aggregator.sol";

  private readonly _decimals: number;
  private latestRound = 0n;
  private rounds = new Map<bigint, Round>();

  constructor(context: DeployContext, decimals: number, initialAnswer: bigint) {
    super(context);
    this._decimals = decimals;
    this.updateAnswerInternal(initialAnswer);
  }

  connect(runner: ChainSigner): MockV3AggregatorSession {
    return {
      updateAnswer: (answer) =>
        this.chain.sendTransaction(runner, {
          to: this.address,
          data: async () => this.updateAnswerInternal(answer),
        }),
      updateRoundData: (roundId, answer, timestamp, startedAt) =>
        this.chain.sendTransaction(runner, {
          to: this.address,
          data: async () => this.updateRoundDataInternal(roundId, answer, timestamp, startedAt),
        }),
    };
  }

  async decimals(): Promise<number> {
    return this._decimals;
  }

  async description(): Promise<string> {
    return MockV3Aggregator.DESCRIPTION;
  }

  async version(): Promise<bigint> {
    return MockV3Aggregator.VERSION;
  }

  async latestAnswer(): Promise<bigint> {
    return this.roundAt(this.latestRound).answer;
  }

  async getRoundData(roundId: bigint): Promise<RoundData> {
    return this.roundData(roundId);
  }

  async latestRoundData(): Promise<RoundData> {
    return this.roundData(this.latestRound);
  }

  checkpoint(): Restore {
    const latestRound = this.latestRound;
    const rounds = new Map(this.rounds);
    return () => {
      this.latestRound = latestRound;
      this.rounds = new Map(rounds);
    };
  }

  private updateAnswerInternal(answer: bigint): void {
    this.requireTransaction("updateAnswer");
    const { timestamp } = this.chain.pendingBlock;
    this.latestRound += 1n;
    this.rounds.set(this.latestRound, { answer, timestamp, startedAt: timestamp });
  }

  private updateRoundDataInternal(roundId: bigint, answer: bigint, timestamp: bigint, startedAt: bigint): void {
    this.requireTransaction("updateRoundData");
    this.latestRound = roundId;
    this.rounds.set(roundId, { answer, timestamp, startedAt });
  }

  private roundAt(roundId: bigint): Round {
    return this.rounds.get(roundId) ?? { answer: 0n, timestamp: 0n, startedAt: 0n };
  }

  private roundData(roundId: bigint): RoundData {
    const { answer, timestamp, startedAt } = this.roundAt(roundId);
    return { roundId, answer, startedAt, updatedAt: timestamp, answeredInRound: roundId };
  }
}
