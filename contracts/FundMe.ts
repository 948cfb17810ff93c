import { getAddress, parseEther } from "ethers";

import { Contract, type DeployContext, type Restore } from "../chain/Contract.js";
import { CustomError, IndexOutOfRangeError } from "../chain/errors.js";
import type {
  Address,
  ChainSigner,
  Message,
  PayableOverrides,
  TransactionReceipt,
} from "../chain/types.js";
import type { AggregatorV3Interface } from "./interfaces/AggregatorV3Interface.js";
import { getConversionRate } from "./PriceConverter.js";

export class NotOwnerError extends CustomError {
  constructor(contract: Address) {
    super(contract, "FundMe__NotOwner");
  }
}

export class InsufficientContributionError extends CustomError {
  constructor(
    contract: Address,
    readonly usdValue: bigint,
    readonly minimumUsd: bigint
  ) {
    super(contract, "FundMe__InsufficientContribution", [usdValue, minimumUsd]);
  }
}

export class TransferFailedError extends CustomError {
  constructor(contract: Address) {
    super(contract, "FundMe__TransferFailed");
  }
}

export interface FundMeSession {
  fund(overrides?: PayableOverrides): Promise<TransactionReceipt>;
  withdraw(): Promise<TransactionReceipt>;
  cheaperWithdraw(): Promise<TransactionReceipt>;
  /** A call whose data matches no function. */
  fallback(overrides?: PayableOverrides): Promise<TransactionReceipt>;
}

/**
 * Collects ether from anyone sending at least MINIMUM_USD worth of it, priced
 * through a Chainlink feed, and lets the deployer sweep the balance.
 */
export class FundMe extends Contract {
  static readonly MINIMUM_USD = parseEther("5");

  private readonly owner: Address;
  private readonly priceFeed: AggregatorV3Interface;
  private amountFunded = new Map<Address, bigint>();
  private funders: Address[] = [];

  constructor(context: DeployContext, priceFeed: AggregatorV3Interface) {
    super(context);
    this.owner = context.msg.sender;
    this.priceFeed = priceFeed;
  }

  connect(runner: ChainSigner): FundMeSession {
    const send = (value: bigint, data: (msg: Message) => Promise<void>) =>
      this.chain.sendTransaction(runner, { to: this.address, value, data });

    return {
      fund: (overrides = {}) => send(overrides.value ?? 0n, (msg) => this.fund(msg)),
      withdraw: () => send(0n, (msg) => this.withdraw(msg)),
      cheaperWithdraw: () => send(0n, (msg) => this.cheaperWithdraw(msg)),
      fallback: (overrides = {}) => send(overrides.value ?? 0n, (msg) => this.fallback(msg)),
    };
  }

  async fund(msg: Message): Promise<void> {
    this.requireTransaction("fund");
    const usdValue = await getConversionRate(msg.value, this.priceFeed);
    if (usdValue < FundMe.MINIMUM_USD) {
      throw new InsufficientContributionError(this.address, usdValue, FundMe.MINIMUM_USD);
    }
    this.amountFunded.set(msg.sender, this.getAddressToAmountFunded(msg.sender) + msg.value);
    this.funders.push(msg.sender);
  }

  override async receive(msg: Message): Promise<void> {
    await this.fund(msg);
  }

  async fallback(msg: Message): Promise<void> {
    await this.fund(msg);
  }

  async withdraw(msg: Message): Promise<void> {
    this.requireTransaction("withdraw");
    this.onlyOwner(msg);
    for (let i = 0; i < this.funders.length; i++) {
      this.amountFunded.set(this.funders[i], 0n);
    }
    this.funders = [];
    await this.payOwner();
  }

  /** Same effect as `withdraw`, reading the funders list from storage once. */
  async cheaperWithdraw(msg: Message): Promise<void> {
    this.requireTransaction("cheaperWithdraw");
    this.onlyOwner(msg);
    const snapshot = [...this.funders];
    for (const funder of snapshot) {
      this.amountFunded.set(funder, 0n);
    }
    this.funders = [];
    await this.payOwner();
  }

  getVersion(): Promise<bigint> {
    return this.priceFeed.version();
  }

  getAddressToAmountFunded(fundingAddress: Address): bigint {
    return this.amountFunded.get(getAddress(fundingAddress)) ?? 0n;
  }

  getFunder(index: number): Address {
    const funder = Number.isInteger(index) && index >= 0 ? this.funders[index] : undefined;
    if (funder === undefined) {
      throw new IndexOutOfRangeError(this.address, index, this.funders.length);
    }
    return funder;
  }

  getFundersCount(): number {
    return this.funders.length;
  }

  getOwner(): Address {
    return this.owner;
  }

  getPriceFeed(): Address {
    return this.priceFeed.address;
  }

  checkpoint(): Restore {
    const funded = new Map(this.amountFunded);
    const funders = [...this.funders];
    return () => {
      this.amountFunded = new Map(funded);
      this.funders = [...funders];
    };
  }

  private onlyOwner(msg: Message): void {
    if (msg.sender !== this.owner) {
      throw new NotOwnerError(this.address);
    }
  }

  private async payOwner(): Promise<void> {
    const callSuccess = await this.chain.sendValue(this.address, this.owner, this.balance);
    if (!callSuccess) {
      throw new TransferFailedError(this.address);
    }
  }
}
