import type { Address } from "./types.js";

export class ChainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientFundsError extends ChainError {
  constructor(
    readonly account: Address,
    readonly balance: bigint,
    readonly required: bigint
  ) {
    super(
      `sender doesn't have enough funds to send tx. The max upfront cost is: ${required} and the sender's balance is: ${balance}.`
    );
  }
}

/** Raised by contract code; the enclosing transaction is rolled back. */
export class RevertError extends ChainError {
  constructor(
    readonly contract: Address,
    readonly reason: string
  ) {
    super(`VM Exception while processing transaction: ${reason}`);
  }
}

export class CustomError extends RevertError {
  constructor(
    contract: Address,
    readonly errorName: string,
    readonly args: readonly bigint[] = []
  ) {
    super(contract, `reverted with custom error '${errorName}(${args.join(", ")})'`);
  }
}

const PANIC_DESCRIPTIONS: Readonly<Record<number, string>> = {
  0x01: "Assertion error",
  0x11: "Arithmetic operation overflowed outside of an unchecked block",
  0x12: "Division or modulo division by zero",
  0x32: "Array accessed at an out-of-bounds or negative index",
};

export class PanicError extends RevertError {
  constructor(
    contract: Address,
    readonly code: number
  ) {
    const hex = `0x${code.toString(16).padStart(2, "0")}`;
    const description = PANIC_DESCRIPTIONS[code] ?? "Unknown panic code";
    super(contract, `reverted with panic code ${hex} (${description})`);
  }
}

export class IndexOutOfRangeError extends PanicError {
  constructor(
    contract: Address,
    readonly index: number,
    readonly length: number
  ) {
    super(contract, 0x32);
  }
}
