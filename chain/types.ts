export type Address = string;

/** Call context handed to contract code, the equivalent of `msg`. */
export interface Message {
  readonly sender: Address;
  readonly value: bigint;
}

export interface ChainSigner {
  readonly address: Address;
}

export interface Block {
  readonly number: number;
  readonly timestamp: bigint;
}

export interface TransactionRequest {
  readonly to: Address;
  readonly value?: bigint;
  /** Contract code to run; omitted for a plain value transfer. */
  readonly data?: (msg: Message) => Promise<void>;
}

export interface TransactionReceipt {
  readonly hash: string;
  readonly blockNumber: number;
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly nonce: number;
  readonly status: 1;
}

export interface PayableOverrides {
  readonly value?: bigint;
}
