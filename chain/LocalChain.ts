import { AsyncLocalStorage } from "node:async_hooks";

import {
  AbiCoder,
  HDNodeWallet,
  getAddress,
  getCreateAddress,
  keccak256,
  parseEther,
  type ContractRunner,
} from "ethers";

import type { Contract, ContractFactory, Restore } from "./Contract.js";
import { ChainError, InsufficientFundsError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import type {
  Address,
  Block,
  ChainSigner,
  Message,
  TransactionReceipt,
  TransactionRequest,
} from "./types.js";

export const DEFAULT_MNEMONIC = "test test test test test test test test test test test junk";
export const DEFAULT_CHAIN_ID = 31337n;
const ACCOUNTS_PATH = "m/44'/60'/0'/0";

export interface LocalChainOptions {
  chainId?: bigint;
  mnemonic?: string;
  accounts?: number;
  initialBalance?: bigint;
  /** Unix seconds of the genesis block. */
  timestamp?: bigint;
  /** Reads contracts that live on the forked network, e.g. a JsonRpcProvider. */
  fork?: ContractRunner;
  logger?: Logger;
}

const derivedAccounts = new Map<string, Address[]>();

function deriveAccounts(mnemonic: string, count: number): Address[] {
  const cached = derivedAccounts.get(mnemonic) ?? [];
  if (cached.length < count) {
    const root = HDNodeWallet.fromPhrase(mnemonic, undefined, ACCOUNTS_PATH);
    for (let i = cached.length; i < count; i++) {
      cached.push(root.deriveChild(i).address);
    }
    derivedAccounts.set(mnemonic, cached);
  }
  return cached.slice(0, count);
}

/**
 * In-process chain that executes contract code with the guarantees a real
 * node gives: one transaction at a time, value moved before the call, and a
 * failed transaction leaves no trace but a bumped nonce.
 */
export class LocalChain {
  readonly chainId: bigint;
  readonly fork?: ContractRunner;

  private readonly logger: Logger;
  private readonly signers: readonly ChainSigner[];
  private balances = new Map<Address, bigint>();
  private nonces = new Map<Address, number>();
  private contracts = new Map<Address, Contract>();
  private head: Block;

  private queue: Promise<void> = Promise.resolve();
  /** Set while contract code of a transaction runs. */
  private readonly frame = new AsyncLocalStorage<Address>();

  private snapshots = new Map<number, Restore>();
  private nextSnapshotId = 1;

  constructor(options: LocalChainOptions = {}) {
    this.chainId = options.chainId ?? DEFAULT_CHAIN_ID;
    this.fork = options.fork;
    this.logger = (options.logger ?? defaultLogger).child({ chainId: this.chainId.toString() });
    this.head = {
      number: 0,
      timestamp: options.timestamp ?? BigInt(Math.floor(Date.now() / 1000)),
    };

    const initialBalance = options.initialBalance ?? parseEther("10000");
    this.signers = deriveAccounts(options.mnemonic ?? DEFAULT_MNEMONIC, options.accounts ?? 20).map(
      (address) => {
        this.balances.set(address, initialBalance);
        return { address };
      }
    );
  }

  getSigners(): readonly ChainSigner[] {
    return this.signers;
  }

  getBalance(address: Address): bigint {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  setBalance(address: Address, amount: bigint): void {
    this.balances.set(getAddress(address), amount);
  }

  getNonce(address: Address): number {
    return this.nonces.get(getAddress(address)) ?? 0;
  }

  getContract(address: Address): Contract | undefined {
    return this.contracts.get(getAddress(address));
  }

  /** Latest mined block. */
  getBlock(): Block {
    return this.head;
  }

  /** The block the executing transaction will be mined in. */
  get pendingBlock(): Block {
    return { number: this.head.number + 1, timestamp: this.head.timestamp + 1n };
  }

  sendTransaction(from: ChainSigner, request: TransactionRequest): Promise<TransactionReceipt> {
    return this.execute(from, request.value ?? 0n, async (sender, nonce, value) => {
      const to = getAddress(request.to);
      const { data } = request;
      if (data !== undefined && !this.contracts.has(to)) {
        throw new ChainError(`Transaction calls ${to}, which has no contract code`);
      }

      this.moveValue(sender, to, value);
      const msg = { sender, value };
      if (data !== undefined) {
        await data(msg);
      } else {
        await this.contracts.get(to)?.receive(msg);
      }
      const receipt = this.mine(sender, to, value, nonce);
      return { receipt, result: receipt };
    });
  }

  async deploy<C extends Contract>(
    from: ChainSigner,
    factory: ContractFactory<C>,
    value = 0n
  ): Promise<C> {
    return this.execute(from, value, async (sender, nonce) => {
      const deployed = await this.construct(sender, nonce, factory, value);
      return { receipt: this.mine(sender, deployed.address, value, nonce), result: deployed };
    });
  }

  /** High-level call from contract code; a revert propagates to the caller. */
  async call<T>(from: Address, to: Address, value: bigint, fn: (msg: Message) => Promise<T>): Promise<T> {
    this.requireExecuting("call");
    const sender = getAddress(from);
    this.moveValue(sender, getAddress(to), value);
    return fn({ sender, value });
  }

  /**
   * Low-level value transfer from contract code. Returns false, with only this
   * transfer's effects undone, when the recipient fails in any way or funds
   * run short.
   */
  async sendValue(from: Address, to: Address, amount: bigint): Promise<boolean> {
    this.requireExecuting("sendValue");
    const sender = getAddress(from);
    const recipient = getAddress(to);
    if (this.getBalance(sender) < amount) {
      return false;
    }

    const restore = this.checkpoint();
    try {
      this.moveValue(sender, recipient, amount);
      await this.contracts.get(recipient)?.receive({ sender, value: amount });
      return true;
    } catch (error) {
      if (!(error instanceof ChainError)) {
        throw error;
      }
      restore();
      this.logger.debug({ from: sender, to: recipient, error: error.name }, "value transfer rejected");
      return false;
    }
  }

  /** CREATE from contract code. */
  async create<C extends Contract>(from: Address, factory: ContractFactory<C>, value = 0n): Promise<C> {
    this.requireExecuting("create");
    const sender = getAddress(from);
    const nonce = this.bumpNonce(sender);
    return this.construct(sender, nonce, factory, value);
  }

  /** Throws unless called from contract code of a running transaction. */
  requireExecuting(operation: string): void {
    if (this.frame.getStore() === undefined) {
      throw new ChainError(`${operation} is only available to contract code inside a transaction`);
    }
  }

  snapshot(): string {
    const id = this.nextSnapshotId++;
    this.snapshots.set(id, this.checkpoint());
    return `0x${id.toString(16)}`;
  }

  /** Restores the state at `id`; that snapshot and every later one are discarded. */
  revert(id: string): boolean {
    const key = Number.parseInt(id, 16);
    const restore = this.snapshots.get(key);
    if (restore === undefined) {
      return false;
    }
    restore();
    for (const snapshotId of [...this.snapshots.keys()]) {
      if (snapshotId >= key) {
        this.snapshots.delete(snapshotId);
      }
    }
    return true;
  }

  private execute<T>(
    from: ChainSigner,
    value: bigint,
    run: (sender: Address, nonce: number, value: bigint) => Promise<{ receipt: TransactionReceipt; result: T }>
  ): Promise<T> {
    if (this.frame.getStore() !== undefined) {
      return Promise.reject(new ChainError("A transaction cannot be sent from inside another transaction"));
    }

    return this.enqueue(async () => {
      const sender = getAddress(from.address);
      const balance = this.getBalance(sender);
      if (balance < value) {
        throw new InsufficientFundsError(sender, balance, value);
      }

      const nonce = this.bumpNonce(sender);
      const restore = this.checkpoint();
      try {
        const { receipt, result } = await this.frame.run(sender, () => run(sender, nonce, value));
        this.logger.debug(
          { hash: receipt.hash, from: sender, to: receipt.to, nonce, value, block: receipt.blockNumber },
          "transaction mined"
        );
        return result;
      } catch (error) {
        restore();
        this.logger.debug(
          { from: sender, nonce, error: error instanceof Error ? error.name : String(error) },
          "transaction reverted"
        );
        throw error;
      }
    });
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.queue.then(job);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async construct<C extends Contract>(
    sender: Address,
    nonce: number,
    factory: ContractFactory<C>,
    value: bigint
  ): Promise<C> {
    const address = getCreateAddress({ from: sender, nonce });
    this.moveValue(sender, address, value);
    const contract = await factory({ chain: this, address, msg: { sender, value } });
    if (contract.address !== address) {
      throw new ChainError(`Contract constructed at ${contract.address}, expected ${address}`);
    }
    this.contracts.set(address, contract);
    return contract;
  }

  private moveValue(from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    const balance = this.getBalance(from);
    if (balance < amount) {
      throw new InsufficientFundsError(from, balance, amount);
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.getBalance(to) + amount);
  }

  private bumpNonce(address: Address): number {
    const nonce = this.getNonce(address);
    this.nonces.set(address, nonce + 1);
    return nonce;
  }

  private mine(from: Address, to: Address, value: bigint, nonce: number): TransactionReceipt {
    this.head = this.pendingBlock;
    const hash = keccak256(
      AbiCoder.defaultAbiCoder().encode(
        ["uint256", "address", "uint256", "uint256"],
        [this.chainId, from, nonce, this.head.number]
      )
    );
    return { hash, blockNumber: this.head.number, from, to, value, nonce, status: 1 };
  }

  private checkpoint(): Restore {
    const balances = new Map(this.balances);
    const nonces = new Map(this.nonces);
    const contracts = new Map(this.contracts);
    const head = this.head;
    const storage = [...contracts.values()].map((contract) => contract.checkpoint());

    return () => {
      this.balances = new Map(balances);
      this.nonces = new Map(nonces);
      this.contracts = new Map(contracts);
      this.head = head;
      for (const restore of storage) {
        restore();
      }
    };
  }
}
