import { RevertError } from "./errors.js";
import type { LocalChain } from "./LocalChain.js";
import type { Address, Message } from "./types.js";

/** Undoes every storage write made since the matching `checkpoint()`. */
export type Restore = () => void;

export interface DeployContext {
  readonly chain: LocalChain;
  readonly address: Address;
  /** The creator and the value sent along with the deployment. */
  readonly msg: Message;
}

export type ContractFactory<C extends Contract> = (context: DeployContext) => C | Promise<C>;

/**
 * Base class of everything deployed on a {@link LocalChain}.
 *
 * Subclasses keep their storage in plain fields and must capture all of it in
 * `checkpoint()`; the chain uses those closures to roll a failed transaction
 * back.
 */
export abstract class Contract {
  readonly address: Address;
  protected readonly chain: LocalChain;

  constructor({ chain, address }: DeployContext) {
    this.chain = chain;
    this.address = address;
  }

  abstract checkpoint(): Restore;

  /** Runs on a plain value transfer. Contracts without a receive hook reject ether. */
  async receive(_msg: Message): Promise<void> {
    throw new RevertError(
      this.address,
      "function selector was not recognized and there's no fallback nor receive function"
    );
  }

  /** Guards entry points that write storage or move ether. */
  protected requireTransaction(operation: string): void {
    this.chain.requireExecuting(`${this.constructor.name}.${operation}`);
  }

  protected get balance(): bigint {
    return this.chain.getBalance(this.address);
  }
}
