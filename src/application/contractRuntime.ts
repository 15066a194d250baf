import { Identity } from "../domain/entities/identity";
import { StateStore, TransactionManager } from "./ports/repositories";
import { DistributedLock, TokenAuthorization } from "./ports/services";
import { AuctionState } from "./state/auctionState";

/**
 * Executes contract calls one at a time per instance, each inside a single
 * transaction, so a failure anywhere in a call discards all of its writes.
 */
export class ContractRuntime {
  readonly state: AuctionState;

  constructor(
    readonly contract: Identity,
    store: StateStore,
    private readonly tx: TransactionManager,
    private readonly lock: DistributedLock,
    private readonly lockTtlMs: number
  ) {
    this.state = new AuctionState(store);
  }

  get lockResource(): string {
    return `lock:contract:${this.contract.id}`;
  }

  get invoker(): TokenAuthorization {
    return { kind: "invoker", invoker: this.contract };
  }

  invoke<T>(handler: (state: AuctionState) => Promise<T>): Promise<T> {
    return this.lock.withLock(this.lockResource, this.lockTtlMs, () =>
      this.tx.withTransaction(() => handler(this.state))
    );
  }
}
