/**
 * Ledger.ts - In-process sequencer for contract transactions
 *
 * Stands in for the chain's ordering layer:
 * - transactions run one at a time, in submission order
 * - a failed transaction restores every registered contract and drops its events
 * - contracts read the signer, the immediate caller and the block timestamp
 *
 * Contract getters called directly are not isolated: while a transaction is
 * awaiting something, they see its uncommitted writes and its pinned
 * timestamp. Readers that must see committed state only go through `read()`.
 *
 * Usage mirrors Mina.transaction:
 *
 *   await ledger.transaction(user, async () => {
 *     await pool.deposit(commitment, POOL_TIER.MEDIUM);
 *   });
 */

import { PublicKey, UInt64 } from 'o1js';

export type EventConstructor = abstract new (...args: never[]) => object;
export type EventMap = Record<string, EventConstructor>;

export interface LedgerEvent {
  address: PublicKey;
  type: string;
  event: object;
  timestamp: UInt64;
  transaction: number;
}

/**
 * Anything whose state the ledger snapshots around a transaction.
 * `checkpoint()` returns the closure that restores the snapshot.
 */
export interface Checkpointable {
  readonly address: PublicKey;
  checkpoint(): () => void;
}

interface TransactionContext {
  sender: PublicKey;
  callers: PublicKey[];
  timestamp: UInt64;
  events: LedgerEvent[];
  registered: string[];
}

export interface LedgerOptions {
  /** Start a manual clock at this time (ms). Without it the system clock is used. */
  timestamp?: number | bigint;
}

export class Ledger {
  private contracts = new Map<string, Checkpointable>();
  private log: LedgerEvent[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private context: TransactionContext | undefined;
  private clock: () => UInt64;
  private transactionCount = 0;

  constructor(options: LedgerOptions = {}) {
    const start = options.timestamp;
    this.clock = start === undefined ? () => UInt64.from(Date.now()) : () => UInt64.from(start);
  }

  register(contract: Checkpointable) {
    const key = contract.address.toBase58();
    if (this.contracts.has(key)) {
      throw new Error(`Address ${key} already holds a contract`);
    }
    this.contracts.set(key, contract);
    this.context?.registered.push(key);
  }

  hasContract(address: PublicKey): boolean {
    return this.contracts.has(address.toBase58());
  }

  // ========== Clock ==========

  /**
   * Block timestamp inside a transaction, clock time outside one.
   */
  get timestamp(): UInt64 {
    return this.context?.timestamp ?? this.clock();
  }

  setTimestamp(ms: number | bigint) {
    const fixed = UInt64.from(ms);
    this.clock = () => fixed;
  }

  advanceTime(ms: number | bigint) {
    this.setTimestamp(this.clock().add(UInt64.from(ms)).toBigInt());
  }

  useSystemClock() {
    this.clock = () => UInt64.from(Date.now());
  }

  // ========== Transactions ==========

  get inTransaction(): boolean {
    return this.context !== undefined;
  }

  get sender(): PublicKey {
    return this.requireContext().sender;
  }

  /**
   * The immediate caller: the signer, or the contract making a nested call.
   */
  get caller(): PublicKey {
    const { callers } = this.requireContext();
    return callers[callers.length - 1];
  }

  /**
   * Queues `body` as one atomic transaction signed by `sender`.
   * Must not be called from inside another transaction's body.
   */
  transaction<T>(sender: PublicKey, body: () => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.execute(sender, body));
    // The queue only orders transactions; each caller still receives its own failure.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Queues a read behind every transaction submitted so far, so `body` sees
   * committed state and the clock rather than an in-flight transaction's
   * pinned timestamp. `body` must not submit a transaction.
   */
  read<T>(body: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(body);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Runs `body` with `caller` as the immediate caller of whatever it invokes.
   */
  async call<T>(caller: PublicKey, body: () => Promise<T>): Promise<T> {
    const { callers } = this.requireContext();
    callers.push(caller);
    try {
      return await body();
    } finally {
      callers.pop();
    }
  }

  // ========== Events ==========

  emit(address: PublicKey, type: string, event: object) {
    const context = this.requireContext();
    context.events.push({
      address,
      type,
      event,
      timestamp: context.timestamp,
      transaction: this.transactionCount,
    });
  }

  fetchEvents(address?: PublicKey, type?: string): LedgerEvent[] {
    return this.log.filter(
      (entry) =>
        (address === undefined || entry.address.equals(address).toBoolean()) &&
        (type === undefined || entry.type === type)
    );
  }

  private async execute<T>(sender: PublicKey, body: () => Promise<T>): Promise<T> {
    const restores = [...this.contracts.values()].map((contract) => contract.checkpoint());
    const context: TransactionContext = {
      sender,
      callers: [sender],
      timestamp: this.clock(),
      events: [],
      registered: [],
    };
    this.context = context;

    try {
      const result = await body();
      this.log.push(...context.events);
      this.transactionCount++;
      return result;
    } catch (error) {
      for (const restore of restores.reverse()) restore();
      for (const key of context.registered) this.contracts.delete(key);
      throw error;
    } finally {
      this.context = undefined;
    }
  }

  private requireContext(): TransactionContext {
    if (!this.context) {
      throw new Error('Not inside a transaction');
    }
    return this.context;
  }
}

/**
 * Base class of every contract living on a Ledger.
 *
 * Subclasses declare their event types in `events` and snapshot their own
 * state in `checkpoint()`.
 */
export abstract class Contract<E extends EventMap> implements Checkpointable {
  abstract readonly events: E;
  readonly address: PublicKey;
  protected readonly ledger: Ledger;

  constructor(ledger: Ledger, address: PublicKey) {
    this.ledger = ledger;
    this.address = address;
    ledger.register(this);
  }

  abstract checkpoint(): () => void;

  protected get sender(): PublicKey {
    return this.ledger.sender;
  }

  protected get caller(): PublicKey {
    return this.ledger.caller;
  }

  protected get timestamp(): UInt64 {
    if (!this.ledger.inTransaction) {
      throw new Error('Not inside a transaction');
    }
    return this.ledger.timestamp;
  }

  /**
   * Calls into another contract with this contract as the caller.
   */
  protected invoke<T>(body: () => Promise<T>): Promise<T> {
    return this.ledger.call(this.address, body);
  }

  protected emitEvent<K extends keyof E & string>(type: K, event: InstanceType<E[K]>) {
    this.ledger.emit(this.address, type, event);
  }

  fetchEvents<K extends keyof E & string>(type: K): InstanceType<E[K]>[] {
    const constructor = this.events[type];
    return this.ledger
      .fetchEvents(this.address, type)
      .map((entry) => entry.event)
      .filter((event): event is InstanceType<E[K]> => event instanceof constructor);
  }
}
