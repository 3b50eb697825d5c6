import { AggregatorClosedError } from './errors.js';

type SlotState<T> = { kind: 'pending' } | { kind: 'sent'; value: T } | { kind: 'closed' };

type Waiter<T> = {
  resolve: (value: T) => void;
  reject: (err: AggregatorClosedError) => void;
};

class ReplySlot<T> {
  state: SlotState<T> = { kind: 'pending' };
  private waiters: Waiter<T>[] = [];

  settle(next: SlotState<T>): boolean {
    if (this.state.kind !== 'pending') return false;
    this.state = next;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) this.notify(w);
    return true;
  }

  subscribe(waiter: Waiter<T>): void {
    if (this.state.kind === 'pending') this.waiters.push(waiter);
    else this.notify(waiter);
  }

  private notify(waiter: Waiter<T>): void {
    if (this.state.kind === 'sent') waiter.resolve(this.state.value);
    else if (this.state.kind === 'closed') waiter.reject(new AggregatorClosedError());
  }
}

/** Write side of a one-shot reply. Held by the actor loop. */
export class ReplySender<T> {
  constructor(private slot: ReplySlot<T>) {}

  /** Deposits the reply. Only the first send or close takes effect. */
  send(value: T): boolean {
    return this.slot.settle({ kind: 'sent', value });
  }

  close(): boolean {
    return this.slot.settle({ kind: 'closed' });
  }

  get isSettled(): boolean {
    return this.slot.state.kind !== 'pending';
  }
}

/**
 * Read side of a one-shot reply, handed to the query caller.
 *
 * The underlying promise is only created once somebody awaits, so a result the
 * caller discards never turns into an unhandled rejection when it later closes.
 */
export class AsyncResult<T> implements PromiseLike<T> {
  private promise: Promise<T> | undefined;

  constructor(private slot: ReplySlot<T>) {}

  static closed<T>(): AsyncResult<T> {
    const slot = new ReplySlot<T>();
    slot.settle({ kind: 'closed' });
    return new AsyncResult(slot);
  }

  toPromise(): Promise<T> {
    if (!this.promise) {
      this.promise = new Promise<T>((resolve, reject) => this.slot.subscribe({ resolve, reject }));
    }
    return this.promise;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }
}

export type ReplyBridge<T> = {
  sender: ReplySender<T>;
  result: AsyncResult<T>;
};

export function createReplyBridge<T>(): ReplyBridge<T> {
  const slot = new ReplySlot<T>();
  return { sender: new ReplySender(slot), result: new AsyncResult(slot) };
}
