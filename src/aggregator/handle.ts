import type { SharedSighting } from '../domain/sighting.js';
import { AggregatorClosedError } from './errors.js';
import type { Mailbox } from './mailbox.js';
import { AsyncResult, createReplyBridge, type ReplySender } from './replyBridge.js';
import type { AggregatorStats, Command, RaidBoss } from './types.js';

/** Counts live handles; the mailbox closes when the last one is released. */
class HandleClaims {
  private count = 0;

  constructor(private mailbox: Mailbox<Command>) {}

  retain(): void {
    this.count++;
  }

  release(): void {
    this.count--;
    if (this.count === 0) this.mailbox.close();
  }
}

/**
 * Front door to the aggregator. Any number of call sites may hold a clone; they all
 * feed the same mailbox, so their commands are serialized without any locking here.
 * Submitting never waits. Only awaiting the returned result does.
 */
export class AggregatorHandle {
  private released = false;

  private constructor(
    private mailbox: Mailbox<Command>,
    private claims: HandleClaims
  ) {
    claims.retain();
  }

  static open(mailbox: Mailbox<Command>): AggregatorHandle {
    return new AggregatorHandle(mailbox, new HandleClaims(mailbox));
  }

  clone(): AggregatorHandle {
    if (this.released) throw new AggregatorClosedError('cannot clone a released handle');
    return new AggregatorHandle(this.mailbox, this.claims);
  }

  /** Drops this handle's claim on the mailbox. Safe to call twice. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.claims.release();
  }

  listBosses(): AsyncResult<RaidBoss[]> {
    return this.request<RaidBoss[]>(reply => ({ kind: 'listBosses', reply }));
  }

  /** Unordered; sort by `createdAt` for a timeline. */
  recentHistory(bossName: string): AsyncResult<SharedSighting[]> {
    return this.request<SharedSighting[]>(reply => ({ kind: 'recentHistory', bossName, reply }));
  }

  stats(): AsyncResult<AggregatorStats> {
    return this.request<AggregatorStats>(reply => ({ kind: 'stats', reply }));
  }

  private request<T>(build: (reply: ReplySender<T>) => Command): AsyncResult<T> {
    if (this.released) return AsyncResult.closed<T>();

    const { sender, result } = createReplyBridge<T>();
    if (!this.mailbox.push(build(sender))) sender.close();
    return result;
  }
}
