import { shareSighting, type Sighting } from '../domain/sighting.js';
import { logger } from '../utils/logger.js';
import { BossTable, type LevelParser } from './bossTable.js';
import { AggregatorHandle } from './handle.js';
import { Mailbox } from './mailbox.js';
import type { Command } from './types.js';

type LoopEvent =
  | { from: 'feed'; kind: 'sighting'; sighting: Sighting }
  | { from: 'feed'; kind: 'done' }
  | { from: 'feed'; kind: 'readError'; error: unknown }
  | { from: 'mailbox'; command: Command | undefined }
  | { from: 'stop' };

export type AggregatorState = 'idle' | 'running' | 'terminated';

export type AggregatorOptions = {
  /** Log every applied sighting at info level. */
  logSightings?: boolean;
  /** Level lookup for newly seen bosses; defaults to the "Lvl 60 Name" prefix parser. */
  parseLevel?: LevelParser;
};

/**
 * Runs the aggregation loop. The loop is the only code that touches the boss table:
 * sightings and commands are funneled into one event queue and applied one at a time.
 */
export class AggregatorDriver {
  private readonly table: BossTable;
  private state: AggregatorState = 'idle';
  private runPromise: Promise<void> | undefined;

  private ready: LoopEvent[] = [];
  private wake: (() => void) | undefined;
  private lastFrom: 'feed' | 'mailbox' = 'mailbox';
  private stopRequested = false;

  constructor(
    private source: AsyncIterable<Sighting>,
    private mailbox: Mailbox<Command>,
    private historySize: number,
    private opts: AggregatorOptions = {}
  ) {
    this.table = new BossTable(historySize, opts.parseLevel);
  }

  get currentState(): AggregatorState {
    return this.state;
  }

  /** Starts the loop once; later calls return the same promise. Resolves on termination. */
  run(): Promise<void> {
    this.runPromise ??= this.loop();
    return this.runPromise;
  }

  /**
   * Ends the loop after the event in progress. Commands still queued have their
   * replies closed. Before `run()` was ever called this terminates immediately.
   */
  stop(): void {
    if (this.stopRequested || this.state === 'terminated') return;
    this.stopRequested = true;

    if (this.state === 'idle') {
      this.state = 'terminated';
      this.closeMailbox();
      logger.info('aggregator_terminated', { reason: 'stopped_before_start', ...this.table.stats() });
      return;
    }
    this.deliver({ from: 'stop' });
  }

  private async loop(): Promise<void> {
    if (this.state === 'terminated') return;
    this.state = 'running';
    logger.info('aggregator_started', { historySize: this.historySize });

    let feed: AsyncIterator<Sighting> | undefined;
    let reason = 'sources_exhausted';
    try {
      feed = this.openFeed();
      let mailboxOpen = true;
      if (feed) this.pullFeed(feed);
      this.pullMailbox();

      while (feed || mailboxOpen) {
        const event = await this.nextEvent();

        if (event.from === 'stop') {
          reason = 'stopped';
          break;
        }

        if (event.from === 'mailbox') {
          if (event.command === undefined) {
            mailboxOpen = false;
            logger.info('aggregator_mailbox_closed');
            continue;
          }
          this.handleCommand(event.command);
          this.pullMailbox();
          continue;
        }

        if (!feed) continue;
        switch (event.kind) {
          case 'sighting':
            this.handleSighting(event.sighting);
            this.pullFeed(feed);
            break;
          case 'readError':
            // Dropped. The next pull waits for a macrotask so timers and I/O run between failures.
            logger.warn('aggregator_feed_read_error', { err: String(event.error) });
            this.pullFeedLater(feed);
            break;
          case 'done':
            feed = undefined;
            logger.info('aggregator_feed_closed');
            break;
        }
      }
    } catch (err) {
      reason = 'failed';
      logger.error('aggregator_loop_failed', { err: String(err) });
      throw err;
    } finally {
      this.state = 'terminated';
      for (const leftover of this.ready.splice(0)) this.discard(leftover);
      this.closeMailbox();
      if (feed) this.detachFeed(feed);
      logger.info('aggregator_terminated', { reason, ...this.table.stats() });
    }
  }

  /** A source that cannot be opened counts as already ended; queries are still served. */
  private openFeed(): AsyncIterator<Sighting> | undefined {
    try {
      return this.source[Symbol.asyncIterator]();
    } catch (err) {
      logger.warn('aggregator_feed_open_failed', { err: String(err) });
      return undefined;
    }
  }

  private handleSighting(sighting: Sighting): void {
    this.table.handleSighting(shareSighting(sighting));
    if (this.opts.logSightings) {
      logger.info('aggregator_sighting', {
        boss: sighting.bossName,
        raidId: sighting.raidId,
        language: sighting.language,
        createdAt: sighting.createdAt,
      });
    }
  }

  private handleCommand(command: Command): void {
    switch (command.kind) {
      case 'listBosses':
        command.reply.send(this.table.listBosses());
        break;
      case 'recentHistory':
        command.reply.send(this.table.recentHistory(command.bossName));
        break;
      case 'stats':
        command.reply.send({
          ...this.table.stats(),
          mailboxDepth: this.mailbox.length,
          historySize: this.historySize,
        });
        break;
    }
  }

  private pullFeed(feed: AsyncIterator<Sighting>): void {
    void new Promise<IteratorResult<Sighting>>(resolve => resolve(feed.next())).then(
      r => this.deliver(r.done ? { from: 'feed', kind: 'done' } : { from: 'feed', kind: 'sighting', sighting: r.value }),
      (error: unknown) => this.deliver({ from: 'feed', kind: 'readError', error })
    );
  }

  private pullFeedLater(feed: AsyncIterator<Sighting>): void {
    setImmediate(() => {
      if (this.state === 'running') this.pullFeed(feed);
    });
  }

  private pullMailbox(): void {
    void this.mailbox.recv().then(
      command => this.deliver({ from: 'mailbox', command }),
      (error: unknown) => {
        logger.error('aggregator_mailbox_recv_failed', { err: String(error) });
        this.deliver({ from: 'mailbox', command: undefined });
      }
    );
  }

  private deliver(event: LoopEvent): void {
    // Pulls still in flight when the loop ended land here.
    if (this.state === 'terminated') {
      this.discard(event);
      return;
    }
    this.ready.push(event);
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private nextEvent(): Promise<LoopEvent> {
    const event = this.takeReady();
    if (event) return Promise.resolve(event);

    return new Promise<LoopEvent>(resolve => {
      this.wake = () => {
        const next = this.takeReady();
        if (next) resolve(next);
      };
    });
  }

  /**
   * Stop wins over everything else. Between the two sources, whichever did not
   * go last is preferred when both have something ready.
   */
  private takeReady(): LoopEvent | undefined {
    if (this.ready.length === 0) return undefined;

    let idx = this.ready.findIndex(e => e.from === 'stop');
    if (idx < 0) idx = this.ready.findIndex(e => e.from !== this.lastFrom);
    if (idx < 0) idx = 0;

    const [event] = this.ready.splice(idx, 1);
    if (event && event.from !== 'stop') this.lastFrom = event.from;
    return event;
  }

  private discard(event: LoopEvent): void {
    if (event.from === 'mailbox') event.command?.reply.close();
  }

  private closeMailbox(): void {
    this.mailbox.close();
    for (const command of this.mailbox.drain()) command.reply.close();
  }

  private detachFeed(feed: AsyncIterator<Sighting>): void {
    if (!feed.return) return;
    void new Promise<unknown>(resolve => resolve(feed.return?.())).catch((err: unknown) => {
      logger.warn('aggregator_feed_detach_failed', { err: String(err) });
    });
  }
}

export type Aggregator = {
  handle: AggregatorHandle;
  driver: AggregatorDriver;
};

/**
 * Wires a sighting source to a fresh boss table. The caller must `driver.run()`;
 * until then commands simply queue up.
 */
export function createAggregator(
  source: AsyncIterable<Sighting>,
  historySize: number,
  opts: AggregatorOptions = {}
): Aggregator {
  if (!Number.isInteger(historySize) || historySize < 0) {
    throw new Error(`Invalid history size: ${historySize}`);
  }

  const mailbox = new Mailbox<Command>();
  const handle = AggregatorHandle.open(mailbox);
  const driver = new AggregatorDriver(source, mailbox, historySize, opts);
  return { handle, driver };
}
