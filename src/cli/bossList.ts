import cron, { type ScheduledTask } from 'node-cron';
import type { AggregatorHandle, RaidBoss } from '../aggregator/index.js';
import { sortBosses } from '../domain/ordering.js';
import { logger } from '../utils/logger.js';

export function formatBossLine(boss: RaidBoss): string {
  const line = `${String(boss.level).padEnd(3)} | ${boss.name} (${boss.language})`;
  return boss.image ? `${line} ${boss.image}` : line;
}

/** One line per boss, lowest level first, followed by a blank separator line. */
export function formatBossList(bosses: readonly RaidBoss[]): string {
  return sortBosses(bosses)
    .map(b => `${formatBossLine(b)}\n`)
    .join('')
    .concat('\n');
}

export type BossListPrinterOptions = {
  schedule: string;
  write?: (text: string) => void;
};

export type BossListPrinter = {
  start(): void;
  stop(): void;
  printOnce(): Promise<void>;
};

export function createBossListPrinter(handle: AggregatorHandle, opts: BossListPrinterOptions): BossListPrinter {
  if (!cron.validate(opts.schedule)) {
    throw new Error(`Invalid boss list schedule: ${opts.schedule}`);
  }

  const write = opts.write ?? ((text: string) => process.stdout.write(text));
  let task: ScheduledTask | undefined;
  let printing = false;

  async function printOnce(): Promise<void> {
    // Skip a tick rather than stack queries behind a slow one.
    if (printing) return;
    printing = true;
    try {
      const bosses = await handle.listBosses();
      write(formatBossList(bosses));
    } catch (err) {
      logger.warn('boss_list_failed', { err: String(err) });
    } finally {
      printing = false;
    }
  }

  return {
    start() {
      if (task) return;
      task = cron.schedule(opts.schedule, () => {
        void printOnce();
      });
      logger.info('boss_list_printer_started', { schedule: opts.schedule });
    },
    stop() {
      task?.stop();
      task = undefined;
    },
    printOnce,
  };
}
