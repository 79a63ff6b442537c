/**
 * Sync Commands - lease-sync sync-once / sync-loop
 *
 * @module cli/commands/sync
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { Command } from 'commander';
import { SyncJob } from '../../jobs/SyncJob.js';
import type { SyncCycleReport } from '../../services/sync/SyncEngine.js';
import type { Runtime } from '../../bootstrap.js';
import { handleError, openRuntime, parsePositiveInt, withRuntime, type GlobalOptions } from '../utils.js';

export interface SyncLoopOptions {
  interval?: number;
}

/**
 * Render a cycle report as a table
 */
export function renderCycleReport(report: SyncCycleReport): string {
  if (report.skipped) {
    return chalk.yellow('Another sync cycle is running; skipped.');
  }

  const table = new Table({
    head: [chalk.bold('Phase'), chalk.bold('Processed'), chalk.bold('Changed'), chalk.bold('Failed'), chalk.bold('Note')],
    style: { head: [], border: [] },
  });

  for (const phase of report.phases) {
    const note = phase.error ? chalk.red(phase.error) : phase.skipped ? chalk.dim('skipped') : '';
    table.push([
      phase.name,
      String(phase.processed),
      String(phase.changed),
      phase.failed > 0 ? chalk.red(String(phase.failed)) : '0',
      note,
    ]);
  }

  return `${table.toString()}\n${chalk.dim(`Completed in ${report.durationMs}ms`)}`;
}

export async function syncOnceCommand(options: GlobalOptions): Promise<void> {
  await withRuntime(options, async (runtime) => {
    const report = await runtime.engine.runSyncCycle();
    console.log(renderCycleReport(report));
  });
}

export async function syncLoopCommand(options: GlobalOptions & SyncLoopOptions): Promise<void> {
  let runtime: Runtime;
  try {
    runtime = openRuntime(options);
  } catch (error) {
    handleError(error);
    return;
  }

  const minutes = options.interval ?? runtime.config.polling.intervalMinutes;
  const job = new SyncJob(runtime.engine, { intervalMs: minutes * 60 * 1000 });

  const shutdown = (signal: string): void => {
    console.log(chalk.dim(`\nReceived ${signal}, finishing current cycle...`));
    job
      .stop()
      .then(() => runtime.close())
      .catch((error: unknown) => handleError(error));
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  console.log(chalk.green(`Sync loop started (every ${minutes} minute${minutes === 1 ? '' : 's'}). Ctrl+C to stop.`));
  job.start();
}

export function registerSyncCommands(program: Command): void {
  program
    .command('sync-once')
    .description('Run a single sync cycle')
    .action(async (_options: unknown, command: Command) => {
      await syncOnceCommand(command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('sync-loop')
    .description('Run sync cycles on the polling interval until stopped')
    .option('-i, --interval <minutes>', 'Override polling.intervalMinutes', parsePositiveInt)
    .action(async (_options: unknown, command: Command) => {
      await syncLoopCommand(command.optsWithGlobals<GlobalOptions & SyncLoopOptions>());
    });
}
