/**
 * Status Command - lease-sync status
 *
 * @module cli/commands/status
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { Command } from 'commander';
import { buildStatusReport, type StatusReport } from '../../services/status/StatusReport.js';
import { formatDate, withRuntime, type GlobalOptions } from '../utils.js';

export interface StatusOptions {
  json?: boolean;
}

function describeDetails(details: Record<string, unknown>): string {
  return Object.entries(details)
    .filter(([, value]) => typeof value !== 'object' || value === null)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(' ');
}

export function renderStatus(report: StatusReport): string {
  const lines = [
    chalk.bold('Units'),
    `  Occupied:   ${report.occupied}`,
    `  Vacant:     ${report.vacant}`,
    `  Delinquent: ${report.delinquent > 0 ? chalk.red(String(report.delinquent)) : '0'}`,
    `  Suspended:  ${report.suspended > 0 ? chalk.yellow(String(report.suspended)) : '0'}`,
    `  Ended:      ${report.endedLeases}`,
    '',
    chalk.bold('Inventory'),
    `  Active: ${report.inventory.active}  Suspended: ${report.inventory.suspended}  ` +
      `Unprovisioned: ${report.inventory.unprovisioned}  Pending: ${report.inventory.pending}`,
    '',
    `Notifications: ${report.notificationsEnabled ? chalk.green('enabled') : chalk.dim('disabled')}`,
    '',
    chalk.bold('Recent events'),
  ];

  if (report.recentEvents.length === 0) {
    lines.push(chalk.dim('  No events yet.'));
    return lines.join('\n');
  }

  const table = new Table({
    head: [chalk.bold('Time'), chalk.bold('Event'), chalk.bold('Details')],
    style: { head: [], border: [] },
  });
  for (const event of report.recentEvents) {
    const name = event.eventType.endsWith('_failed') ? chalk.red(event.eventType) : event.eventType;
    table.push([formatDate(event.createdAt), name, describeDetails(event.details)]);
  }
  lines.push(table.toString());
  return lines.join('\n');
}

export async function statusCommand(options: GlobalOptions & StatusOptions): Promise<void> {
  await withRuntime(options, (runtime) => {
    const report = buildStatusReport(runtime.config, runtime.store, runtime.registry);
    console.log(options.json ? JSON.stringify(report, null, 2) : renderStatus(report));
  });
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show unit, inventory and recent sync status')
    .option('--json', 'Output as JSON')
    .action(async (_options: unknown, command: Command) => {
      await statusCommand(command.optsWithGlobals<GlobalOptions & StatusOptions>());
    });
}
