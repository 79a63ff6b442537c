/**
 * Billing Report Command - lease-sync billing-report
 *
 * @module cli/commands/billing
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import type { Command } from 'commander';
import type { BillingSnapshot } from '../../types/index.js';
import { formatMoney, parsePositiveInt, withRuntime, type GlobalOptions } from '../utils.js';

export interface BillingReportOptions {
  month?: number;
  year?: number;
  createInvoice?: boolean;
  json?: boolean;
}

export function renderBillingReport(snapshot: BillingSnapshot, addonPrices: Record<string, number>): string {
  const month = `${snapshot.year}-${String(snapshot.month).padStart(2, '0')}`;
  const table = new Table({
    head: [chalk.bold('Item'), chalk.bold('Qty'), chalk.bold('Rate'), chalk.bold('Amount')],
    style: { head: [], border: [] },
  });

  table.push([
    'Base service (occupied units)',
    String(snapshot.occupiedUnits),
    formatMoney(snapshot.baseRate),
    formatMoney(snapshot.bill.baseTotal),
  ]);
  for (const [name, count] of Object.entries(snapshot.upgradeCounts)) {
    const price = addonPrices[name] ?? 0;
    table.push([`${name} add-on`, String(count), formatMoney(price), formatMoney(count * price)]);
  }
  table.push([chalk.bold('Total'), '', '', chalk.bold(formatMoney(snapshot.bill.grandTotal))]);

  const lines = [
    chalk.bold(`Billing report ${month}`),
    `Occupied: ${snapshot.occupiedUnits}  Vacant: ${snapshot.vacantUnits}  Total units: ${snapshot.totalUnits}`,
    table.toString(),
  ];
  if (snapshot.units.length > 0) {
    lines.push(chalk.dim(`Units: ${snapshot.units.join(', ')}`));
  }
  return lines.join('\n');
}

export async function billingReportCommand(options: GlobalOptions & BillingReportOptions): Promise<void> {
  await withRuntime(options, async (runtime) => {
    const snapshot = runtime.billingReport.generate(options.month, options.year);

    if (options.json) {
      console.log(JSON.stringify(snapshot, null, 2));
    } else {
      const addonPrices = Object.fromEntries(runtime.config.packages.map((p) => [p.name, p.addonPrice]));
      console.log(renderBillingReport(snapshot, addonPrices));
    }

    if (!options.createInvoice) return;

    const spinner = options.json ? null : ora('Creating invoice...').start();
    try {
      const result = await runtime.billingReport.createInvoice(snapshot);
      spinner?.succeed(`Invoice ${result.invoiceId} created for client ${result.clientId}`);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      }
    } catch (error) {
      spinner?.fail('Invoice creation failed');
      throw error;
    }
  });
}

export function registerBillingCommands(program: Command): void {
  program
    .command('billing-report')
    .description('Generate the monthly billing report for the complex')
    .option('-m, --month <month>', 'Report month (1-12), default current', parsePositiveInt)
    .option('-y, --year <year>', 'Report year, default current', parsePositiveInt)
    .option('--create-invoice', 'Create the invoice in the billing system')
    .option('--json', 'Output as JSON')
    .action(async (_options: unknown, command: Command) => {
      await billingReportCommand(command.optsWithGlobals<GlobalOptions & BillingReportOptions>());
    });
}
