/**
 * Endpoint Commands - lease-sync provision / activate / suspend / discover / inventory
 *
 * @module cli/commands/endpoints
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import type { Command } from 'commander';
import { ENDPOINT_STATUSES, type EndpointRecord, type EndpointStatus, type ServicePackage } from '../../types/index.js';
import { getDefaultPackage } from '../../config.js';
import { leasePackage } from '../../services/sync/charges.js';
import { describeProvisionResult } from '../../services/endpoint/EndpointService.js';
import type { Runtime } from '../../bootstrap.js';
import { withRuntime, type GlobalOptions } from '../utils.js';

export const MANUAL_SUSPEND_REASON = 'Manually suspended';

export interface SuspendOptions {
  reason?: string;
}

function statusColor(status: EndpointStatus): string {
  switch (status) {
    case 'active':
      return chalk.green(status);
    case 'suspended':
      return chalk.yellow(status);
    case 'unprovisioned':
      return chalk.blue(status);
    case 'pending':
      return chalk.gray(status);
  }
}

export function renderInventory(endpoints: EndpointRecord[]): string {
  const table = new Table({
    head: [chalk.bold('Endpoint'), chalk.bold('Unit'), chalk.bold('Serial'), chalk.bold('Status'), chalk.bold('Device')],
    style: { head: [], border: [] },
  });
  const counts: Record<EndpointStatus, number> = { pending: 0, unprovisioned: 0, suspended: 0, active: 0 };

  for (const endpoint of endpoints) {
    counts[endpoint.status]++;
    table.push([
      endpoint.name,
      endpoint.unit,
      endpoint.serialNumber || chalk.dim('-'),
      statusColor(endpoint.status),
      endpoint.deviceId || chalk.dim('-'),
    ]);
  }

  const summary = ENDPOINT_STATUSES.map((status) => `${status}: ${counts[status]}`).join('  ');
  return `${table.toString()}\n${chalk.dim(`${endpoints.length} endpoints (${summary})`)}`;
}

/**
 * Bandwidth for a manual activation: the package of the lease bound to the
 * endpoint, or the default package when the unit is vacant
 */
function bandwidthFor(runtime: Runtime, endpointName: string): ServicePackage {
  const lease = runtime.store.findActiveLeaseByEndpoint(endpointName);
  return lease ? leasePackage(runtime.config, lease, runtime.logger) : getDefaultPackage(runtime.config);
}

export async function provisionCommand(options: GlobalOptions): Promise<void> {
  await withRuntime(options, async (runtime) => {
    const spinner = ora('Provisioning ONUs...').start();
    const result = await runtime.endpoints.provisionPending();
    spinner.succeed(describeProvisionResult(result));

    for (const name of result.provisioned) console.log(chalk.green(`  + ${name}`));
    for (const name of result.notFound) console.log(chalk.yellow(`  ? ${name} (not found on network)`));
    for (const name of result.failed) console.log(chalk.red(`  ! ${name} (failed)`));
  });
}

export async function activateCommand(endpointName: string, options: GlobalOptions): Promise<void> {
  await withRuntime(options, async (runtime) => {
    const pkg = bandwidthFor(runtime, endpointName);
    const endpoint = await runtime.endpoints.activateByName(endpointName, pkg);
    console.log(chalk.green(`${endpoint.name} is active (${pkg.name}, ${pkg.downloadMbps}/${pkg.uploadMbps} Mbps)`));
  });
}

export async function suspendCommand(endpointName: string, options: GlobalOptions & SuspendOptions): Promise<void> {
  await withRuntime(options, async (runtime) => {
    const reason = options.reason ?? MANUAL_SUSPEND_REASON;
    const endpoint = await runtime.endpoints.suspendByName(endpointName, reason);
    console.log(chalk.yellow(`${endpoint.name} is suspended (${reason})`));
  });
}

export async function discoverCommand(options: GlobalOptions): Promise<void> {
  await withRuntime(options, async (runtime) => {
    const devices = await runtime.endpoints.discover();
    if (devices.length === 0) {
      console.log(chalk.yellow('No devices found.'));
      return;
    }

    const table = new Table({
      head: [chalk.bold('Device'), chalk.bold('Name'), chalk.bold('Serial / MAC'), chalk.bold('Authorized'), chalk.bold('Endpoint')],
      style: { head: [], border: [] },
    });
    for (const { device, endpointName } of devices) {
      table.push([
        device.id,
        device.name ?? chalk.dim('-'),
        device.serialNumber ?? device.mac ?? chalk.dim('-'),
        device.authorized ? chalk.green('yes') : chalk.yellow('no'),
        endpointName ?? chalk.dim('not in inventory'),
      ]);
    }
    console.log(table.toString());
  });
}

export async function inventoryCommand(options: GlobalOptions): Promise<void> {
  await withRuntime(options, (runtime) => {
    console.log(renderInventory(runtime.registry.list()));
  });
}

export function registerEndpointCommands(program: Command): void {
  program
    .command('provision')
    .description('Authorize ONUs that have a serial but no device id yet')
    .action(async (_options: unknown, command: Command) => {
      await provisionCommand(command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('activate <endpoint>')
    .description('Activate an endpoint by name')
    .action(async (endpoint: string, _options: unknown, command: Command) => {
      await activateCommand(endpoint, command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('suspend <endpoint>')
    .description('Suspend an endpoint by name')
    .option('-r, --reason <reason>', 'Reason recorded on the device', MANUAL_SUSPEND_REASON)
    .action(async (endpoint: string, _options: unknown, command: Command) => {
      await suspendCommand(endpoint, command.optsWithGlobals<GlobalOptions & SuspendOptions>());
    });

  program
    .command('discover')
    .description('List devices known to the network system')
    .action(async (_options: unknown, command: Command) => {
      await discoverCommand(command.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('inventory')
    .description('Show the ONU inventory')
    .action(async (_options: unknown, command: Command) => {
      await inventoryCommand(command.optsWithGlobals<GlobalOptions>());
    });
}
