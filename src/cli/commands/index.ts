/**
 * CLI Commands Registry
 *
 * Registers every lease-sync command with the main program.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSyncCommands } from './sync.js';
import { registerBillingCommands } from './billing.js';
import { registerStatusCommand } from './status.js';
import { registerEndpointCommands } from './endpoints.js';

export function registerCommands(program: Command): void {
  registerSyncCommands(program);
  registerBillingCommands(program);
  registerStatusCommand(program);
  registerEndpointCommands(program);
}

export { registerSyncCommands, registerBillingCommands, registerStatusCommand, registerEndpointCommands };
