/**
 * CLI Utilities
 *
 * Shared helpers for lease-sync commands: runtime lifecycle, error output
 * and formatting.
 *
 * @module cli/utils
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { loadConfig, loadEnvironment, DEFAULT_CONFIG_PATH } from '../config.js';
import { createRuntime, type Runtime } from '../bootstrap.js';
import { AppError, ConfigurationError } from '../utils/errors.js';

/**
 * Options every command accepts
 */
export interface GlobalOptions {
  config?: string;
}

/**
 * Resolve the configuration file path
 *
 * Resolution order:
 * 1. --config option
 * 2. SYNC_CONFIG_PATH environment variable
 * 3. config.yaml in the working directory
 */
export function resolveConfigPath(options: GlobalOptions): string {
  return options.config || process.env.SYNC_CONFIG_PATH || DEFAULT_CONFIG_PATH;
}

/**
 * Load configuration and build the runtime
 *
 * @throws ConfigurationError when the configuration is missing or invalid
 */
export function openRuntime(options: GlobalOptions): Runtime {
  loadEnvironment();
  const config = loadConfig(resolveConfigPath(options));
  return createRuntime(config);
}

/**
 * Run a command body against a fresh runtime, closing it afterwards
 */
export async function withRuntime(
  options: GlobalOptions,
  body: (runtime: Runtime) => Promise<void> | void
): Promise<void> {
  let runtime: Runtime | null = null;
  try {
    runtime = openRuntime(options);
    await body(runtime);
  } catch (error) {
    handleError(error);
  } finally {
    runtime?.close();
  }
}

/**
 * Report an error. Only configuration failures change the exit code;
 * everything else is an operational failure that has been logged.
 */
export function handleError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`Configuration error: ${message}`));
    for (const issue of error.issues) {
      if (!message.includes(issue)) console.error(chalk.red(`  - ${issue}`));
    }
    process.exitCode = 1;
    return;
  }

  console.error(chalk.red(`Error: ${message}`));
  if (error instanceof AppError) {
    console.error(chalk.dim(`Code: ${error.code}`));
  }
}

/**
 * Check if colored output should be used
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  return process.stdout.isTTY === true;
}

/**
 * Formats a date for display
 */
export function formatDate(date: Date | null): string {
  if (!date) {
    return '-';
  }
  return date.toISOString().replace('T', ' ').substring(0, 19);
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
