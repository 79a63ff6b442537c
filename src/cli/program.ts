/**
 * CLI program definition
 *
 * @module cli/program
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerCommands } from './commands/index.js';
import { shouldUseColor } from './utils.js';

export const PROGRAM_NAME = 'lease-sync';

/**
 * Calculate Levenshtein distance between two strings
 * Used for did-you-mean suggestions
 */
export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1);
      current[j] = Math.min(substitution, (current[j - 1] ?? 0) + 1, (previous[j] ?? 0) + 1);
    }
    previous = current;
  }

  return previous[a.length] ?? 0;
}

/**
 * Find closest matching command names for typo suggestions
 */
export function findSimilarCommands(input: string, commands: string[], maxDistance = 2): string[] {
  return commands
    .map((cmd) => ({ cmd, distance: levenshtein(input.toLowerCase(), cmd.toLowerCase()) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .map(({ cmd }) => cmd);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Keep ONU service in step with leases, rent and billing')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to config.yaml (default: $SYNC_CONFIG_PATH or ./config.yaml)')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals<{ color?: boolean }>();
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    });

  registerCommands(program);

  program.on('command:*', (operands: string[]) => {
    const unknownCommand = operands[0] ?? '';
    const suggestions = findSimilarCommands(
      unknownCommand,
      program.commands.map((cmd) => cmd.name())
    );

    console.error(chalk.red(`error: unknown command '${unknownCommand}'`));
    if (suggestions.length > 0) {
      console.error();
      console.error(chalk.yellow('Did you mean one of these?'));
      for (const cmd of suggestions) {
        console.error(`  ${chalk.cyan(cmd)}`);
      }
    }
    console.error();
    console.error(`Run ${chalk.cyan(`${PROGRAM_NAME} --help`)} for a list of available commands.`);
    process.exitCode = 1;
  });

  return program;
}
