/**
 * CLI program and formatting Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { createProgram, findSimilarCommands, levenshtein } from '../../../src/cli/program.js';
import { formatMoney, parsePositiveInt, resolveConfigPath } from '../../../src/cli/utils.js';
import { renderCycleReport } from '../../../src/cli/commands/sync.js';
import { renderInventory } from '../../../src/cli/commands/endpoints.js';
import { endpoint } from '../../helpers/fakes.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('createProgram', () => {
  it('registers every command', () => {
    const names = createProgram().commands.map((cmd) => cmd.name());

    expect(names.sort()).toEqual([
      'activate',
      'billing-report',
      'discover',
      'inventory',
      'provision',
      'status',
      'suspend',
      'sync-loop',
      'sync-once',
    ]);
  });
});

describe('command suggestions', () => {
  it('computes edit distance', () => {
    expect(levenshtein('status', 'status')).toBe(0);
    expect(levenshtein('sync-one', 'sync-once')).toBe(1);
    expect(levenshtein('kitten', 'sitting')).toBe(3);
  });

  it('suggests the closest commands first', () => {
    expect(findSimilarCommands('sync-onc', ['sync-once', 'sync-loop', 'status'])).toEqual(['sync-once']);
    expect(findSimilarCommands('STATU', ['status', 'suspend'])).toEqual(['status']);
    expect(findSimilarCommands('xyz', ['status'])).toEqual([]);
  });
});

describe('cli utils', () => {
  it('parses positive integers strictly', () => {
    expect(parsePositiveInt('12')).toBe(12);
    expect(() => parsePositiveInt('0')).toThrow('Must be a positive integer.');
    expect(() => parsePositiveInt('3.5')).toThrow('Must be a positive integer.');
    expect(() => parsePositiveInt('abc')).toThrow('Must be a positive integer.');
  });

  it('formats money with two decimals', () => {
    expect(formatMoney(4590)).toBe('$4590.00');
  });

  it('prefers the --config option', () => {
    expect(resolveConfigPath({ config: '/etc/lease-sync.yaml' })).toBe('/etc/lease-sync.yaml');
  });
});

describe('renderers', () => {
  it('notes a skipped cycle', () => {
    expect(renderCycleReport({ skipped: true, startedAt: new Date(), durationMs: 0, phases: [] })).toBe(
      'Another sync cycle is running; skipped.'
    );
  });

  it('summarizes inventory by status', () => {
    const output = renderInventory([endpoint('1', 'active'), endpoint('2', 'suspended'), endpoint('3', 'pending')]);

    expect(output.split('\n').at(-1)).toBe('3 endpoints (pending: 1  unprovisioned: 0  suspended: 1  active: 1)');
  });
});
