/**
 * Ticket classification Tests
 */

import { describe, it, expect } from 'vitest';
import {
  classifyTicket,
  extractSpeedTokens,
  resolveRequestedPackage,
} from '../../../../src/services/sync/classification.js';
import { testConfig } from '../../../helpers/fakes.js';

const config = testConfig();
const classify = (subject: string, description = '') =>
  classifyTicket(subject, description, config.keywords, config.packages);

describe('extractSpeedTokens', () => {
  it('reads megabit and gigabit speeds', () => {
    expect(extractSpeedTokens('500 Mbps or 1.5g')).toEqual([500, 1500]);
  });

  it('treats "gigabit" as 1000', () => {
    expect(extractSpeedTokens('Gigabit please')).toEqual([1000]);
  });

  it('returns nothing for plain numbers', () => {
    expect(extractSpeedTokens('unit 12 is slow')).toEqual([]);
  });
});

describe('resolveRequestedPackage', () => {
  it('matches on a speed in the package name', () => {
    expect(resolveRequestedPackage('move me to 2g', config.packages)?.name).toBe('Fiber 2G');
  });

  it('matches on download speed', () => {
    expect(resolveRequestedPackage('500 mbps is enough', config.packages)?.name).toBe('Fiber 500');
  });

  it('prefers the fastest match', () => {
    expect(resolveRequestedPackage('1g or 2g', config.packages)?.name).toBe('Fiber 2G');
  });

  it('returns null when no package offers the speed', () => {
    expect(resolveRequestedPackage('10g', config.packages)).toBeNull();
  });
});

describe('classifyTicket', () => {
  it('classifies an upgrade with a resolvable package', () => {
    const intent = classify('Upgrade request', 'Please move me to 1G');
    expect(intent).toEqual({ kind: 'upgrade', servicePackage: config.packages[1] });
  });

  it('reads speeds from the description', () => {
    const intent = classify('Upgrade', 'Can I get 2 gbps?');
    expect(intent.kind).toBe('upgrade');
    expect(intent.kind === 'upgrade' && intent.servicePackage.name).toBe('Fiber 2G');
  });

  it('falls back to support when no package resolves', () => {
    expect(classify('Upgrade my internet')).toEqual({ kind: 'support' });
  });

  it('classifies internet issues as support', () => {
    expect(classify('WiFi down', 'No connection since Monday')).toEqual({ kind: 'support' });
  });

  it('leaves unrelated tickets unclassified', () => {
    expect(classify('Leaky faucet', 'Kitchen sink drips')).toEqual({ kind: 'unclassified' });
    expect(classify('Upgrade the kitchen')).toEqual({ kind: 'unclassified' });
  });
});
