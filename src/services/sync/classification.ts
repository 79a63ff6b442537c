/**
 * Maintenance ticket classification
 *
 * Keyword containment over subject + description, lower-cased. Upgrade
 * requests win over support requests, but only when a target package can be
 * resolved from the speeds mentioned; otherwise the ticket is considered for
 * support.
 */

import type { ServicePackage } from '../../types/index.js';

export interface KeywordSets {
  internetIssues: string[];
  upgradeRequests: string[];
}

export type TicketIntent =
  | { kind: 'upgrade'; servicePackage: ServicePackage }
  | { kind: 'support' }
  | { kind: 'unclassified' };

const SPEED_TOKEN = /(\d+(?:\.\d+)?)\s*(gbps|gbit|gig|gb|g|mbps|mbit|meg|mb|m)\b/g;

/**
 * Speeds (in Mbps) mentioned in a piece of text: "1g", "2 gbps", "500m",
 * "gigabit"
 */
export function extractSpeedTokens(text: string): number[] {
  const lower = text.toLowerCase();
  const speeds = new Set<number>();

  for (const match of lower.matchAll(SPEED_TOKEN)) {
    const value = Number.parseFloat(match[1] ?? '');
    const unit = match[2] ?? '';
    if (Number.isNaN(value)) continue;
    speeds.add(unit.startsWith('g') ? Math.round(value * 1000) : Math.round(value));
  }

  if (lower.includes('gigabit')) {
    speeds.add(1000);
  }

  return [...speeds];
}

/**
 * Package whose speed matches one of the speeds requested. A package
 * matches on its download speed or on a speed in its name; the fastest
 * match wins.
 */
export function resolveRequestedPackage(text: string, packages: ServicePackage[]): ServicePackage | null {
  const requested = new Set(extractSpeedTokens(text));
  if (requested.size === 0) return null;

  const matches = packages.filter(
    (pkg) =>
      requested.has(pkg.downloadMbps) || extractSpeedTokens(pkg.name).some((speed) => requested.has(speed))
  );

  let best: ServicePackage | null = null;
  for (const pkg of matches) {
    if (!best || pkg.downloadMbps > best.downloadMbps) best = pkg;
  }
  return best;
}

export function classifyTicket(
  subject: string,
  description: string,
  keywords: KeywordSets,
  packages: ServicePackage[]
): TicketIntent {
  const text = `${subject} ${description}`.toLowerCase();

  if (keywords.upgradeRequests.some((kw) => text.includes(kw))) {
    const servicePackage = resolveRequestedPackage(text, packages);
    if (servicePackage) {
      return { kind: 'upgrade', servicePackage };
    }
  }

  if (keywords.internetIssues.some((kw) => text.includes(kw))) {
    return { kind: 'support' };
  }

  return { kind: 'unclassified' };
}
