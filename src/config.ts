import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import * as yaml from 'js-yaml';
import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './utils/errors.js';
import type { ServicePackage } from './types/index.js';

/** Default configuration file, relative to the working directory */
export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Zod schema for a service package in the catalog
 */
const packageSchema = z.object({
  name: z.string().min(1),
  downloadMbps: z.coerce.number().int().positive(),
  uploadMbps: z.coerce.number().int().positive(),
  addonPrice: z.coerce.number().min(0).default(0),
  servicePlanId: z.coerce.string().min(1).optional(),
  default: z.boolean().default(false),
});

/**
 * Comma-separated string or YAML list, lower-cased
 */
const keywordListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((val) => (Array.isArray(val) ? val : val.split(',')))
  .transform((list) => list.map((kw) => kw.trim().toLowerCase()).filter(Boolean));

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  // Property management (Innago)
  propertyManagement: z.object({
    apiUrl: z.string().url(),
    apiKey: z.string().min(1),
    propertyId: z.coerce.string().min(1),
    // Used when a lease payload carries no property address
    defaultPropertyAddress: z.string().min(1).optional(),
  }),

  // UISP (CRM + NMS)
  uisp: z.object({
    host: z.string().min(1),
    protocol: z.enum(['http', 'https']).default('https'),
    crmApiKey: z.string().min(1),
    nmsApiKey: z.string().min(1),
    parentSiteId: z.coerce.string().min(1),
    ticketClientId: z.coerce.string().min(1).optional(),
    ticketClientName: z.string().min(1).default('Property Management'),
    registerTenantServices: z.boolean().default(false),
  }),

  // Complex-level billing
  billing: z.object({
    baseRate: z.coerce.number().min(0).default(45),
    totalUnits: z.coerce.number().int().min(0).default(0),
    gracePeriodDay: z.coerce.number().int().min(1).max(28).default(5),
    creditFloor: z.coerce.number().min(0).default(1),
    complexClientName: z.string().min(1).default('Apartment Complex'),
    complexEmail: z.string().email().optional(),
    invoiceDueDays: z.coerce.number().int().min(0).default(14),
  }),

  packages: z.array(packageSchema).min(1, 'At least one package is required'),

  keywords: z
    .object({
      internetIssues: keywordListSchema.default(['internet', 'wifi', 'wi-fi', 'network', 'fiber', 'connection']),
      upgradeRequests: keywordListSchema.default(['upgrade', '1g', '2g', 'gigabit']),
    })
    .default({}),

  polling: z
    .object({
      intervalMinutes: z.coerce.number().int().min(1).default(5),
    })
    .default({}),

  http: z
    .object({
      timeoutMs: z.coerce.number().int().min(1000).max(120000).default(10000),
      errorThresholdPercentage: z.coerce.number().min(1).max(100).default(50),
      resetTimeoutMs: z.coerce.number().int().min(1000).default(30000),
    })
    .default({}),

  database: z
    .object({
      path: z.string().min(1).default('./data/lease-sync.db'),
    })
    .default({}),

  inventory: z
    .object({
      path: z.string().min(1).default('./onu-inventory.csv'),
    })
    .default({}),

  // Optional: tenant notifications are disabled when absent
  email: z
    .object({
      smtpHost: z.string().min(1),
      smtpPort: z.coerce.number().int().min(1).max(65535).default(587),
      secure: z.boolean().default(false),
      user: z.string().optional(),
      pass: z.string().optional(),
      from: z.string().min(1),
    })
    .optional(),
});

type ParsedConfig = z.infer<typeof configSchema>;

/**
 * Validated and typed configuration. Built once at startup and passed
 * explicitly to every component.
 */
export type AppConfig = Readonly<
  Omit<ParsedConfig, 'packages'> & {
    packages: ServicePackage[];
  }
>;

/**
 * Load .env files so secrets can stay out of config.yaml
 */
export function loadEnvironment(): void {
  dotenvConfig({ path: '.env.local' });
  dotenvConfig(); // Fallback to .env
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay secrets from the environment onto the raw YAML document
 */
function applyEnvironmentOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    return isRecord(value) ? { ...value } : {};
  };

  const propertyManagement = section('propertyManagement');
  const uisp = section('uisp');
  const result: Record<string, unknown> = { ...raw };

  if (env.INNAGO_API_KEY) propertyManagement.apiKey = env.INNAGO_API_KEY;
  if (env.UISP_CRM_API_KEY) uisp.crmApiKey = env.UISP_CRM_API_KEY;
  if (env.UISP_NMS_API_KEY) uisp.nmsApiKey = env.UISP_NMS_API_KEY;

  result.propertyManagement = propertyManagement;
  result.uisp = uisp;

  if (isRecord(raw.email) && env.SMTP_PASS) {
    result.email = { ...raw.email, pass: env.SMTP_PASS };
  }

  if (env.DATABASE_PATH) {
    result.database = { ...section('database'), path: env.DATABASE_PATH };
  }

  return result;
}

/**
 * Resolve the default package: the one flagged `default`, else the first.
 * More than one flagged default is a configuration error.
 */
function normalizePackages(packages: ParsedConfig['packages']): ServicePackage[] {
  const flagged = packages.filter((pkg) => pkg.default);
  if (flagged.length > 1) {
    throw new ConfigurationError('Configuration validation failed', [
      `packages: more than one default package (${flagged.map((p) => p.name).join(', ')})`,
    ]);
  }

  const names = new Set<string>();
  for (const pkg of packages) {
    if (names.has(pkg.name)) {
      throw new ConfigurationError('Configuration validation failed', [
        `packages: duplicate package name "${pkg.name}"`,
      ]);
    }
    names.add(pkg.name);
  }

  return packages.map((pkg, index) => ({
    ...pkg,
    default: flagged.length === 0 ? index === 0 : pkg.default,
  }));
}

/**
 * Parse and validate a configuration document (already loaded from YAML)
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration validation failed', [
      'root: expected a mapping of configuration sections',
    ]);
  }

  const result = configSchema.safeParse(applyEnvironmentOverrides(raw, env));

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues
    );
  }

  return {
    ...result.data,
    packages: normalizePackages(result.data.packages),
  };
}

/**
 * Read, parse and validate the YAML configuration file
 *
 * @throws ConfigurationError when the file is missing, unreadable or invalid
 */
export function loadConfig(path: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Config file not found: ${path}`);
  }

  let document: unknown;
  try {
    document = yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file could not be parsed: ${path}`, [detail]);
  }

  return parseConfig(document, env);
}

// =============================================================================
// Package Catalog Helpers
// =============================================================================

/**
 * Get the default (included-with-rent) package
 */
export function getDefaultPackage(config: AppConfig): ServicePackage {
  const pkg = config.packages.find((p) => p.default) ?? config.packages[0];
  if (!pkg) {
    throw new ConfigurationError('No service packages configured');
  }
  return pkg;
}

/**
 * Look up a package by its exact name
 */
export function getPackageByName(config: AppConfig, name: string): ServicePackage | undefined {
  return config.packages.find((p) => p.name === name);
}

/**
 * Check if tenant notifications are configured
 */
export function isEmailEnabled(config: AppConfig): boolean {
  return config.email !== undefined;
}
