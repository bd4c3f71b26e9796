/**
 * Config Loader - YAML file + environment overrides
 *
 * Resolution order (later wins):
 * 1. Built-in defaults
 * 2. YAML file (`FLEETBOARD_CONFIG`, default ./fleetboard.yaml)
 * 3. Environment variables
 *
 * @module config/loader
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Value } from '@sinclair/typebox/value';
import * as yaml from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import type { BackoffConfig } from '../notifications/outbox.js';
import { assertPolicyInvariants } from '../policy/category-policy.js';
import { MINUTE_MS, parseDuration } from '../time.js';
import type {
  CategoryPolicy,
  DestinationDirectory,
  PingGroup,
  SummaryDestination,
} from '../types.js';
import { FleetboardConfigSchema, type RawCategory, type RawFleetboardConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'fleetboard.yaml';

export interface FleetboardConfig {
  dataDir: string;
  tickMs: number;
  summaryMs: number;
  appUrl?: string;
  discord: {
    botToken?: string;
    apiBase?: string;
  };
  delivery: {
    maxAttempts: number;
    backoff: BackoffConfig;
  };
  audit: {
    enabled: boolean;
    path: string;
  };
  categories: CategoryPolicy[];
  pingGroups: PingGroup[];
  summaries: SummaryDestination[];
}

type Env = Record<string, string | undefined>;

function duration(value: string | number, field: string, issues: string[]): number {
  const ms = parseDuration(value);
  if (ms === null) {
    issues.push(`${field}: "${value}" is not a duration (use e.g. 90m, 2h, 1h30m, 1d)`);
    return 0;
  }
  return ms;
}

function toCategory(raw: RawCategory, index: number, issues: string[]): CategoryPolicy {
  const field = (name: string): string => `categories[${index}].${name}`;
  return {
    id: raw.id,
    scopeId: raw.scopeId,
    name: raw.name,
    minSpacingMs: duration(raw.minSpacing, field('minSpacing'), issues),
    maxAdvanceMs: duration(raw.maxAdvance, field('maxAdvance'), issues),
    reminderLeadMs:
      raw.reminderLead === undefined ? undefined : duration(raw.reminderLead, field('reminderLead'), issues),
    viewerRoles: raw.viewerRoles ?? [],
    creatorRoles: raw.creatorRoles ?? [],
    managerRoles: raw.managerRoles ?? [],
    pingRoles: raw.pingRoles ?? [],
    destinations: raw.destinations,
    pingGroupId: raw.pingGroup,
  };
}

function checkReferences(categories: CategoryPolicy[], pingGroups: PingGroup[], issues: string[]): void {
  const seen = new Set<string>();
  for (const category of categories) {
    if (seen.has(category.id)) {
      issues.push(`categories: duplicate id "${category.id}"`);
    }
    seen.add(category.id);

    if (category.pingGroupId !== undefined) {
      const group = pingGroups.find((g) => g.id === category.pingGroupId);
      if (!group) {
        issues.push(`categories: "${category.id}" references unknown ping group "${category.pingGroupId}"`);
      } else if (group.scopeId !== category.scopeId) {
        issues.push(`categories: "${category.id}" and ping group "${group.id}" belong to different scopes`);
      }
    }
  }
}

/**
 * Validate a parsed document and apply defaults and environment overrides.
 * `baseDir` anchors relative paths (the config file's directory).
 */
export function resolveConfig(document: unknown, env: Env = process.env, baseDir = process.cwd()): FleetboardConfig {
  if (!Value.Check(FleetboardConfigSchema, document)) {
    const issues = [...Value.Errors(FleetboardConfigSchema, document)].map(
      (e) => `${e.path || '/'}: ${e.message}`,
    );
    throw new ConfigError('Invalid configuration', issues);
  }
  const raw: RawFleetboardConfig = document;
  const issues: string[] = [];

  const pingGroups: PingGroup[] = (raw.pingGroups ?? []).map((g, i) => ({
    id: g.id,
    scopeId: g.scopeId,
    name: g.name,
    cooldownMs: duration(g.cooldown, `pingGroups[${i}].cooldown`, issues),
  }));
  const categories = raw.categories.map((c, i) => toCategory(c, i, issues));
  checkReferences(categories, pingGroups, issues);

  const tickMs = duration(env.FLEETBOARD_TICK_MS ?? raw.tickInterval ?? MINUTE_MS, 'tickInterval', issues);
  const summaryMs = duration(
    env.FLEETBOARD_SUMMARY_MS ?? raw.summaryInterval ?? 30 * MINUTE_MS,
    'summaryInterval',
    issues,
  );
  if (tickMs === 0) issues.push('tickInterval: must be greater than zero');
  if (summaryMs === 0) issues.push('summaryInterval: must be greater than zero');

  const backoff: BackoffConfig = {
    baseMs: duration(raw.delivery?.backoffBase ?? '30s', 'delivery.backoffBase', issues),
    maxMs: duration(raw.delivery?.backoffMax ?? '15m', 'delivery.backoffMax', issues),
  };

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }
  for (const category of categories) {
    assertPolicyInvariants(category);
  }

  const dataDir = path.resolve(baseDir, env.FLEETBOARD_DATA_DIR ?? raw.dataDir ?? 'data');
  const appUrl = env.FLEETBOARD_APP_URL ?? raw.appUrl;

  return {
    dataDir,
    tickMs,
    summaryMs,
    appUrl: appUrl ? appUrl : undefined,
    discord: {
      botToken: env.FLEETBOARD_DISCORD_TOKEN ?? raw.discord?.botToken,
      apiBase: raw.discord?.apiBase,
    },
    delivery: {
      maxAttempts: raw.delivery?.maxAttempts ?? 5,
      backoff,
    },
    audit: {
      enabled: raw.audit?.enabled ?? true,
      path: path.resolve(dataDir, raw.audit?.path ?? 'audit.log'),
    },
    categories,
    pingGroups,
    summaries: (raw.summaries ?? []).map((s) => ({ id: s.channel, scopeId: s.scopeId, roles: s.roles ?? [] })),
  };
}

export function parseConfig(source: string, env: Env = process.env, baseDir = process.cwd()): FleetboardConfig {
  let document: unknown;
  try {
    document = yaml.parse(source);
  } catch (e) {
    throw new ConfigError(`Config is not valid YAML: ${errorMessage(e)}`);
  }
  return resolveConfig(document ?? {}, env, baseDir);
}

/**
 * Load the configuration file named by `configPath`, `FLEETBOARD_CONFIG`
 * or ./fleetboard.yaml, in that order.
 */
export async function loadConfig(configPath?: string, env: Env = process.env): Promise<FleetboardConfig> {
  const file = path.resolve(configPath ?? env.FLEETBOARD_CONFIG ?? DEFAULT_CONFIG_PATH);

  let source: string;
  try {
    source = await readFile(file, 'utf-8');
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${file}`);
    }
    throw new ConfigError(`Failed to read ${file}: ${errorMessage(e)}`);
  }
  return parseConfig(source, env, path.dirname(file));
}

/**
 * Summary destinations listed in the configuration.
 */
export class ConfigDestinationDirectory implements DestinationDirectory {
  constructor(private readonly destinations: SummaryDestination[]) {}

  async listSummaryDestinations(): Promise<SummaryDestination[]> {
    return this.destinations.map((d) => ({ ...d, roles: [...d.roles] }));
  }
}
