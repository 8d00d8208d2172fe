import * as fs from 'fs';
import * as yaml from 'yaml';
import type { z } from 'zod';
import { ConfigError, describeCause } from './errors.js';
import { logger } from './logger.js';
import { DispatcherConfigSchema, type DispatcherConfig, type DispatcherConfigInput } from './types.js';
import { isFalsyFlag, isTruthyFlag } from './utils.js';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates `raw` against `schema`, turning zod issues into a single ConfigError.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, source?: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), { source, cause: parsed.error });
  }
  return parsed.data;
}

export function readYamlFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError('file not found', { source: filePath });
  }
  const fileContents = fs.readFileSync(filePath, 'utf-8');
  try {
    return yaml.parse(fileContents);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${describeCause(err)}`, { source: filePath, cause: err });
  }
}

/**
 * Loads dispatcher settings from a YAML file. Missing keys take their defaults.
 */
export function loadConfig(configPath: string): DispatcherConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}` });

  try {
    // An empty file parses to null; treat it as "all defaults".
    const config = parseWith(DispatcherConfigSchema, readYamlFile(configPath) ?? {}, configPath);
    logger.log({ type: 'SYSTEM', content: 'Configuration loaded and validated successfully.' });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${describeCause(error)}`,
      metadata: { error },
    });
    throw error;
  }
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`expected an integer, got "${raw}"`, { source: name });
  }
  return n;
}

function boolFromEnv(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (isTruthyFlag(raw)) return true;
  if (isFalsyFlag(raw)) return false;
  if (raw === undefined || raw.trim() === '') return undefined;
  throw new ConfigError(`expected a boolean flag, got "${raw}"`, { source: name });
}

/**
 * Reads `FANOUT_*` overrides. Unset variables are omitted from the result so it
 * can be layered over file or code defaults with `resolveConfig`.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<DispatcherConfigInput> {
  const layer: Partial<DispatcherConfigInput> = {
    concurrencyLimit: intFromEnv(env, 'FANOUT_CONCURRENCY_LIMIT'),
    perCallTimeoutMs: intFromEnv(env, 'FANOUT_PER_CALL_TIMEOUT_MS'),
    roundDeadlineMs: intFromEnv(env, 'FANOUT_ROUND_DEADLINE_MS'),
    freezeEvents: boolFromEnv(env, 'FANOUT_FREEZE_EVENTS'),
  };
  return withoutUndefined(layer);
}

/**
 * Merges config layers left to right (later wins) and validates the result.
 */
export function resolveConfig(...layers: Partial<DispatcherConfigInput>[]): DispatcherConfig {
  const merged: Partial<DispatcherConfigInput> = {};
  for (const layer of layers) {
    Object.assign(merged, withoutUndefined(layer));
  }
  return parseWith(DispatcherConfigSchema, merged, 'dispatcher config');
}

function withoutUndefined(layer: Partial<DispatcherConfigInput>): Partial<DispatcherConfigInput> {
  const out: Partial<DispatcherConfigInput> = {};
  if (layer.concurrencyLimit !== undefined) out.concurrencyLimit = layer.concurrencyLimit;
  if (layer.perCallTimeoutMs !== undefined) out.perCallTimeoutMs = layer.perCallTimeoutMs;
  if (layer.roundDeadlineMs !== undefined) out.roundDeadlineMs = layer.roundDeadlineMs;
  if (layer.freezeEvents !== undefined) out.freezeEvents = layer.freezeEvents;
  return out;
}
