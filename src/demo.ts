#!/usr/bin/env node
import * as path from 'path';
import { pathToFileURL } from 'url';
import { setTimeout as delay } from 'timers/promises';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { configFromEnv, parseWith, readYamlFile, resolveConfig } from './config.js';
import { formatSummary, summarizeOutcomes } from './dispatcher/aggregate.js';
import { Dispatcher } from './dispatcher/dispatcher.js';
import { logger } from './logger.js';
import type { AggregateResult, DispatcherConfigInput } from './types.js';
import { mulberry32 } from './utils.js';

export const SimulatedSubscriberSchema = z.object({
  name: z.string().min(1),
  delayMs: z.number().int().nonnegative().default(0),
  // Extra random delay in [0, jitterMs), drawn from the seeded RNG.
  jitterMs: z.number().int().nonnegative().default(0),
  // Reject on every round whose number is a multiple of failEvery.
  failEvery: z.number().int().positive().optional(),
  // Never settle; only a timeout or the round deadline ends the call.
  hang: z.boolean().default(false),
});
export type SimulatedSubscriber = z.infer<typeof SimulatedSubscriberSchema>;

export const DemoConfigSchema = z.object({
  rounds: z.number().int().positive().default(3),
  seed: z.number().int().default(1),
  dispatcher: z
    .object({
      concurrencyLimit: z.number().optional(),
      perCallTimeoutMs: z.number().optional(),
      roundDeadlineMs: z.number().optional(),
      freezeEvents: z.boolean().optional(),
    })
    .default({}),
  subscribers: z.array(SimulatedSubscriberSchema).min(1),
});
export type DemoConfig = z.infer<typeof DemoConfigSchema>;

export interface DemoEvent {
  round: number;
  emittedAt: string;
}

export function loadDemoConfig(configPath: string): DemoConfig {
  return parseWith(DemoConfigSchema, readYamlFile(configPath), configPath);
}

/**
 * Registers one simulated subscriber per config entry and runs the configured
 * number of rounds sequentially. Returns every round's aggregate.
 */
export async function runDemo(
  config: DemoConfig,
  overrides: Partial<DispatcherConfigInput> = {}
): Promise<AggregateResult[]> {
  const dispatcher = new Dispatcher<DemoEvent>({
    config: resolveConfig(config.dispatcher, overrides),
    logger,
  });
  const rng = mulberry32(config.seed);

  for (const sub of config.subscribers) {
    dispatcher.register(
      async event => {
        if (sub.hang) return new Promise<void>(() => {});
        await delay(sub.delayMs + Math.floor(rng() * sub.jitterMs));
        if (sub.failEvery !== undefined && event.round % sub.failEvery === 0) {
          throw new Error(`${sub.name} rejected round ${event.round}`);
        }
      },
      { label: sub.name }
    );
  }

  const { concurrencyLimit, perCallTimeoutMs, roundDeadlineMs } = dispatcher.config;
  logger.log({
    type: 'SYSTEM',
    content: `Dispatcher ready: ${config.subscribers.length} subscriber(s), limit ${concurrencyLimit}, per-call timeout ${perCallTimeoutMs}ms, round deadline ${roundDeadlineMs || 'none'}`,
  });

  const results: AggregateResult[] = [];
  for (let round = 1; round <= config.rounds; round++) {
    const result = await dispatcher.notify({ round, emittedAt: new Date().toISOString() });
    results.push(result);
    logger.log({
      type: 'SYSTEM',
      content: `Round ${round}: ${formatSummary(summarizeOutcomes(result))} in ${result.elapsedMs}ms`,
      metadata: { roundId: result.roundId },
    });
  }
  return results;
}

export function parseArgs(argv: string[]): {
  configFile: string;
  rounds?: number;
  seed?: number;
  quiet: boolean;
} {
  let configFile: string | undefined;
  let rounds: number | undefined;
  let seed: number | undefined;
  let quiet = false;

  const intArg = (flag: string, next: string | undefined): number => {
    if (!next) throw new Error(`Missing value for ${flag}`);
    const n = Number(next);
    if (!Number.isInteger(n)) throw new Error(`Invalid value "${next}" for ${flag}`);
    return n;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    // npm forwards a literal `--`; ignore it.
    if (arg === '--') continue;

    if (arg === '--quiet' || arg === '-q') {
      quiet = true;
      continue;
    }

    if (arg === '--rounds') {
      rounds = intArg(arg, argv[i + 1]);
      i++;
      continue;
    }

    if (arg === '--seed') {
      seed = intArg(arg, argv[i + 1]);
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile: configFile ?? 'fanout-demo.yaml', rounds, seed, quiet };
}

async function main() {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (args.quiet) logger.setConsoleOutputEnabled(false);

  const configPath = path.resolve(process.cwd(), args.configFile);

  try {
    const fileConfig = loadDemoConfig(configPath);
    const config: DemoConfig = {
      ...fileConfig,
      rounds: args.rounds ?? fileConfig.rounds,
      seed: args.seed ?? fileConfig.seed,
    };
    const results = await runDemo(config, configFromEnv());
    if (args.quiet) {
      for (const result of results) {
        console.log(`${result.roundId}: ${formatSummary(summarizeOutcomes(result))}`);
      }
    }
  } catch (error) {
    console.error('Fatal Error:', error);
    process.exit(1);
  }
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  void main();
}
