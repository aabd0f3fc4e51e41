import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { DEFAULT_ACTION_LABELS } from '../backtest/events.js';
import { policyRecordSchema } from '../backtest/policy.js';
import { DEFAULT_SIGNALS } from '../backtest/signals.js';
import { DEFAULT_EVENT_COLUMNS } from '../io/csv.js';
import { expandHome, LOG_LEVELS } from './logger.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const configSchema = z.object({
  backtest: z
    .object({
      initialCapital: z.number().positive().default(1000),
      input: z.string().min(1).default('signals.csv'),
      output: z.string().min(1).default('backtest_result.csv'),
    })
    .default({}),
  signals: z
    .object({
      canonical: z.array(z.string().min(1)).min(1).default([...DEFAULT_SIGNALS]),
    })
    .default({}),
  policy: policyRecordSchema.optional(),
  csv: z
    .object({
      columns: z
        .object({
          timestamp: z.string().min(1).default(DEFAULT_EVENT_COLUMNS.timestamp),
          price: z.string().min(1).default(DEFAULT_EVENT_COLUMNS.price),
          action: z.string().min(1).default(DEFAULT_EVENT_COLUMNS.action),
          signal: z.string().min(1).default(DEFAULT_EVENT_COLUMNS.signal),
        })
        .default({}),
      enterLabels: z.array(z.string().min(1)).default([...DEFAULT_ACTION_LABELS.enter]),
      exitLabels: z.array(z.string().min(1)).default([...DEFAULT_ACTION_LABELS.exit]),
      bom: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),
});

export type BacktestConfig = z.infer<typeof configSchema>;

export function getConfigPath(): string {
  return (
    process.env.SIGNAL_BACKTEST_CONFIG_PATH ?? join(homedir(), '.signal-backtest', 'config.yaml')
  );
}

export function parseConfig(raw: unknown): BacktestConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load the YAML config. An explicit path must exist; the default location
 * falls back to built-in defaults when absent.
 */
export function loadConfig(path?: string): BacktestConfig {
  const explicit = path !== undefined;
  const resolved = expandHome(path ?? getConfigPath());
  if (!existsSync(resolved)) {
    if (explicit) {
      throw new ConfigError(`Config not found: ${resolved}`);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.parse(readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(raw);
}
