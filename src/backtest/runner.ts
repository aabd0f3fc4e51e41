import type { BacktestConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { readEventTable, writeResultTable, type CsvRow, type EventColumns } from '../io/csv.js';
import { assertInitialCapital, simulate, type BacktestSnapshot } from './engine.js';
import type { ActionLabels } from './events.js';
import { defaultPolicyFor, loadPolicy, PositionPolicy } from './policy.js';
import { createSignalNormalizer, DEFAULT_SIGNALS } from './signals.js';

export type RunBacktestParams = {
  inputPath: string;
  /** When omitted, nothing is written. */
  outputPath?: string;
  policy?: PositionPolicy;
  initialCapital: number;
  vocabulary?: readonly string[];
  columns?: EventColumns;
  actionLabels?: ActionLabels;
  bom?: boolean;
  logger?: Logger;
};

export type BacktestRunResult = {
  rows: CsvRow[];
  snapshots: BacktestSnapshot[];
  /** Value at the last event, or the initial capital for an empty input. */
  finalValueUsd: number;
  switches: number;
};

export function runBacktest(params: RunBacktestParams): BacktestRunResult {
  const vocabulary = params.vocabulary ?? DEFAULT_SIGNALS;
  // Configuration is checked before the input is touched.
  const normalize = createSignalNormalizer(vocabulary);
  const policy = params.policy ?? defaultPolicyFor(vocabulary);
  assertInitialCapital(params.initialCapital);

  const table = readEventTable(params.inputPath, {
    columns: params.columns,
    actionLabels: params.actionLabels,
  });
  params.logger?.debug(`Loaded ${table.events.length} event(s) from ${params.inputPath}`);

  const snapshots = simulate(table.events, policy, params.initialCapital, {
    normalizeSignal: normalize,
    logger: params.logger,
  });

  if (params.outputPath) {
    writeResultTable(params.outputPath, table, snapshots, { bom: params.bom });
    params.logger?.info(`Backtest complete, results saved to ${params.outputPath}`);
  }

  const last = snapshots[snapshots.length - 1];
  return {
    rows: table.rows,
    snapshots,
    finalValueUsd: last ? last.totalAssetValueUsd : params.initialCapital,
    switches: snapshots.filter((snapshot) => snapshot.remark.length > 0).length,
  };
}

/**
 * Policy precedence: an explicit argument (inline text or file), then the
 * config's `policy` section, then the count-based default over the vocabulary.
 */
export function resolvePolicy(
  config: BacktestConfig,
  policyArg?: string,
  vocabulary: readonly string[] = config.signals.canonical
): PositionPolicy {
  if (policyArg) return loadPolicy(policyArg);
  if (config.policy) return PositionPolicy.fromRecord(config.policy);
  return defaultPolicyFor(vocabulary);
}

/**
 * Run parameters from a loaded config, with explicit overrides on top.
 */
export function runParamsFromConfig(
  config: BacktestConfig,
  overrides: Partial<RunBacktestParams> = {}
): RunBacktestParams {
  const vocabulary = overrides.vocabulary ?? config.signals.canonical;
  return {
    inputPath: overrides.inputPath ?? config.backtest.input,
    outputPath: overrides.outputPath ?? config.backtest.output,
    initialCapital: overrides.initialCapital ?? config.backtest.initialCapital,
    policy: overrides.policy ?? resolvePolicy(config, undefined, vocabulary),
    vocabulary,
    columns: overrides.columns ?? config.csv.columns,
    actionLabels: overrides.actionLabels ?? { enter: config.csv.enterLabels, exit: config.csv.exitLabels },
    bom: overrides.bom ?? config.csv.bom,
    logger: overrides.logger,
  };
}
