#!/usr/bin/env node
/**
 * signal-backtest CLI
 *
 * Replays an enter/exit signal sheet through a position policy and writes the
 * per-event account ledger.
 */

import { Command } from 'commander';

import { loadPolicy } from '../backtest/policy.js';
import { resolvePolicy, runBacktest, runParamsFromConfig } from '../backtest/runner.js';
import { createSignalNormalizer, enumerateSignalSets } from '../backtest/signals.js';
import { loadConfig, type BacktestConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { VERSION } from '../index.js';

type CommonOptions = {
  config?: string;
  policy?: string;
};

type RunOptions = CommonOptions & {
  input?: string;
  output?: string;
  initial?: string;
  verbose?: boolean;
};

function createLogger(config: BacktestConfig, verbose = false): Logger {
  return new Logger(verbose ? 'debug' : config.logging.level, { filePath: config.logging.filePath });
}

function parseCapital(raw: string): number {
  const value = Number(raw.replace(/,/g, ''));
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`--initial must be a positive number, got "${raw}"`);
  }
  return value;
}

function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function reportFailure(error: unknown, logger?: Logger): void {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  if (logger) {
    logger.error(message);
  } else {
    console.error(message);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('signal-backtest')
  .description('Signal-driven position and equity backtester')
  .version(VERSION);

// ============================================================================
// Backtest
// ============================================================================

program
  .command('run')
  .description('Run a backtest over a signal CSV and write the result ledger')
  .option('-i, --input <path>', 'Input CSV (default from config)')
  .option('-o, --output <path>', 'Output CSV (default from config)')
  .option('--initial <usd>', 'Initial capital in USD')
  .option('-p, --policy <json|file>', 'Policy mapping as inline JSON or a JSON/YAML file')
  .option('-c, --config <path>', 'Config file')
  .option('-v, --verbose', 'Log every position switch')
  .action(async (options: RunOptions) => {
    let logger: Logger | undefined;
    try {
      const config = loadConfig(options.config);
      logger = createLogger(config, options.verbose);
      const params = runParamsFromConfig(config, {
        inputPath: options.input,
        outputPath: options.output,
        initialCapital: options.initial !== undefined ? parseCapital(options.initial) : undefined,
        policy: options.policy ? loadPolicy(options.policy) : undefined,
        logger,
      });
      const result = runBacktest(params);
      const last = result.snapshots[result.snapshots.length - 1];

      console.log('Backtest Summary');
      console.log('─'.repeat(40));
      console.log(`Events: ${result.snapshots.length}`);
      console.log(`Switches: ${result.switches}`);
      console.log(`Initial capital: ${formatUsd(params.initialCapital)}`);
      console.log(`Final position: ${last?.positionType ?? 'flat'}`);
      console.log(`Final value: ${formatUsd(result.finalValueUsd)}`);
      if (params.outputPath) {
        console.log(`Output: ${params.outputPath}`);
      }
    } catch (error) {
      reportFailure(error, logger);
    } finally {
      await logger?.close();
    }
  });

// ============================================================================
// Policy
// ============================================================================

program
  .command('policy')
  .description('Show the target position for every signal combination')
  .option('-p, --policy <json|file>', 'Policy mapping as inline JSON or a JSON/YAML file')
  .option('-c, --config <path>', 'Config file')
  .action((options: CommonOptions) => {
    try {
      const config = loadConfig(options.config);
      const policy = resolvePolicy(config, options.policy);
      const combos = enumerateSignalSets(config.signals.canonical);
      const labels = combos.map((signals) => (signals.length > 0 ? signals.join(' & ') : '(no signals)'));
      const width = Math.max(...labels.map((label) => label.length));

      console.log('Signal Policy');
      console.log('─'.repeat(width + 24));
      combos.forEach((signals, i) => {
        const target = policy.resolve(signals);
        const mapped = target ? `${target.position} (ratio ${target.ratio})` : '(keep current)';
        console.log(`${labels[i].padEnd(width)}  ${mapped}`);
      });
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('normalize <labels...>')
  .description('Print the canonical signal for each raw label')
  .option('-c, --config <path>', 'Config file')
  .action((labels: string[], options: CommonOptions) => {
    try {
      const config = loadConfig(options.config);
      const normalize = createSignalNormalizer(config.signals.canonical);
      for (const label of labels) {
        console.log(`${label} -> ${normalize(label)}`);
      }
    } catch (error) {
      reportFailure(error);
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => reportFailure(error));
