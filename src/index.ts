export const VERSION = '0.1.0';

export {
  accountValue,
  PositionSimulator,
  simulate,
  type AccountState,
  type BacktestSnapshot,
  type SimulationOptions,
} from './backtest/engine.js';
export { EventDataError, PolicyConfigError, type EventDataErrorCode } from './backtest/errors.js';
export {
  DEFAULT_ACTION_LABELS,
  parseAction,
  parsePrice,
  type ActionLabels,
  type SignalAction,
  type SignalEvent,
} from './backtest/events.js';
export {
  DEFAULT_POLICY,
  defaultPolicyFor,
  formatSignalSetKey,
  loadPolicy,
  PositionPolicy,
  signalSetKey,
  type PolicyEntry,
  type PolicyTarget,
} from './backtest/policy.js';
export {
  isLeveraged,
  LEVERAGE_MULTIPLIER,
  parsePositionType,
  POSITION_TYPES,
  type PositionType,
} from './backtest/positions.js';
export { resolvePolicy, runBacktest, runParamsFromConfig, type BacktestRunResult } from './backtest/runner.js';
export {
  createSignalNormalizer,
  DEFAULT_SIGNALS,
  enumerateSignalSets,
  normalizeSignal,
  type SignalNormalizer,
} from './backtest/signals.js';
export { ConfigError, loadConfig, type BacktestConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { formatResultTable, parseEventTable, readEventTable, writeResultTable } from './io/csv.js';
