/**
 * Signal-driven position simulation.
 *
 * Every event is folded into the account in a fixed order: mark leveraged
 * holdings to market, update the active signal set, look up the target
 * position, switch (liquidate then reopen) when it differs, and emit a
 * snapshot. Nothing looks ahead; events are processed in the order given.
 */

import type { Logger } from '../core/logger.js';
import { PolicyConfigError } from './errors.js';
import { parsePrice, type SignalEvent } from './events.js';
import type { PositionPolicy } from './policy.js';
import { isLeveraged, LEVERAGE_MULTIPLIER, type LeveragedPosition, type PositionType } from './positions.js';
import { normalizeSignal, type SignalNormalizer } from './signals.js';

/**
 * Account holdings. Flat accounts hold only USD; every other position holds
 * only the asset, so cash and quantity are never both live.
 */
export type AccountState =
  | { position: 'flat'; usd: number }
  | { position: 'spot'; quantity: number }
  | { position: LeveragedPosition; quantity: number; referencePrice: number };

export type BacktestSnapshot = {
  index: number;
  timestamp: string;
  price: number;
  positionType: PositionType;
  assetQuantity: number;
  totalAssetValueUsd: number;
  /** Canonical names, sorted. */
  activeSignals: string[];
  /** Empty unless the position switched at this event. */
  remark: string;
};

export type SimulationOptions = {
  normalizeSignal?: SignalNormalizer;
  logger?: Logger;
};

export function assertInitialCapital(initialCapital: number): void {
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new PolicyConfigError(`Initial capital must be a positive number, got ${initialCapital}`);
  }
}

export function accountValue(state: AccountState, price: number): number {
  return state.position === 'flat' ? state.usd : state.quantity * price;
}

export function assetQuantity(state: AccountState): number {
  return state.position === 'flat' ? 0 : state.quantity;
}

export function describeSwitch(from: PositionType, to: PositionType): string {
  return `switch ${from} -> ${to}`;
}

/**
 * Carry leveraged PnL accrued since the last reference price into the
 * quantity, then re-anchor the reference at `price`.
 */
function settle(state: AccountState, price: number, logger?: Logger): AccountState {
  if (state.position === 'flat' || state.position === 'spot') {
    return state;
  }
  const multiplier = LEVERAGE_MULTIPLIER[state.position];
  let quantity =
    state.quantity + (multiplier * (price - state.referencePrice)) / state.referencePrice * state.quantity;
  if (quantity < 0) {
    logger?.warn(
      `${state.position} position wiped out: price ${price} against reference ${state.referencePrice}`
    );
    quantity = 0;
  }
  return { position: state.position, quantity, referencePrice: price };
}

function open(target: PositionType, usd: number, price: number): AccountState {
  if (target === 'flat') {
    return { position: 'flat', usd };
  }
  const quantity = usd / price;
  if (isLeveraged(target)) {
    return { position: target, quantity, referencePrice: price };
  }
  return { position: target, quantity };
}

/**
 * Incremental simulator: one `apply` per event. Each call leaves the account
 * consistent, so a caller may stop between events.
 */
export class PositionSimulator {
  private account: AccountState;
  private readonly signals = new Set<string>();
  private readonly normalize: SignalNormalizer;
  private readonly logger?: Logger;
  private processed = 0;

  constructor(
    private readonly policy: PositionPolicy,
    initialCapital: number,
    options: SimulationOptions = {}
  ) {
    assertInitialCapital(initialCapital);
    this.account = { position: 'flat', usd: initialCapital };
    this.normalize = options.normalizeSignal ?? ((raw) => normalizeSignal(raw));
    this.logger = options.logger;
  }

  get state(): AccountState {
    return { ...this.account };
  }

  get activeSignals(): string[] {
    return [...this.signals].sort();
  }

  get processedCount(): number {
    return this.processed;
  }

  apply(event: SignalEvent): BacktestSnapshot {
    const index = this.processed;
    const price = parsePrice(event.price, { index, timestamp: event.timestamp });

    const settled = settle(this.account, price, this.logger);

    // A blank label names no signal; the event still settles and snapshots.
    const signal = this.normalize(event.rawSignal);
    if (signal.length > 0) {
      if (event.action === 'enter') {
        this.signals.add(signal);
      } else if (event.action === 'exit') {
        this.signals.delete(signal);
      }
    }

    const target = this.policy.resolve(this.signals)?.position ?? settled.position;

    let next = settled;
    let remark = '';
    if (target !== settled.position) {
      // Liquidate to USD at this price, then reopen. Leveraged PnL is already in the quantity.
      next = open(target, accountValue(settled, price), price);
      remark = describeSwitch(settled.position, target);
      this.logger?.debug(`[${event.timestamp}] ${remark} @ ${price}`);
    }

    this.account = next;
    this.processed += 1;

    return {
      index,
      timestamp: event.timestamp,
      price,
      positionType: next.position,
      assetQuantity: assetQuantity(next),
      totalAssetValueUsd: accountValue(next, price),
      activeSignals: this.activeSignals,
      remark,
    };
  }
}

export function simulate(
  events: Iterable<SignalEvent>,
  policy: PositionPolicy,
  initialCapital: number,
  options: SimulationOptions = {}
): BacktestSnapshot[] {
  const simulator = new PositionSimulator(policy, initialCapital, options);
  const snapshots: BacktestSnapshot[] = [];
  for (const event of events) {
    snapshots.push(simulator.apply(event));
  }
  return snapshots;
}
