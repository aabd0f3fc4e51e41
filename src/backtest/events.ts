import { EventDataError, type EventLocation } from './errors.js';

export type SignalAction = 'enter' | 'exit' | 'none';

export type SignalEvent = {
  timestamp: string;
  /** Asset price in USD. Strings may carry thousands separators ("64,250.5"). */
  price: number | string;
  action: SignalAction;
  rawSignal: string;
};

export type ActionLabels = {
  enter: readonly string[];
  exit: readonly string[];
};

export const DEFAULT_ACTION_LABELS: ActionLabels = {
  enter: ['enter', 'entry', '进场'],
  exit: ['exit', '出场'],
};

// Decimal notation only, no 0x/0o/0b literals.
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function parsePrice(value: number | string, location: EventLocation): number {
  let price: number;
  if (typeof value === 'number') {
    price = value;
  } else {
    const cleaned = value.replace(/,/g, '').trim();
    if (!DECIMAL_PATTERN.test(cleaned)) {
      throw new EventDataError('malformed_price', `Unparsable price "${value}"`, location);
    }
    price = Number(cleaned);
  }
  if (!Number.isFinite(price) || price <= 0) {
    throw new EventDataError('non_positive_price', `Price must be a positive finite number, got ${price}`, location);
  }
  return price;
}

export function parseAction(label: string, labels: ActionLabels = DEFAULT_ACTION_LABELS): SignalAction {
  const value = label.trim();
  const lower = value.toLowerCase();
  if (labels.enter.some((candidate) => candidate === value || candidate.toLowerCase() === lower)) {
    return 'enter';
  }
  if (labels.exit.some((candidate) => candidate === value || candidate.toLowerCase() === lower)) {
    return 'exit';
  }
  return 'none';
}
