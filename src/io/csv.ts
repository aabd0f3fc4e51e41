import { readFileSync, writeFileSync } from 'node:fs';

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

import type { BacktestSnapshot } from '../backtest/engine.js';
import { EventDataError } from '../backtest/errors.js';
import { DEFAULT_ACTION_LABELS, parseAction, type ActionLabels, type SignalEvent } from '../backtest/events.js';

export type EventColumns = {
  timestamp: string;
  price: string;
  action: string;
  signal: string;
};

export const DEFAULT_EVENT_COLUMNS: EventColumns = {
  timestamp: 'timestamp',
  price: 'price',
  action: 'action',
  signal: 'raw_signal',
};

export const RESULT_COLUMNS = [
  'position_type',
  'asset_quantity',
  'total_asset_value_usd',
  'active_signals',
  'remark',
] as const;

export type CsvRow = Record<string, string>;

export type EventTable = {
  columns: string[];
  rows: CsvRow[];
  events: SignalEvent[];
};

export type ReadEventTableOptions = {
  columns?: EventColumns;
  actionLabels?: ActionLabels;
};

export type WriteResultTableOptions = {
  /** Prefix a UTF-8 byte order mark so spreadsheet tools pick the encoding. */
  bom?: boolean;
};

function isRecordList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'))
  );
}

export function parseEventTable(text: string, options: ReadEventTableOptions = {}): EventTable {
  const columns = options.columns ?? DEFAULT_EVENT_COLUMNS;
  const actionLabels = options.actionLabels ?? DEFAULT_ACTION_LABELS;

  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isRecordList(parsed)) {
    throw new Error('CSV parser returned an unexpected shape');
  }
  const records = parsed;
  const [header = [], ...body] = records;
  const headerNames = header.map((name) => name.trim());

  for (const required of [columns.timestamp, columns.price, columns.action, columns.signal]) {
    if (!headerNames.includes(required)) {
      throw new EventDataError(
        'missing_column',
        `Missing required column "${required}" (found: ${headerNames.join(', ') || 'none'})`
      );
    }
  }

  const rows = body.map((record) => {
    const row: CsvRow = {};
    headerNames.forEach((name, i) => {
      row[name] = record[i] ?? '';
    });
    return row;
  });

  const events = rows.map(
    (row): SignalEvent => ({
      timestamp: row[columns.timestamp],
      price: row[columns.price],
      action: parseAction(row[columns.action], actionLabels),
      rawSignal: row[columns.signal],
    })
  );

  return { columns: headerNames, rows, events };
}

export function readEventTable(path: string, options: ReadEventTableOptions = {}): EventTable {
  return parseEventTable(readFileSync(path, 'utf-8'), options);
}

/**
 * Render the input rows with the five result columns appended. Input columns
 * that share a result column name are overwritten in place.
 */
export function formatResultTable(
  table: Pick<EventTable, 'columns' | 'rows'>,
  snapshots: readonly BacktestSnapshot[],
  options: WriteResultTableOptions = {}
): string {
  if (table.rows.length !== snapshots.length) {
    throw new Error(`Row/snapshot count mismatch: ${table.rows.length} rows, ${snapshots.length} snapshots`);
  }
  const resultNames: readonly string[] = RESULT_COLUMNS;
  const header = [...table.columns.filter((name) => !resultNames.includes(name)), ...RESULT_COLUMNS];

  const records = table.rows.map((row, i) => {
    const snapshot = snapshots[i];
    const out: Record<string, string | number> = {
      ...row,
      position_type: snapshot.positionType,
      asset_quantity: snapshot.assetQuantity,
      total_asset_value_usd: snapshot.totalAssetValueUsd,
      active_signals: snapshot.activeSignals.join(','),
      remark: snapshot.remark,
    };
    return header.map((name) => out[name] ?? '');
  });

  return stringify([header, ...records], { bom: options.bom ?? false });
}

export function writeResultTable(
  path: string,
  table: Pick<EventTable, 'columns' | 'rows'>,
  snapshots: readonly BacktestSnapshot[],
  options: WriteResultTableOptions = {}
): void {
  writeFileSync(path, formatResultTable(table, snapshots, options), 'utf-8');
}
