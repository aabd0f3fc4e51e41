import { describe, expect, it } from 'vitest';

import type { BacktestSnapshot } from '../../src/backtest/engine.js';
import { EventDataError } from '../../src/backtest/errors.js';
import { formatResultTable, parseEventTable } from '../../src/io/csv.js';

const INPUT = [
  'timestamp,price,action,raw_signal,note',
  '2024-01-01,100,enter,ADX breakout,first',
  '2024-01-02,"1,100",exit,ADX,second',
  '',
].join('\n');

function snapshot(overrides: Partial<BacktestSnapshot>): BacktestSnapshot {
  return {
    index: 0,
    timestamp: '',
    price: 100,
    positionType: 'flat',
    assetQuantity: 0,
    totalAssetValueUsd: 1000,
    activeSignals: [],
    remark: '',
    ...overrides,
  };
}

describe('parseEventTable', () => {
  it('builds events and keeps every input column', () => {
    const table = parseEventTable(INPUT);

    expect(table.columns).toEqual(['timestamp', 'price', 'action', 'raw_signal', 'note']);
    expect(table.rows[1]).toEqual({
      timestamp: '2024-01-02',
      price: '1,100',
      action: 'exit',
      raw_signal: 'ADX',
      note: 'second',
    });
    expect(table.events).toEqual([
      { timestamp: '2024-01-01', price: '100', action: 'enter', rawSignal: 'ADX breakout' },
      { timestamp: '2024-01-02', price: '1,100', action: 'exit', rawSignal: 'ADX' },
    ]);
  });

  it('maps configured column names and action labels', () => {
    const text = '\ufeff日期/时间,价格 USD,类型,信号\r\n2024-02-01 09:00,"64,250.5",进场,tempeture_index>70\r\n';

    const table = parseEventTable(text, {
      columns: { timestamp: '日期/时间', price: '价格 USD', action: '类型', signal: '信号' },
    });

    expect(table.events).toEqual([
      { timestamp: '2024-02-01 09:00', price: '64,250.5', action: 'enter', rawSignal: 'tempeture_index>70' },
    ]);
  });

  it('names the missing column', () => {
    expect(() => parseEventTable('timestamp,price,raw_signal\n2024-01-01,1,ADX\n')).toThrow(EventDataError);
    expect(() => parseEventTable('timestamp,price,raw_signal\n2024-01-01,1,ADX\n')).toThrow(
      'Missing required column "action" (found: timestamp, price, raw_signal)'
    );
  });

  it('returns no events for a header-only file', () => {
    expect(parseEventTable('timestamp,price,action,raw_signal\n').events).toEqual([]);
  });
});

describe('formatResultTable', () => {
  it('appends the result columns to each input row', () => {
    const table = parseEventTable(INPUT);
    const snapshots = [
      snapshot({ positionType: 'spot', assetQuantity: 10, activeSignals: ['ADX'], remark: 'switch flat -> spot' }),
      snapshot({ index: 1, totalAssetValueUsd: 1100, remark: 'switch spot -> flat' }),
    ];

    expect(formatResultTable(table, snapshots)).toBe(
      [
        'timestamp,price,action,raw_signal,note,position_type,asset_quantity,total_asset_value_usd,active_signals,remark',
        '2024-01-01,100,enter,ADX breakout,first,spot,10,1000,ADX,switch flat -> spot',
        '2024-01-02,"1,100",exit,ADX,second,flat,0,1100,,switch spot -> flat',
        '',
      ].join('\n')
    );
  });

  it('comma-joins active signals into one quoted cell', () => {
    const table = parseEventTable('timestamp,price,action,raw_signal\n2024-01-01,100,enter,ADX\n');
    const output = formatResultTable(table, [snapshot({ activeSignals: ['120_ma', 'ADX'] })]);

    expect(output.split('\n')[1]).toBe('2024-01-01,100,enter,ADX,flat,0,1000,"120_ma,ADX",');
  });

  it('prefixes a byte order mark on request', () => {
    const table = parseEventTable('timestamp,price,action,raw_signal\n');

    expect(formatResultTable(table, [], { bom: true }).startsWith('\ufefftimestamp,')).toBe(true);
  });

  it('refuses mismatched row and snapshot counts', () => {
    const table = parseEventTable(INPUT);

    expect(() => formatResultTable(table, [snapshot({})])).toThrow('Row/snapshot count mismatch: 2 rows, 1 snapshots');
  });
});
