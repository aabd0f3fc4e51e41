import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { PolicyConfigError } from '../../src/backtest/errors.js';
import {
  DEFAULT_POLICY,
  defaultPolicyFor,
  formatSignalSetKey,
  loadPolicy,
  parseSignalSetKey,
  PositionPolicy,
  signalSetKey,
} from '../../src/backtest/policy.js';

function writeTempPolicy(name: string, body: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'signal-backtest-policy-'));
  const path = join(dir, name);
  writeFileSync(path, body, 'utf-8');
  return path;
}

describe('signalSetKey', () => {
  it('ignores order and duplicates', () => {
    expect(signalSetKey(['b', 'a', 'b'])).toBe('["a","b"]');
    expect(signalSetKey(new Set(['a', 'b']))).toBe(signalSetKey(['b', 'a']));
    expect(signalSetKey([])).toBe('[]');
  });

  it('keeps sets with separator-like members apart', () => {
    expect(signalSetKey([''])).not.toBe(signalSetKey([]));
    expect(signalSetKey(['x|y'])).not.toBe(signalSetKey(['x', 'y']));
  });

  it('formats the record form of a set', () => {
    expect(formatSignalSetKey(['ADX', '120_ma', 'ADX'])).toBe('120_ma|ADX');
    expect(formatSignalSetKey([])).toBe('');
  });

  it('parses keys back into sorted sets', () => {
    expect(parseSignalSetKey(' ADX | 120_ma |ADX')).toEqual(['120_ma', 'ADX']);
    expect(parseSignalSetKey('')).toEqual([]);
  });
});

describe('PositionPolicy', () => {
  it('resolves mapped combinations regardless of insertion order', () => {
    const policy = PositionPolicy.fromRecord({
      '': 'flat',
      'ADX | 120_ma': { position: '2x', ratio: 0.5 },
    });

    expect(policy.size).toBe(2);
    expect(policy.resolve(['120_ma', 'ADX'])).toEqual({ position: 'leveraged_2x', ratio: 0.5 });
    expect(policy.resolve(new Set(['ADX', '120_ma']))).toEqual({ position: 'leveraged_2x', ratio: 0.5 });
    expect(policy.resolve([])).toEqual({ position: 'flat', ratio: 1 });
  });

  it('returns undefined for unmapped combinations', () => {
    const policy = PositionPolicy.fromRecord({ ADX: 'spot' });

    expect(policy.resolve(['120_ma'])).toBeUndefined();
    expect(policy.has(['ADX'])).toBe(true);
    expect(policy.has(['ADX', '120_ma'])).toBe(false);
  });

  it('accepts legacy position labels', () => {
    const policy = PositionPolicy.fromRecord({ tempeture_index: { position: '一倍合约' } });

    expect(policy.resolve(['tempeture_index'])?.position).toBe('leveraged_1x');
  });

  it('rejects unknown positions', () => {
    expect(() => PositionPolicy.fromRecord({ ADX: 'short' })).toThrow(
      'Unknown position "short" for signal set "ADX" (expected flat|spot|leveraged_1x|leveraged_2x)'
    );
    expect(() => PositionPolicy.fromEntries([[['ADX'], { position: '3x' }]])).toThrow(PolicyConfigError);
  });

  it('rejects ratios outside [0, 1]', () => {
    expect(() => PositionPolicy.fromRecord({ ADX: { position: 'spot', ratio: 1.5 } })).toThrow(
      'Ratio for signal set "ADX" must be within [0, 1], got 1.5'
    );
    expect(() => PositionPolicy.fromRecord({ ADX: { position: 'spot', ratio: -0.1 } })).toThrow(
      PolicyConfigError
    );
  });

  it.each([null, 'flat', ['ADX'], { ADX: 3 }, { ADX: { ratio: 1 } }])('rejects malformed input %j', (raw) => {
    expect(() => PositionPolicy.fromRecord(raw)).toThrow(PolicyConfigError);
  });

  it('round-trips through its record form', () => {
    const copy = PositionPolicy.fromRecord(DEFAULT_POLICY.toRecord());

    expect(copy.entries()).toEqual(DEFAULT_POLICY.entries());
  });
});

describe('DEFAULT_POLICY', () => {
  it('scales position with the number of active signals', () => {
    expect(DEFAULT_POLICY.size).toBe(8);
    expect(DEFAULT_POLICY.resolve([])?.position).toBe('flat');
    expect(DEFAULT_POLICY.resolve(['120_ma'])?.position).toBe('spot');
    expect(DEFAULT_POLICY.resolve(['ADX', 'tempeture_index'])?.position).toBe('leveraged_1x');
    expect(DEFAULT_POLICY.resolve(['ADX', '120_ma', 'tempeture_index'])?.position).toBe('leveraged_2x');
  });

  it('caps larger vocabularies at 2x', () => {
    const policy = defaultPolicyFor(['a', 'b', 'c', 'd']);

    expect(policy.size).toBe(16);
    expect(policy.resolve(['a', 'b', 'c', 'd'])?.position).toBe('leveraged_2x');
  });
});

describe('loadPolicy', () => {
  it('falls back to the default policy', () => {
    expect(loadPolicy()).toBe(DEFAULT_POLICY);
    expect(loadPolicy('  ')).toBe(DEFAULT_POLICY);
  });

  it('parses inline JSON', () => {
    const policy = loadPolicy('{"": "flat", "ADX|120_ma": {"position": "spot", "ratio": 0.25}}');

    expect(policy.resolve(['120_ma', 'ADX'])).toEqual({ position: 'spot', ratio: 0.25 });
  });

  it('reads JSON and YAML files', () => {
    const jsonPath = writeTempPolicy('policy.json', JSON.stringify({ ADX: { position: 'leveraged_1x' } }));
    const yamlPath = writeTempPolicy('policy.yaml', 'ADX: spot\n"ADX|tempeture_index": 2x\n');

    expect(loadPolicy(jsonPath).resolve(['ADX'])?.position).toBe('leveraged_1x');
    expect(loadPolicy(yamlPath).resolve(['tempeture_index', 'ADX'])?.position).toBe('leveraged_2x');
  });

  it('rejects text that is neither a file nor an object', () => {
    expect(() => loadPolicy('missing-policy.json')).toThrow(
      'Policy "missing-policy.json" is neither an existing file nor a JSON object'
    );
  });
});
