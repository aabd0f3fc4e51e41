import { describe, expect, it } from 'vitest';

import { isLeveraged, parsePositionType, POSITION_TYPES } from '../../src/backtest/positions.js';

describe('parsePositionType', () => {
  it.each([
    ['flat', 'flat'],
    ['SPOT', 'spot'],
    ['1x-leveraged', 'leveraged_1x'],
    [' 2x ', 'leveraged_2x'],
    ['leveraged_2x', 'leveraged_2x'],
    ['空仓', 'flat'],
    ['现货', 'spot'],
    ['一倍合约', 'leveraged_1x'],
    ['两倍合约', 'leveraged_2x'],
  ])('parses %s', (label, expected) => {
    expect(parsePositionType(label)).toBe(expected);
  });

  it.each(['short', '3x', '', 'constructor'])('returns null for %j', (label) => {
    expect(parsePositionType(label)).toBeNull();
  });
});

describe('isLeveraged', () => {
  it('flags only the leveraged tiers', () => {
    expect(POSITION_TYPES.filter(isLeveraged)).toEqual(['leveraged_1x', 'leveraged_2x']);
  });
});
