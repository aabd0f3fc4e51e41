export type PositionType = 'flat' | 'spot' | 'leveraged_1x' | 'leveraged_2x';

export type LeveragedPosition = Extract<PositionType, 'leveraged_1x' | 'leveraged_2x'>;

export const POSITION_TYPES: readonly PositionType[] = ['flat', 'spot', 'leveraged_1x', 'leveraged_2x'];

export const LEVERAGE_MULTIPLIER: Record<LeveragedPosition, number> = {
  leveraged_1x: 1,
  leveraged_2x: 2,
};

// Alternate spellings accepted in policy files. The CJK labels are the ones
// written by older exports of the signal sheet.
const POSITION_ALIASES = new Map<string, PositionType>(Object.entries({
  flat: 'flat',
  cash: 'flat',
  spot: 'spot',
  leveraged_1x: 'leveraged_1x',
  '1x-leveraged': 'leveraged_1x',
  '1x': 'leveraged_1x',
  leveraged_2x: 'leveraged_2x',
  '2x-leveraged': 'leveraged_2x',
  '2x': 'leveraged_2x',
  空仓: 'flat',
  现货: 'spot',
  一倍合约: 'leveraged_1x',
  两倍合约: 'leveraged_2x',
} satisfies Record<string, PositionType>));

export function isLeveraged(position: PositionType): position is LeveragedPosition {
  return position === 'leveraged_1x' || position === 'leveraged_2x';
}

export function parsePositionType(label: string): PositionType | null {
  const key = label.trim();
  return POSITION_ALIASES.get(key) ?? POSITION_ALIASES.get(key.toLowerCase()) ?? null;
}
