import { existsSync, readFileSync } from 'node:fs';

import yaml from 'yaml';
import { z } from 'zod';

import { PolicyConfigError } from './errors.js';
import { parsePositionType, type PositionType } from './positions.js';
import { DEFAULT_SIGNALS, enumerateSignalSets } from './signals.js';

export type PolicyTarget = {
  position: PositionType;
  /** Share of equity to allocate. Validated and carried, not applied by the engine. */
  ratio: number;
};

export type PolicyTargetInput = {
  position: string;
  ratio?: number;
};

export type PolicyEntry = {
  signals: string[];
  target: PolicyTarget;
};

const KEY_SEPARATOR = '|';

const targetSchema = z.union([
  z.string(),
  z.object({
    position: z.string(),
    ratio: z.number().optional(),
  }),
]);

export const policyRecordSchema = z.record(z.string(), targetSchema);

function canonicalSignalSet(signals: Iterable<string>): string[] {
  return [...new Set(signals)].sort();
}

/**
 * Order-independent lookup key for a set of signals. Members are encoded
 * individually, so no label (empty, or containing the record separator) can
 * collide with a different set.
 */
export function signalSetKey(signals: Iterable<string>): string {
  return JSON.stringify(canonicalSignalSet(signals));
}

/** Record form of a set: sorted members joined with `|`, the empty set as `""`. */
export function formatSignalSetKey(signals: Iterable<string>): string {
  return canonicalSignalSet(signals).join(KEY_SEPARATOR);
}

export function parseSignalSetKey(key: string): string[] {
  return canonicalSignalSet(
    key
      .split(KEY_SEPARATOR)
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
  );
}

function toTarget(input: PolicyTargetInput, key: string): PolicyTarget {
  const position = parsePositionType(input.position);
  if (!position) {
    throw new PolicyConfigError(
      `Unknown position "${input.position}" for signal set "${key}" (expected flat|spot|leveraged_1x|leveraged_2x)`
    );
  }
  const ratio = input.ratio ?? 1;
  if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
    throw new PolicyConfigError(`Ratio for signal set "${key}" must be within [0, 1], got ${ratio}`);
  }
  return { position, ratio };
}

/**
 * Read-only mapping from an active signal set to the position to hold.
 *
 * The table is deliberately partial: `resolve` returns undefined for a
 * combination it does not list, and the engine then keeps its current
 * position.
 */
export class PositionPolicy {
  private constructor(private readonly table: ReadonlyMap<string, PolicyEntry>) {}

  static fromEntries(
    entries: Iterable<readonly [Iterable<string>, PolicyTargetInput]>
  ): PositionPolicy {
    const table = new Map<string, PolicyEntry>();
    for (const [signals, input] of entries) {
      const members = canonicalSignalSet(signals);
      table.set(signalSetKey(members), {
        signals: members,
        target: toTarget(input, formatSignalSetKey(members)),
      });
    }
    return new PositionPolicy(table);
  }

  /**
   * Build a policy from its serialised form, e.g.
   * `{ "": "flat", "ADX|120_ma": { "position": "leveraged_1x", "ratio": 1 } }`.
   */
  static fromRecord(raw: unknown): PositionPolicy {
    const parsed = policyRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PolicyConfigError(`Invalid policy: ${issues}`);
    }
    return PositionPolicy.fromEntries(
      Object.entries(parsed.data).map(
        ([key, value]) =>
          [parseSignalSetKey(key), typeof value === 'string' ? { position: value } : value] as const
      )
    );
  }

  get size(): number {
    return this.table.size;
  }

  resolve(activeSignals: Iterable<string>): PolicyTarget | undefined {
    return this.table.get(signalSetKey(activeSignals))?.target;
  }

  has(activeSignals: Iterable<string>): boolean {
    return this.table.has(signalSetKey(activeSignals));
  }

  entries(): PolicyEntry[] {
    return [...this.table.values()].map((entry) => ({
      signals: [...entry.signals],
      target: { ...entry.target },
    }));
  }

  toRecord(): Record<string, PolicyTarget> {
    const out: Record<string, PolicyTarget> = {};
    for (const entry of this.table.values()) {
      out[formatSignalSetKey(entry.signals)] = { ...entry.target };
    }
    return out;
  }
}

const POSITION_BY_SIGNAL_COUNT: readonly PositionType[] = ['flat', 'spot', 'leveraged_1x', 'leveraged_2x'];

/**
 * Count-based policy over a vocabulary: no signals flat, one spot, two 1x
 * leveraged, three or more 2x leveraged.
 */
export function defaultPolicyFor(vocabulary: readonly string[]): PositionPolicy {
  const top = POSITION_BY_SIGNAL_COUNT.length - 1;
  return PositionPolicy.fromEntries(
    enumerateSignalSets(vocabulary).map(
      (signals) => [signals, { position: POSITION_BY_SIGNAL_COUNT[Math.min(signals.length, top)] }] as const
    )
  );
}

export const DEFAULT_POLICY: PositionPolicy = defaultPolicyFor(DEFAULT_SIGNALS);

function parsePolicyText(text: string, origin: string): unknown {
  try {
    return yaml.parse(text);
  } catch (error) {
    throw new PolicyConfigError(
      `Failed to parse policy from ${origin}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Resolve a policy argument: nothing means the default policy, an existing
 * path is read as JSON or YAML, anything else is parsed as inline JSON.
 */
export function loadPolicy(arg?: string | null): PositionPolicy {
  if (!arg || arg.trim().length === 0) {
    return DEFAULT_POLICY;
  }
  if (existsSync(arg)) {
    return PositionPolicy.fromRecord(parsePolicyText(readFileSync(arg, 'utf-8'), arg));
  }
  const raw = parsePolicyText(arg, 'inline text');
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new PolicyConfigError(`Policy "${arg}" is neither an existing file nor a JSON object`);
  }
  return PositionPolicy.fromRecord(raw);
}
