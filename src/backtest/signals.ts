import { PolicyConfigError } from './errors.js';

/**
 * Default canonical signals, in matching priority order. Spellings follow the
 * labels emitted by the indicator feed.
 */
export const DEFAULT_SIGNALS: readonly string[] = ['tempeture_index', '120_ma', 'ADX'];

// `|` joins policy keys and `,` joins the display column.
const RESERVED_CHARS = /[|,]/;

export type SignalNormalizer = (raw: string) => string;

/**
 * Map a loosely formatted signal label onto a canonical identifier.
 *
 * An exact match wins outright; otherwise the first canonical name (in
 * vocabulary order) contained in the label is returned. Labels that match
 * nothing come back trimmed, so new indicators pass through untouched.
 */
export function normalizeSignal(raw: string, vocabulary: readonly string[] = DEFAULT_SIGNALS): string {
  const label = String(raw);
  const trimmed = label.trim();
  if (vocabulary.includes(trimmed)) return trimmed;
  for (const canonical of vocabulary) {
    if (label.includes(canonical)) return canonical;
  }
  return trimmed;
}

export function validateSignalVocabulary(vocabulary: readonly string[]): string[] {
  if (vocabulary.length === 0) {
    throw new PolicyConfigError('Signal vocabulary must contain at least one signal');
  }
  const seen = new Set<string>();
  for (const name of vocabulary) {
    const trimmed = name.trim();
    if (trimmed.length === 0 || trimmed !== name) {
      throw new PolicyConfigError(`Invalid signal name "${name}" (empty or padded with whitespace)`);
    }
    if (RESERVED_CHARS.test(name)) {
      throw new PolicyConfigError(`Signal name "${name}" must not contain "|" or ","`);
    }
    if (seen.has(name)) {
      throw new PolicyConfigError(`Duplicate signal name "${name}"`);
    }
    seen.add(name);
  }
  return [...vocabulary];
}

export function createSignalNormalizer(vocabulary: readonly string[] = DEFAULT_SIGNALS): SignalNormalizer {
  const names = validateSignalVocabulary(vocabulary);
  return (raw) => normalizeSignal(raw, names);
}

/**
 * Every subset of the vocabulary: empty set first, then by size, members in
 * vocabulary order.
 */
export function enumerateSignalSets(vocabulary: readonly string[] = DEFAULT_SIGNALS): string[][] {
  const subsets: string[][] = [];
  const pick = (start: number, size: number, acc: string[]): void => {
    if (acc.length === size) {
      subsets.push([...acc]);
      return;
    }
    for (let i = start; i < vocabulary.length; i++) {
      acc.push(vocabulary[i]);
      pick(i + 1, size, acc);
      acc.pop();
    }
  };
  for (let size = 0; size <= vocabulary.length; size++) {
    pick(0, size, []);
  }
  return subsets;
}
