/**
 * N-gram counting and count-to-probability conversion.
 */

import { InputValidationError } from './errors.js';
import type { NgramEntry, NgramKey } from './types.js';

export function tokenKey(token: string): NgramKey {
  return { kind: 'token', token };
}

export function sequenceKey(tokens: readonly string[]): NgramKey {
  return { kind: 'sequence', tokens: [...tokens] };
}

// Identity used for lookups only; it never reaches a file.
function identity(key: NgramKey): string {
  return key.kind === 'token'
    ? JSON.stringify(['t', key.token])
    : JSON.stringify(['s', ...key.tokens]);
}

/**
 * Insertion-ordered map from n-gram keys to numbers.
 */
export class NgramTable implements Iterable<NgramEntry> {
  private entries = new Map<string, NgramEntry>();

  static from(entries: Iterable<NgramEntry>): NgramTable {
    const table = new NgramTable();
    for (const { key, value } of entries) table.set(key, value);
    return table;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: NgramKey): number | undefined {
    return this.entries.get(identity(key))?.value;
  }

  has(key: NgramKey): boolean {
    return this.entries.has(identity(key));
  }

  set(key: NgramKey, value: number): this {
    const id = identity(key);
    const existing = this.entries.get(id);
    if (existing) {
      existing.value = value;
    } else {
      this.entries.set(id, { key, value });
    }
    return this;
  }

  increment(key: NgramKey, by = 1): void {
    this.set(key, (this.get(key) ?? 0) + by);
  }

  total(): number {
    let sum = 0;
    for (const { value } of this.entries.values()) sum += value;
    return sum;
  }

  keys(): NgramKey[] {
    return [...this.entries.values()].map((e: NgramEntry) => e.key);
  }

  [Symbol.iterator](): Iterator<NgramEntry> {
    return [...this.entries.values()]
      .map((e: NgramEntry) => ({ key: e.key, value: e.value }))[Symbol.iterator]();
  }

  /** Entries sorted by value descending, ties in insertion order */
  top(limit: number): NgramEntry[] {
    return [...this]
      .sort((a: NgramEntry, b: NgramEntry) => b.value - a.value)
      .slice(0, limit);
  }
}

export function ngrams(tokens: readonly string[], n: number): NgramTable {
  if (!Number.isInteger(n) || n < 1) {
    throw new InputValidationError(`N-gram size must be a positive integer, got ${n}`);
  }

  const table = new NgramTable();

  if (n === 1) {
    for (const token of tokens) table.increment(tokenKey(token));
    return table;
  }

  for (let i = 0; i + n <= tokens.length; i++) {
    table.increment(sequenceKey(tokens.slice(i, i + n)));
  }
  return table;
}

/**
 * Add-s smoothing over the observed keys only: no mass is set aside for
 * unseen n-grams. A zero denominator yields an empty table.
 */
export function probabilities(counts: NgramTable, smoothing = 0): NgramTable {
  if (!Number.isFinite(smoothing) || smoothing < 0) {
    throw new InputValidationError(`Smoothing must be a non-negative number, got ${smoothing}`);
  }

  const result = new NgramTable();
  const denominator = counts.total() + smoothing * counts.size;
  if (counts.size === 0 || denominator === 0) return result;

  for (const { key, value } of counts) {
    result.set(key, (value + smoothing) / denominator);
  }
  return result;
}

export function formatKey(key: NgramKey): string {
  return key.kind === 'token' ? key.token : key.tokens.join(' ');
}
