/**
 * Frequency Store
 * Saves and loads n-gram tables as flat JSON records ("key": value per line)
 */

import fs from 'fs';
import { InputValidationError } from './errors.js';
import { NgramTable, sequenceKey, tokenKey } from './ngrams.js';
import type { NgramKey } from './types.js';

// Tokens are assumed never to contain this
export const KEY_DELIMITER = '||';

export function serializeKey(key: NgramKey): string {
  return key.kind === 'token' ? key.token : key.tokens.join(KEY_DELIMITER);
}

export function deserializeKey(raw: string): NgramKey {
  return raw.includes(KEY_DELIMITER) ? sequenceKey(raw.split(KEY_DELIMITER)) : tokenKey(raw);
}

export function toRecord(table: NgramTable): Record<string, number> {
  // Null prototype so a "__proto__" token is stored as a plain key
  const record: Record<string, number> = Object.create(null);
  for (const { key, value } of table) {
    record[serializeKey(key)] = value;
  }
  return record;
}

export function fromRecord(record: unknown): NgramTable {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new InputValidationError('Frequency file must contain a JSON object');
  }

  const table = new NgramTable();
  for (const [raw, value] of Object.entries(record)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InputValidationError(`Frequency for "${raw}" is not a number`);
    }
    table.set(deserializeKey(raw), value);
  }
  return table;
}

export function saveFrequencies(table: NgramTable, filename: string): void {
  fs.writeFileSync(filename, JSON.stringify(toRecord(table), null, 2), 'utf-8');
}

export function loadFrequencies(filename: string): NgramTable {
  const content = fs.readFileSync(filename, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new InputValidationError(`${filename} is not valid JSON`);
  }
  return fromRecord(parsed);
}
