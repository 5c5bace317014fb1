import type { ColumnMapping, ModifierEntries, ModifierEntry } from '../model/ColumnMapping.js';
import type { Modifier, ModifierInput } from '../model/Modifier.js';
import { ColumnIdentifierError } from '../errors/CsvSedErrors.js';
import { parseModifier } from './ModifierParser.js';

type ColumnKey = number | string;

interface ParsedEntry {
  readonly key: ColumnKey;
  readonly modifier: Modifier;
}

const INDEX_KEY = /^(0|[1-9]\d*)$/;

/**
 * Turn modifiers keyed by column index or header name into a mapping from zero-based column
 * index to parsed modifier.
 *
 * Every modifier is parsed before any column is resolved. Names are looked up in `headers`;
 * without headers only indices are accepted.
 *
 * @throws InvalidModifierError when a modifier does not parse.
 * @throws ColumnIdentifierError when a name is unknown or unresolvable, an index is invalid,
 *   or a name and an index address the same column.
 */
export function resolveColumns(headers: readonly string[] | undefined, entries: ModifierEntries): ColumnMapping {
  const parsed = normalizeEntries(headers, entries).map(
    ({ key, input }): ParsedEntry => ({ key, modifier: parseModifier(input) }),
  );

  const byIndex = new Map<number, Modifier>();
  for (const { key, modifier } of parsed) {
    if (typeof key !== 'number') continue;
    if (!Number.isInteger(key) || key < 0) {
      throw new ColumnIdentifierError(`Column index ${String(key)} is not a non-negative integer.`, key);
    }
    byIndex.set(key, modifier);
  }

  for (const { key, modifier } of parsed) {
    if (typeof key !== 'string') continue;
    if (!headers) {
      throw new ColumnIdentifierError(`Column "${key}" cannot be resolved by name without a header row.`, key);
    }
    const idx = headers.indexOf(key);
    if (idx < 0) {
      throw new ColumnIdentifierError(`Column "${key}" is not present in the header row.`, key);
    }
    const existing = byIndex.get(idx);
    if (existing) {
      throw new ColumnIdentifierError(
        `Column "${key}" has index ${String(idx)} which already has a modifier: ${existing.source}`,
        key,
      );
    }
    byIndex.set(idx, modifier);
  }

  return new Map([...byIndex].sort(([a], [b]) => a - b));
}

function normalizeEntries(
  headers: readonly string[] | undefined,
  entries: ModifierEntries,
): { key: ColumnKey; input: ModifierInput }[] {
  const pairs: [ColumnKey, ModifierEntry][] = isEntryArray(entries)
    ? entries.map((entry, idx): [ColumnKey, ModifierEntry] => [idx, entry])
    : isEntryMap(entries)
      ? [...entries]
      : Object.entries(entries).map(([key, entry]): [ColumnKey, ModifierEntry] => [objectKey(headers, key), entry]);

  const normalized: { key: ColumnKey; input: ModifierInput }[] = [];
  for (const [key, input] of pairs) {
    if (input === null || input === undefined || input === '') continue;
    normalized.push({ key, input });
  }
  return normalized;
}

function objectKey(headers: readonly string[] | undefined, key: string): ColumnKey {
  if (headers?.includes(key)) return key;
  return INDEX_KEY.test(key) ? Number(key) : key;
}

function isEntryArray(entries: ModifierEntries): entries is readonly ModifierEntry[] {
  return Array.isArray(entries);
}

function isEntryMap(entries: ModifierEntries): entries is ReadonlyMap<ColumnKey, ModifierEntry> {
  return entries instanceof Map;
}
