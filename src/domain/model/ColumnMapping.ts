import type { Modifier, ModifierInput } from './Modifier.js';

/** Zero-based column index to the single modifier applied to it, in ascending index order. */
export type ColumnMapping = ReadonlyMap<number, Modifier>;

/** An entry left empty means "leave this column alone". */
export type ModifierEntry = ModifierInput | null | undefined;

/**
 * The forms in which column modifiers can be supplied.
 *
 * - An array assigns modifiers by position: `['s/a/b/', undefined, 'y/a-z/A-Z/']`.
 * - A `Map` distinguishes indices (numbers) from header names (strings).
 * - A plain object is keyed by header name, or by index written as a non-negative integer
 *   string when no header column carries that name.
 */
export type ModifierEntries =
  | readonly ModifierEntry[]
  | ReadonlyMap<number | string, ModifierEntry>
  | Readonly<Record<string, ModifierEntry>>;
