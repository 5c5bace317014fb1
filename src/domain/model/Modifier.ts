/** A caller-supplied transformation, accepted wherever a modifier string is. */
export type ModifierFn = (value: string) => string | Promise<string>;

/** A raw modifier as supplied by the caller: sed-like text, or a function. */
export type ModifierInput = string | ModifierFn;

/** Flag letters understood by the substitute (`s`) modifier. */
export type SubstituteFlag = 'i' | 'g' | 'l' | 'm' | 's' | 'u' | 'x';

/** Flag letters understood by the transliterate (`y`) modifier. */
export type TransliterateFlag = 'i';

/** One piece of a compiled replacement template: literal text or a group reference. */
export type ReplacementPart =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'group'; readonly group: number | string };

/** `s/REGEX/REPL/FLAGS`. */
export interface SubstituteModifier {
  readonly kind: 'substitute';
  /** The modifier text this was parsed from. */
  readonly source: string;
  readonly pattern: RegExp;
  readonly replacement: readonly ReplacementPart[];
  readonly flags: readonly SubstituteFlag[];
  /** `0` replaces every match, `1` only the first. */
  readonly count: 0 | 1;
}

/** `y/SRC/DST/FLAGS`. */
export interface TransliterateModifier {
  readonly kind: 'transliterate';
  readonly source: string;
  /** Source code point to destination code point. */
  readonly table: ReadonlyMap<string, string>;
  readonly flags: readonly TransliterateFlag[];
}

/** `e/COMMAND/`. */
export interface ExecuteModifier {
  readonly kind: 'execute';
  readonly source: string;
  readonly command: string;
}

/** A function modifier supplied through the library API. */
export interface FunctionModifier {
  readonly kind: 'function';
  readonly source: string;
  readonly fn: ModifierFn;
}

/** A parsed operator, ready to be applied to field values. */
export type Modifier = SubstituteModifier | TransliterateModifier | ExecuteModifier | FunctionModifier;

/** Discriminant of `Modifier`. */
export type ModifierKind = Modifier['kind'];
