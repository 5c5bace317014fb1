import type {
  ExecuteModifier,
  FunctionModifier,
  Modifier,
  ReplacementPart,
  SubstituteModifier,
  TransliterateModifier,
} from '../model/Modifier.js';
import type { CommandRunner } from '../ports/CommandRunner.js';
import { ExecutionError, InvalidModifierError } from '../errors/CsvSedErrors.js';

/** What `e/COMMAND/` modifiers need to run. */
export interface ExecutionContext {
  readonly runner: CommandRunner;
  /** Upper bound on each command's run time, in milliseconds. */
  readonly timeoutMs: number;
}

/** Apply a parsed modifier to one field value. */
export async function applyModifier(modifier: Modifier, value: string, context: ExecutionContext): Promise<string> {
  switch (modifier.kind) {
    case 'substitute':
      return substitute(modifier, value);
    case 'transliterate':
      return transliterate(modifier, value);
    case 'execute':
      return execute(modifier, value, context);
    case 'function':
      return callFunction(modifier, value);
    default: {
      const unreachable: never = modifier;
      throw new Error(`Unknown modifier: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Replace the first match (or every match when global) with the expanded template. */
export function substitute(modifier: SubstituteModifier, value: string): string {
  // A global pattern keeps `lastIndex` between `exec()` calls; `replace()` resets it.
  return value.replace(modifier.pattern, (match: string, ...rest: unknown[]) =>
    expandReplacement(modifier.replacement, match, rest),
  );
}

function expandReplacement(parts: readonly ReplacementPart[], match: string, rest: readonly unknown[]): string {
  // Replacer arguments: captures..., offset, input[, named groups].
  const offsetAt = rest.findIndex((arg) => typeof arg === 'number');
  const captures = rest.slice(0, offsetAt < 0 ? rest.length : offsetAt);
  const last = rest[rest.length - 1];
  const named = typeof last === 'object' && last !== null ? new Map(Object.entries(last)) : new Map<string, unknown>();

  let out = '';
  for (const part of parts) {
    if (part.type === 'text') {
      out += part.text;
      continue;
    }
    const group = typeof part.group === 'number' ? (part.group === 0 ? match : captures[part.group - 1]) : named.get(part.group);
    out += typeof group === 'string' ? group : '';
  }
  return out;
}

/** Map every character found in the table; others pass through. Length is preserved. */
export function transliterate(modifier: TransliterateModifier, value: string): string {
  let out = '';
  for (const ch of value) {
    out += modifier.table.get(ch) ?? ch;
  }
  return out;
}

/** Pipe the value through the command and return its output minus one trailing newline. */
export async function execute(modifier: ExecuteModifier, value: string, context: ExecutionContext): Promise<string> {
  const result = await context.runner.run(modifier.command, value, { timeoutMs: context.timeoutMs });
  if (result.exitCode !== 0) {
    throw new ExecutionError(modifier.command, 'exit', { exitCode: result.exitCode, stderr: result.stderr });
  }
  return result.stdout.endsWith('\n') ? result.stdout.slice(0, -1) : result.stdout;
}

async function callFunction(modifier: FunctionModifier, value: string): Promise<string> {
  const result: unknown = await modifier.fn(value);
  if (typeof result !== 'string') {
    throw new InvalidModifierError(modifier.source, `function returned ${typeof result} instead of a string`);
  }
  return result;
}
