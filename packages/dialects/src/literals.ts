/**
 * SQL literal and default-expression helpers shared by the providers.
 */

import type { AttributeValue, FunctionCallValue } from '@tidemark/schema';

export const NUMERIC_LITERAL = /^-?\d+(\.\d+)?$/;

const QUOTED_LITERAL = /^'((?:[^']|'')*)'$/s;
const ESCAPED_LITERAL = /^'((?:[^'\\]|''|\\.)*)'$/s;

/** Characters a backslash escape stands for; any other escaped character is itself */
const BACKSLASH_ESCAPES: Record<string, string> = { '0': '\0', n: '\n', r: '\r', t: '\t', b: '\b', Z: '\x1a' };

/**
 * Single-quoted SQL literal. With `backslashEscapes` every backslash is
 * doubled, for engines that read `\` as an escape character.
 */
export function quoteLiteral(text: string, backslashEscapes = false): string {
  const escaped = backslashEscapes ? text.replace(/\\/g, '\\\\') : text;
  return `'${escaped.replace(/'/g, "''")}'`;
}

/** Content of a single-quoted SQL literal, or undefined when `raw` is not one */
export function unquoteLiteral(raw: string, backslashEscapes = false): string | undefined {
  if (!backslashEscapes) {
    const match = QUOTED_LITERAL.exec(raw);
    return match ? (match[1] ?? '').replace(/''/g, "'") : undefined;
  }
  const match = ESCAPED_LITERAL.exec(raw);
  if (!match) return undefined;
  return (match[1] ?? '').replace(/''|\\(.)/gs, (_match: string, escaped: string | undefined) =>
    escaped === undefined ? "'" : (BACKSLASH_ESCAPES[escaped] ?? escaped),
  );
}

export function stringValue(value: string): AttributeValue {
  return { kind: 'string', value };
}

export function numberValue(raw: string): AttributeValue {
  return { kind: 'number', value: Number(raw), raw };
}

export function booleanValue(value: boolean): AttributeValue {
  return { kind: 'boolean', value };
}

export function callValue(name: string, ...args: string[]): FunctionCallValue {
  return { kind: 'call', name, args: args.map((arg) => ({ value: stringValue(arg) })) };
}

/** Wrap a database expression the declaration language has no spelling for */
export function dbGenerated(expression: string): AttributeValue {
  return callValue('dbgenerated', expression);
}

/** First positional string argument of a call, e.g. the SQL of `dbgenerated("…")` */
export function firstStringArgument(call: FunctionCallValue): string | undefined {
  const first = call.args[0]?.value;
  return first?.kind === 'string' ? first.value : undefined;
}
