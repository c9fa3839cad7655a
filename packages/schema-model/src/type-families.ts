/**
 * Coarse classification of canonical SQL types.
 *
 * Providers decide how to apply a type change from the families involved, and
 * data-loss analysis uses the same classification to tell widening changes
 * from ones that may truncate or reject existing values.
 */

export type TypeFamily =
  | 'integer'
  | 'decimal'
  | 'float'
  | 'boolean'
  | 'text'
  | 'temporal'
  | 'json'
  | 'binary'
  | 'uuid'
  | 'other';

const FAMILY_PATTERNS: ReadonlyArray<[RegExp, TypeFamily]> = [
  [/^(TINYINT\(1\)|BOOLEAN|BOOL)$/, 'boolean'],
  [/^(TINYINT|SMALLINT|MEDIUMINT|INTEGER|INT|BIGINT|SMALLSERIAL|SERIAL|BIGSERIAL)\b/, 'integer'],
  [/^(DECIMAL|NUMERIC|MONEY)\b/, 'decimal'],
  [/^(REAL|DOUBLE|FLOAT)\b/, 'float'],
  [/^(TEXT|TINYTEXT|MEDIUMTEXT|LONGTEXT|CITEXT|VARCHAR|CHAR|CHARACTER|ENUM)\b/, 'text'],
  [/^(TIMESTAMPTZ|TIMESTAMP|DATETIME|DATE|TIMETZ|TIME|YEAR)\b/, 'temporal'],
  [/^(JSONB|JSON)\b/, 'json'],
  [/^(BYTEA|TINYBLOB|BLOB|MEDIUMBLOB|LONGBLOB|BINARY|VARBINARY)\b/, 'binary'],
  [/^UUID$/, 'uuid'],
];

const INTEGER_RANK: Record<string, number> = {
  TINYINT: 1,
  SMALLINT: 2,
  SMALLSERIAL: 2,
  MEDIUMINT: 3,
  INT: 4,
  INTEGER: 4,
  SERIAL: 4,
  BIGINT: 5,
  BIGSERIAL: 5,
};

/** Text types without a length limit */
const UNBOUNDED_TEXT = new Set(['TEXT', 'MEDIUMTEXT', 'LONGTEXT', 'CITEXT']);

export function typeFamily(type: string): TypeFamily {
  const normalized = type.trim().toUpperCase();
  if (normalized.endsWith('[]')) return 'other';
  for (const [pattern, family] of FAMILY_PATTERNS) {
    if (pattern.test(normalized)) return family;
  }
  return 'other';
}

function isNumericFamily(family: TypeFamily): boolean {
  return family === 'integer' || family === 'decimal' || family === 'float';
}

/**
 * Whether a database can convert values of `from` into `to` with a cast.
 */
export function areCastCompatible(from: string, to: string): boolean {
  const a = typeFamily(from);
  const b = typeFamily(to);
  if (a === b) return a !== 'other' || baseName(from) === baseName(to);
  if (isNumericFamily(a) && isNumericFamily(b)) return true;
  return b === 'text' && a !== 'binary' && a !== 'other';
}

/**
 * Whether every value of `from` fits in `to` unchanged.
 */
export function isWideningChange(from: string, to: string): boolean {
  const fromBase = baseName(from);
  const toBase = baseName(to);
  if (from.trim().toUpperCase() === to.trim().toUpperCase()) return true;

  const a = typeFamily(from);
  const b = typeFamily(to);

  if (b === 'text' && UNBOUNDED_TEXT.has(toBase)) return a !== 'binary' && a !== 'other';

  if (a === 'integer' && b === 'integer') {
    return (INTEGER_RANK[fromBase] ?? 0) <= (INTEGER_RANK[toBase] ?? 0);
  }
  if (a === 'integer' && b === 'decimal') return true;

  if (fromBase === toBase) {
    const fromArgs = typeArguments(from);
    const toArgs = typeArguments(to);
    if (toArgs.length === 0) return true;
    if (fromArgs.length !== toArgs.length) return false;
    return fromArgs.every((value, i) => value <= (toArgs[i] ?? 0));
  }

  if (a === 'text' && b === 'text') {
    // CHAR/VARCHAR of the same length are interchangeable for stored values.
    const fromArgs = typeArguments(from);
    const toArgs = typeArguments(to);
    return fromArgs.length === 1 && toArgs.length === 1 && (fromArgs[0] ?? 0) <= (toArgs[0] ?? 0);
  }

  return false;
}

function baseName(type: string): string {
  return (
    type
      .trim()
      .toUpperCase()
      .match(/^[A-Z ]+?(?=\(|$| UNSIGNED)/)?.[0]
      ?.trim() ?? type.trim().toUpperCase()
  );
}

function typeArguments(type: string): number[] {
  const match = type.match(/\(([^)]*)\)/);
  if (!match?.[1]) return [];
  return match[1]
    .split(',')
    .map((part) => Number(part.trim()))
    .filter((value) => Number.isFinite(value));
}
