export interface SplitOptions {
  /**
   * A backslash inside a string literal escapes the next character, as in
   * MySQL. PostgreSQL honours it only in `E'...'` strings, SQLite never.
   */
  backslashEscapes?: boolean;
}

/**
 * Split a migration script into statements.
 *
 * Semicolons inside quoted strings and identifiers, `--` and `/* *\/`
 * comments and PostgreSQL dollar-quoted bodies do not end a statement.
 * Pieces holding only whitespace and comments are dropped.
 */
export function splitStatements(sql: string, options: SplitOptions = {}): string[] {
  const statements: string[] = [];
  let start = 0;
  let i = 0;

  const push = (end: number) => {
    const statement = sql.slice(start, end).trim();
    if (hasCode(statement)) statements.push(statement);
    start = end + 1;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "'" || ch === '"' || ch === '`') {
      const escapes = ch !== '`' && (options.backslashEscapes === true || (ch === "'" && isEscapeString(sql, i)));
      i = skipQuoted(sql, i, ch, escapes);
    } else if (ch === '-' && next === '-') {
      i = skipUntil(sql, i + 2, '\n');
    } else if (ch === '/' && next === '*') {
      i = skipUntil(sql, i + 2, '*/');
    } else if (ch === '$') {
      const tag = /^\$[A-Za-z_]*\$/.exec(sql.slice(i))?.[0];
      i = tag ? skipUntil(sql, i + tag.length, tag) : i + 1;
    } else if (ch === ';') {
      push(i);
      i += 1;
    } else {
      i += 1;
    }
  }
  push(sql.length);

  return statements;
}

/** PostgreSQL `E'...'` literal: the quote follows a lone `E` */
function isEscapeString(sql: string, quote: number): boolean {
  return /[Ee]/.test(sql[quote - 1] ?? '') && !/[\w$]/.test(sql[quote - 2] ?? '');
}

/** Index just past the closing quote; a doubled quote is an escaped one */
function skipQuoted(sql: string, open: number, quote: string, backslashEscapes: boolean): number {
  let i = open + 1;
  while (i < sql.length) {
    if (backslashEscapes && sql[i] === '\\') {
      i += 2;
      continue;
    }
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i += 1;
  }
  return sql.length;
}

function skipUntil(sql: string, from: number, terminator: string): number {
  const end = sql.indexOf(terminator, from);
  return end === -1 ? sql.length : end + terminator.length;
}

function hasCode(statement: string): boolean {
  const stripped = statement
    .replace(/--[^\n]*/g, '')
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .trim();
  return stripped.length > 0;
}
