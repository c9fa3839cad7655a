import { describe, expect, it } from 'vitest';

import { splitStatements } from '../split.js';

describe('splitStatements', () => {
  it('should ignore semicolons in strings and comments', () => {
    const sql = "CREATE TABLE a (x TEXT DEFAULT ';');\n-- note; here\nINSERT INTO a VALUES ('it''s; fine');\n/* block; */\n";
    expect(splitStatements(sql)).toEqual([
      "CREATE TABLE a (x TEXT DEFAULT ';')",
      "-- note; here\nINSERT INTO a VALUES ('it''s; fine')",
    ]);
  });

  it('should keep quoted identifiers whole', () => {
    expect(splitStatements('SELECT `a;b` FROM t; SELECT "c;d" FROM u;')).toEqual([
      'SELECT `a;b` FROM t',
      'SELECT "c;d" FROM u',
    ]);
  });

  it('should keep dollar-quoted bodies whole', () => {
    expect(splitStatements('CREATE FUNCTION f() RETURNS int AS $$ SELECT 1; $$ LANGUAGE sql; SELECT 2')).toEqual([
      'CREATE FUNCTION f() RETURNS int AS $$ SELECT 1; $$ LANGUAGE sql',
      'SELECT 2',
    ]);
  });

  it('should end a literal at a quote that follows a backslash', () => {
    const sql = "CREATE TABLE a (p TEXT DEFAULT 'C:\\');\nCREATE TABLE b (id INT);\n";
    expect(splitStatements(sql)).toEqual(["CREATE TABLE a (p TEXT DEFAULT 'C:\\')", 'CREATE TABLE b (id INT)']);
  });

  it('should honour backslash escapes when the engine reads them', () => {
    const sql = "INSERT INTO a VALUES ('it\\'s; fine', 'C:\\\\'); SELECT 1";
    expect(splitStatements(sql, { backslashEscapes: true })).toEqual([
      "INSERT INTO a VALUES ('it\\'s; fine', 'C:\\\\')",
      'SELECT 1',
    ]);
  });

  it('should honour backslash escapes in E strings', () => {
    expect(splitStatements("SELECT E'\\'; still'; SELECT 'C:\\'; SELECT 2")).toEqual([
      "SELECT E'\\'; still'",
      "SELECT 'C:\\'",
      'SELECT 2',
    ]);
  });

  it('should return nothing for blank scripts', () => {
    expect(splitStatements('')).toEqual([]);
    expect(splitStatements('  ;\n-- only a comment\n')).toEqual([]);
  });
});
