import { describe, expect, it } from 'vitest';

import { tokenize } from '../lexer.js';

describe('Lexer', () => {
  it('should tokenize a model header and field with positions', () => {
    const { tokens, errors } = tokenize('model User {\n  id Int @id\n}');
    expect(errors).toEqual([]);
    expect(tokens.map((t) => [t.type, t.value, t.line, t.column])).toEqual([
      ['IDENTIFIER', 'model', 1, 1],
      ['IDENTIFIER', 'User', 1, 7],
      ['LBRACE', '{', 1, 12],
      ['NEWLINE', '\n', 1, 13],
      ['IDENTIFIER', 'id', 2, 3],
      ['IDENTIFIER', 'Int', 2, 6],
      ['AT', '@', 2, 10],
      ['IDENTIFIER', 'id', 2, 11],
      ['NEWLINE', '\n', 2, 13],
      ['RBRACE', '}', 3, 1],
      ['EOF', '', 3, 2],
    ]);
  });

  it('should distinguish @ from @@', () => {
    const { tokens } = tokenize('@@map @db');
    expect(tokens.map((t) => t.type)).toEqual(['ATAT', 'IDENTIFIER', 'AT', 'IDENTIFIER', 'EOF']);
  });

  it('should skip line and block comments', () => {
    const { tokens } = tokenize('/// docs\nid /* inline */ Int // trailing');
    expect(tokens.map((t) => t.value)).toEqual(['\n', 'id', 'Int', '']);
  });

  it('should decode string escapes', () => {
    const { tokens } = tokenize('"say \\"hi\\"\\n"');
    expect(tokens[0]).toMatchObject({ type: 'STRING', value: 'say "hi"\n' });
  });

  it('should read negative and decimal numbers', () => {
    const { tokens } = tokenize('-1.5 42');
    expect(tokens.slice(0, 2).map((t) => [t.type, t.value])).toEqual([
      ['NUMBER', '-1.5'],
      ['NUMBER', '42'],
    ]);
  });

  it('should report unterminated strings and unexpected characters', () => {
    const { errors } = tokenize('a $\n"open');
    expect(errors).toEqual([
      { message: 'Unexpected character `$`', line: 1, column: 3, context: 'a $' },
      { message: 'Unterminated string literal', line: 2, column: 1, context: '"open' },
    ]);
  });
});
