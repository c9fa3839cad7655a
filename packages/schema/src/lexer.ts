/**
 * Lexer for schema declarations.
 *
 * Produces a flat token stream with line/column positions. Newlines are
 * significant (one field per line) and are emitted as tokens; comments and
 * other whitespace are dropped.
 */

import type { SyntaxErrorDetail } from '@tidemark/core';

export type TokenType =
  | 'AT'
  | 'ATAT'
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACE'
  | 'RBRACE'
  | 'LBRACKET'
  | 'RBRACKET'
  | 'EQUALS'
  | 'COLON'
  | 'QUESTION'
  | 'COMMA'
  | 'DOT'
  | 'STRING'
  | 'NUMBER'
  | 'IDENTIFIER'
  | 'NEWLINE'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

export interface LexResult {
  tokens: Token[];
  errors: SyntaxErrorDetail[];
}

const PUNCTUATION: Record<string, TokenType> = {
  '(': 'LPAREN',
  ')': 'RPAREN',
  '{': 'LBRACE',
  '}': 'RBRACE',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '=': 'EQUALS',
  ':': 'COLON',
  '?': 'QUESTION',
  ',': 'COMMA',
  '.': 'DOT',
};

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
};

export class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;
  private readonly tokens: Token[] = [];
  private readonly errors: SyntaxErrorDetail[] = [];
  private readonly lines: string[];

  constructor(private readonly input: string) {
    this.lines = input.split(/\r?\n/);
  }

  tokenize(): LexResult {
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos] ?? '';

      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\uFEFF') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.push('NEWLINE', '\n', this.line, this.column);
        this.advance();
        continue;
      }

      if (ch === '/' && this.peek(1) === '/') {
        while (this.pos < this.input.length && this.input[this.pos] !== '\n') this.advance();
        continue;
      }

      if (ch === '/' && this.peek(1) === '*') {
        this.skipBlockComment();
        continue;
      }

      if (ch === '@') {
        const line = this.line;
        const column = this.column;
        if (this.peek(1) === '@') {
          this.advance();
          this.advance();
          this.push('ATAT', '@@', line, column);
        } else {
          this.advance();
          this.push('AT', '@', line, column);
        }
        continue;
      }

      const punct = PUNCTUATION[ch];
      if (punct) {
        this.push(punct, ch, this.line, this.column);
        this.advance();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (isDigit(ch) || (ch === '-' && isDigit(this.peek(1)))) {
        this.readNumber();
        continue;
      }

      if (isIdentStart(ch)) {
        this.readIdentifier();
        continue;
      }

      this.error(`Unexpected character \`${ch}\``, this.line, this.column);
      this.advance();
    }

    this.push('EOF', '', this.line, this.column);
    return { tokens: this.tokens, errors: this.errors };
  }

  private readString(): void {
    const line = this.line;
    const column = this.column;
    this.advance(); // opening quote
    let value = '';

    while (this.pos < this.input.length) {
      const ch = this.input[this.pos] ?? '';
      if (ch === '"') {
        this.advance();
        this.push('STRING', value, line, column);
        return;
      }
      if (ch === '\n') break;
      if (ch === '\\') {
        const next = this.peek(1);
        const escaped = ESCAPES[next];
        if (escaped !== undefined) {
          value += escaped;
          this.advance();
          this.advance();
          continue;
        }
      }
      value += ch;
      this.advance();
    }

    this.error('Unterminated string literal', line, column);
    this.push('STRING', value, line, column);
  }

  private readNumber(): void {
    const line = this.line;
    const column = this.column;
    let value = '';
    if (this.input[this.pos] === '-') {
      value += '-';
      this.advance();
    }
    while (isDigit(this.input[this.pos] ?? '')) {
      value += this.input[this.pos];
      this.advance();
    }
    if (this.input[this.pos] === '.' && isDigit(this.peek(1))) {
      value += '.';
      this.advance();
      while (isDigit(this.input[this.pos] ?? '')) {
        value += this.input[this.pos];
        this.advance();
      }
    }
    this.push('NUMBER', value, line, column);
  }

  private readIdentifier(): void {
    const line = this.line;
    const column = this.column;
    let value = '';
    while (isIdentPart(this.input[this.pos] ?? '')) {
      value += this.input[this.pos];
      this.advance();
    }
    this.push('IDENTIFIER', value, line, column);
  }

  private skipBlockComment(): void {
    const line = this.line;
    const column = this.column;
    this.advance();
    this.advance();
    while (this.pos < this.input.length) {
      if (this.input[this.pos] === '*' && this.peek(1) === '/') {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }
    this.error('Unterminated block comment', line, column);
  }

  private advance(): void {
    if (this.input[this.pos] === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  private peek(offset: number): string {
    return this.input[this.pos + offset] ?? '';
  }

  private push(type: TokenType, value: string, line: number, column: number): void {
    this.tokens.push({ type, value, line, column });
  }

  private error(message: string, line: number, column: number): void {
    this.errors.push({ message, line, column, context: this.lines[line - 1] });
  }
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

/** Tokenize declaration text */
export function tokenize(input: string): LexResult {
  return new Lexer(input).tokenize();
}
