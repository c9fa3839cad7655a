/**
 * @tidemark/schema — Declaration parser.
 *
 * Recursive-descent parser over the token stream from {@link Lexer}. Errors
 * are collected, not thrown: after a syntax error the parser resynchronises at
 * the next line (or the end of the current block) and keeps going so a single
 * pass reports as many problems as possible.
 *
 * @module @tidemark/schema
 */

import type { SyntaxErrorDetail } from '@tidemark/core';

import type {
  Argument,
  Attribute,
  AttributeValue,
  Datasource,
  Enum,
  EnumValue,
  Field,
  FieldType,
  Generator,
  ListValue,
  Model,
  Position,
  Property,
  Schema,
} from './ast.js';
import { type Token, type TokenType, tokenize } from './lexer.js';

export interface ParseResult {
  /** False when any syntax error was reported; the schema must not be used then */
  success: boolean;
  schema: Schema;
  errors: SyntaxErrorDetail[];
}

interface BlockHeader {
  name: string;
  position: Position;
}

class Parser {
  private pos = 0;
  private readonly errors: SyntaxErrorDetail[] = [];
  private readonly eof: Token;

  constructor(
    private readonly tokens: Token[],
    private readonly lines: string[],
  ) {
    this.eof = tokens[tokens.length - 1] ?? { type: 'EOF', value: '', line: 1, column: 1 };
  }

  parse(): { schema: Schema; errors: SyntaxErrorDetail[] } {
    const schema: Schema = { datasources: [], generators: [], models: [], enums: [] };

    this.skipNewlines();
    while (!this.check('EOF')) {
      const token = this.current();

      if (token.type === 'IDENTIFIER') {
        switch (token.value) {
          case 'datasource': {
            const block = this.parseConfigBlock('datasource');
            if (block) schema.datasources.push(block);
            break;
          }
          case 'generator': {
            const block = this.parseConfigBlock('generator');
            if (block) schema.generators.push(block);
            break;
          }
          case 'model': {
            const model = this.parseModel();
            if (model) schema.models.push(model);
            break;
          }
          case 'enum': {
            const enumDef = this.parseEnum();
            if (enumDef) schema.enums.push(enumDef);
            break;
          }
          default:
            this.error(`Unrecognized block type \`${token.value}\``, token);
            this.skipUnknownBlock();
        }
      } else if (token.type === 'RBRACE') {
        this.error('Unexpected `}` without a matching `{`', token);
        this.advance();
      } else {
        this.error(`Unexpected ${describe(token)} at top level`, token);
        this.skipLine();
      }

      this.skipNewlines();
    }

    return { schema, errors: this.errors };
  }

  // ─── Blocks ──────────────────────────────────────────────────────────────

  private parseConfigBlock(keyword: 'datasource' | 'generator'): Datasource | Generator | undefined {
    const header = this.parseBlockHeader(keyword);
    if (!header) return undefined;

    const properties: Property[] = [];
    const closed = this.parseBody(`${keyword} ${header.name}`, header.position, () => {
      const token = this.current();
      if (token.type === 'IDENTIFIER' && this.peek(1).type === 'EQUALS') {
        this.advance();
        this.advance();
        const value = this.parseValue();
        if (!value) {
          this.skipLine();
          return;
        }
        properties.push({ name: token.value, value, position: positionOf(token) });
        return;
      }
      this.error(`Expected \`key = value\` in ${keyword} \`${header.name}\``, token);
      this.skipLine();
    });

    return closed ? { name: header.name, properties, position: header.position } : undefined;
  }

  private parseModel(): Model | undefined {
    const header = this.parseBlockHeader('model');
    if (!header) return undefined;

    const fields: Field[] = [];
    const attributes: Attribute[] = [];
    const closed = this.parseBody(`model ${header.name}`, header.position, () => {
      const token = this.current();
      if (token.type === 'ATAT') {
        const attribute = this.parseAttribute();
        if (attribute) attributes.push(attribute);
        return;
      }
      if (token.type === 'IDENTIFIER') {
        const field = this.parseField();
        if (field) fields.push(field);
        return;
      }
      this.error(`Unexpected ${describe(token)} in model \`${header.name}\``, token);
      this.skipLine();
    });

    return closed ? { name: header.name, fields, attributes, position: header.position } : undefined;
  }

  private parseEnum(): Enum | undefined {
    const header = this.parseBlockHeader('enum');
    if (!header) return undefined;

    const values: EnumValue[] = [];
    const attributes: Attribute[] = [];
    const closed = this.parseBody(`enum ${header.name}`, header.position, () => {
      const token = this.current();
      if (token.type === 'ATAT') {
        const attribute = this.parseAttribute();
        if (attribute) attributes.push(attribute);
        return;
      }
      if (token.type === 'IDENTIFIER') {
        this.advance();
        values.push({ name: token.value, attributes: this.parseFieldAttributes(), position: positionOf(token) });
        return;
      }
      this.error(`Unexpected ${describe(token)} in enum \`${header.name}\``, token);
      this.skipLine();
    });

    return closed ? { name: header.name, values, attributes, position: header.position } : undefined;
  }

  private parseBlockHeader(keyword: string): BlockHeader | undefined {
    const start = this.advance();
    const nameToken = this.current();
    if (nameToken.type !== 'IDENTIFIER') {
      this.error(`Expected a name after \`${keyword}\``, nameToken);
      this.skipUnknownBlock();
      return undefined;
    }
    this.advance();

    if (!this.check('LBRACE')) {
      this.error(`Expected \`{\` after \`${keyword} ${nameToken.value}\``, this.current());
      this.skipUnknownBlock();
      return undefined;
    }
    this.advance();

    return { name: nameToken.value, position: positionOf(start) };
  }

  /**
   * Parse lines until the closing brace. Returns false when the file ends first.
   */
  private parseBody(label: string, start: Position, parseLine: () => void): boolean {
    for (;;) {
      this.skipNewlines();
      const token = this.current();
      if (token.type === 'RBRACE') {
        this.advance();
        return true;
      }
      if (token.type === 'EOF') {
        this.errors.push({
          message: `Unterminated block \`${label}\`: missing closing \`}\``,
          line: start.line,
          column: start.column,
          context: this.lines[start.line - 1],
        });
        return false;
      }
      parseLine();
      this.expectLineEnd();
    }
  }

  // ─── Fields & attributes ─────────────────────────────────────────────────

  private parseField(): Field | undefined {
    const nameToken = this.advance();
    const typeToken = this.current();
    if (typeToken.type !== 'IDENTIFIER') {
      this.error(`Field \`${nameToken.value}\` is missing a type`, typeToken);
      this.skipLine();
      return undefined;
    }
    this.advance();

    const type: FieldType = { name: typeToken.value, isArray: false, isOptional: false };

    if (typeToken.value === 'Unsupported' && this.check('LPAREN')) {
      this.advance();
      const native = this.current();
      if (native.type !== 'STRING') {
        this.error('Expected a quoted native type inside `Unsupported(...)`', native);
        this.skipLine();
        return undefined;
      }
      this.advance();
      type.unsupported = native.value;
      if (!this.check('RPAREN')) {
        this.error('Expected `)` after `Unsupported("...")`', this.current());
        this.skipLine();
        return undefined;
      }
      this.advance();
    }

    if (this.check('LBRACKET')) {
      this.advance();
      if (!this.check('RBRACKET')) {
        this.error(`Expected \`]\` after \`${typeToken.value}[\``, this.current());
        this.skipLine();
        return undefined;
      }
      this.advance();
      type.isArray = true;
    }

    if (this.check('QUESTION')) {
      this.advance();
      type.isOptional = true;
    }

    return {
      name: nameToken.value,
      type,
      attributes: this.parseFieldAttributes(),
      position: positionOf(nameToken),
    };
  }

  private parseFieldAttributes(): Attribute[] {
    const attributes: Attribute[] = [];
    while (this.check('AT')) {
      const attribute = this.parseAttribute();
      if (!attribute) break;
      attributes.push(attribute);
    }
    return attributes;
  }

  private parseAttribute(): Attribute | undefined {
    const start = this.advance();
    const prefix = start.type === 'ATAT' ? '@@' : '@';
    const nameToken = this.current();
    if (nameToken.type !== 'IDENTIFIER') {
      this.error(`Expected an attribute name after \`${prefix}\``, nameToken);
      this.skipLine();
      return undefined;
    }
    this.advance();

    let name = nameToken.value;
    while (this.check('DOT')) {
      this.advance();
      const part = this.current();
      if (part.type !== 'IDENTIFIER') {
        this.error(`Expected a name after \`${prefix}${name}.\``, part);
        this.skipLine();
        return undefined;
      }
      this.advance();
      name += `.${part.value}`;
    }

    let args: Argument[] = [];
    if (this.check('LPAREN')) {
      const parsed = this.parseArguments(`${prefix}${name}`);
      if (!parsed) return undefined;
      args = parsed;
    }

    return { name, args, position: positionOf(start) };
  }

  // ─── Arguments & values ──────────────────────────────────────────────────

  private parseArguments(label: string): Argument[] | undefined {
    this.advance(); // (
    const args: Argument[] = [];

    this.skipNewlines();
    if (this.check('RPAREN')) {
      this.advance();
      return args;
    }

    for (;;) {
      this.skipNewlines();
      const arg = this.parseArgument();
      if (!arg) {
        this.skipLine();
        return undefined;
      }
      args.push(arg);

      this.skipNewlines();
      if (this.check('COMMA')) {
        this.advance();
        this.skipNewlines();
        if (this.check('RPAREN')) {
          this.advance();
          return args;
        }
        continue;
      }
      if (this.check('RPAREN')) {
        this.advance();
        return args;
      }

      this.error(
        `Malformed argument list for \`${label}\`: expected \`,\` or \`)\` but found ${describe(this.current())}`,
        this.current(),
      );
      this.skipLine();
      return undefined;
    }
  }

  private parseArgument(): Argument | undefined {
    const token = this.current();
    const next = this.peek(1).type;
    if (token.type === 'IDENTIFIER' && (next === 'COLON' || next === 'EQUALS')) {
      this.advance();
      this.advance();
      this.skipNewlines();
      const value = this.parseValue();
      return value ? { name: token.value, value } : undefined;
    }
    const value = this.parseValue();
    return value ? { value } : undefined;
  }

  private parseValue(): AttributeValue | undefined {
    const token = this.current();
    switch (token.type) {
      case 'STRING':
        this.advance();
        return { kind: 'string', value: token.value };
      case 'NUMBER':
        this.advance();
        return { kind: 'number', value: Number(token.value), raw: token.value };
      case 'LBRACKET':
        return this.parseList();
      case 'IDENTIFIER': {
        this.advance();
        if (token.value === 'true' || token.value === 'false') {
          return { kind: 'boolean', value: token.value === 'true' };
        }
        let name = token.value;
        while (this.check('DOT') && this.peek(1).type === 'IDENTIFIER') {
          this.advance();
          name += `.${this.advance().value}`;
        }
        if (this.check('LPAREN')) {
          const args = this.parseArguments(`${name}()`);
          return args ? { kind: 'call', name, args } : undefined;
        }
        return { kind: 'identifier', value: name };
      }
      default:
        this.error(`Expected a value but found ${describe(token)}`, token);
        return undefined;
    }
  }

  private parseList(): ListValue | undefined {
    this.advance(); // [
    const items: AttributeValue[] = [];

    this.skipNewlines();
    if (this.check('RBRACKET')) {
      this.advance();
      return { kind: 'list', items };
    }

    for (;;) {
      this.skipNewlines();
      const value = this.parseValue();
      if (!value) return undefined;
      items.push(value);

      this.skipNewlines();
      if (this.check('COMMA')) {
        this.advance();
        this.skipNewlines();
        if (this.check('RBRACKET')) {
          this.advance();
          return { kind: 'list', items };
        }
        continue;
      }
      if (this.check('RBRACKET')) {
        this.advance();
        return { kind: 'list', items };
      }

      this.error(`Expected \`,\` or \`]\` in list but found ${describe(this.current())}`, this.current());
      return undefined;
    }
  }

  // ─── Recovery ────────────────────────────────────────────────────────────

  private expectLineEnd(): void {
    const token = this.current();
    if (token.type === 'NEWLINE' || token.type === 'RBRACE' || token.type === 'EOF') return;
    this.error(`Unexpected ${describe(token)}; expected end of line`, token);
    this.skipLine();
  }

  /** Skip to the end of the current line, leaving a closing brace in place */
  private skipLine(): void {
    while (!this.check('NEWLINE') && !this.check('RBRACE') && !this.check('EOF')) {
      this.advance();
    }
  }

  /** Skip an unrecognised block: the rest of its header line and a balanced `{ ... }` body */
  private skipUnknownBlock(): void {
    while (!this.check('LBRACE') && !this.check('NEWLINE') && !this.check('EOF')) {
      this.advance();
    }
    if (!this.check('LBRACE')) return;

    let depth = 0;
    while (!this.check('EOF')) {
      const token = this.advance();
      if (token.type === 'LBRACE') depth++;
      if (token.type === 'RBRACE') {
        depth--;
        if (depth === 0) return;
      }
    }
  }

  // ─── Token helpers ───────────────────────────────────────────────────────

  private current(): Token {
    return this.tokens[this.pos] ?? this.eof;
  }

  private peek(offset: number): Token {
    return this.tokens[this.pos + offset] ?? this.eof;
  }

  private check(type: TokenType): boolean {
    return this.current().type === type;
  }

  private advance(): Token {
    const token = this.current();
    if (token.type !== 'EOF') this.pos++;
    return token;
  }

  private skipNewlines(): void {
    while (this.check('NEWLINE')) this.advance();
  }

  private error(message: string, token: Token): void {
    this.errors.push({
      message,
      line: token.line,
      column: token.column,
      context: this.lines[token.line - 1],
    });
  }
}

function positionOf(token: Token): Position {
  return { line: token.line, column: token.column };
}

function describe(token: Token): string {
  switch (token.type) {
    case 'EOF':
      return 'end of file';
    case 'NEWLINE':
      return 'end of line';
    case 'STRING':
      return `string "${token.value}"`;
    default:
      return `\`${token.value}\``;
  }
}

/**
 * Parse declaration text into a {@link Schema}.
 *
 * Syntax errors from the lexer and the parser are merged and sorted by
 * position. `success` is false whenever any were reported.
 *
 * @example
 * ```typescript
 * const { success, schema, errors } = parseSchema(source);
 * if (!success) {
 *   for (const e of errors) report(`${e.line}:${e.column} ${e.message}`);
 * }
 * ```
 */
export function parseSchema(text: string): ParseResult {
  const lexed = tokenize(text);
  const lines = text.split(/\r?\n/);
  const { schema, errors } = new Parser(lexed.tokens, lines).parse();

  const all = [...lexed.errors, ...errors].sort((a, b) => a.line - b.line || a.column - b.column);
  return { success: all.length === 0, schema, errors: all };
}
