import { describe, expect, it } from 'vitest';

import { parseSchema } from '../parser.js';

const BLOG = `
datasource db {
  provider = "postgresql"
  url      = env("DATABASE_URL")
}

generator client {
  provider = "tidemark-client-js"
}

enum Role {
  USER
  ADMIN
}

model User {
  id        Int      @id @default(autoincrement())
  email     String   @unique @db.VarChar(320)
  name      String?
  role      Role     @default(USER)
  posts     Post[]
  createdAt DateTime @default(now())

  @@map("users")
}

model Post {
  id       Int      @id
  authorId Int
  author   User     @relation(fields: [authorId], references: [id], onDelete: Cascade)
  tags     String[]

  @@index([authorId, id(sort: Desc)], map: "post_author_idx")
}
`;

describe('parseSchema', () => {
  describe('blocks', () => {
    it('should parse datasources, generators, enums and models', () => {
      const result = parseSchema(BLOG);
      expect(result.errors).toEqual([]);
      expect(result.success).toBe(true);

      const { schema } = result;
      expect(schema.datasources.map((d) => d.name)).toEqual(['db']);
      expect(schema.generators.map((g) => g.name)).toEqual(['client']);
      expect(schema.enums.map((e) => e.values.map((v) => v.name))).toEqual([['USER', 'ADMIN']]);
      expect(schema.models.map((m) => m.name)).toEqual(['User', 'Post']);
    });

    it('should parse datasource properties including function calls', () => {
      const { schema } = parseSchema(BLOG);
      const [provider, url] = schema.datasources[0]?.properties ?? [];
      expect(provider).toMatchObject({ name: 'provider', value: { kind: 'string', value: 'postgresql' } });
      expect(url?.value).toEqual({
        kind: 'call',
        name: 'env',
        args: [{ value: { kind: 'string', value: 'DATABASE_URL' } }],
      });
    });
  });

  describe('fields', () => {
    it('should parse type modifiers', () => {
      const { schema } = parseSchema(BLOG);
      const user = schema.models[0];
      expect(user?.fields.map((f) => f.name)).toEqual(['id', 'email', 'name', 'role', 'posts', 'createdAt']);
      expect(user?.fields[2]?.type).toEqual({ name: 'String', isArray: false, isOptional: true });
      expect(user?.fields[4]?.type).toEqual({ name: 'Post', isArray: true, isOptional: false });
      expect(user?.fields[2]?.position).toEqual({ line: 19, column: 3 });
    });

    it('should parse attributes with dotted names and typed arguments', () => {
      const { schema } = parseSchema(BLOG);
      const [id, email, , role] = schema.models[0]?.fields ?? [];

      expect(id?.attributes.map((a) => a.name)).toEqual(['id', 'default']);
      expect(id?.attributes[1]?.args).toEqual([{ value: { kind: 'call', name: 'autoincrement', args: [] } }]);

      expect(email?.attributes.map((a) => a.name)).toEqual(['unique', 'db.VarChar']);
      expect(email?.attributes[1]?.args).toEqual([{ value: { kind: 'number', value: 320, raw: '320' } }]);

      expect(role?.attributes[0]?.args).toEqual([{ value: { kind: 'identifier', value: 'USER' } }]);
    });

    it('should parse named relation arguments', () => {
      const { schema } = parseSchema(BLOG);
      const author = schema.models[1]?.fields[2];
      expect(author?.attributes[0]?.args).toEqual([
        { name: 'fields', value: { kind: 'list', items: [{ kind: 'identifier', value: 'authorId' }] } },
        { name: 'references', value: { kind: 'list', items: [{ kind: 'identifier', value: 'id' }] } },
        { name: 'onDelete', value: { kind: 'identifier', value: 'Cascade' } },
      ]);
    });

    it('should parse Unsupported types', () => {
      const { success, schema } = parseSchema('model Place {\n  id Int @id\n  geo Unsupported("geometry")?\n}');
      expect(success).toBe(true);
      expect(schema.models[0]?.fields[1]?.type).toEqual({
        name: 'Unsupported',
        isArray: false,
        isOptional: true,
        unsupported: 'geometry',
      });
    });
  });

  describe('model attributes', () => {
    it('should parse @@map and @@index with sort modifiers', () => {
      const { schema } = parseSchema(BLOG);
      expect(schema.models[0]?.attributes).toEqual([
        { name: 'map', args: [{ value: { kind: 'string', value: 'users' } }], position: { line: 24, column: 3 } },
      ]);

      const index = schema.models[1]?.attributes[0];
      expect(index?.name).toBe('index');
      expect(index?.args).toEqual([
        {
          value: {
            kind: 'list',
            items: [
              { kind: 'identifier', value: 'authorId' },
              { kind: 'call', name: 'id', args: [{ name: 'sort', value: { kind: 'identifier', value: 'Desc' } }] },
            ],
          },
        },
        { name: 'map', value: { kind: 'string', value: 'post_author_idx' } },
      ]);
    });

    it('should allow argument lists spanning lines with trailing commas', () => {
      const { success, schema } = parseSchema(
        'model Pair {\n  a Int\n  b Int\n  @@id([\n    a,\n    b,\n  ])\n}',
      );
      expect(success).toBe(true);
      expect(schema.models[0]?.attributes[0]?.args[0]?.value).toEqual({
        kind: 'list',
        items: [
          { kind: 'identifier', value: 'a' },
          { kind: 'identifier', value: 'b' },
        ],
      });
    });
  });

  describe('errors', () => {
    it('should collect several errors in one pass', () => {
      const source = [
        'model A {',
        '  id Int @id',
        '  bad @@',
        '}',
        '',
        'widget W {',
        '}',
        '',
        'model B {',
        '  id Int @id',
        '  email String @default("x" "y")',
        '}',
      ].join('\n');

      const result = parseSchema(source);
      expect(result.success).toBe(false);
      expect(result.errors.map((e) => [e.line, e.column, e.message])).toEqual([
        [3, 7, 'Field `bad` is missing a type'],
        [6, 1, 'Unrecognized block type `widget`'],
        [11, 29, 'Malformed argument list for `@default`: expected `,` or `)` but found string "y"'],
      ]);
      expect(result.errors[1]?.context).toBe('widget W {');
      // parsing continued past the errors
      expect(result.schema.models.map((m) => m.name)).toEqual(['A', 'B']);
      expect(result.schema.models[1]?.fields.map((f) => f.name)).toEqual(['id', 'email']);
    });

    it('should report unterminated blocks', () => {
      const result = parseSchema('model User {\n  id Int @id\n');
      expect(result.errors).toEqual([
        {
          message: 'Unterminated block `model User`: missing closing `}`',
          line: 1,
          column: 1,
          context: 'model User {',
        },
      ]);
      expect(result.schema.models).toEqual([]);
    });

    it('should report a closing brace without an opening one', () => {
      const result = parseSchema('}\n');
      expect(result.errors.map((e) => e.message)).toEqual(['Unexpected `}` without a matching `{`']);
    });

    it('should report trailing tokens after a complete field', () => {
      const result = parseSchema('model User {\n  id Int @id )\n}');
      expect(result.errors.map((e) => [e.line, e.column, e.message])).toEqual([
        [2, 14, 'Unexpected `)`; expected end of line'],
      ]);
    });
  });
});
