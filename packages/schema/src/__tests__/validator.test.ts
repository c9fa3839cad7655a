import { SchemaSyntaxError, ValidationError } from '@tidemark/core';
import { describe, expect, it } from 'vitest';

import { getDatasource, resolveDatasourceUrl } from '../datasource.js';
import { parseSchema } from '../parser.js';
import { loadSchema, validateSchema } from '../validator.js';

function issuesFor(source: string): string[] {
  const result = parseSchema(source);
  expect(result.errors).toEqual([]);
  return validateSchema(result.schema).map((i) => `${i.path}: ${i.message}`);
}

const DATASOURCE = 'datasource db {\n  provider = "sqlite"\n  url = "file:./dev.db"\n}\n';

describe('validateSchema', () => {
  it('should accept a well-formed schema', () => {
    expect(
      issuesFor(`${DATASOURCE}
model User {
  id    Int    @id
  posts Post[]
}
model Post {
  id       Int  @id
  authorId Int
  author   User @relation(fields: [authorId], references: [id], onDelete: Cascade)
  @@index([authorId])
}`),
    ).toEqual([]);
  });

  it('should report unknown type references', () => {
    expect(issuesFor('model A {\n  id Int @id\n  other Unknwn\n}')).toEqual(['A.other: Unknown type `Unknwn`']);
  });

  it('should report duplicates', () => {
    expect(
      issuesFor('model A {\n  id Int @id\n  id String\n}\nmodel A {\n  id Int @id\n}\nenum E {\n  X\n  X\n}'),
    ).toEqual(['E.X: Duplicate value `X` in enum `E`', 'A: Duplicate model `A`', 'A.id: Duplicate field `id`']);
  });

  it('should report malformed relations', () => {
    expect(
      issuesFor(`model User {
  id Int @id
}
model Post {
  id       Int  @id
  authorId Int
  author   User @relation(fields: [authorId, id], references: [id], onDelete: Explode)
  editor   User @relation(fields: [authorId])
}`),
    ).toEqual([
      'Post.author: `fields` has 2 entries but `references` has 1',
      'Post.author: Invalid `onDelete`; expected one of Cascade, Restrict, NoAction, SetNull, SetDefault',
      'Post.editor: `@relation` needs both `fields` and `references`',
    ]);
  });

  it('should report @relation on scalar fields and references to missing fields', () => {
    expect(
      issuesFor(`model User {
  id Int @id
}
model Post {
  id     Int  @id
  owner  Int  @relation(fields: [owner], references: [id])
  author User @relation(fields: [writerId], references: [uid])
}`),
    ).toEqual([
      'Post.owner: `@relation` is only allowed on fields whose type is a model',
      'Post.author: Relation field `writerId` does not exist on `Post`',
      'Post.author: Referenced field `uid` does not exist on `User`',
    ]);
  });

  it('should report empty defaults, bad composite keys and missing identity', () => {
    expect(
      issuesFor('model Tag {\n  label String @default()\n  @@index([missing])\n}'),
    ).toEqual([
      'Tag.label: `@default` requires a value',
      'Tag: `@@index` references unknown scalar field `missing`',
      'Tag: Model `Tag` needs an `@id`, `@@id`, `@unique` or `@@unique`',
    ]);
  });

  it('should check datasource and generator blocks', () => {
    expect(
      issuesFor('datasource db {\n  provider = "oracle"\n}\ngenerator client {\n  output = "./gen"\n}'),
    ).toEqual([
      'datasource.db.provider: Unsupported provider `oracle`; expected one of postgresql, mysql, sqlite',
      'datasource.db.url: Datasource is missing `url`',
      'generator.client.provider: Generator is missing `provider`',
    ]);
  });
});

describe('loadSchema', () => {
  it('should throw SchemaSyntaxError for unparsable text', () => {
    expect(() => loadSchema('model {')).toThrow(SchemaSyntaxError);
  });

  it('should throw ValidationError for semantic problems', () => {
    expect(() => loadSchema('model A {\n  id Int @id\n  b Missing\n}')).toThrow(ValidationError);
  });

  it('should return the schema when valid', () => {
    expect(loadSchema(`${DATASOURCE}model A {\n  id Int @id\n}`).models).toHaveLength(1);
  });
});

describe('getDatasource', () => {
  it('should read provider and env-backed urls', () => {
    const { schema } = parseSchema(
      'datasource db {\n  provider = "postgresql"\n  url = env("DATABASE_URL")\n}',
    );
    const datasource = getDatasource(schema);
    expect(datasource).toEqual({
      name: 'db',
      provider: 'postgresql',
      url: { kind: 'env', variable: 'DATABASE_URL' },
      shadowDatabaseUrl: undefined,
    });
    expect(
      resolveDatasourceUrl({ kind: 'env', variable: 'DATABASE_URL' }, { DATABASE_URL: 'postgresql://localhost/app' }),
    ).toBe('postgresql://localhost/app');
    expect(resolveDatasourceUrl({ kind: 'literal', value: 'file:./dev.db' }, {})).toBe('file:./dev.db');
  });

  it('should return undefined without a datasource', () => {
    expect(getDatasource(parseSchema('').schema)).toBeUndefined();
  });
});
