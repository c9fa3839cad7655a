import { DestructiveChangeError, createLogger } from '@tidemark/core';
import { type DatabaseDriver, createSqliteDriver } from '@tidemark/database';
import { SqliteProvider } from '@tidemark/dialects';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { diffSources, planMigration, pullSchema, pushSchema } from '../workflows.js';
import { sqliteTables } from './fixtures.js';

const provider = new SqliteProvider();
const logger = createLogger({ level: 'error', handler: () => undefined });

const DATASOURCE = `
datasource db {
  provider = "sqlite"
  url      = "file:./dev.db"
}
`;

const USERS = `${DATASOURCE}
model users {
  id    Int     @id @default(autoincrement())
  email String  @unique
  name  String?
}
`;

const USERS_WITHOUT_NAME = `${DATASOURCE}
model users {
  id    Int     @id @default(autoincrement())
  email String  @unique
}
`;

async function columnsOf(driver: DatabaseDriver, table: string): Promise<string[]> {
  const rows = await driver.query('SELECT name FROM pragma_table_info(?) ORDER BY cid', [table]);
  return rows.map((row) => String(row['name']));
}

describe('pushSchema', () => {
  let driver: DatabaseDriver;

  beforeEach(() => {
    driver = createSqliteDriver('file::memory:');
  });

  afterEach(async () => {
    await driver.close();
  });

  it('should create the declared tables', async () => {
    const result = await pushSchema(driver, provider, USERS, { logger });

    expect(result.statements).toHaveLength(1);
    expect(result.statements[0]).toMatch(/^CREATE TABLE "users" \(/);
    expect(result.statements[0]).toContain('"email" TEXT NOT NULL UNIQUE');
    expect(result.warnings).toEqual([]);
    expect(await sqliteTables(driver)).toEqual(['users']);
  });

  it('should do nothing when the database is in sync', async () => {
    await pushSchema(driver, provider, USERS, { logger });
    const again = await pushSchema(driver, provider, USERS, { logger });
    expect(again.statements).toEqual([]);
  });

  it('should refuse to drop a column unless data loss is accepted', async () => {
    await pushSchema(driver, provider, USERS, { logger });

    const error = await pushSchema(driver, provider, USERS_WITHOUT_NAME, { logger }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DestructiveChangeError);
    expect(error).toMatchObject({
      code: 'TIDEMARK_D500',
      warnings: [{ kind: 'drop_column', table: 'users', column: 'name' }],
    });
    expect(await columnsOf(driver, 'users')).toEqual(['id', 'email', 'name']);

    const result = await pushSchema(driver, provider, USERS_WITHOUT_NAME, { logger, acceptDataLoss: true });
    expect(result.warnings.map((w) => w.kind)).toEqual(['drop_column']);
    expect(await columnsOf(driver, 'users')).toEqual(['id', 'email']);
  });
});

describe('planMigration', () => {
  it('should render the DDL without executing it', async () => {
    const driver = createSqliteDriver('file::memory:');
    const plan = await planMigration(driver, provider, USERS, { logger });

    expect(plan.changeSet.createTables.map((t) => t.name)).toEqual(['users']);
    expect(plan.sql).toMatch(/^CREATE TABLE "users" \(/);
    expect(plan.sql.endsWith(';\n')).toBe(true);
    expect(await sqliteTables(driver)).toEqual([]);
    await driver.close();
  });
});

describe('diffSources', () => {
  it('should describe the changes from nothing to a declaration', async () => {
    const diff = await diffSources({ kind: 'empty' }, { kind: 'declaration', text: USERS }, provider, { logger });
    expect(diff.summary).toBe('[+] Added tables\n  - users');
    expect(diff.sql).toMatch(/^CREATE TABLE "users"/);
  });

  it('should drop everything when diffing a declaration to nothing', async () => {
    const diff = await diffSources({ kind: 'declaration', text: USERS }, { kind: 'empty' }, provider, { logger });
    expect(diff.summary).toBe('[-] Removed tables\n  - users');
    expect(diff.sql).toBe('DROP TABLE "users";\n');
  });

  it('should compare against a live database', async () => {
    const driver = createSqliteDriver('file::memory:');
    await pushSchema(driver, provider, USERS, { logger });

    const diff = await diffSources({ kind: 'database', driver }, { kind: 'declaration', text: USERS }, provider, { logger });
    expect(diff.summary).toBe('No difference detected.');
    expect(diff.sql).toBe('');
    await driver.close();
  });
});

const BLOG = `${DATASOURCE}
model User {
  id    Int     @id @default(autoincrement())
  email String  @unique
  name  String?
  posts Post[]
}

model Post {
  id        Int      @id @default(autoincrement())
  title     String   @default("untitled")
  createdAt DateTime @default(now())
  authorId  Int
  author    User     @relation(fields: [authorId], references: [id], onDelete: Cascade)

  @@index([authorId, title])
}
`;

describe('pullSchema', () => {
  let driver: DatabaseDriver;

  beforeEach(() => {
    driver = createSqliteDriver('file::memory:');
  });

  afterEach(async () => {
    await driver.close();
  });

  it('should write a declaration that matches the database', async () => {
    await pushSchema(driver, provider, BLOG, { logger });

    const pulled = await pullSchema(driver, provider, { logger });
    expect(pulled.tables).toBe(2);
    expect(pulled.schema.models.map((m) => m.name)).toEqual(['Post', 'User']);
    expect(pulled.text.split('\n')).toContain('  user      User     @relation(fields: [authorId], references: [id], onDelete: Cascade)');

    const diff = await diffSources({ kind: 'database', driver }, { kind: 'declaration', text: pulled.text }, provider, {
      logger,
    });
    expect(diff.summary).toBe('No difference detected.');
    expect(diff.sql).toBe('');
  });

  it('should give every relation a field on both models', async () => {
    await pushSchema(driver, provider, BLOG, { logger });

    const { schema } = await pullSchema(driver, provider, { logger });
    expect(schema.models.map((m) => m.fields.map((f) => f.name))).toEqual([
      ['id', 'title', 'createdAt', 'authorId', 'user'],
      ['id', 'email', 'name', 'post'],
    ]);
  });

  it('should pull an empty database into a datasource alone', async () => {
    const pulled = await pullSchema(driver, provider, { logger }, { urlEnv: 'DEV_URL' });
    expect(pulled.tables).toBe(0);
    expect(pulled.text).toBe('datasource db {\n  provider = "sqlite"\n  url      = env("DEV_URL")\n}\n');
  });
});
