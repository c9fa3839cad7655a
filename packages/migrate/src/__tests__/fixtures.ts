import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import type { DatabaseDriver } from '@tidemark/database';

export const INIT = '20240101000000_init';
export const POSTS = '20240102000000_posts';

export const INIT_SQL = `-- CreateTable
CREATE TABLE "User" (
    "id" INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT,
    "email" TEXT NOT NULL
);

CREATE UNIQUE INDEX "User_email_key" ON "User"("email");
`;

export const POSTS_SQL = `CREATE TABLE "Post" (
    "id" INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT,
    "title" TEXT NOT NULL,
    "authorId" INTEGER NOT NULL,
    CONSTRAINT "Post_authorId_fkey" FOREIGN KEY ("authorId") REFERENCES "User"("id") ON DELETE RESTRICT ON UPDATE CASCADE
);
`;

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tidemark-migrate-'));
}

/** Write `<root>/<name>/migration.sql` */
export function writeMigrationDir(root: string, name: string, sql: string): void {
  fs.mkdirSync(path.join(root, name), { recursive: true });
  fs.writeFileSync(path.join(root, name, 'migration.sql'), sql);
}

/** Names of the user tables in an SQLite database */
export async function sqliteTables(driver: DatabaseDriver): Promise<string[]> {
  const rows = await driver.query(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
  );
  return rows.map((row) => String(row['name']));
}
