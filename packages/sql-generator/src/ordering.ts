/**
 * Dependency ordering of created and dropped tables.
 */

import type { ForeignKeyInfo, TableInfo } from '@tidemark/schema-model';

export interface CreateOrder {
  tables: TableInfo[];
  /** Foreign keys that must be added once every table exists, per table name */
  deferred: Map<string, ForeignKeyInfo[]>;
}

/**
 * Order tables so each is created after the tables its foreign keys point at.
 *
 * Ready tables are taken alphabetically. When a cycle leaves no table ready,
 * the alphabetically first blocked table goes next and its foreign keys to
 * tables not yet created are deferred, unless `canDefer` is false.
 */
export function orderForCreate(
  tables: readonly TableInfo[],
  normalize: (name: string) => string,
  canDefer: boolean,
): CreateOrder {
  const pending = new Map(tables.map((t) => [normalize(t.name), t]));
  const created = new Set<string>();
  const result: CreateOrder = { tables: [], deferred: new Map() };

  const blockers = (table: TableInfo) =>
    table.foreignKeys.filter((fk) => {
      const target = normalize(fk.referencedTable);
      return target !== normalize(table.name) && pending.has(target) && !created.has(target);
    });

  while (pending.size > 0) {
    const candidates = [...pending.values()].sort(byName);
    const next = candidates.find((t) => blockers(t).length === 0) ?? candidates[0];
    if (!next) break;

    const blocked = blockers(next);
    if (blocked.length > 0 && canDefer) {
      result.deferred.set(next.name, blocked);
    }

    result.tables.push(next);
    created.add(normalize(next.name));
    pending.delete(normalize(next.name));
  }

  return result;
}

export interface DropOrder {
  tables: TableInfo[];
  /** Foreign keys to drop before any table, breaking cycles among dropped tables */
  foreignKeys: Array<{ table: string; name: string }>;
}

/**
 * Order tables so each is dropped before the tables it references.
 */
export function orderForDrop(
  tables: readonly TableInfo[],
  normalize: (name: string) => string,
  canDropForeignKeys: boolean,
): DropOrder {
  const pending = new Map(tables.map((t) => [normalize(t.name), t]));
  const result: DropOrder = { tables: [], foreignKeys: [] };

  // A table is blocked while another pending table still references it.
  const referrers = (table: TableInfo) => {
    const key = normalize(table.name);
    return [...pending.values()].filter(
      (other) => other !== table && other.foreignKeys.some((fk) => normalize(fk.referencedTable) === key),
    );
  };

  while (pending.size > 0) {
    const candidates = [...pending.values()].sort(byName);
    const next = candidates.find((t) => referrers(t).length === 0) ?? candidates[0];
    if (!next) break;

    if (canDropForeignKeys && referrers(next).length > 0) {
      const key = normalize(next.name);
      for (const other of referrers(next)) {
        for (const fk of other.foreignKeys) {
          if (normalize(fk.referencedTable) === key) result.foreignKeys.push({ table: other.name, name: fk.name });
        }
      }
    }

    result.tables.push(next);
    pending.delete(normalize(next.name));
  }

  return result;
}

function byName(a: TableInfo, b: TableInfo): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
