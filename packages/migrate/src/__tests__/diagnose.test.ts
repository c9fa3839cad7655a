import { DriftError } from '@tidemark/core';
import { createColumn, createTable, emptyChangeSet } from '@tidemark/schema-model';
import { describe, expect, it } from 'vitest';

import { diagnose } from '../diagnose.js';
import type { DiagnoseInput, LocalMigration } from '../types.js';

function local(name: string): LocalMigration {
  return { name, timestamp: name.slice(0, 14), path: `/m/${name}`, sqlPath: `/m/${name}/migration.sql`, sql: '', checksum: 'c' };
}

function input(overrides: Partial<DiagnoseInput> = {}): DiagnoseInput {
  return {
    local: [],
    applied: [],
    pending: [],
    missing: [],
    modified: [],
    failed: [],
    drift: emptyChangeSet(),
    changes: emptyChangeSet(),
    ...overrides,
  };
}

describe('diagnose', () => {
  it('should require a reset when an applied migration is missing locally', () => {
    const action = diagnose(input({ missing: ['20240101000000_init'] }));
    expect(action.action).toBe('reset');
    if (action.action !== 'reset') return;
    expect(action.error).toBeInstanceOf(DriftError);
    expect(action.error).toMatchObject({ code: 'TIDEMARK_R700', reason: 'missing', migrations: ['20240101000000_init'] });
    expect(action.reason).toBe(
      'The following migration(s) are applied to the database but missing from the migrations directory:\n  20240101000000_init',
    );
  });

  it('should report modified migrations before missing ones', () => {
    const action = diagnose(input({ modified: ['20240102000000_posts'], missing: ['20240101000000_init'] }));
    expect(action).toMatchObject({ action: 'reset', error: { reason: 'modified', migrations: ['20240102000000_posts'] } });
  });

  it('should require a reset for failed migrations', () => {
    const action = diagnose(input({ failed: ['20240102000000_posts'], pending: [local('20240102000000_posts')] }));
    expect(action).toMatchObject({ action: 'reset', error: { reason: 'failed' } });
  });

  it('should require a reset when the schema drifted from the history', () => {
    const drift = emptyChangeSet();
    const extra = createTable('extra');
    extra.columns.set('id', createColumn('id', 'INTEGER'));
    drift.createTables = [extra];

    const action = diagnose(input({ drift, pending: [local('20240102000000_posts')] }));
    expect(action.action).toBe('reset');
    if (action.action !== 'reset') return;
    expect(action.error.reason).toBe('schema');
    expect(action.reason).toContain('[+] Added tables\n  - extra');
  });

  it('should apply pending migrations when the history is intact', () => {
    const pending = [local('20240102000000_posts'), local('20240103000000_tags')];
    expect(diagnose(input({ pending }))).toEqual({ action: 'apply', pending });
  });

  it('should apply pending migrations when the drift check was skipped', () => {
    const pending = [local('20240102000000_posts')];
    expect(diagnose(input({ pending, drift: undefined }))).toEqual({ action: 'apply', pending });
  });

  it('should offer a new migration when nothing is pending', () => {
    const changes = emptyChangeSet();
    changes.dropTables = [{ name: 'legacy', table: createTable('legacy') }];
    expect(diagnose(input({ changes }))).toEqual({ action: 'create', changeSet: changes, inSync: false });
    expect(diagnose(input())).toEqual({ action: 'create', changeSet: emptyChangeSet(), inSync: true });
  });
});
