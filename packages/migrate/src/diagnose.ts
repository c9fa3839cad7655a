/**
 * @tidemark/migrate — Development diagnostic.
 *
 * @module @tidemark/migrate
 */

import { DriftError } from '@tidemark/core';
import { summarizeChangeSet } from '@tidemark/diff';
import { isEmptyChangeSet } from '@tidemark/schema-model';

import type { DevAction, DiagnoseInput } from './types.js';

/**
 * Decide what a development workflow does next.
 *
 * History problems come first: an applied migration that was edited, one
 * that is gone from disk, or one that failed half way. Then structural drift,
 * then pending migrations. Only a database that matches its history and has
 * nothing pending gets a new migration. Every disagreement between history
 * and database ends in `reset`; nothing is guessed or applied destructively.
 */
export function diagnose(input: DiagnoseInput): DevAction {
  if (input.modified.length > 0) {
    return reset(
      new DriftError('modified', [...input.modified]),
      `The following migration(s) were modified after they were applied:\n  ${input.modified.join(', ')}\n\n` +
        'Applied migrations must not change. Reset the database to replay the edited history.',
    );
  }

  if (input.missing.length > 0) {
    return reset(
      new DriftError('missing', [...input.missing]),
      `The following migration(s) are applied to the database but missing from the migrations directory:\n  ${input.missing.join(
        ', ',
      )}`,
    );
  }

  if (input.failed.length > 0) {
    return reset(
      new DriftError('failed', [...input.failed]),
      `The following migration(s) failed and were not rolled back:\n  ${input.failed.join(', ')}`,
    );
  }

  if (input.drift && !isEmptyChangeSet(input.drift)) {
    const summary = summarizeChangeSet(input.drift);
    return reset(
      new DriftError('schema', [], `The database schema is not in sync with the migration history:\n${summary}`),
      'Drift detected: the database schema is not in sync with the migration history.\n\n' +
        'These are the changes from the schema the applied migrations produce to the actual schema:\n\n' +
        summary,
    );
  }

  if (input.pending.length > 0) {
    return { action: 'apply', pending: [...input.pending] };
  }

  return { action: 'create', changeSet: input.changes, inSync: isEmptyChangeSet(input.changes) };
}

function reset(error: DriftError, reason: string): DevAction {
  return { action: 'reset', reason, error };
}
