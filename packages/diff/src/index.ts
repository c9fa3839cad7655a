/**
 * @tidemark/diff — Schema comparison.
 *
 * @example
 * ```ts
 * import { buildModel, compare, summarizeChangeSet } from '@tidemark/diff';
 *
 * const desired = buildModel(schema, provider);
 * const changes = compare(desired, await introspect(driver, provider), provider);
 * console.log(summarizeChangeSet(changes));
 * ```
 *
 * @module @tidemark/diff
 */

export { buildModel, columnNameOf, tableNameOf } from './build.js';
export { compare, defaultsEqual, type CompareOptions } from './compare.js';
export { toDeclaration, type PullOptions } from './pull.js';
export { analyzeDataLoss, assertNoDataLoss } from './data-loss.js';
export { summarizeChangeSet } from './summary.js';

export { isEmptyChangeSet } from '@tidemark/schema-model';
