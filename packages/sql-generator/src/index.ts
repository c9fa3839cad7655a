/**
 * @tidemark/sql-generator — Change set to ordered, provider-specific DDL.
 *
 * @example
 * ```ts
 * import { generate } from '@tidemark/sql-generator';
 *
 * const sql = generate(compare(desired, actual, provider), provider);
 * ```
 *
 * @module @tidemark/sql-generator
 */

export { REDEFINE_PREFIX, generate, generateStatements } from './generator.js';
export { orderForCreate, orderForDrop, type CreateOrder, type DropOrder } from './ordering.js';
export { splitStatements, type SplitOptions } from './split.js';
