/**
 * What the mapper does with rows of tables, or cells of columns, that the
 * schema mapping does not name.
 *
 * - `drop-silently`: drop and count (reported only in the end-of-run summary).
 * - `drop-with-warning`: drop, count, and emit a warning event the first time each table or column is seen.
 * - `fail`: throw `UnmappedSchemaError`.
 */
export type UnmappedPolicy = 'drop-silently' | 'drop-with-warning' | 'fail';

/**
 * How a data row whose cell count differs from the block's column count is handled.
 *
 * - `strict`: throw `MalformedInputError`.
 * - `lenient`: pair cells with columns up to the shorter of the two; missing cells are absent, extra cells are dropped.
 */
export type RowAlignment = 'strict' | 'lenient';

export const UNMAPPED_POLICIES: readonly UnmappedPolicy[] = ['drop-silently', 'drop-with-warning', 'fail'];

export const ROW_ALIGNMENTS: readonly RowAlignment[] = ['strict', 'lenient'];
