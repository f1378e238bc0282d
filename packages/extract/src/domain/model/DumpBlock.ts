/** One data line of a bulk-copy block, split on tabs. */
export interface DumpRow {
  /** One-based line number in the dump. */
  readonly line: number;
  /** Cells parallel-indexed to the block's columns. */
  readonly cells: readonly string[];
}

/**
 * A bulk-copy block. `rows` is lazy and shares the underlying line stream:
 * it must be consumed before the next block is requested, otherwise the
 * parser skips the remaining rows.
 */
export interface DumpBlock {
  /** Table identifier: last dot-separated segment of the qualified name, unquoted. */
  readonly table: string;
  /** Qualified name as written in the directive (e.g. `public._core_team`). */
  readonly qualifiedName: string;
  readonly columns: readonly string[];
  /** Line number of the directive. */
  readonly line: number;
  readonly rows: AsyncIterable<DumpRow>;
}
