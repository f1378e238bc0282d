import type { DumpBlock } from '../model/DumpBlock.js';

/**
 * Port for turning a line stream into bulk-copy blocks.
 *
 * Single forward pass: restarting means re-reading the input from the start.
 */
export interface BlockParser {
  blocks(lines: AsyncIterable<string>): AsyncIterable<DumpBlock>;
}
