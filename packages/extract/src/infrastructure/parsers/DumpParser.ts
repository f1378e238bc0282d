import type { RowAlignment } from '@dumpshift/core';
import { MalformedInputError } from '@dumpshift/core';
import type { BlockParser } from '../../domain/ports/BlockParser.js';
import type { DumpBlock, DumpRow } from '../../domain/model/DumpBlock.js';

const DIRECTIVE_PREFIX = 'COPY ';
const DIRECTIVE = /^COPY\s+(\S+?)\s*\((.*)\)\s+FROM\s+stdin;?\s*$/;
const TERMINATOR = '\\.';

export interface DumpParserOptions {
  /** Handling of rows whose cell count differs from the column count. Default: `'strict'`. */
  readonly rowAlignment?: RowAlignment;
}

interface BlockHeader {
  readonly table: string;
  readonly qualifiedName: string;
  readonly columns: readonly string[];
  readonly line: number;
}

/** Pulls lines one at a time and tracks the current line number. */
class LineCursor {
  private lineNumber = 0;

  constructor(private readonly iterator: AsyncIterator<string>) {}

  get line(): number {
    return this.lineNumber;
  }

  async next(): Promise<string | undefined> {
    const result = await this.iterator.next();
    if (result.done) return undefined;
    this.lineNumber++;
    return result.value;
  }
}

/** Rows of one block, read from the shared cursor up to the terminator. */
class BlockBody {
  private closed = false;

  constructor(
    private readonly header: BlockHeader,
    private readonly cursor: LineCursor,
    private readonly alignment: RowAlignment,
  ) {}

  async *rows(): AsyncGenerator<DumpRow> {
    for (let text = await this.nextLine(); text !== undefined; text = await this.nextLine()) {
      yield { line: this.cursor.line, cells: this.split(text) };
    }
  }

  /** Skip whatever the consumer left unread. */
  async drain(): Promise<void> {
    while ((await this.nextLine()) !== undefined) {
      // skip
    }
  }

  private async nextLine(): Promise<string | undefined> {
    if (this.closed) return undefined;

    const text = await this.cursor.next();
    if (text === undefined) {
      throw new MalformedInputError('Input ended inside a bulk-copy block without its terminator', this.header.table, this.cursor.line);
    }
    if (text === TERMINATOR) {
      this.closed = true;
      return undefined;
    }
    return text;
  }

  private split(text: string): string[] {
    const cells = text.split('\t');
    if (this.alignment === 'strict' && cells.length !== this.header.columns.length) {
      throw new MalformedInputError(
        `Row has ${String(cells.length)} cells but the block declares ${String(this.header.columns.length)} columns`,
        this.header.table,
        this.cursor.line,
      );
    }
    return cells;
  }
}

/**
 * Parser for the bulk-copy text format written by `pg_dump`:
 *
 * ```
 * COPY public._core_team (id, name, initial_seed) FROM stdin;
 * 1\tFalcons\t3
 * \.
 * ```
 *
 * Lines outside a block are ignored. Cells are split on tabs with no unescaping.
 */
export class DumpParser implements BlockParser {
  private readonly alignment: RowAlignment;

  constructor(options?: DumpParserOptions) {
    this.alignment = options?.rowAlignment ?? 'strict';
  }

  async *blocks(lines: AsyncIterable<string>): AsyncGenerator<DumpBlock> {
    const cursor = new LineCursor(lines[Symbol.asyncIterator]());

    for (let text = await cursor.next(); text !== undefined; text = await cursor.next()) {
      if (!text.startsWith(DIRECTIVE_PREFIX)) continue;

      const header = parseDirective(text, cursor.line);
      const body = new BlockBody(header, cursor, this.alignment);
      yield { ...header, rows: body.rows() };
      await body.drain();
    }
  }
}

/** Parse a `COPY … (cols) FROM stdin;` line. */
export function parseDirective(text: string, line: number): BlockHeader {
  const match = DIRECTIVE.exec(text);
  if (!match) {
    const name = text.slice(DIRECTIVE_PREFIX.length).trim().split(/\s+/)[0] ?? '';
    throw new MalformedInputError('Bulk-copy directive without a column list', lastSegment(name), line);
  }

  const [, qualifiedName = '', columnList = ''] = match;
  return {
    table: lastSegment(qualifiedName),
    qualifiedName,
    columns: columnList.split(',').map((c) => unquote(c.trim())),
    line,
  };
}

function lastSegment(qualifiedName: string): string {
  const segments = qualifiedName.split('.');
  return unquote(segments[segments.length - 1] ?? qualifiedName);
}

function unquote(identifier: string): string {
  return identifier.length >= 2 && identifier.startsWith('"') && identifier.endsWith('"')
    ? identifier.slice(1, -1).replace(/""/g, '"')
    : identifier;
}
