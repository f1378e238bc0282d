import { describe, it, expect } from 'vitest';
import { BufferSource, readLines } from '@dumpshift/core';
import type { RowAlignment } from '@dumpshift/core';
import { DumpParser, parseDirective } from '../../src/infrastructure/parsers/DumpParser.js';
import type { DumpRow } from '../../src/domain/model/DumpBlock.js';

interface ParsedBlock {
  table: string;
  columns: readonly string[];
  line: number;
  rows: DumpRow[];
}

async function parse(text: string, rowAlignment?: RowAlignment): Promise<ParsedBlock[]> {
  const parsed: ParsedBlock[] = [];
  for await (const block of new DumpParser({ rowAlignment }).blocks(readLines(new BufferSource(text)))) {
    const rows: DumpRow[] = [];
    for await (const row of block.rows) rows.push(row);
    parsed.push({ table: block.table, columns: block.columns, line: block.line, rows });
  }
  return parsed;
}

describe('DumpParser', () => {
  it('should parse a block and skip lines outside it', async () => {
    const dump = [
      'SET client_encoding = \'UTF8\';',
      'COPY public._core_team (id, name, initial_seed) FROM stdin;',
      '1\tFalcons\t3',
      '2\tHawks\t',
      '\\.',
      '',
      '-- trailing comment',
    ].join('\n');

    expect(await parse(dump)).toEqual([
      {
        table: '_core_team',
        columns: ['id', 'name', 'initial_seed'],
        line: 2,
        rows: [
          { line: 3, cells: ['1', 'Falcons', '3'] },
          { line: 4, cells: ['2', 'Hawks', ''] },
        ],
      },
    ]);
  });

  it('should parse consecutive blocks', async () => {
    const dump = 'COPY public.a (id) FROM stdin;\n1\n\\.\nCOPY public.b (id) FROM stdin;\n\\.\n';
    const blocks = await parse(dump);
    expect(blocks.map((b) => [b.table, b.rows.length])).toEqual([
      ['a', 1],
      ['b', 0],
    ]);
  });

  it('should skip rows the consumer did not read', async () => {
    const dump = 'COPY public.a (id) FROM stdin;\n1\n2\n\\.\nCOPY public.b (id) FROM stdin;\n3\n\\.\n';
    const tables: string[] = [];
    for await (const block of new DumpParser().blocks(readLines(new BufferSource(dump)))) {
      tables.push(block.table);
    }
    expect(tables).toEqual(['a', 'b']);
  });

  it('should fail on a block without a terminator', async () => {
    const dump = 'COPY public.t (id) FROM stdin;\n1\n';
    await expect(parse(dump)).rejects.toThrow(
      'Input ended inside a bulk-copy block without its terminator (table "t", line 2)',
    );
  });

  it('should fail on a truncated block even when rows are not read', async () => {
    const dump = 'COPY public.t (id) FROM stdin;\n1\n';
    const consume = async (): Promise<void> => {
      for await (const block of new DumpParser().blocks(readLines(new BufferSource(dump)))) {
        expect(block.table).toBe('t');
      }
    };
    await expect(consume()).rejects.toMatchObject({ name: 'MalformedInputError', table: 't' });
  });

  it('should reject a cell count mismatch under strict alignment', async () => {
    const dump = 'COPY public.t (id, name, flag) FROM stdin;\n1\tAlice\n\\.\n';
    await expect(parse(dump)).rejects.toThrow('Row has 2 cells but the block declares 3 columns (table "t", line 2)');
  });

  it('should pass mismatched rows through under lenient alignment', async () => {
    const dump = 'COPY public.t (id, name, flag) FROM stdin;\n1\tAlice\n2\tBob\t1\textra\n\\.\n';
    const [block] = await parse(dump, 'lenient');
    expect(block?.rows.map((r) => r.cells)).toEqual([
      ['1', 'Alice'],
      ['2', 'Bob', '1', 'extra'],
    ]);
  });

  it('should not treat a backslash-dot inside other text as a terminator', async () => {
    const dump = 'COPY public.t (id, note) FROM stdin;\n1\t\\.\n\\.\n';
    const [block] = await parse(dump);
    expect(block?.rows).toEqual([{ line: 2, cells: ['1', '\\.'] }]);
  });
});

describe('parseDirective', () => {
  it('should unquote identifiers', () => {
    expect(parseDirective('COPY public."User" ("id", "Name") FROM stdin;', 7)).toEqual({
      table: 'User',
      qualifiedName: 'public."User"',
      columns: ['id', 'Name'],
      line: 7,
    });
  });

  it('should accept a table without a schema prefix', () => {
    expect(parseDirective('COPY _core_field (id, name) FROM stdin;', 1).table).toBe('_core_field');
  });

  it('should reject a directive without a column list', () => {
    expect(() => parseDirective('COPY public.t FROM stdin;', 1)).toThrow(
      'Bulk-copy directive without a column list (table "t", line 1)',
    );
  });
});
