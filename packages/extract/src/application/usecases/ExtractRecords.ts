import type { MigrationRecord } from '@dumpshift/core';
import { readLines } from '@dumpshift/core';
import { DumpParser } from '../../infrastructure/parsers/DumpParser.js';
import { RowMapper } from '../../domain/services/RowMapper.js';
import type { ExtractContext } from '../ExtractContext.js';

/** Use case: stream the dump through the block parser and row mapper, yielding records in dump order. */
export class ExtractRecords {
  constructor(private readonly ctx: ExtractContext) {}

  async *execute(): AsyncGenerator<MigrationRecord> {
    const source = this.ctx.assertSourceConfigured();
    this.ctx.reset();
    this.ctx.sourceMetadata = source.metadata();

    const parser = new DumpParser({ rowAlignment: this.ctx.rowAlignment });
    const mapper = new RowMapper(this.ctx.schema, {
      unmappedPolicy: this.ctx.unmappedPolicy,
      nullToken: this.ctx.nullToken,
      listener: this.ctx,
    });

    for await (const block of parser.blocks(readLines(source))) {
      this.ctx.blocks++;
      this.ctx.eventBus.emit({
        type: 'block:started',
        table: block.table,
        columns: block.columns,
        line: block.line,
        mapped: mapper.isMapped(block.table),
        timestamp: Date.now(),
      });

      let rowCount = 0;
      let recordCount = 0;
      for await (const row of block.rows) {
        rowCount++;
        this.ctx.rows++;
        const record = mapper.mapRow(block.table, block.columns, row.cells, row.line);
        if (!record) continue;

        recordCount++;
        this.ctx.countRecord(record.entity);
        yield record;
      }

      this.ctx.eventBus.emit({
        type: 'block:completed',
        table: block.table,
        rowCount,
        recordCount,
        timestamp: Date.now(),
      });
    }

    this.ctx.eventBus.emit({ type: 'extract:completed', summary: this.ctx.buildSummary(), timestamp: Date.now() });
  }
}
