import type { DataSource, ExtractSummary, MigrationSchema, RowAlignment, SourceMetadata, UnmappedPolicy } from '@dumpshift/core';
import { EventBus } from '@dumpshift/core';
import type { DropReport, FallbackReport, MappingListener } from '../domain/services/RowMapper.js';

/** Shared state for one extraction run: configuration, event bus and counters. */
export class ExtractContext implements MappingListener {
  readonly eventBus = new EventBus();
  source: DataSource | null = null;
  sourceMetadata: SourceMetadata = {};

  blocks = 0;
  rows = 0;
  coercionFallbacks = 0;
  readonly records = new Map<string, number>();
  readonly unmappedTables = new Map<string, number>();
  readonly unmappedColumns = new Map<string, string[]>();

  constructor(
    readonly schema: MigrationSchema,
    readonly unmappedPolicy: UnmappedPolicy,
    readonly rowAlignment: RowAlignment,
    readonly nullToken: string | undefined,
  ) {}

  assertSourceConfigured(): DataSource {
    if (!this.source) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    return this.source;
  }

  reset(): void {
    this.sourceMetadata = {};
    this.blocks = 0;
    this.rows = 0;
    this.coercionFallbacks = 0;
    this.records.clear();
    this.unmappedTables.clear();
    this.unmappedColumns.clear();
  }

  countRecord(entity: string): void {
    this.records.set(entity, (this.records.get(entity) ?? 0) + 1);
  }

  onDrop(report: DropReport): void {
    if (report.column !== undefined) {
      const columns = this.unmappedColumns.get(report.table) ?? [];
      columns.push(report.column);
      this.unmappedColumns.set(report.table, columns);
      if (report.warn) {
        this.eventBus.emit({ type: 'column:unmapped', table: report.table, column: report.column, timestamp: Date.now() });
      }
      return;
    }

    const dropped = this.unmappedTables.get(report.table) ?? 0;
    this.unmappedTables.set(report.table, dropped + 1);
    if (report.warn && dropped === 0) {
      this.eventBus.emit({ type: 'table:unmapped', table: report.table, line: report.line ?? 0, timestamp: Date.now() });
    }
  }

  onFallback(report: FallbackReport): void {
    this.coercionFallbacks++;
    this.eventBus.emit({ type: 'coercion:fallback', ...report, timestamp: Date.now() });
  }

  buildSummary(): ExtractSummary {
    return {
      source: this.sourceMetadata,
      blocks: this.blocks,
      rows: this.rows,
      records: Object.fromEntries(this.records),
      unmappedTables: Object.fromEntries(this.unmappedTables),
      unmappedColumns: Object.fromEntries(this.unmappedColumns),
      coercionFallbacks: this.coercionFallbacks,
    };
  }
}
