import type {
  DataSource,
  EventPayload,
  EventType,
  DomainEvent,
  ExtractSummary,
  MigrationRecord,
  MigrationSchema,
  RowAlignment,
  UnmappedPolicy,
} from '@dumpshift/core';
import { RecordFileStore } from '@dumpshift/core';
import { ExtractContext } from './application/ExtractContext.js';
import { ExtractRecords } from './application/usecases/ExtractRecords.js';
import { RecordEmitter } from './application/RecordEmitter.js';
import type { EmittedFile } from './application/RecordEmitter.js';

/** Configuration for an extraction run. */
export interface DumpExtractorConfig {
  /** Schema mapping applied to every block. */
  readonly schema: MigrationSchema;
  /** Treatment of tables and columns the schema does not name. Default: `'drop-silently'`. */
  readonly unmappedPolicy?: UnmappedPolicy;
  /** Treatment of rows whose cell count differs from the column count. Default: `'strict'`. */
  readonly rowAlignment?: RowAlignment;
  /** A cell exactly equal to this token is treated as empty. Default: none. */
  readonly nullToken?: string;
}

/** Result of `DumpExtractor.run()`. */
export interface ExtractResult {
  readonly summary: ExtractSummary;
  readonly files: readonly EmittedFile[];
}

/**
 * Facade for the one-directional extraction pipeline:
 * dump → block parser → row mapper (schema + coercion) → record emitter.
 *
 * @example
 * ```typescript
 * const extractor = new DumpExtractor({ schema: await loadBuiltinSchema() });
 * extractor.from(new FilePathSource('data.sql'));
 * const { summary, files } = await extractor.run('fixtures');
 * ```
 */
export class DumpExtractor {
  private readonly ctx: ExtractContext;

  constructor(config: DumpExtractorConfig) {
    this.ctx = new ExtractContext(
      config.schema,
      config.unmappedPolicy ?? 'drop-silently',
      config.rowAlignment ?? 'strict',
      config.nullToken,
    );
  }

  /** Set the dump to read. */
  from(source: DataSource): this {
    this.ctx.source = source;
    return this;
  }

  /** Subscribe to a domain event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Lazily yield mapped records in dump order, without writing anything. */
  records(): AsyncGenerator<MigrationRecord> {
    return new ExtractRecords(this.ctx).execute();
  }

  /**
   * Extract every record and write one record file per entity into `target`
   * (a directory or a configured store). Nothing is written when the dump is malformed.
   */
  async run(target: string | RecordFileStore): Promise<ExtractResult> {
    const store = typeof target === 'string' ? new RecordFileStore({ directory: target }) : target;
    const files = await new RecordEmitter(store, this.ctx.eventBus).emit(this.records());
    return { summary: this.ctx.buildSummary(), files };
  }

  /** Counters of the most recent run. */
  getSummary(): ExtractSummary {
    return this.ctx.buildSummary();
  }
}
