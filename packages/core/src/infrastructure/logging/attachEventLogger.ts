import type { DomainEvent } from '../../domain/events/DomainEvents.js';
import type { Logger } from './logger.js';

/** Anything that publishes domain events: the `EventBus` itself or a facade over one. */
export interface EventSubscriber {
  onAny(handler: (event: DomainEvent) => void): unknown;
}

/** Log every domain event published by `source` at a level matching its operator relevance. */
export function attachEventLogger(source: EventSubscriber, logger: Logger): void {
  source.onAny((event) => {
    logEvent(logger, event);
  });
}

function logEvent(logger: Logger, event: DomainEvent): void {
  switch (event.type) {
    case 'block:started':
      logger.debug('Block started', { table: event.table, line: event.line, mapped: event.mapped });
      break;
    case 'block:completed':
      logger.debug('Block completed', { table: event.table, rows: event.rowCount, records: event.recordCount });
      break;
    case 'table:unmapped':
      logger.warn('Dropping rows of unmapped table', { table: event.table, line: event.line });
      break;
    case 'column:unmapped':
      logger.warn('Dropping unmapped column', { table: event.table, column: event.column });
      break;
    case 'coercion:fallback':
      logger.warn('Kept uncoercible value as string', {
        entity: event.entity,
        field: event.field,
        value: event.value,
        expected: event.expected,
      });
      break;
    case 'file:written':
      logger.info(`Wrote ${String(event.recordCount)} records`, { entity: event.entity, path: event.path });
      break;
    case 'extract:completed':
      logger.info('Extraction completed', { ...event.summary });
      break;
    case 'field:repaired':
      logger.debug('Repaired field', {
        path: event.path,
        entity: event.entity,
        pk: event.primaryKey,
        field: event.field,
        rule: event.rule,
      });
      break;
    case 'schema:drift':
      logger.warn('Record names an entity unknown to the schema', {
        path: event.path,
        entity: event.entity,
        pk: event.primaryKey,
      });
      break;
    case 'file:repaired':
      logger.info(event.dryRun ? 'Would repair file' : 'Repaired file', {
        path: event.path,
        backup: event.backupPath,
        changes: event.changeCount,
      });
      break;
    case 'file:unchanged':
      logger.debug('File already canonical', { path: event.path });
      break;
    case 'file:skipped':
      logger.error('Skipped unreadable record file', { path: event.path, reason: event.reason });
      break;
    case 'fixer:applied':
      logger.debug('Fixer applied', { fixer: event.fixer, path: event.path, records: event.recordsChanged });
      break;
  }
}
