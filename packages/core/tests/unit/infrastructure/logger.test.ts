import { describe, it, expect } from 'vitest';
import { Logger, parseLogLevel } from '../../../src/infrastructure/logging/logger.js';
import type { LogLevel } from '../../../src/infrastructure/logging/logger.js';
import { attachEventLogger } from '../../../src/infrastructure/logging/attachEventLogger.js';
import { EventBus } from '../../../src/application/EventBus.js';

function capture(level: LogLevel, pretty = false): { logger: Logger; lines: [LogLevel, string][] } {
  const lines: [LogLevel, string][] = [];
  const logger = new Logger({ level, service: 'test', pretty }, (lvl, line) => {
    lines.push([lvl, line]);
  });
  return { logger, lines };
}

describe('Logger', () => {
  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(lines.map(([level]) => level)).toEqual(['warn', 'error']);
  });

  it('should write JSON lines with metadata', () => {
    const { logger, lines } = capture('info');
    logger.info('extracted', { records: 3 });

    const [level, line] = lines[0] ?? ['debug', '{}'];
    expect(level).toBe('info');
    expect(JSON.parse(line)).toMatchObject({ level: 'info', service: 'test', message: 'extracted', records: 3 });
  });

  it('should prefix child loggers with their scope', () => {
    const { logger, lines } = capture('info');
    logger.child('extract').info('done');
    expect(JSON.parse(lines[0]?.[1] ?? '{}')).toMatchObject({ service: 'test:extract' });
  });

  it('should format pretty lines', () => {
    const { logger, lines } = capture('info', true);
    logger.warn('careful', { table: '_core_x' });
    expect(lines[0]?.[1]).toMatch(/^\[.+\] WARN: careful \{"table":"_core_x"\}$/);
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('attachEventLogger', () => {
  it('should log warnings for unmapped tables and info for written files', () => {
    const { logger, lines } = capture('info');
    const bus = new EventBus();
    attachEventLogger(bus, logger);

    bus.emit({ type: 'table:unmapped', table: '_core_legacy', line: 4, timestamp: 1 });
    bus.emit({ type: 'file:written', entity: 'games.team', path: 'f/games_team.json', recordCount: 2, timestamp: 2 });
    bus.emit({ type: 'block:started', table: '_core_team', columns: ['id'], line: 9, mapped: true, timestamp: 3 });

    expect(lines.map(([level]) => level)).toEqual(['warn', 'info']);
  });

  it('should log the dump file name and size with the extraction summary', () => {
    const { logger, lines } = capture('info');
    const bus = new EventBus();
    attachEventLogger(bus, logger);

    bus.emit({
      type: 'extract:completed',
      summary: {
        source: { fileName: 'league.sql', fileSize: 2048 },
        blocks: 1,
        rows: 3,
        records: { 'games.team': 3 },
        unmappedTables: {},
        unmappedColumns: {},
        coercionFallbacks: 0,
      },
      timestamp: 4,
    });

    expect(JSON.parse(lines[0]?.[1] ?? '{}')).toMatchObject({
      message: 'Extraction completed',
      source: { fileName: 'league.sql', fileSize: 2048 },
      rows: 3,
    });
  });
});
