// Main entry point
export { DumpExtractor } from './DumpExtractor.js';
export type { DumpExtractorConfig, ExtractResult } from './DumpExtractor.js';

// Domain model
export type { DumpBlock, DumpRow } from './domain/model/DumpBlock.js';

// Domain services
export { RowMapper } from './domain/services/RowMapper.js';
export type { RowMapperOptions, MappingListener, DropReport, FallbackReport } from './domain/services/RowMapper.js';

// Ports
export type { BlockParser } from './domain/ports/BlockParser.js';

// Application
export { RecordEmitter } from './application/RecordEmitter.js';
export type { EmittedFile } from './application/RecordEmitter.js';

// Infrastructure adapters
export { DumpParser, parseDirective } from './infrastructure/parsers/DumpParser.js';
export type { DumpParserOptions } from './infrastructure/parsers/DumpParser.js';
