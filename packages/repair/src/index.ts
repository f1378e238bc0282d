// Main entry point
export { RepairRunner, defaultFixers } from './RepairRunner.js';
export type { RepairRunnerConfig, RepairSummary, FailedFile } from './RepairRunner.js';

// Domain model
export type { FieldChange, RepairOutcome, RepairRule } from './domain/model/FieldChange.js';

// Domain services
export { normalizeRecord } from './domain/services/normalizeRecord.js';

// Ports
export type { RecordFixer } from './domain/ports/RecordFixer.js';

// Use case result types
export type { FileRepairResult } from './application/RepairContext.js';
export type { NormalizeResult, DriftedRecord } from './application/usecases/NormalizeRecordFile.js';

// Built-in fixers
export { MembershipFixer, DEFAULT_MEMBERSHIP_RULES } from './fixers/MembershipFixer.js';
export type { MembershipFixerOptions, MembershipRule } from './fixers/MembershipFixer.js';
export { GameFieldFixer, DEFAULT_GAME_RENAMES, DEFAULT_GAME_DEFAULTS } from './fixers/GameFieldFixer.js';
export type { GameFieldFixerOptions } from './fixers/GameFieldFixer.js';
