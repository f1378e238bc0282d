import type { FieldValue, MigrationRecord } from '@dumpshift/core';
import { parseInteger, withFields } from '@dumpshift/core';
import type { RecordFixer } from '../domain/ports/RecordFixer.js';
import type { FieldChange, RepairOutcome } from '../domain/model/FieldChange.js';

export interface GameFieldFixerOptions {
  /** Default: `'games.game'`. */
  readonly entity?: string;
  /** Ordered legacy → current field renames. */
  readonly renames?: readonly (readonly [from: string, to: string])[];
  /** Fields coerced to integers when they hold a digit string. */
  readonly integerFields?: readonly string[];
  /** Values filled in when a field is absent. */
  readonly defaults?: Readonly<Record<string, FieldValue>>;
}

export const DEFAULT_GAME_RENAMES: readonly (readonly [string, string])[] = [
  ['start_time', 'date'],
  ['team1', 'home_team'],
  ['team2', 'away_team'],
  ['team1_score', 'home_team_score'],
  ['team2_score', 'away_team_score'],
  ['pool', 'division_pool'],
];

export const DEFAULT_GAME_DEFAULTS: Readonly<Record<string, FieldValue>> = {
  location: 1,
  status: 'completed',
};

/**
 * Moves game records from the legacy field names to the current ones. A
 * rename only happens when the target field is absent, so a record that
 * carries both keeps both.
 */
export class GameFieldFixer implements RecordFixer {
  readonly name = 'game-fields';
  readonly entity: string;
  private readonly renames: readonly (readonly [string, string])[];
  private readonly integerFields: readonly string[];
  private readonly defaults: Readonly<Record<string, FieldValue>>;

  constructor(options?: GameFieldFixerOptions) {
    this.entity = options?.entity ?? 'games.game';
    this.renames = options?.renames ?? DEFAULT_GAME_RENAMES;
    this.integerFields = options?.integerFields ?? ['game_round'];
    this.defaults = options?.defaults ?? DEFAULT_GAME_DEFAULTS;
  }

  fix(record: MigrationRecord): RepairOutcome<MigrationRecord> {
    const fields: Record<string, FieldValue> = { ...record.fields };
    const changes: FieldChange[] = [];
    const change = (field: string, before: FieldValue | undefined, after: FieldValue, rule: FieldChange['rule']): void => {
      changes.push({ entity: record.entity, primaryKey: record.primary_key, field, before, after, rule });
    };

    for (const [from, to] of this.renames) {
      const value = fields[from];
      if (value === undefined || fields[to] !== undefined) continue;
      delete fields[from];
      fields[to] = value;
      change(to, undefined, value, 'rename');
    }

    for (const field of this.integerFields) {
      const value = fields[field];
      if (typeof value !== 'string') continue;
      const parsed = parseInteger(value);
      if (parsed === undefined) continue;
      fields[field] = parsed;
      change(field, value, parsed, 'integer');
    }

    for (const [field, value] of Object.entries(this.defaults)) {
      if (fields[field] !== undefined) continue;
      fields[field] = value;
      change(field, undefined, value, 'default');
    }

    return { record: changes.length > 0 ? withFields(record, fields) : record, changes };
  }
}
