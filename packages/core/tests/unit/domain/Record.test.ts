import { describe, it, expect } from 'vitest';
import { createRecord, recordsEqual, fieldValuesEqual } from '../../../src/domain/model/Record.js';

describe('recordsEqual', () => {
  it('should ignore field order', () => {
    const a = createRecord('games.team', 1, { name: 'Falcons', initial_seed: 3 });
    const b = createRecord('games.team', 1, { initial_seed: 3, name: 'Falcons' });
    expect(recordsEqual(a, b)).toBe(true);
  });

  it('should compare primary keys, entities and values', () => {
    const a = createRecord('games.team', 1, { name: 'Falcons' });
    expect(recordsEqual(a, createRecord('games.team', 2, { name: 'Falcons' }))).toBe(false);
    expect(recordsEqual(a, createRecord('games.player', 1, { name: 'Falcons' }))).toBe(false);
    expect(recordsEqual(a, createRecord('games.team', 1, { name: 'Hawks' }))).toBe(false);
    expect(recordsEqual(a, createRecord('games.team', 1, { name: 'Falcons', city: 'Nairobi' }))).toBe(false);
  });

  it('should distinguish a number from its string form', () => {
    expect(recordsEqual(createRecord('x', null, { team: 4 }), createRecord('x', null, { team: '4' }))).toBe(false);
  });
});

describe('fieldValuesEqual', () => {
  it('should compare lists element-wise', () => {
    expect(fieldValuesEqual([1, 2], [1, 2])).toBe(true);
    expect(fieldValuesEqual([1, 2], [2, 1])).toBe(false);
    expect(fieldValuesEqual([1], 1)).toBe(false);
  });
});

describe('createRecord', () => {
  it('should copy the field mapping', () => {
    const fields: Record<string, string> = { name: 'Falcons' };
    const record = createRecord('games.team', 1, fields);
    fields['name'] = 'Hawks';
    expect(record.fields).toEqual({ name: 'Falcons' });
  });
});
