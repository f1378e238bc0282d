import { describe, it, expect } from 'vitest';
import { defineSchema, findTable, isKnownEntity, isRelationField } from '../../../src/domain/model/Schema.js';

const schema = defineSchema({
  name: 'league',
  tables: [
    { table: '_core_team', entity: 'games.team', columns: { name: 'name', origin_id: 'origin' } },
    { table: '_core_player', entity: 'games.player', primaryKey: 'player_no', columns: { name: 'name' } },
  ],
  extraEntities: ['core.world'],
  coercion: { relationFields: ['origin'] },
});

describe('defineSchema', () => {
  it('should index tables by legacy name with ordered column renames', () => {
    const team = findTable(schema, '_core_team');
    expect(team?.entity).toBe('games.team');
    expect(team?.primaryKey).toBe('id');
    expect([...(team?.columns.entries() ?? [])]).toEqual([
      ['name', 'name'],
      ['origin_id', 'origin'],
    ]);
  });

  it('should keep a declared primary key column', () => {
    expect(findTable(schema, '_core_player')?.primaryKey).toBe('player_no');
  });

  it('should return undefined for unmapped tables', () => {
    expect(findTable(schema, '_core_unknown')).toBeUndefined();
  });

  it('should know mapped and extra entities', () => {
    expect(isKnownEntity(schema, 'games.team')).toBe(true);
    expect(isKnownEntity(schema, 'core.world')).toBe(true);
    expect(isKnownEntity(schema, 'games.legacy')).toBe(false);
  });

  it('should default the relation suffix to _id', () => {
    expect(schema.coercion.relationSuffix).toBe('_id');
    expect(isRelationField(schema.coercion, 'origin')).toBe(true);
    expect(isRelationField(schema.coercion, 'country_id')).toBe(true);
    expect(isRelationField(schema.coercion, 'name')).toBe(false);
  });

  it('should produce a frozen schema', () => {
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.coercion)).toBe(true);
  });
});
