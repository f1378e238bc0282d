import { describe, it, expect } from 'vitest';
import { createRecord } from '@dumpshift/core';
import { MembershipFixer } from '../../src/fixers/MembershipFixer.js';
import { GameFieldFixer } from '../../src/fixers/GameFieldFixer.js';

describe('MembershipFixer', () => {
  const fixer = new MembershipFixer();

  it('should add the superuser group exactly once across runs', () => {
    const record = createRecord('authman.user', 1, { username: 'admin', is_superuser: true });

    const first = fixer.fix(record);
    expect(first.record.fields['groups']).toEqual([1]);
    expect(first.changes).toEqual([
      { entity: 'authman.user', primaryKey: 1, field: 'groups', before: undefined, after: [1], rule: 'membership' },
    ]);

    const second = fixer.fix(first.record);
    expect(second.record.fields['groups']).toEqual([1]);
    expect(second.changes).toEqual([]);
    expect(second.record).toBe(first.record);
  });

  it('should grant the team manager group', () => {
    const outcome = fixer.fix(createRecord('authman.user', 2, { role: 'team_manager', is_superuser: false }));
    expect(outcome.record.fields['groups']).toEqual([2]);
  });

  it('should union with existing memberships', () => {
    const outcome = fixer.fix(createRecord('authman.user', 3, { is_superuser: 't', role: 'team_manager', groups: [2, 5] }));
    expect(outcome.record.fields['groups']).toEqual([2, 5, 1]);
    expect(outcome.changes[0]?.before).toEqual([2, 5]);
  });

  it('should treat a membership id stored as a string as already present', () => {
    const record = createRecord('authman.user', 6, { is_superuser: true, groups: ['1'] });
    const outcome = fixer.fix(record);
    expect(outcome.changes).toEqual([]);
    expect(outcome.record.fields['groups']).toEqual(['1']);
  });

  it('should not write a membership field when no rule matches', () => {
    const record = createRecord('authman.user', 4, { role: 'player', is_superuser: false });
    const outcome = fixer.fix(record);
    expect(outcome.record).toBe(record);
    expect('groups' in outcome.record.fields).toBe(false);
  });

  it('should leave a membership field that is not a list', () => {
    const record = createRecord('authman.user', 5, { is_superuser: true, groups: 'admins' });
    expect(fixer.fix(record).changes).toEqual([]);
  });

  it('should accept custom rules and field names', () => {
    const custom = new MembershipFixer({
      entity: 'club.member',
      membershipField: 'roles',
      rules: [{ field: 'captain', equals: 1, group: 9 }],
    });
    const outcome = custom.fix(createRecord('club.member', 8, { captain: 1 }));
    expect(custom.entity).toBe('club.member');
    expect(outcome.record.fields['roles']).toEqual([9]);
  });
});

describe('GameFieldFixer', () => {
  const fixer = new GameFieldFixer();

  it('should move legacy game fields to their current names', () => {
    const record = createRecord('games.game', 7, {
      name: 'Final',
      start_time: '2019-06-02T15:30:00Z',
      team1: 1,
      team2: 2,
      team1_score: 13,
      team2_score: 11,
      pool: 3,
      game_round: '2',
    });

    const outcome = fixer.fix(record);

    expect(outcome.record.fields).toEqual({
      name: 'Final',
      date: '2019-06-02T15:30:00Z',
      home_team: 1,
      away_team: 2,
      home_team_score: 13,
      away_team_score: 11,
      division_pool: 3,
      game_round: 2,
      location: 1,
      status: 'completed',
    });
    expect(outcome.changes.map((c) => c.rule)).toEqual([
      'rename',
      'rename',
      'rename',
      'rename',
      'rename',
      'rename',
      'integer',
      'default',
      'default',
    ]);
  });

  it('should be a no-op on a fixed record', () => {
    const fixed = fixer.fix(createRecord('games.game', 7, { team1: 1, game_round: '2' })).record;
    const again = fixer.fix(fixed);
    expect(again.changes).toEqual([]);
    expect(again.record).toBe(fixed);
  });

  it('should keep both fields when the current name is already present', () => {
    const outcome = fixer.fix(createRecord('games.game', 8, { team1: 1, home_team: 5, location: 2, status: 'scheduled' }));
    expect(outcome.record.fields).toEqual({ team1: 1, home_team: 5, location: 2, status: 'scheduled' });
    expect(outcome.changes).toEqual([]);
  });

  it('should keep a game round that is not an integer', () => {
    const outcome = fixer.fix(createRecord('games.game', 9, { game_round: 'semi', location: 1, status: 'completed' }));
    expect(outcome.record.fields['game_round']).toBe('semi');
    expect(outcome.changes).toEqual([]);
  });
});
