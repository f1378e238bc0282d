import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RecordFileStore, loadBuiltinSchema, serializeRecords } from '@dumpshift/core';
import type { DomainEvent, MigrationSchema } from '@dumpshift/core';
import { RepairRunner } from '../../src/RepairRunner.js';

const USERS = `[
  {"entity": "authman.user", "primary_key": 1,
   "fields": {"username": "admin", "is_superuser": "1", "last_login": "2019-05-01 08:00:00"}}
]
`;

const GAMES = `[
  {"entity": "games.game", "primary_key": 7,
   "fields": {"name": "Final", "start_time": "2019-06-02 15:30:00", "team1": 1, "team2": 2, "game_round": "2"}}
]
`;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('RepairRunner', () => {
  let schema: MigrationSchema;
  let directory: string;
  let usersPath: string;
  let gamesPath: string;

  beforeAll(async () => {
    schema = await loadBuiltinSchema();
  });

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'dumpshift-repair-'));
    usersPath = join(directory, 'authman_user.json');
    gamesPath = join(directory, 'games_game.json');
    await writeFile(usersPath, USERS);
    await writeFile(gamesPath, GAMES);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('normalize', () => {
    it('should rewrite residual encodings and back up the prior bytes', async () => {
      const runner = new RepairRunner({ schema, directory });
      const result = await runner.normalize(usersPath);

      expect(result.changed).toBe(true);
      expect(result.changes.map((c) => [c.field, c.rule])).toEqual([
        ['is_superuser', 'boolean-string'],
        ['last_login', 'naive-timestamp'],
      ]);
      expect(result.backupPath).toBe(`${usersPath}.bak`);
      expect(await readFile(`${usersPath}.bak`, 'utf-8')).toBe(USERS);
      expect(await readFile(usersPath, 'utf-8')).toBe(
        serializeRecords([
          {
            entity: 'authman.user',
            primary_key: 1,
            fields: { username: 'admin', is_superuser: true, last_login: '2019-05-01T08:00:00Z' },
          },
        ]),
      );
    });

    it('should be idempotent and leave the file and its backup alone on a second pass', async () => {
      const runner = new RepairRunner({ schema, directory });
      await runner.normalize(usersPath);
      const afterFirst = await readFile(usersPath);
      const mtimeAfterFirst = (await stat(usersPath)).mtimeMs;

      const second = await runner.normalize(usersPath);

      expect(second.changed).toBe(false);
      expect(second.changes).toEqual([]);
      expect(second.backupPath).toBeNull();
      expect((await readFile(usersPath)).equals(afterFirst)).toBe(true);
      expect((await stat(usersPath)).mtimeMs).toBe(mtimeAfterFirst);
      expect(await readFile(`${usersPath}.bak`, 'utf-8')).toBe(USERS);
    });

    it('should not create a backup for a file that is already canonical', async () => {
      const canonical = serializeRecords([{ entity: 'games.team', primary_key: 1, fields: { name: 'Falcons' } }]);
      const path = join(directory, 'games_team.json');
      await writeFile(path, canonical);

      const result = await new RepairRunner({ schema, directory }).normalize(path);

      expect(result.changed).toBe(false);
      expect(await exists(`${path}.bak`)).toBe(false);
    });

    it('should report records of unknown entities and still normalize them', async () => {
      const path = join(directory, 'legacy.json');
      await writeFile(
        path,
        '[{"entity": "games.legacy", "primary_key": 3, "fields": {"seen_at": "2019-05-01 08:00:00"}}]',
      );
      const drifted: DomainEvent[] = [];
      const runner = new RepairRunner({ schema, directory }).on('schema:drift', (e) => drifted.push(e));

      const result = await runner.normalize(path);

      expect(result.drift).toEqual([{ entity: 'games.legacy', primaryKey: 3 }]);
      expect(drifted).toHaveLength(1);
      expect(result.changes).toHaveLength(1);
    });

    it('should only report changes in a dry run', async () => {
      const events: string[] = [];
      const runner = new RepairRunner({ schema, directory, dryRun: true }).onAny((e) => events.push(e.type));

      const result = await runner.normalize(usersPath);

      expect(result.changed).toBe(true);
      expect(result.backupPath).toBeNull();
      expect(await readFile(usersPath, 'utf-8')).toBe(USERS);
      expect(await exists(`${usersPath}.bak`)).toBe(false);
      expect(events).toEqual(['field:repaired', 'field:repaired', 'file:repaired']);
    });

    it('should use the configured backup suffix', async () => {
      const result = await new RepairRunner({ schema, directory, backupSuffix: '.orig' }).normalize(usersPath);
      expect(result.backupPath).toBe(`${usersPath}.orig`);
    });
  });

  describe('fix', () => {
    it('should derive memberships without duplicating them on a second run', async () => {
      const runner = new RepairRunner({ schema, directory });
      await runner.normalize(usersPath);

      const first = await runner.fix(usersPath);
      const second = await runner.fix(usersPath);

      expect(first.changes.map((c) => c.rule)).toEqual(['membership']);
      expect(second.changed).toBe(false);
      const { records } = await new RecordFileStore({ directory }).read(usersPath);
      expect(records[0]?.fields['groups']).toEqual([1]);
    });

    it('should back up the normalized bytes before fixing', async () => {
      const runner = new RepairRunner({ schema, directory });
      await runner.normalize(usersPath);
      const normalized = await readFile(usersPath, 'utf-8');

      await runner.fix(usersPath);

      expect(await readFile(`${usersPath}.bak`, 'utf-8')).toBe(normalized);
    });

    it('should announce each fixer that handles an entity of the file', async () => {
      const applied: string[] = [];
      const runner = new RepairRunner({ schema, directory }).on('fixer:applied', (e) => applied.push(e.fixer));

      await runner.fix(gamesPath);

      expect(applied).toEqual(['game-fields']);
    });
  });

  describe('repairAll', () => {
    it('should normalize then fix every record file in the directory', async () => {
      const runner = new RepairRunner({ schema, directory });

      const { normalized, fixed } = await runner.repairAll();

      expect(normalized).toEqual({
        filesScanned: 2,
        filesChanged: 2,
        fieldsChanged: 3,
        backups: [`${usersPath}.bak`, `${gamesPath}.bak`],
        driftRecords: 0,
        failed: [],
      });
      expect(fixed).toEqual({
        filesScanned: 2,
        filesChanged: 2,
        fieldsChanged: 7,
        backups: [`${usersPath}.bak`, `${gamesPath}.bak`],
        driftRecords: 0,
        failed: [],
      });

      const { records } = await new RecordFileStore({ directory }).read(gamesPath);
      expect(records).toEqual([
        {
          entity: 'games.game',
          primary_key: 7,
          fields: {
            name: 'Final',
            date: '2019-06-02T15:30:00Z',
            home_team: 1,
            away_team: 2,
            game_round: 2,
            location: 1,
            status: 'completed',
          },
        },
      ]);
    });

    it('should skip a file that is not a record file and keep sweeping', async () => {
      const brokenPath = join(directory, 'a_broken.json');
      await writeFile(brokenPath, '[{"entity": ');
      const skipped: string[] = [];
      const runner = new RepairRunner({ schema, directory }).on('file:skipped', (e) => skipped.push(e.path));

      const summary = await runner.normalizeAll();

      expect(summary.filesScanned).toBe(2);
      expect(summary.filesChanged).toBe(2);
      expect(summary.failed.map((f) => f.path)).toEqual([brokenPath]);
      expect(summary.failed[0]?.reason.startsWith(`${brokenPath}: invalid JSON (`)).toBe(true);
      expect(skipped).toEqual([brokenPath]);
      expect(await readFile(brokenPath, 'utf-8')).toBe('[{"entity": ');
      const { records } = await new RecordFileStore({ directory }).read(usersPath);
      expect(records[0]?.fields['last_login']).toBe('2019-05-01T08:00:00Z');
    });

    it('should change nothing on a second sweep', async () => {
      const runner = new RepairRunner({ schema, directory });
      await runner.repairAll();

      const { normalized, fixed } = await runner.repairAll();

      expect(normalized.filesChanged + fixed.filesChanged).toBe(0);
      expect(normalized.backups).toEqual([]);
      expect(fixed.backups).toEqual([]);
    });
  });
});
