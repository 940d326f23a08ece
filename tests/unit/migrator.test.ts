/**
 * Database Migrator Tests
 * File discovery and naming helpers; no database connection is made
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { QueryResultRow } from 'pg';

import {
  ConnectionSource,
  DatabaseMigrator,
  MigrationConnection,
  checksumOf,
  createMigrationFiles,
  defaultMigrationsPath,
  downFilename,
  formatStatus,
  listMigrationFiles,
  planMigrations,
  validateSchemaTable,
} from '../../src/database/migrator';

interface Statement {
  text: string;
  values: unknown[];
}

/** Answers the schema-table reads from `applied` and records everything else */
class FakeDatabase implements ConnectionSource {
  readonly statements: Statement[] = [];
  applied: QueryResultRow[] = [];
  failOn: string | null = null;
  released = 0;
  ended = false;

  async connect(): Promise<MigrationConnection> {
    return {
      query: async (text: string, values: unknown[] = []) => {
        const sql = text.replace(/\s+/g, ' ').trim();
        this.statements.push({ text: sql, values });
        if (this.failOn !== null && sql.includes(this.failOn)) throw new Error('syntax error');

        if (sql.startsWith('SELECT id, name, filename, checksum, applied_at')) {
          const rows = sql.includes('DESC') ? [...this.applied].reverse().slice(0, Number(values[0])) : this.applied;
          return { rows };
        }
        return { rows: [] };
      },
      release: () => {
        this.released += 1;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  get transactionLog(): string[] {
    return this.statements
      .map(s => s.text)
      .filter(t => ['BEGIN', 'COMMIT', 'ROLLBACK'].includes(t) || /^(CREATE|DROP) TABLE (?!IF )\w+/.test(t));
  }

  valuesOf(prefix: string): unknown[][] {
    return this.statements.filter(s => s.text.startsWith(prefix)).map(s => s.values);
  }
}

describe('Database Migrator', () => {
  describe('Bundled migrations', () => {
    it('should find the initial schema', () => {
      expect(listMigrationFiles(defaultMigrationsPath())).toEqual([
        { id: 1, name: 'initial schema', filename: '0001_initial_schema.sql' },
      ]);
    });

    it('should create every entity table and drop them on rollback', () => {
      const dir = defaultMigrationsPath();
      const up = fs.readFileSync(path.join(dir, '0001_initial_schema.sql'), 'utf8');
      const down = fs.readFileSync(path.join(dir, '0001_initial_schema.down.sql'), 'utf8');

      for (const table of ['networks', 'tokens', 'posts', 'sentiment_labels', 'token_mentions']) {
        expect(up).toContain(`CREATE TABLE IF NOT EXISTS ${table} (`);
        expect(down).toContain(`DROP TABLE IF EXISTS ${table};`);
      }
    });
  });

  describe('Migration files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should list up migrations in id order', () => {
      for (const file of ['0002_add_index.sql', '0001_init.sql', '0001_init.down.sql', 'README.md']) {
        fs.writeFileSync(path.join(dir, file), '');
      }

      expect(listMigrationFiles(dir)).toEqual([
        { id: 1, name: 'init', filename: '0001_init.sql' },
        { id: 2, name: 'add index', filename: '0002_add_index.sql' },
      ]);
    });

    it('should create the next numbered pair', () => {
      fs.writeFileSync(path.join(dir, '0003_earlier.sql'), '');

      const files = createMigrationFiles('Add Author Index', dir);

      expect(files).toEqual(['0004_add_author_index.sql', '0004_add_author_index.down.sql']);
      expect(fs.readFileSync(path.join(dir, files[0]), 'utf8')).toMatch(/^-- Migration: Add Author Index\n/);
      expect(fs.readFileSync(path.join(dir, files[1]), 'utf8')).toMatch(/^-- Rollback: Add Author Index\n/);
    });
  });

  describe('Helpers', () => {
    it('should hash content with sha256', () => {
      expect(checksumOf('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(checksumOf('a')).not.toBe(checksumOf('b'));
    });

    it('should accept valid schema table names', () => {
      expect(() => validateSchemaTable('_migrations')).not.toThrow();
      expect(() => validateSchemaTable('schema_v2')).not.toThrow();
    });

    it('should reject unsafe schema table names', () => {
      expect(() => validateSchemaTable('1migrations')).toThrow('Invalid schema table name: "1migrations"');
      expect(() => validateSchemaTable('migrations; DROP TABLE posts')).toThrow(/Invalid schema table name/);
      expect(() => validateSchemaTable('a'.repeat(64))).toThrow('Schema table name too long: 64 chars (max 63)');
    });

    it('should validate the schema table before opening a pool', () => {
      expect(() => new DatabaseMigrator({ schemaTable: 'bad-name' })).toThrow(/Invalid schema table name/);
    });
  });

  describe('Running migrations', () => {
    const NETWORKS_SQL = 'CREATE TABLE networks (id INT);';
    const TOKENS_SQL = 'CREATE TABLE tokens (id INT);';
    const appliedAt = new Date('2024-03-01T00:00:00.000Z');

    let dir: string;
    let db: FakeDatabase;
    let migrator: DatabaseMigrator;

    const appliedRow = (id: number, name: string, filename: string, checksum: string) =>
      ({ id, name, filename, checksum, applied_at: appliedAt });

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
      fs.writeFileSync(path.join(dir, '0001_networks.sql'), NETWORKS_SQL);
      fs.writeFileSync(path.join(dir, '0001_networks.down.sql'), 'DROP TABLE networks;');
      fs.writeFileSync(path.join(dir, '0002_tokens.sql'), TOKENS_SQL);

      db = new FakeDatabase();
      migrator = new DatabaseMigrator({ migrationsPath: dir }, db);
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should apply every pending file in its own transaction', async () => {
      const result = await migrator.migrate();

      expect(result).toEqual({ success: true, migrationsRun: ['networks', 'tokens'] });
      expect(db.transactionLog).toEqual([
        'BEGIN', NETWORKS_SQL, 'COMMIT',
        'BEGIN', TOKENS_SQL, 'COMMIT',
      ]);
      expect(db.valuesOf('INSERT INTO _migrations')).toEqual([
        [1, 'networks', '0001_networks.sql', checksumOf(NETWORKS_SQL)],
        [2, 'tokens', '0002_tokens.sql', checksumOf(TOKENS_SQL)],
      ]);
      expect(db.released).toBe(1);
    });

    it('should skip migrations already recorded', async () => {
      db.applied = [appliedRow(1, 'networks', '0001_networks.sql', checksumOf(NETWORKS_SQL))];

      expect(await migrator.migrate()).toEqual({ success: true, migrationsRun: ['tokens'] });
      expect(db.transactionLog).toEqual(['BEGIN', TOKENS_SQL, 'COMMIT']);
    });

    it('should refuse to run when an applied file has changed', async () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      db.applied = [appliedRow(1, 'networks', '0001_networks.sql', 'stale')];

      const result = await migrator.migrate();

      expect(result).toEqual({
        success: false,
        migrationsRun: [],
        error: 'Migration 0001_networks.sql has been modified after being applied. ' +
          `Expected checksum: stale, got: ${checksumOf(NETWORKS_SQL)}`,
      });
      expect(db.transactionLog).toEqual([]);
      error.mockRestore();
    });

    it('should roll back a failing file and stop', async () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      db.failOn = 'CREATE TABLE tokens';

      const result = await migrator.migrate();

      expect(result).toEqual({ success: false, migrationsRun: ['networks'], error: 'Migration tokens failed: syntax error' });
      expect(db.transactionLog).toEqual(['BEGIN', NETWORKS_SQL, 'COMMIT', 'BEGIN', TOKENS_SQL, 'ROLLBACK']);
      expect(error).toHaveBeenCalledWith('[Migrator] Migration tokens failed: syntax error');
      expect(db.released).toBe(1);
      error.mockRestore();
    });

    it('should revert the newest migrations first', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      db.applied = [
        appliedRow(1, 'networks', '0001_networks.sql', checksumOf(NETWORKS_SQL)),
        appliedRow(2, 'tokens', '0002_tokens.sql', checksumOf(TOKENS_SQL)),
      ];

      const result = await migrator.rollback(2);

      expect(result).toEqual({ success: true, migrationsRun: ['tokens', 'networks'] });
      expect(db.transactionLog).toEqual(['BEGIN', 'COMMIT', 'BEGIN', 'DROP TABLE networks;', 'COMMIT']);
      expect(db.valuesOf('DELETE FROM _migrations')).toEqual([[2], [1]]);
      expect(warn).toHaveBeenCalledWith('[Migrator] No down migration for 0002_tokens.sql; removing its record only');
      warn.mockRestore();
    });

    it('should report applied and pending migrations', async () => {
      db.applied = [appliedRow(1, 'networks', '0001_networks.sql', checksumOf(NETWORKS_SQL))];

      const status = await migrator.status();

      expect(status.applied).toEqual([
        { id: 1, name: 'networks', filename: '0001_networks.sql', checksum: checksumOf(NETWORKS_SQL), appliedAt },
      ]);
      expect(status.pending.map(m => m.filename)).toEqual(['0002_tokens.sql']);
      expect(formatStatus(status)).toEqual([
        'Applied (1):',
        '  0001_networks.sql  applied 2024-03-01T00:00:00.000Z',
        'Pending (1):',
        '  0002_tokens.sql',
      ]);
    });

    it('should end the connection source on close', async () => {
      await migrator.close();
      expect(db.ended).toBe(true);
    });
  });

  describe('planMigrations', () => {
    const available = [
      { id: 1, name: 'a', filename: '0001_a.sql', checksum: 'x' },
      { id: 2, name: 'b', filename: '0002_b.sql', checksum: 'y' },
    ];

    it('should keep unrecorded migrations in order', () => {
      expect(planMigrations(available, [{ id: 1, checksum: 'x' }]).map(m => m.id)).toEqual([2]);
      expect(planMigrations(available, [])).toEqual(available);
    });

    it('should name the rollback file and format an empty status', () => {
      expect(downFilename('0003_add_index.sql')).toBe('0003_add_index.down.sql');
      expect(formatStatus({ applied: [], pending: [] })).toEqual(['Applied (0):', '  none', 'Pending (0):', '  none']);
    });
  });
});
