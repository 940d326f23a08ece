// =============================================================================
// Database Migrator
// Applies the analytics schema (networks, tokens, posts, labels, mentions)
// =============================================================================

import { Pool, QueryResultRow } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';

import config, { DatabaseConfig } from '../config/default';

// =============================================================================
// Types
// =============================================================================

export interface MigrationFile {
  id: number;
  name: string;
  filename: string;
}

export type Migration = MigrationFile & {
  checksum: string;
  appliedAt?: Date;
};

export interface MigrationResult {
  success: boolean;
  migrationsRun: string[];
  error?: string;
}

export interface MigrationStatus {
  applied: Migration[];
  pending: Migration[];
}

export interface MigratorOptions {
  migrationsPath: string;
  schemaTable: string;
}

/** A checked-out connection; pg's PoolClient satisfies it */
export interface MigrationConnection {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
  release(): void;
}

/** Where connections come from; pg's Pool satisfies it */
export interface ConnectionSource {
  connect(): Promise<MigrationConnection>;
  end(): Promise<void>;
}

const MIGRATION_FILE = /^(\d+)_(.+)\.sql$/;

// =============================================================================
// Migration files
// =============================================================================

/**
 * SQL files live beside the sources; a compiled build (dist/database) falls
 * back to the source tree since tsc does not copy them.
 */
export function defaultMigrationsPath(): string {
  const local = path.join(__dirname, 'migrations');
  if (fs.existsSync(local)) return local;
  return path.resolve(__dirname, '../../src/database/migrations');
}

export function validateSchemaTable(name: string): void {
  // PostgreSQL identifiers: letter or underscore first, then letters, digits, underscores
  if (!/^[a-z_][a-z0-9_]*$/i.test(name)) {
    throw new Error(
      `Invalid schema table name: "${name}". ` +
      'Must start with letter or underscore and contain only letters, digits, and underscores.'
    );
  }
  if (name.length > 63) {
    throw new Error(`Schema table name too long: ${name.length} chars (max 63)`);
  }
}

export function checksumOf(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/** Up migrations in id order; `.down.sql` files are rollbacks */
export function listMigrationFiles(migrationsPath: string): MigrationFile[] {
  return fs
    .readdirSync(migrationsPath)
    .filter(f => MIGRATION_FILE.test(f) && !f.endsWith('.down.sql'))
    .sort()
    .flatMap(filename => {
      const match = filename.match(MIGRATION_FILE);
      if (!match) return [];
      return [{ id: parseInt(match[1]), name: match[2].replace(/_/g, ' '), filename }];
    });
}

export function downFilename(filename: string): string {
  return filename.replace(/\.sql$/, '.down.sql');
}

/**
 * Files not yet recorded in the schema table. A recorded migration whose
 * file no longer hashes to the stored checksum stops the whole plan.
 */
export function planMigrations(available: Migration[], applied: Array<{ id: number; checksum: string }>): Migration[] {
  const recorded = new Map(applied.map(m => [m.id, m.checksum]));
  const mismatched = available.filter(m => recorded.has(m.id) && recorded.get(m.id) !== m.checksum);

  if (mismatched.length > 0) {
    const [first] = mismatched;
    throw new Error(
      `Migration ${first.filename} has been modified after being applied. ` +
      `Expected checksum: ${recorded.get(first.id)}, got: ${first.checksum}`
    );
  }
  return available.filter(m => !recorded.has(m.id));
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

function mapMigration(row: QueryResultRow): Migration {
  return {
    id: Number(row.id),
    name: String(row.name),
    filename: String(row.filename),
    checksum: String(row.checksum),
    appliedAt: row.applied_at instanceof Date ? row.applied_at : new Date(String(row.applied_at)),
  };
}

async function inTransaction(connection: MigrationConnection, work: () => Promise<void>): Promise<void> {
  await connection.query('BEGIN');
  try {
    await work();
    await connection.query('COMMIT');
  } catch (error) {
    await connection.query('ROLLBACK');
    throw error;
  }
}

export function createMigrationPool(database: DatabaseConfig): Pool {
  return new Pool({
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
    ssl: database.ssl ? { rejectUnauthorized: false } : undefined,
    max: 2,
    connectionTimeoutMillis: 10000,
  });
}

// =============================================================================
// Migrator
// =============================================================================

export class DatabaseMigrator {
  private readonly source: ConnectionSource;
  private readonly options: MigratorOptions;

  constructor(options: Partial<MigratorOptions> = {}, source?: ConnectionSource) {
    const schemaTable = options.schemaTable || '_migrations';
    validateSchemaTable(schemaTable);

    this.options = {
      migrationsPath: options.migrationsPath || defaultMigrationsPath(),
      schemaTable,
    };
    this.source = source ?? createMigrationPool(config.database);
  }

  /** Applies every pending file, one transaction each, stopping at the first failure */
  async migrate(): Promise<MigrationResult> {
    const migrationsRun: string[] = [];

    return this.withConnection(async (connection): Promise<MigrationResult> => {
      try {
        const pending = await this.pending(connection);
        if (pending.length === 0) {
          console.log('[Migrator] Schema is up to date');
          return { success: true, migrationsRun };
        }

        for (const migration of pending) {
          console.log(`[Migrator] Applying ${migration.filename}`);
          const sql = this.read(migration.filename);

          await inTransaction(connection, async () => {
            await connection.query(sql);
            await connection.query(
              `INSERT INTO ${this.options.schemaTable} (id, name, filename, checksum, applied_at)
               VALUES ($1, $2, $3, $4, NOW())`,
              [migration.id, migration.name, migration.filename, migration.checksum]
            );
          }).catch(error => {
            throw new Error(`Migration ${migration.name} failed: ${errorMessage(error)}`);
          });

          migrationsRun.push(migration.name);
        }

        console.log(`[Migrator] Applied ${migrationsRun.length} migration(s)`);
        return { success: true, migrationsRun };
      } catch (error) {
        console.error(`[Migrator] ${errorMessage(error)}`);
        return { success: false, migrationsRun, error: errorMessage(error) };
      }
    });
  }

  /** Reverts the newest `steps` recorded migrations, newest first */
  async rollback(steps: number = 1): Promise<MigrationResult> {
    const migrationsRun: string[] = [];

    return this.withConnection(async (connection): Promise<MigrationResult> => {
      try {
        await this.ensureSchemaTable(connection);
        const { rows } = await connection.query(
          `SELECT id, name, filename, checksum, applied_at
           FROM ${this.options.schemaTable}
           ORDER BY id DESC
           LIMIT $1`,
          [steps]
        );

        for (const migration of rows.map(mapMigration)) {
          const downPath = path.join(this.options.migrationsPath, downFilename(migration.filename));
          const sql = fs.existsSync(downPath) ? fs.readFileSync(downPath, 'utf8') : null;
          if (sql === null) {
            console.warn(`[Migrator] No down migration for ${migration.filename}; removing its record only`);
          }

          console.log(`[Migrator] Reverting ${migration.filename}`);
          await inTransaction(connection, async () => {
            if (sql !== null) await connection.query(sql);
            await connection.query(`DELETE FROM ${this.options.schemaTable} WHERE id = $1`, [migration.id]);
          }).catch(error => {
            throw new Error(`Rollback of ${migration.name} failed: ${errorMessage(error)}`);
          });

          migrationsRun.push(migration.name);
        }

        console.log(`[Migrator] Reverted ${migrationsRun.length} migration(s)`);
        return { success: true, migrationsRun };
      } catch (error) {
        console.error(`[Migrator] ${errorMessage(error)}`);
        return { success: false, migrationsRun, error: errorMessage(error) };
      }
    });
  }

  async status(): Promise<MigrationStatus> {
    return this.withConnection(async connection => {
      const applied = await this.applied(connection);
      return { applied, pending: planMigrations(this.available(), applied) };
    });
  }

  async close(): Promise<void> {
    await this.source.end();
  }

  // ===========================================================================
  // Helper Methods
  // ===========================================================================

  private async withConnection<T>(work: (connection: MigrationConnection) => Promise<T>): Promise<T> {
    const connection = await this.source.connect();
    try {
      return await work(connection);
    } finally {
      connection.release();
    }
  }

  private read(filename: string): string {
    return fs.readFileSync(path.join(this.options.migrationsPath, filename), 'utf8');
  }

  private available(): Migration[] {
    return listMigrationFiles(this.options.migrationsPath).map(file => ({
      ...file,
      checksum: checksumOf(this.read(file.filename)),
    }));
  }

  private async ensureSchemaTable(connection: MigrationConnection): Promise<void> {
    await connection.query(`
      CREATE TABLE IF NOT EXISTS ${this.options.schemaTable} (
        id INTEGER PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        filename VARCHAR(255) NOT NULL,
        checksum VARCHAR(64) NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  private async applied(connection: MigrationConnection): Promise<Migration[]> {
    await this.ensureSchemaTable(connection);
    const { rows } = await connection.query(
      `SELECT id, name, filename, checksum, applied_at FROM ${this.options.schemaTable} ORDER BY id ASC`
    );
    return rows.map(mapMigration);
  }

  private async pending(connection: MigrationConnection): Promise<Migration[]> {
    return planMigrations(this.available(), await this.applied(connection));
  }
}

// =============================================================================
// CLI
// =============================================================================

export function createMigrationFiles(name: string, migrationsPath: string = defaultMigrationsPath()): string[] {
  if (!fs.existsSync(migrationsPath)) {
    fs.mkdirSync(migrationsPath, { recursive: true });
  }

  const maxId = listMigrationFiles(migrationsPath).reduce((max, f) => Math.max(max, f.id), 0);
  const nextId = String(maxId + 1).padStart(4, '0');
  const safeName = name.toLowerCase().replace(/[^a-z0-9]+/g, '_');
  const created = new Date().toISOString();
  const files = [`${nextId}_${safeName}.sql`, `${nextId}_${safeName}.down.sql`];

  fs.writeFileSync(path.join(migrationsPath, files[0]), `-- Migration: ${name}\n-- Created: ${created}\n\n`);
  fs.writeFileSync(path.join(migrationsPath, files[1]), `-- Rollback: ${name}\n-- Created: ${created}\n\n`);
  return files;
}

export function formatStatus({ applied, pending }: MigrationStatus): string[] {
  const applyLine = (m: Migration) => `  ${m.filename}  applied ${m.appliedAt ? m.appliedAt.toISOString() : 'unknown'}`;
  return [
    `Applied (${applied.length}):`,
    ...(applied.length > 0 ? applied.map(applyLine) : ['  none']),
    `Pending (${pending.length}):`,
    ...(pending.length > 0 ? pending.map(m => `  ${m.filename}`) : ['  none']),
  ];
}

const USAGE = [
  'Usage: migrator <command>',
  '',
  '  migrate | up              apply pending migrations',
  '  rollback | down [steps]   revert the newest migrations (default 1)',
  '  status                    list applied and pending migrations',
  '  create <name>             add an empty up/down migration pair',
];

async function main(args: string[]): Promise<void> {
  const [command, argument] = args;

  if (command === 'create') {
    if (!argument) {
      console.error('Usage: migrator create <migration_name>');
      process.exitCode = 1;
      return;
    }
    for (const file of createMigrationFiles(argument)) console.log(`[Migrator] Created ${file}`);
    return;
  }

  if (!['migrate', 'up', 'rollback', 'down', 'status'].includes(command)) {
    console.log(USAGE.join('\n'));
    return;
  }

  const migrator = new DatabaseMigrator();
  try {
    if (command === 'status') {
      console.log(formatStatus(await migrator.status()).join('\n'));
      return;
    }
    const result = command === 'rollback' || command === 'down'
      ? await migrator.rollback(parseInt(argument || '1'))
      : await migrator.migrate();
    if (!result.success) process.exitCode = 1;
  } finally {
    await migrator.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch(error => {
    console.error(error);
    process.exit(1);
  });
}
