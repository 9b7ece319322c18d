import fs from 'fs';
import path from 'path';
import { SqlClient } from './db';
import logger from './logger';

type Direction = 'up' | 'down';

interface RunMigrationsOptions {
  client: SqlClient;
  direction?: Direction;
  to?: string | null;
  migrationsDir?: string;
}

interface MigrationFile {
  version: string;
  upPath: string;
  downPath: string;
}

export interface MigrationState {
  ok: boolean;
  applied: string[];
  pending: string[];
}

function resolveMigrationsDir() {
  const distPath = path.join(__dirname, '..', 'migrations');
  if (fs.existsSync(distPath)) return distPath;
  const rootPath = path.join(__dirname, '..', '..', 'migrations');
  if (fs.existsSync(rootPath)) return rootPath;
  throw new Error('[migrations] migrations directory not found');
}

function loadMigrations(migrationsDir = resolveMigrationsDir()): MigrationFile[] {
  return fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql') && !f.endsWith('.down.sql'))
    .map((f) => f.replace(/\.sql$/, ''))
    .sort()
    .map((version) => ({
      version,
      upPath: path.join(migrationsDir, `${version}.sql`),
      downPath: path.join(migrationsDir, `${version}.down.sql`),
    }));
}

async function ensureMigrationsTable(client: SqlClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function appliedVersions(client: SqlClient): Promise<string[]> {
  const { rows } = await client.query(
    'SELECT version FROM schema_migrations ORDER BY applied_at DESC, version DESC',
  );
  return rows.flatMap((row) => (typeof row.version === 'string' ? [row.version] : []));
}

async function inTransaction(client: SqlClient, fn: () => Promise<void>) {
  await client.query('BEGIN');
  try {
    await fn();
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
}

export async function runMigrations(options: RunMigrationsOptions): Promise<void> {
  const { client } = options;
  const direction: Direction = options.direction ?? 'up';
  const to = options.to ?? null;
  const migrations = loadMigrations(options.migrationsDir);

  await ensureMigrationsTable(client);
  const applied = new Set(await appliedVersions(client));

  if (direction === 'up') {
    for (const migration of migrations) {
      if (applied.has(migration.version)) continue;

      const sql = fs.readFileSync(migration.upPath, 'utf-8');
      await inTransaction(client, async () => {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
      });
      logger.info('[migrations] applied', { migration: migration.version });
    }
    return;
  }

  const toRollback = migrations
    .filter((m) => applied.has(m.version))
    .sort((a, b) => b.version.localeCompare(a.version));

  for (const migration of toRollback) {
    if (to && migration.version <= to) break;
    if (!fs.existsSync(migration.downPath)) {
      throw new Error(`[migrations] missing down script for ${migration.version}`);
    }
    const sql = fs.readFileSync(migration.downPath, 'utf-8');
    await inTransaction(client, async () => {
      await client.query(sql);
      await client.query('DELETE FROM schema_migrations WHERE version = $1', [migration.version]);
    });
    logger.warn('[migrations] rolled back', { migration: migration.version });

    // without a target only the latest migration is rolled back
    if (!to) break;
  }
}

export async function getMigrationState(options: {
  client: SqlClient;
  migrationsDir?: string;
}): Promise<MigrationState> {
  await ensureMigrationsTable(options.client);
  const applied = await appliedVersions(options.client);
  const appliedSet = new Set(applied);
  const pending = loadMigrations(options.migrationsDir)
    .map((m) => m.version)
    .filter((version) => !appliedSet.has(version));
  return { ok: pending.length === 0, applied, pending };
}
