/**
 * SQLite database initialization
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export type SqliteDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** File path relative to projectRoot, an absolute path, or ':memory:'. */
  path: string;
  projectRoot?: string;
}

const IN_MEMORY = ':memory:';

function resolveDbPath(path: string, projectRoot: string): string {
  if (path === IN_MEMORY) return path;
  const absolute = isAbsolute(path) ? path : join(projectRoot, path);

  const dir = dirname(absolute);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  return absolute;
}

export function openDatabase(options: OpenDatabaseOptions): SqliteDatabase {
  const projectRoot = options.projectRoot ?? process.cwd();
  const dbPath = resolveDbPath(options.path, projectRoot);
  const isNew = dbPath === IN_MEMORY || !existsSync(dbPath);

  logger.info({ dbPath, isNew }, 'Opening database');

  const db = new Database(dbPath);

  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  runMigrations(db, projectRoot);

  return db;
}

function runMigrations(database: SqliteDatabase, projectRoot: string): void {
  const migrationsDir = join(projectRoot, 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}
