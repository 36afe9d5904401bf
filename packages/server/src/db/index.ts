import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { existsSync, mkdirSync } from 'fs';
import { config } from '../config.js';
import { runStartupMigrations } from './startupMigrations.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const dataDir = join(__dirname, '../../../../data');

function resolveDbPath(): string {
  if (config.databasePath) return config.databasePath;

  // Ensure data directory exists
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
  return join(dataDir, 'progress-portal.db');
}

const dbPath = resolveDbPath();
const sqlite: DatabaseType = new Database(dbPath);

if (dbPath !== ':memory:') {
  // Enable WAL mode for better performance
  sqlite.pragma('journal_mode = WAL');
}
sqlite.pragma('foreign_keys = ON');

// Schema is created on first connection so every entry point sees the same tables
runStartupMigrations(sqlite);

export const db = drizzle(sqlite, { schema });
export type Db = typeof db;
export { schema };
export { sqlite };
