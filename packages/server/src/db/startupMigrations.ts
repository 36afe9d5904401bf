/**
 * Startup Migrations
 *
 * Runs essential schema migrations on server startup.
 * All migrations are idempotent (safe to run multiple times).
 * Tracks applied migrations in a `_migrations` table.
 */
import type Database from 'better-sqlite3';

interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

type Log = (message: string) => void;

/**
 * All migrations in order. Each migration must be idempotent.
 */
const migrations: Migration[] = [
  {
    version: 1,
    name: 'create_course_tables',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS users (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          email TEXT NOT NULL UNIQUE,
          name TEXT NOT NULL,
          created_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS courses (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          slug TEXT NOT NULL UNIQUE,
          color TEXT,
          created_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS course_sessions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          course_id INTEGER NOT NULL REFERENCES courses(id) ON DELETE CASCADE,
          title TEXT NOT NULL,
          start_time INTEGER NOT NULL,
          duration_minutes INTEGER NOT NULL DEFAULT 60
        );
        CREATE INDEX IF NOT EXISTS course_sessions_course_idx ON course_sessions(course_id);
        CREATE INDEX IF NOT EXISTS course_sessions_start_idx ON course_sessions(start_time);

        CREATE TABLE IF NOT EXISTS enrollments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          course_id INTEGER NOT NULL REFERENCES courses(id) ON DELETE CASCADE,
          status TEXT NOT NULL DEFAULT 'pending',
          enrolled_at INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS enrollments_user_course_idx ON enrollments(user_id, course_id);
        CREATE INDEX IF NOT EXISTS enrollments_course_idx ON enrollments(course_id);
      `);
    },
  },
  {
    version: 2,
    name: 'create_progress_tables',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS session_attendances (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          session_id INTEGER NOT NULL REFERENCES course_sessions(id) ON DELETE CASCADE,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          status TEXT NOT NULL,
          recorded_at INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS attendances_session_user_idx ON session_attendances(session_id, user_id);

        CREATE TABLE IF NOT EXISTS session_completions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          session_id INTEGER NOT NULL REFERENCES course_sessions(id) ON DELETE CASCADE,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          completed_at INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS completions_session_user_idx ON session_completions(session_id, user_id);
        CREATE INDEX IF NOT EXISTS completions_user_idx ON session_completions(user_id);
      `);
    },
  },
  {
    version: 3,
    name: 'create_notification_tables',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS notification_preferences (
          user_id INTEGER PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
          reminder_days_before INTEGER NOT NULL DEFAULT 1,
          reminder_hours_before INTEGER NOT NULL DEFAULT 0,
          email_notifications INTEGER NOT NULL DEFAULT 1,
          in_app_notifications INTEGER NOT NULL DEFAULT 1,
          updated_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS in_app_notifications (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          title TEXT NOT NULL,
          message TEXT NOT NULL,
          notification_type TEXT NOT NULL,
          is_read INTEGER NOT NULL DEFAULT 0,
          created_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS in_app_notifications_user_idx ON in_app_notifications(user_id);

        CREATE TABLE IF NOT EXISTS session_reminders (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          session_id INTEGER NOT NULL REFERENCES course_sessions(id) ON DELETE CASCADE,
          channel TEXT NOT NULL,
          sent_at INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS reminders_user_session_channel_idx
          ON session_reminders(user_id, session_id, channel);
      `);
    },
  },
  {
    version: 4,
    name: 'create_achievements',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS achievements (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
          course_id INTEGER NOT NULL REFERENCES courses(id) ON DELETE CASCADE,
          achievement_type TEXT NOT NULL,
          title TEXT NOT NULL,
          description TEXT NOT NULL,
          awarded_at INTEGER NOT NULL
        );
        CREATE UNIQUE INDEX IF NOT EXISTS achievements_user_course_type_idx
          ON achievements(user_id, course_id, achievement_type);
      `);
    },
  },
  {
    version: 5,
    name: 'index_unread_notifications',
    up: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS in_app_notifications_user_read_idx
          ON in_app_notifications(user_id, is_read);
      `);
    },
  },
];

/**
 * Ensures the migrations tracking table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);
}

/**
 * Gets list of already applied migration versions
 */
function getAppliedMigrations(db: Database.Database): Set<number> {
  const rows = db.prepare<[], { version: number }>('SELECT version FROM _migrations').all();
  return new Set(rows.map((r) => r.version));
}

/**
 * Records a migration as applied
 */
function recordMigration(db: Database.Database, migration: Migration): void {
  db.prepare('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)').run(
    migration.version,
    migration.name,
    Date.now()
  );
}

/**
 * Runs all pending migrations against an open connection
 * @returns Number of migrations applied
 */
export function runStartupMigrations(db: Database.Database, log: Log = () => {}): number {
  ensureMigrationsTable(db);

  const appliedMigrations = getAppliedMigrations(db);
  let applied = 0;

  // Run pending migrations in order
  for (const migration of migrations) {
    if (appliedMigrations.has(migration.version)) {
      continue;
    }

    log(`[migrations] Running: ${migration.name}`);

    db.transaction(() => {
      migration.up(db);
      recordMigration(db, migration);
    })();

    applied++;
  }

  if (applied > 0) {
    log(`[migrations] Applied ${applied} migration(s)`);
  }

  return applied;
}
