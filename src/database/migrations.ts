import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
  down: (db: Database) => Promise<void>;
}

const MIGRATION_HISTORY_VERSION = 1;

export const migrations: Migration[] = [
  {
    version: MIGRATION_HISTORY_VERSION,
    name: 'create_migration_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    },
    down: async () => {
      // Needed for tracking, never rolled back
    }
  },

  {
    version: 2,
    name: 'create_applications_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS applications (
          id TEXT PRIMARY KEY,
          dedup_key TEXT UNIQUE NOT NULL,
          company_key TEXT NOT NULL,
          company_name TEXT NOT NULL,
          title TEXT,
          title_key TEXT,
          job_id TEXT NOT NULL DEFAULT '',
          application_date TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'Applied' CHECK (status IN ('Applied', 'Viewed', 'Interview', 'Assessment', 'Offer', 'Rejected', 'Withdrawn')),
          last_updated TEXT NOT NULL,
          created_at TEXT NOT NULL,
          notes TEXT NOT NULL DEFAULT '',
          source TEXT NOT NULL DEFAULT 'email' CHECK (source IN ('email', 'manual'))
        );
      `);

      // Create indexes for performance
      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_applications_company_key ON applications(company_key);
        CREATE INDEX IF NOT EXISTS idx_applications_status ON applications(status);
        CREATE INDEX IF NOT EXISTS idx_applications_last_updated ON applications(last_updated);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS applications;');
    }
  },

  {
    version: 3,
    name: 'create_application_messages_table',
    up: async (db: Database) => {
      // A message belongs to at most one application
      await db.exec(`
        CREATE TABLE IF NOT EXISTS application_messages (
          message_id TEXT PRIMARY KEY,
          application_id TEXT NOT NULL,
          status_keyword TEXT,
          observed_at TEXT NOT NULL,
          added_at TEXT NOT NULL,
          FOREIGN KEY (application_id) REFERENCES applications(id) ON DELETE CASCADE
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_application_messages_application_id ON application_messages(application_id);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS application_messages;');
    }
  },

  {
    version: 4,
    name: 'create_status_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS status_history (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          application_id TEXT NOT NULL,
          from_status TEXT,
          to_status TEXT NOT NULL,
          message_id TEXT,
          changed_at TEXT NOT NULL,
          FOREIGN KEY (application_id) REFERENCES applications(id) ON DELETE CASCADE
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_status_history_application_id ON status_history(application_id);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS status_history;');
    }
  },

  {
    version: 5,
    name: 'create_review_queue_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS review_queue (
          message_id TEXT PRIMARY KEY,
          sender TEXT NOT NULL,
          subject TEXT NOT NULL,
          body TEXT NOT NULL,
          score REAL NOT NULL,
          received_at TEXT NOT NULL,
          flagged_at TEXT NOT NULL,
          state TEXT NOT NULL DEFAULT 'pending' CHECK (state IN ('pending', 'accepted', 'dismissed')),
          resolved_at TEXT
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_review_queue_state ON review_queue(state);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS review_queue;');
    }
  },

  {
    version: 6,
    name: 'create_ingestion_runs_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS ingestion_runs (
          id TEXT PRIMARY KEY,
          started_at TEXT NOT NULL,
          finished_at TEXT,
          status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'cancelled', 'failed')),
          report TEXT, -- JSON PipelineReport
          error TEXT,
          latest_message_at TEXT
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_ingestion_runs_started_at ON ingestion_runs(started_at);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS ingestion_runs;');
    }
  },

  {
    version: 7,
    name: 'add_ingestion_runs_fetch_summary',
    up: async (db: Database) => {
      await db.exec('ALTER TABLE ingestion_runs ADD COLUMN fetch_summary TEXT; -- JSON FetchSummary');
    },
    down: async (db: Database) => {
      await db.exec('ALTER TABLE ingestion_runs DROP COLUMN fetch_summary;');
    }
  }
];

async function currentVersion(db: Database): Promise<number> {
  const result = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  return result?.version || 0;
}

export async function runMigrations(db: Database): Promise<void> {
  console.log('🔄 Running database migrations...');

  // Ensure migration history table exists first
  const historyMigration = migrations.find(m => m.version === MIGRATION_HISTORY_VERSION);
  if (historyMigration) {
    await historyMigration.up(db);
  }

  const applied = await currentVersion(db);

  for (const migration of migrations) {
    if (migration.version > applied) {
      console.log(`🔄 Running migration ${migration.version}: ${migration.name}`);

      try {
        await db.exec('BEGIN TRANSACTION;');
        await migration.up(db);

        // Record migration in history
        await db.run(
          'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
          [migration.version, migration.name, new Date().toISOString()]
        );

        await db.exec('COMMIT;');
        console.log(`✅ Migration ${migration.version} completed successfully`);
      } catch (error) {
        await db.exec('ROLLBACK;');
        console.error(`❌ Migration ${migration.version} failed:`, error);
        throw error;
      }
    }
  }

  console.log('✅ All migrations completed successfully');
}

export async function rollbackMigration(db: Database, targetVersion: number): Promise<void> {
  console.log(`🔄 Rolling back to migration version ${targetVersion}...`);

  const applied = await currentVersion(db);

  if (targetVersion >= applied) {
    console.log('No rollback needed - target version is current or higher');
    return;
  }

  const migrationsToRollback = migrations
    .filter(m => m.version > targetVersion && m.version <= applied && m.version !== MIGRATION_HISTORY_VERSION)
    .sort((a, b) => b.version - a.version);

  for (const migration of migrationsToRollback) {
    console.log(`🔄 Rolling back migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.down(db);

      await db.run(
        'DELETE FROM migration_history WHERE version = ?',
        [migration.version]
      );

      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} rolled back successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Rollback of migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  console.log(`✅ Rollback to version ${targetVersion} completed successfully`);
}
