import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import fs from 'fs';
import path from 'path';

let db: Database | null = null;

/**
 * Open a SQLite connection with foreign keys enabled.
 * Pass ':memory:' for a throwaway database.
 */
export async function openDatabase(filename: string): Promise<Database> {
  if (filename !== ':memory:') {
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = await open({
    filename,
    driver: sqlite3.Database
  });

  await database.exec('PRAGMA foreign_keys = ON');
  return database;
}

/**
 * Get or create the shared database connection
 */
export async function getDatabase(dbPath?: string): Promise<Database> {
  if (db) {
    return db;
  }

  const filename = dbPath || process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'applications.db');
  db = await openDatabase(filename);
  console.log(`✅ Database opened at ${filename}`);

  return db;
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}
