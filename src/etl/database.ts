/**
 * SQLite access for the discharge loader.
 *
 * One handle per run, opened through `withDatabase` and passed explicitly to
 * every operation that needs it.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { InvalidTableNameError } from './errors.js';

export type DischargeDatabase = Database.Database;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/u;

export function openDatabase(dbPath: string): DischargeDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  console.log(`[INFO]: Connection Checked: sqlite:///${dbPath}`);
  return db;
}

export function withDatabase<T>(dbPath: string, fn: (db: DischargeDatabase) => T): T {
  const db = openDatabase(dbPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/** Table names are interpolated into SQL, so only plain identifiers pass. */
export function quoteTableName(table: string): string {
  if (!IDENTIFIER_PATTERN.test(table)) {
    throw new InvalidTableNameError(table);
  }
  return `"${table}"`;
}

export function tableExists(db: DischargeDatabase, table: string): boolean {
  const row = db.prepare(
    `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`
  ).get(table) as { name: string } | undefined;
  return row !== undefined;
}
