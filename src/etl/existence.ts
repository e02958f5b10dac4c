import { quoteTableName, tableExists, type DischargeDatabase } from './database.js';

export type YearPresence =
  | { status: 'table_missing' }
  | { status: 'absent'; tableRows: number }
  | { status: 'present'; yearRows: number };

/**
 * Whether `table` already holds discharges for `year`. A table that has not
 * been created yet is reported as such, separately from an empty one.
 */
export function checkYearPresence(db: DischargeDatabase, table: string, year: number): YearPresence {
  const quoted = quoteTableName(table);
  if (!tableExists(db, table)) {
    return { status: 'table_missing' };
  }

  const yearRow = db.prepare(
    `SELECT count(*) AS count FROM ${quoted} WHERE ANO_EGRESO = ?`
  ).get(year) as { count: number };
  if (yearRow.count > 0) {
    return { status: 'present', yearRows: yearRow.count };
  }

  const totalRow = db.prepare(`SELECT count(*) AS count FROM ${quoted}`).get() as { count: number };
  return { status: 'absent', tableRows: totalRow.count };
}

export function dataAlreadyExists(db: DischargeDatabase, table: string, year: number): boolean {
  return checkYearPresence(db, table, year).status === 'present';
}
