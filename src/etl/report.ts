import type { YearCount } from '../types/discharges.js';
import { quoteTableName, tableExists, type DischargeDatabase } from './database.js';

export function formatYearCount(row: YearCount): string {
  return `(${row.year}, ${row.count})`;
}

/**
 * Prints discharges per year already stored in `table`, at most `limit` lines.
 */
export function reportYearCounts(db: DischargeDatabase, table: string, limit = 100): YearCount[] {
  const quoted = quoteTableName(table);
  if (!tableExists(db, table)) {
    console.log(`[INFO]: Table ${table} does not exist yet`);
    return [];
  }

  const rows = db.prepare(
    `SELECT ANO_EGRESO AS year, count(*) AS count FROM ${quoted} GROUP BY ANO_EGRESO ORDER BY ANO_EGRESO`
  ).all() as YearCount[];

  const shown = rows.slice(0, limit);
  for (const row of shown) {
    console.log(formatYearCount(row));
  }
  return shown;
}
