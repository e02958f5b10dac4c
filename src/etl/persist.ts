import { CANONICAL_COLUMNS, INTEGER_COLUMNS, type DischargeRecord } from '../types/discharges.js';
import { quoteTableName, type DischargeDatabase } from './database.js';

const INTEGER_SET: ReadonlySet<string> = new Set(INTEGER_COLUMNS);

export function createDischargeTableSql(table: string): string {
  const columns = CANONICAL_COLUMNS.map(
    column => `  ${column} ${INTEGER_SET.has(column) ? 'INTEGER' : 'TEXT'}`
  );
  return `CREATE TABLE IF NOT EXISTS ${quoteTableName(table)} (\n${columns.join(',\n')}\n)`;
}

/**
 * Appends the records to `table`, creating it on first use. The whole batch
 * runs in one transaction, so a failing row leaves the table untouched.
 */
export function appendDischarges(db: DischargeDatabase, records: DischargeRecord[], table: string): number {
  const quoted = quoteTableName(table);
  db.exec(createDischargeTableSql(table));

  const placeholders = CANONICAL_COLUMNS.map(column => `@${column}`).join(', ');
  const insert = db.prepare(
    `INSERT INTO ${quoted} (${CANONICAL_COLUMNS.join(', ')}) VALUES (${placeholders})`
  );

  const insertAll = db.transaction((batch: DischargeRecord[]) => {
    for (const record of batch) {
      insert.run(record);
    }
    return batch.length;
  });

  return insertAll(records);
}
