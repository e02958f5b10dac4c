/**
 * Discharge load: argument -> year -> existence check -> load -> clean ->
 * append, followed by the per-year report on every run.
 */

import type { LoaderConfig } from '../config.js';
import type { YearCount } from '../types/discharges.js';
import { parseLoaderArgs } from './args.js';
import { withDatabase, type DischargeDatabase } from './database.js';
import { checkYearPresence } from './existence.js';
import { loadDischargeCsv } from './loader.js';
import { appendDischarges } from './persist.js';
import { cleanDischarges } from './preprocess.js';
import { reportYearCounts } from './report.js';
import { extractYearFromPath } from './year.js';

export type LoadOutcome =
  | { kind: 'no_path'; report: YearCount[] }
  | { kind: 'skipped'; year: number; report: YearCount[] }
  | { kind: 'loaded'; year: number; inserted: number; dropped: number; report: YearCount[] };

type FileOutcome =
  | { kind: 'skipped'; year: number }
  | { kind: 'loaded'; year: number; inserted: number; dropped: number };

function loadFile(db: DischargeDatabase, filePath: string, year: number, config: LoaderConfig): FileOutcome {
  console.log(`File Path: ${filePath}`);

  const presence = checkYearPresence(db, config.table, year);
  if (presence.status === 'present') {
    console.log('The data already exists in the database. No action was taken.');
    return { kind: 'skipped', year };
  }

  const raw = loadDischargeCsv(filePath);
  console.log('[INFO]: Load data');

  const { records, dropped } = cleanDischarges(raw, config.threshold);
  console.log(`[INFO]: Preprocess data (${dropped} rows dropped)`);

  const mismatched = records.filter(record => record.ANO_EGRESO !== year).length;
  if (mismatched > 0) {
    console.warn(`[WARN]: ${mismatched} rows have ANO_EGRESO different from ${year}`);
  }

  const inserted = appendDischarges(db, records, config.table);
  console.log(`[INFO]: Loads data into DB (${inserted} rows)`);

  return { kind: 'loaded', year, inserted, dropped };
}

export function runDischargeLoad(argv: string[], config: LoaderConfig): LoadOutcome {
  const { filePath } = parseLoaderArgs(argv);
  const year = filePath ? extractYearFromPath(filePath) : undefined;

  return withDatabase<LoadOutcome>(config.dbPath, db => {
    console.log('[INFO]: Database connection');

    if (year === undefined) {
      console.log('No path was provided');
      return { kind: 'no_path', report: reportYearCounts(db, config.table, config.reportLimit) };
    }

    const outcome = loadFile(db, filePath, year, config);
    return { ...outcome, report: reportYearCounts(db, config.table, config.reportLimit) };
  });
}
