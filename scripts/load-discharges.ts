#!/usr/bin/env tsx
/**
 * Loads one yearly discharge export into the local SQLite database.
 *
 * Usage:
 *   npm run load -- -f <csv-path>
 *   npm run load -- --file=<csv-path>
 *
 * Examples:
 *   npm run load -- -f data/egresos_2019.csv
 *   DISCHARGES_DB_PATH=/tmp/egresos.db npm run load -- --file=data/egresos_2020.csv
 *
 * Without a file it only prints the per-year counts already stored.
 */

import { pathToFileURL } from 'url';
import { resolveLoaderConfig } from '../src/config.js';
import { ArgumentError } from '../src/etl/errors.js';
import { runDischargeLoad } from '../src/etl/pipeline.js';

/** Runs one load and returns the process exit status: 2 for bad options, 1 for any other failure. */
export function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): number {
  try {
    runDischargeLoad(argv, resolveLoaderConfig(env));
    return 0;
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(error.message);
      return 2;
    }
    console.error('Discharge load failed:', error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exit(main());
}
