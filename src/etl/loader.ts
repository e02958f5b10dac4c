import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import type { RawRecordSet } from '../types/discharges.js';

/**
 * Reads a whole discharge export into memory. Exports are Latin-1 encoded and
 * semicolon-delimited; the first record is the header.
 */
export function loadDischargeCsv(filePath: string): RawRecordSet {
  const content = fs.readFileSync(filePath, 'latin1');
  const records: string[][] = parse(content, {
    delimiter: ';',
    relax_quotes: true,
    skip_empty_lines: true,
  });

  const [header, ...rows] = records;
  if (!header) {
    throw new Error(`No header row found in ${filePath}`);
  }

  return { header, rows };
}
