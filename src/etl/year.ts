import { YearParseError } from './errors.js';

const TRAILING_YEAR = /(\d{4})$/u;

/**
 * Year encoded in the last four characters of the file name, before its
 * first extension: `data/egresos_2019.csv` -> 2019.
 *
 * Returned as a number to compare against the integer `ANO_EGRESO` column,
 * so leading zeros are not kept (`x_0999.csv` -> 999).
 */
export function extractYearFromPath(filePath: string): number {
  const baseName = filePath.split('/').pop() ?? '';
  const stem = baseName.split('.')[0];
  const match = TRAILING_YEAR.exec(stem);
  if (!match) {
    throw new YearParseError(filePath);
  }
  return Number(match[1]);
}
