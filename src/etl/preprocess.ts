/**
 * Cleaning step between the raw CSV and the destination table.
 *
 * - Maps source columns onto the canonical schema by header name
 * - Drops rows that are mostly placeholder markers
 * - Coerces the comuna, region and year codes to integers
 */

import {
  CANONICAL_COLUMNS,
  PLACEHOLDER_MARKER,
  type CanonicalColumn,
  type CanonicalRecordSet,
  type DischargeRecord,
  type IntegerColumn,
  type RawRecordSet,
  type TextColumn,
} from '../types/discharges.js';
import { CoercionError, SchemaMismatchError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/u;

const CANONICAL_SET: ReadonlySet<string> = new Set(CANONICAL_COLUMNS);

function isCanonicalColumn(name: string): name is CanonicalColumn {
  return CANONICAL_SET.has(name);
}

/** `Año egreso` -> `ANO_EGRESO` */
export function foldColumnName(name: string): string {
  return name
    .trim()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/gu, '')
    .replace(/[\s-]+/gu, '_')
    .toUpperCase();
}

/**
 * Position of every canonical column in the source header. Fails when the
 * header is missing a column, has one the schema does not know, or repeats one.
 */
export function mapHeader(header: string[]): ReadonlyMap<CanonicalColumn, number> {
  const positions = new Map<CanonicalColumn, number>();
  const unexpected: string[] = [];
  const duplicated: string[] = [];

  header.forEach((name, index) => {
    const folded = foldColumnName(name);
    if (!isCanonicalColumn(folded)) {
      unexpected.push(name);
    } else if (positions.has(folded)) {
      duplicated.push(name);
    } else {
      positions.set(folded, index);
    }
  });

  const missing = CANONICAL_COLUMNS.filter(column => !positions.has(column));
  if (missing.length > 0 || unexpected.length > 0 || duplicated.length > 0) {
    throw new SchemaMismatchError(missing, unexpected, duplicated);
  }

  return positions;
}

export function countPlaceholders(row: string[]): number {
  return row.filter(cell => cell === PLACEHOLDER_MARKER).length;
}

function toInteger(value: string, column: IntegerColumn, line: number): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new CoercionError(column, value, line);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new CoercionError(column, value, line);
  }
  return parsed;
}

function toRecord(row: string[], mapping: ReadonlyMap<CanonicalColumn, number>, line: number): DischargeRecord {
  const cell = (column: CanonicalColumn): string => row[mapping.get(column) ?? -1] ?? '';
  const text = (column: TextColumn): string | null => {
    const value = cell(column);
    return value === '' ? null : value;
  };
  const int = (column: IntegerColumn): number => toInteger(cell(column), column, line);

  return {
    PERTENENCIA_ESTABLECIMIENTO_SALUD: text('PERTENENCIA_ESTABLECIMIENTO_SALUD'),
    SEXO: text('SEXO'),
    GRUPO_EDAD: text('GRUPO_EDAD'),
    ETNIA: text('ETNIA'),
    GLOSA_PAIS_ORIGEN: text('GLOSA_PAIS_ORIGEN'),
    COMUNA_RESIDENCIA: int('COMUNA_RESIDENCIA'),
    GLOSA_COMUNA_RESIDENCIA: text('GLOSA_COMUNA_RESIDENCIA'),
    REGION_RESIDENCIA: int('REGION_RESIDENCIA'),
    GLOSA_REGION_RESIDENCIA: text('GLOSA_REGION_RESIDENCIA'),
    PREVISION: text('PREVISION'),
    GLOSA_PREVISION: text('GLOSA_PREVISION'),
    ANO_EGRESO: int('ANO_EGRESO'),
    DIAG1: text('DIAG1'),
    DIAG2: text('DIAG2'),
    DIAS_ESTADA: text('DIAS_ESTADA'),
    CONDICION_EGRESO: text('CONDICION_EGRESO'),
    INTERV_Q: text('INTERV_Q'),
    PROCED: text('PROCED'),
  };
}

export function cleanDischarges(raw: RawRecordSet, threshold = 0.5): CanonicalRecordSet {
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new RangeError(`threshold must be between 0 and 1, got ${threshold}`);
  }

  const mapping = mapHeader(raw.header);
  const allowed = Math.floor(raw.header.length * threshold);

  const records: DischargeRecord[] = [];
  let dropped = 0;

  raw.rows.forEach((row, index) => {
    if (countPlaceholders(row) > allowed) {
      dropped += 1;
      return;
    }
    records.push(toRecord(row, mapping, index + 1));
  });

  return { records, dropped };
}
