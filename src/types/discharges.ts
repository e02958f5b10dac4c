/**
 * Domain types for Chilean hospital discharge records (egresos hospitalarios).
 */

/** Canonical column names, in the order they are stored */
export const CANONICAL_COLUMNS = [
  'PERTENENCIA_ESTABLECIMIENTO_SALUD',
  'SEXO',
  'GRUPO_EDAD',
  'ETNIA',
  'GLOSA_PAIS_ORIGEN',
  'COMUNA_RESIDENCIA',
  'GLOSA_COMUNA_RESIDENCIA',
  'REGION_RESIDENCIA',
  'GLOSA_REGION_RESIDENCIA',
  'PREVISION',
  'GLOSA_PREVISION',
  'ANO_EGRESO',
  'DIAG1',
  'DIAG2',
  'DIAS_ESTADA',
  'CONDICION_EGRESO',
  'INTERV_Q',
  'PROCED',
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

/** Columns coerced to integers before persisting */
export const INTEGER_COLUMNS = ['COMUNA_RESIDENCIA', 'REGION_RESIDENCIA', 'ANO_EGRESO'] as const;

export type IntegerColumn = (typeof INTEGER_COLUMNS)[number];

export type TextColumn = Exclude<CanonicalColumn, IntegerColumn>;

/** Sentinel used by the source exports for withheld values */
export const PLACEHOLDER_MARKER = '*';

/** CSV contents before any cleaning: header plus untyped rows */
export interface RawRecordSet {
  header: string[];
  rows: string[][];
}

/** One discharge event, after cleaning */
export type DischargeRecord = { [K in IntegerColumn]: number } & { [K in TextColumn]: string | null };

export interface CanonicalRecordSet {
  records: DischargeRecord[];

  /** Rows removed for carrying too many placeholder markers */
  dropped: number;
}

export interface YearCount {
  year: number;
  count: number;
}
