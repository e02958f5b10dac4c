/**
 * In-memory discharge database with a handful of sample records.
 */

import Database from 'better-sqlite3';
import { CANONICAL_COLUMNS, type DischargeRecord } from '../../src/types/discharges.js';
import { createDischargeTableSql } from '../../src/etl/persist.js';

export const TEST_TABLE = 'egresos_pacientes';

export function sampleDischarge(overrides: Partial<DischargeRecord> = {}): DischargeRecord {
  return {
    PERTENENCIA_ESTABLECIMIENTO_SALUD: 'Pertenecientes al Sistema Nacional de Servicios de Salud, SNSS',
    SEXO: 'Mujer',
    GRUPO_EDAD: '20 a 29 años',
    ETNIA: 'Ninguno',
    GLOSA_PAIS_ORIGEN: 'Chile',
    COMUNA_RESIDENCIA: 13120,
    GLOSA_COMUNA_RESIDENCIA: 'Ñuñoa',
    REGION_RESIDENCIA: 13,
    GLOSA_REGION_RESIDENCIA: 'Metropolitana de Santiago',
    PREVISION: '1',
    GLOSA_PREVISION: 'FONASA',
    ANO_EGRESO: 2019,
    DIAG1: 'O800',
    DIAG2: 'Z370',
    DIAS_ESTADA: '3',
    CONDICION_EGRESO: '1',
    INTERV_Q: '2',
    PROCED: '2',
    ...overrides,
  };
}

const SAMPLE_DISCHARGES: DischargeRecord[] = [
  sampleDischarge({ ANO_EGRESO: 2018 }),
  sampleDischarge({ ANO_EGRESO: 2018, SEXO: 'Hombre', DIAG1: 'J189' }),
  sampleDischarge({ ANO_EGRESO: 2020, COMUNA_RESIDENCIA: 5101, GLOSA_COMUNA_RESIDENCIA: 'Valparaíso', REGION_RESIDENCIA: 5 }),
];

export function createEmptyDatabase(): Database.Database {
  return new Database(':memory:');
}

export function createTestDatabase(records: DischargeRecord[] = SAMPLE_DISCHARGES): Database.Database {
  const db = createEmptyDatabase();
  db.exec(createDischargeTableSql(TEST_TABLE));
  insertSampleData(db, records);
  return db;
}

export function closeTestDatabase(db: Database.Database): void {
  if (db) db.close();
}

function insertSampleData(db: Database.Database, records: DischargeRecord[]): void {
  const placeholders = CANONICAL_COLUMNS.map(() => '?').join(', ');
  const insert = db.prepare(`INSERT INTO ${TEST_TABLE} (${CANONICAL_COLUMNS.join(', ')}) VALUES (${placeholders})`);
  for (const record of records) {
    insert.run(...CANONICAL_COLUMNS.map(column => record[column]));
  }
}

export const sampleData = {
  discharges: SAMPLE_DISCHARGES,
};
