/**
 * Loader settings. There is no configuration file: defaults live here and
 * the database location and table can be overridden from the environment.
 */

export const DEFAULT_DB_PATH = 'database/ministerio_de_salud_chile.db';
export const DEFAULT_TABLE = 'egresos_pacientes';
export const DEFAULT_STAR_THRESHOLD = 0.5;
export const REPORT_LIMIT = 100;

export interface LoaderConfig {
  dbPath: string;
  table: string;
  threshold: number;
  reportLimit: number;
}

export function resolveLoaderConfig(env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  return {
    dbPath: env.DISCHARGES_DB_PATH?.trim() || DEFAULT_DB_PATH,
    table: env.DISCHARGES_TABLE?.trim() || DEFAULT_TABLE,
    threshold: DEFAULT_STAR_THRESHOLD,
    reportLimit: REPORT_LIMIT,
  };
}
