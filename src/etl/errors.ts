/**
 * Errors raised by the discharge load pipeline.
 */

/** Malformed command-line options. The CLI exits with status 2. */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export class YearParseError extends Error {
  constructor(readonly filePath: string) {
    super(`Cannot derive a year from "${filePath}": the file name must end in four digits (e.g. egresos_2019.csv)`);
    this.name = 'YearParseError';
  }
}

export class SchemaMismatchError extends Error {
  constructor(
    readonly missing: string[],
    readonly unexpected: string[],
    readonly duplicated: string[] = [],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing: ${missing.join(', ')}`);
    if (unexpected.length > 0) parts.push(`unexpected: ${unexpected.join(', ')}`);
    if (duplicated.length > 0) parts.push(`duplicated: ${duplicated.join(', ')}`);
    super(`CSV header does not match the discharge schema (${parts.join('; ')})`);
    this.name = 'SchemaMismatchError';
  }
}

export class CoercionError extends Error {
  constructor(
    readonly column: string,
    readonly value: string,
    readonly line: number,
  ) {
    super(`Column ${column} expects an integer, got "${value}" on data line ${line}`);
    this.name = 'CoercionError';
  }
}

export class InvalidTableNameError extends Error {
  constructor(readonly table: string) {
    super(`Invalid table name: "${table}"`);
    this.name = 'InvalidTableNameError';
  }
}
