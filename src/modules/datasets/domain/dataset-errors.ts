export type DatasetErrorCode =
  | 'MALFORMED_HEADER'
  | 'RENAME_COLLISION'
  | 'DATE_PARSE_FAILURE'
  | 'VALUE_CAST_FAILURE'
  | 'MISSING_COLUMN'
  | 'STATUS_MISMATCH'
  | 'INVALID_DATE_FORMAT';

/**
 * Structural problem with an input table. Never retried: the whole run is aborted so
 * that no partial output gets written.
 */
export abstract class DatasetError extends Error {
  abstract readonly code: DatasetErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedHeaderError extends DatasetError {
  readonly code = 'MALFORMED_HEADER';

  constructor(
    readonly header: string,
    reason: string,
  ) {
    super(`Cabeçalho inválido "${header}": ${reason}`);
  }
}

export class RenameCollisionError extends DatasetError {
  readonly code = 'RENAME_COLLISION';

  constructor(
    readonly normalizedName: string,
    readonly headers: string[],
  ) {
    super(
      `Colunas ${headers.map((h) => `"${h}"`).join(', ')} resultam no mesmo nome "${normalizedName}"`,
    );
  }
}

export class DateParseError extends DatasetError {
  readonly code = 'DATE_PARSE_FAILURE';

  constructor(
    readonly header: string,
    reason: string,
  ) {
    super(`Data inválida no cabeçalho "${header}": ${reason}`);
  }
}

export class ValueCastError extends DatasetError {
  readonly code = 'VALUE_CAST_FAILURE';

  constructor(
    readonly column: string,
    readonly row: number,
    readonly value: unknown,
    readonly expected: 'int64' | 'float64',
  ) {
    super(
      `Valor ${JSON.stringify(value)} na coluna "${column}" (linha ${row}) não é um ${expected} válido`,
    );
  }
}

export class MissingColumnError extends DatasetError {
  readonly code = 'MISSING_COLUMN';

  constructor(readonly column: string) {
    super(`Coluna obrigatória ausente: "${column}"`);
  }
}

export class StatusMismatchError extends DatasetError {
  readonly code = 'STATUS_MISMATCH';

  constructor(
    readonly expected: string,
    readonly row: number,
    readonly value: unknown,
  ) {
    super(`Status ${JSON.stringify(value)} na linha ${row} difere do esperado "${expected}"`);
  }
}

export class InvalidDateFormatError extends DatasetError {
  readonly code = 'INVALID_DATE_FORMAT';

  constructor(
    readonly pattern: string,
    reason: string,
  ) {
    super(`Formato de data de saída inválido "${pattern}": ${reason}`);
  }
}
