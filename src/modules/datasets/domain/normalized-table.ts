export type CellValue = string | number | null;

export type ColumnType = 'string' | 'int64';

export interface NormalizedColumn {
  name: string;
  type: ColumnType;
  // null for literal columns added after normalization (e.g. `status`)
  sourceHeader: string | null;
}

export interface NormalizedTable {
  columns: NormalizedColumn[];
  rows: CellValue[][];
}
