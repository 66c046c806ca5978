export type RawCell = string | null;

export type RawRow = RawCell[];

/**
 * Table as read from the source file: the header row plus data rows whose cells are
 * aligned by position with `headers`.
 */
export interface RawTable {
  headers: string[];
  rows: RawRow[];
}
