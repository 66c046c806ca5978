export type ColumnKind = 'date' | 'year' | 'compound' | 'plain';

export type ValueExpr =
  | { op: 'cast'; type: 'int64'; column: string }
  | { op: 'ref'; column: string };

export interface ColumnClassification {
  kind: ColumnKind;
  normalizedName: string;
  valueExpr: ValueExpr;
}
