import { Injectable } from '@nestjs/common';
import type { RawTable } from '@/modules/datasets/domain/raw-table';
import type {
  CellValue,
  NormalizedColumn,
  NormalizedTable,
} from '@/modules/datasets/domain/normalized-table';
import type { ColumnClassification, ValueExpr } from '@/modules/datasets/domain/column-classification';
import {
  MissingColumnError,
  RenameCollisionError,
  ValueCastError,
} from '@/modules/datasets/domain/dataset-errors';
import { HeaderClassifierService } from '@/modules/datasets/application/services/header-classifier.service';
import { DEFAULT_OUTPUT_DATE_FORMAT } from '@/modules/datasets/application/utils/date-format';
import { parseInt64 } from '@/modules/datasets/application/utils/normalize';

interface ColumnPlan {
  header: string;
  classification: ColumnClassification;
}

@Injectable()
export class TableNormalizerService {
  constructor(private readonly classifier: HeaderClassifierService) {}

  normalize(table: RawTable, dateOutputFormat = DEFAULT_OUTPUT_DATE_FORMAT): NormalizedTable {
    // a planilha de origem às vezes grafa a longitude como "Long"
    const headers = table.headers.map((h) => (h === 'Long' ? 'Lon' : h));

    const plans: ColumnPlan[] = headers.map((header) => ({
      header,
      classification: this.classifier.classify(header, dateOutputFormat),
    }));

    const renameTo = this.buildRenames(plans);

    const columns: NormalizedColumn[] = plans.map(({ classification }, position) => ({
      name: classification.normalizedName,
      type: classification.valueExpr.op === 'cast' ? classification.valueExpr.type : 'string',
      sourceHeader: table.headers[position],
    }));

    const rows = table.rows.map((raw, rowIndex) => {
      const renamed = new Map<string, CellValue>();
      renameTo.forEach((name, position) => renamed.set(name, raw[position] ?? null));

      return plans.map(({ classification }) =>
        this.evaluate(classification.valueExpr, renamed, rowIndex + 1),
      );
    });

    return { columns, rows };
  }

  /** Adds a constant string column in front of the table, e.g. `status`. */
  prependLiteralColumn(table: NormalizedTable, name: string, value: string): NormalizedTable {
    const existing = table.columns.find((c) => c.name === name);
    if (existing) {
      throw new RenameCollisionError(name, [existing.sourceHeader ?? name, `'${value}' as ${name}`]);
    }

    return {
      columns: [{ name, type: 'string', sourceHeader: null }, ...table.columns],
      rows: table.rows.map((row) => [value, ...row]),
    };
  }

  /**
   * Every rename is resolved up front so that a collision aborts the run before any cell
   * is cast. Returns the new name of each column by position.
   */
  private buildRenames(plans: ColumnPlan[]): string[] {
    const seen = new Map<string, string>();

    for (const { header, classification } of plans) {
      const previous = seen.get(classification.normalizedName);
      if (previous !== undefined) {
        throw new RenameCollisionError(classification.normalizedName, [previous, header]);
      }
      seen.set(classification.normalizedName, header);
    }

    return plans.map((p) => p.classification.normalizedName);
  }

  private evaluate(expr: ValueExpr, row: Map<string, CellValue>, rowNumber: number): CellValue {
    if (!row.has(expr.column)) {
      throw new MissingColumnError(expr.column);
    }
    const value = row.get(expr.column) ?? null;

    if (expr.op === 'ref') return value;

    const parsed = parseInt64(value);
    if (parsed === null) {
      throw new ValueCastError(expr.column, rowNumber, value, 'int64');
    }
    return parsed;
  }
}
