import { Injectable } from '@nestjs/common';
import type { CellValue, NormalizedTable } from '@/modules/datasets/domain/normalized-table';
import type { CovidItem, CovidStatus, Timeline } from '@/modules/datasets/domain/covid-item';
import {
  MissingColumnError,
  StatusMismatchError,
  ValueCastError,
} from '@/modules/datasets/domain/dataset-errors';
import { normalizeText, parseFloat64, parseInt64 } from '@/modules/datasets/application/utils/normalize';

/**
 * Turns a normalized time-series table into one CovidItem per row, folding the date
 * columns (the ones the normalizer cast to int64) into the row's timeline.
 */
@Injectable()
export class RecordProjectorService {
  project(table: NormalizedTable, status: CovidStatus): CovidItem[] {
    const index = new Map(table.columns.map((c, i) => [c.name, i]));
    const required = (name: string) => {
      const position = index.get(name);
      if (position === undefined) throw new MissingColumnError(name);
      return position;
    };

    const countryAt = required('country_region');
    const latAt = required('lat');
    const lonAt = required('lon');
    const provinceAt = index.get('province_state');
    const statusAt = index.get('status');
    const dateColumns = table.columns
      .map((c, i) => ({ name: c.name, type: c.type, position: i }))
      .filter((c) => c.type === 'int64');

    return table.rows.map((row, rowIndex) => {
      const rowNumber = rowIndex + 1;

      if (statusAt !== undefined && row[statusAt] !== status) {
        throw new StatusMismatchError(status, rowNumber, row[statusAt]);
      }

      const timeline: Timeline = {};
      for (const { name, position } of dateColumns) {
        const count = parseInt64(row[position]);
        if (count === null) {
          throw new ValueCastError(name, rowNumber, row[position], 'int64');
        }
        timeline[name] = count;
      }

      return {
        status,
        provinceState: provinceAt === undefined ? '' : this.text(row[provinceAt]),
        countryRegion: this.text(row[countryAt]),
        lat: this.coordinate(row, latAt, 'lat', rowNumber),
        lon: this.coordinate(row, lonAt, 'lon', rowNumber),
        timeline,
      };
    });
  }

  private text(value: CellValue | undefined): string {
    return normalizeText(value) ?? '';
  }

  private coordinate(row: CellValue[], position: number, column: string, rowNumber: number): number {
    const value = parseFloat64(row[position]);
    if (value === null) {
      throw new ValueCastError(column, rowNumber, row[position] ?? null, 'float64');
    }
    return value;
  }
}
