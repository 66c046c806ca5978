import { Injectable } from '@nestjs/common';
import type { NormalizedTable } from '@/modules/datasets/domain/normalized-table';
import type { CountryPopulationHistory } from '@/modules/datasets/domain/population-history';
import { MissingColumnError, ValueCastError } from '@/modules/datasets/domain/dataset-errors';
import { normalizeText, parseInt64 } from '@/modules/datasets/application/utils/normalize';

const YEAR_COLUMN = /^y_(\d+)$/;

@Injectable()
export class PopulationProjectorService {
  /**
   * Builds the population history of each country from its `y_<year>` columns.
   * Blank cells count as 0 and years with 0 are left out; a country with no year left
   * produces no record at all.
   */
  projectPopulation(table: NormalizedTable): CountryPopulationHistory[] {
    const countryAt = table.columns.findIndex((c) => c.name === 'country');
    if (countryAt === -1) throw new MissingColumnError('country');

    const yearColumns = table.columns.flatMap((c, position) => {
      const match = YEAR_COLUMN.exec(c.name);
      return match ? [{ name: c.name, year: Number(match[1]), position }] : [];
    });

    const histories: CountryPopulationHistory[] = [];

    table.rows.forEach((row, rowIndex) => {
      const yearly: Record<number, number> = {};
      let latestYear: number | null = null;

      for (const { name, year, position } of yearColumns) {
        const text = normalizeText(row[position]) ?? '0';
        const population = parseInt64(text);
        if (population === null) {
          throw new ValueCastError(name, rowIndex + 1, row[position], 'int64');
        }
        if (population === 0) continue;

        yearly[year] = population;
        if (latestYear === null || year > latestYear) latestYear = year;
      }

      if (latestYear === null) return;

      const latestPopulation = yearly[latestYear];
      if (latestPopulation === undefined) {
        throw new Error(`População de ${latestYear} ausente após agregação`);
      }

      histories.push({
        country: normalizeText(row[countryAt]) ?? '',
        latestYear,
        latestPopulation,
        yearly,
      });
    });

    return histories;
  }
}
