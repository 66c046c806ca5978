import { Injectable } from '@nestjs/common';
import type { ColumnClassification } from '@/modules/datasets/domain/column-classification';
import { DateParseError, MalformedHeaderError } from '@/modules/datasets/domain/dataset-errors';
import {
  DEFAULT_OUTPUT_DATE_FORMAT,
  formatDate,
  isValidCalendarDate,
} from '@/modules/datasets/application/utils/date-format';

const DATE_LIKE = /^(\d+)\/(\d+)\/(\d+)$/;
const SINGLE_SLASH = /^([^/]*)\/([^/]*)$/;
const NUMBER_COL = /^(\d+).*/;

type Rule = (header: string, dateOutputFormat: string) => ColumnClassification | null;

/**
 * Decides what a raw column header means and what it is renamed to. Rules are tried in
 * order and the first one that matches wins.
 */
@Injectable()
export class HeaderClassifierService {
  private readonly rules: Rule[] = [
    (header, format) => this.dateColumn(header, format),
    (header) => this.compoundColumn(header),
    (header) => this.yearColumn(header),
    (header) => this.plainColumn(header),
  ];

  classify(header: string, dateOutputFormat = DEFAULT_OUTPUT_DATE_FORMAT): ColumnClassification {
    for (const rule of this.rules) {
      const classification = rule(header, dateOutputFormat);
      if (classification) {
        this.assertValidName(header, classification.normalizedName);
        return classification;
      }
    }
    // plainColumn always matches
    throw new MalformedHeaderError(header, 'nenhuma regra de classificação aplicável');
  }

  private dateColumn(header: string, format: string): ColumnClassification | null {
    const match = DATE_LIKE.exec(header);
    if (!match) return null;

    const [, monthText, dayText, yearText] = match;
    // M/d/yy
    if (monthText.length > 2 || dayText.length > 2 || yearText.length !== 2) {
      throw new DateParseError(header, 'esperado o formato M/d/yy');
    }

    const date = {
      year: 2000 + Number(yearText),
      month: Number(monthText),
      day: Number(dayText),
    };
    if (!isValidCalendarDate(date)) {
      throw new DateParseError(header, 'data inexistente no calendário');
    }

    const normalizedName = formatDate(date, format).toLowerCase();
    return {
      kind: 'date',
      normalizedName,
      valueExpr: { op: 'cast', type: 'int64', column: normalizedName },
    };
  }

  private compoundColumn(header: string): ColumnClassification | null {
    if (header.split('/').length > 2) {
      throw new MalformedHeaderError(header, 'mais de uma barra fora de uma data');
    }
    const match = SINGLE_SLASH.exec(header);
    if (!match) return null;

    const normalizedName = `${match[1]}_${match[2]}`.toLowerCase();
    return { kind: 'compound', normalizedName, valueExpr: { op: 'ref', column: normalizedName } };
  }

  private yearColumn(header: string): ColumnClassification | null {
    const match = NUMBER_COL.exec(header);
    if (!match) return null;

    const normalizedName = `y_${match[1]}`;
    return { kind: 'year', normalizedName, valueExpr: { op: 'ref', column: normalizedName } };
  }

  private plainColumn(header: string): ColumnClassification {
    const normalizedName = header.toLowerCase();
    return { kind: 'plain', normalizedName, valueExpr: { op: 'ref', column: normalizedName } };
  }

  private assertValidName(header: string, normalizedName: string): void {
    if (!normalizedName.trim()) {
      throw new MalformedHeaderError(header, 'nome normalizado vazio');
    }
  }
}
