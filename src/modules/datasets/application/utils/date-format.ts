import { InvalidDateFormatError } from '@/modules/datasets/domain/dataset-errors';

export const DEFAULT_OUTPUT_DATE_FORMAT = "'d_'yyyyMMdd";

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

type FormatToken =
  | { type: 'literal'; text: string }
  | { type: 'field'; field: 'yyyy' | 'yy' | 'MM' | 'M' | 'dd' | 'd' };

const FIELDS = ['yyyy', 'yy', 'MM', 'M', 'dd', 'd'] as const;

const compiled = new Map<string, FormatToken[]>();

/**
 * Compiles a date pattern. Supported fields: yyyy, yy, MM, M, dd, d. Text between
 * single quotes is literal (`''` is a quote); digits, `_`, `-`, `.`, `/` and spaces may
 * appear unquoted.
 */
export function compileDateFormat(pattern: string): FormatToken[] {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  if (!pattern) {
    throw new InvalidDateFormatError(pattern, 'padrão vazio');
  }

  const tokens: FormatToken[] = [];
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === "'") {
      if (pattern[i + 1] === "'") {
        tokens.push({ type: 'literal', text: "'" });
        i += 2;
        continue;
      }
      let text = '';
      let j = i + 1;
      for (;;) {
        if (j >= pattern.length) {
          throw new InvalidDateFormatError(pattern, 'aspas sem fechamento');
        }
        if (pattern[j] === "'") {
          if (pattern[j + 1] !== "'") break;
          // '' dentro do literal vira uma aspa
          text += "'";
          j += 2;
          continue;
        }
        text += pattern[j];
        j += 1;
      }
      tokens.push({ type: 'literal', text });
      i = j + 1;
      continue;
    }

    const field = FIELDS.find((f) => pattern.startsWith(f, i));
    if (field) {
      // "yyy" or "MMM" style runs are not supported
      const next = pattern[i + field.length];
      if (next !== undefined && next === field[0]) {
        throw new InvalidDateFormatError(pattern, `campo não suportado na posição ${i}`);
      }
      tokens.push({ type: 'field', field });
      i += field.length;
      continue;
    }

    if (/[A-Za-z]/.test(ch)) {
      throw new InvalidDateFormatError(pattern, `letra "${ch}" não suportada`);
    }

    tokens.push({ type: 'literal', text: ch });
    i += 1;
  }

  compiled.set(pattern, tokens);
  return tokens;
}

const pad = (value: number, width: number) => String(value).padStart(width, '0');

export function formatDate(date: CalendarDate, pattern: string): string {
  return compileDateFormat(pattern)
    .map((token) => {
      if (token.type === 'literal') return token.text;
      switch (token.field) {
        case 'yyyy':
          return pad(date.year, 4);
        case 'yy':
          return pad(date.year % 100, 2);
        case 'MM':
          return pad(date.month, 2);
        case 'M':
          return String(date.month);
        case 'dd':
          return pad(date.day, 2);
        case 'd':
          return String(date.day);
      }
    })
    .join('');
}

export function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}
