import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse/sync';
import type { RawCell, RawRow, RawTable } from '@/modules/datasets/domain/raw-table';
import type {
  ReadTableParams,
  TableReaderPort,
} from '@/modules/datasets/application/ports/table-reader.port';

@Injectable()
export class SpreadsheetTableReaderService implements TableReaderPort {
  read(params: ReadTableParams): RawTable {
    const { buffer, mimeType, originalName } = params;

    if (mimeType === 'text/csv' || originalName.endsWith('.csv')) {
      return this.readCsv(buffer);
    }

    if (
      mimeType === 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet' ||
      mimeType === 'application/vnd.ms-excel' ||
      originalName.endsWith('.xlsx') ||
      originalName.endsWith('.xls')
    ) {
      return this.readExcel(buffer);
    }

    throw new Error(`Formato de arquivo não suportado: ${mimeType}`);
  }

  private readCsv(buffer: Buffer): RawTable {
    const records: string[][] = csvParse(buffer.toString('utf-8'), {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });

    if (records.length === 0) {
      throw new Error('Arquivo CSV está vazio ou não possui cabeçalhos válidos');
    }

    return this.toTable(records);
  }

  private readExcel(buffer: Buffer): RawTable {
    const workbook = XLSX.read(buffer, {
      type: 'buffer',
      cellDates: false,
    });

    if (workbook.SheetNames.length === 0) {
      throw new Error('Arquivo Excel não possui planilhas');
    }
    const sheetName = workbook.SheetNames[0];
    const sheet = workbook.Sheets[sheetName];

    const records = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      raw: false,
      blankrows: false,
    });

    if (records.length === 0) {
      throw new Error('Planilha Excel está vazia ou não possui dados válidos');
    }

    return this.toTable(records);
  }

  /** First record is the header row; data rows are padded to the header width. */
  private toTable(records: unknown[][]): RawTable {
    const [headerRecord, ...dataRecords] = records;
    const headers = headerRecord.map((h) => (h == null ? '' : String(h).trim()));

    const rows = dataRecords.map((record): RawRow => {
      const row = record.map((cell) => this.toCell(cell));
      while (row.length < headers.length) row.push(null);
      return row;
    });

    return { headers, rows };
  }

  private toCell(value: unknown): RawCell {
    if (value == null) return null;
    const text = String(value).trim();
    return text.length ? text : null;
  }
}
