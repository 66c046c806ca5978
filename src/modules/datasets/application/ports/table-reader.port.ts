import type { RawTable } from '@/modules/datasets/domain/raw-table';

export interface ReadTableParams {
  buffer: Buffer;
  mimeType: string;
  originalName: string;
}

export const TABLE_READER = Symbol('TABLE_READER');

export interface TableReaderPort {
  read(params: ReadTableParams): RawTable;
}
