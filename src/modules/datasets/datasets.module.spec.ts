import { Test } from '@nestjs/testing';
import { AppModule } from '@/app.module';
import { DatasetParserService } from '@/modules/datasets/application/services/dataset-parser.service';
import { DATASET_WRITER } from '@/modules/datasets/application/ports/dataset-writer.port';
import { TABLE_READER } from '@/modules/datasets/application/ports/table-reader.port';
import { JsonDatasetWriterService } from '@/modules/datasets/infra/writer/json-dataset-writer.service';
import { SpreadsheetTableReaderService } from '@/modules/datasets/infra/parser/spreadsheet-table-reader.service';

describe('DatasetsModule', () => {
  it('wires the parser with the spreadsheet reader and the JSON writer', async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();

    expect(moduleRef.get(DatasetParserService)).toBeInstanceOf(DatasetParserService);
    expect(moduleRef.get(TABLE_READER)).toBeInstanceOf(SpreadsheetTableReaderService);
    expect(moduleRef.get(DATASET_WRITER)).toBeInstanceOf(JsonDatasetWriterService);

    await moduleRef.close();
  });
});
