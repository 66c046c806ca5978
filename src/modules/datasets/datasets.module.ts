import { Module } from '@nestjs/common';
import { DatasetsController } from '@/modules/datasets/interface/http/datasets.controller';
import { HeaderClassifierService } from '@/modules/datasets/application/services/header-classifier.service';
import { TableNormalizerService } from '@/modules/datasets/application/services/table-normalizer.service';
import { RecordProjectorService } from '@/modules/datasets/application/services/record-projector.service';
import { PopulationProjectorService } from '@/modules/datasets/application/services/population-projector.service';
import { DatasetParserService } from '@/modules/datasets/application/services/dataset-parser.service';
import { SpreadsheetTableReaderService } from '@/modules/datasets/infra/parser/spreadsheet-table-reader.service';
import { JsonDatasetWriterService } from '@/modules/datasets/infra/writer/json-dataset-writer.service';
import { TABLE_READER } from '@/modules/datasets/application/ports/table-reader.port';
import { DATASET_WRITER } from '@/modules/datasets/application/ports/dataset-writer.port';

@Module({
  controllers: [DatasetsController],
  providers: [
    HeaderClassifierService,
    TableNormalizerService,
    RecordProjectorService,
    PopulationProjectorService,
    DatasetParserService,
    {
      provide: TABLE_READER,
      useClass: SpreadsheetTableReaderService,
    },
    {
      provide: DATASET_WRITER,
      useClass: JsonDatasetWriterService,
    },
  ],
  exports: [DatasetParserService, DATASET_WRITER],
})
export class DatasetsModule {}
