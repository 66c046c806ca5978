import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { basename, join } from 'path';
import { datasetsConfig, type DatasetsConfig } from '@/config/datasets.config';
import type { NormalizedTable } from '@/modules/datasets/domain/normalized-table';
import type { CovidItem, CovidStatus, TimeSeriesBundle } from '@/modules/datasets/domain/covid-item';
import type { CountryPopulationHistory } from '@/modules/datasets/domain/population-history';
import type { TableReaderPort } from '@/modules/datasets/application/ports/table-reader.port';
import { TABLE_READER } from '@/modules/datasets/application/ports/table-reader.port';
import { TableNormalizerService } from '@/modules/datasets/application/services/table-normalizer.service';
import { RecordProjectorService } from '@/modules/datasets/application/services/record-projector.service';
import { PopulationProjectorService } from '@/modules/datasets/application/services/population-projector.service';

export const TIME_SERIES_FILES: Record<CovidStatus, string> = {
  confirmed: 'global_confirmed.csv',
  deaths: 'global_deaths.csv',
  recovered: 'global_recovered.csv',
};

export const POPULATION_FILE = 'global_population.csv';

export interface UploadedTable {
  buffer: Buffer;
  originalName: string;
  mimeType: string;
}

@Injectable()
export class DatasetParserService {
  private readonly logger = new Logger(DatasetParserService.name);

  constructor(
    @Inject(datasetsConfig.KEY) private readonly config: DatasetsConfig,
    @Inject(TABLE_READER) private readonly reader: TableReaderPort,
    private readonly normalizer: TableNormalizerService,
    private readonly records: RecordProjectorService,
    private readonly population: PopulationProjectorService,
  ) {}

  async loadDataset(path: string): Promise<NormalizedTable> {
    const buffer = await readFile(path);
    return this.normalizeUpload({ buffer, originalName: basename(path), mimeType: 'text/csv' });
  }

  normalizeUpload(file: UploadedTable): NormalizedTable {
    const raw = this.reader.read({
      buffer: file.buffer,
      mimeType: file.mimeType,
      originalName: file.originalName,
    });
    const table = this.normalizer.normalize(raw, this.config.outputDateFormat);

    this.logger.log(
      `${file.originalName}: ${table.rows.length} linhas, ${table.columns.length} colunas normalizadas`,
    );
    return table;
  }

  async parseTimeSeries(): Promise<TimeSeriesBundle> {
    const confirmed = await this.parseStatus('confirmed');
    const deaths = await this.parseStatus('deaths');
    const recovered = await this.parseStatus('recovered');
    return { confirmed, deaths, recovered };
  }

  async parsePopulation(): Promise<CountryPopulationHistory[]> {
    const table = await this.loadDataset(join(this.config.datasetDir, POPULATION_FILE));
    const histories = this.population.projectPopulation(table);

    this.logger.log(
      `População: ${histories.length} países com histórico (${table.rows.length - histories.length} sem dados)`,
    );
    return histories;
  }

  projectUpload(file: UploadedTable, status: CovidStatus): CovidItem[] {
    const table = this.normalizer.prependLiteralColumn(this.normalizeUpload(file), 'status', status);
    return this.records.project(table, status);
  }

  projectPopulationUpload(file: UploadedTable): CountryPopulationHistory[] {
    return this.population.projectPopulation(this.normalizeUpload(file));
  }

  private async parseStatus(status: CovidStatus): Promise<CovidItem[]> {
    const loaded = await this.loadDataset(join(this.config.datasetDir, TIME_SERIES_FILES[status]));
    const table = this.normalizer.prependLiteralColumn(loaded, 'status', status);

    this.logPreview(status, table);
    return this.records.project(table, status);
  }

  private logPreview(status: CovidStatus, table: NormalizedTable): void {
    const names = table.columns.map((c) => c.name);
    for (const row of table.rows.slice(0, 2)) {
      const preview = Object.fromEntries(names.slice(0, 8).map((name, i) => [name, row[i]]));
      this.logger.debug(`[${status}] ${JSON.stringify(preview)}`);
    }
  }
}
