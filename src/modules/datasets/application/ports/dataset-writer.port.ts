import type { CovidItem } from '@/modules/datasets/domain/covid-item';
import type { CountryPopulationHistory } from '@/modules/datasets/domain/population-history';

export const DATASET_WRITER = Symbol('DATASET_WRITER');

export interface DatasetWriterPort {
  /** Writes one document per place and returns the written paths. */
  writeByPlace(items: CovidItem[]): Promise<string[]>;
  writePopulation(histories: CountryPopulationHistory[]): Promise<string>;
}
