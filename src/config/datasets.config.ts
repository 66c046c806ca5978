import { registerAs } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';
import {
  DEFAULT_OUTPUT_DATE_FORMAT,
  compileDateFormat,
} from '@/modules/datasets/application/utils/date-format';

export const datasetsConfig = registerAs('datasets', () => {
  const outputDateFormat = process.env.OUTPUT_DATE_FORMAT || DEFAULT_OUTPUT_DATE_FORMAT;
  // falha no boot se o padrão for inválido, não no meio da execução
  compileDateFormat(outputDateFormat);

  return {
    datasetDir: process.env.DATASET_DIR || 'dataset',
    outputDir: process.env.OUTPUT_DIR || 'data',
    outputDateFormat,
    port: Number(process.env.PORT) || 3000,
  };
});

export type DatasetsConfig = ConfigType<typeof datasetsConfig>;
