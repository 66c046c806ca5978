import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { datasetsConfig, type DatasetsConfig } from '@/config/datasets.config';
import type { CovidItem } from '@/modules/datasets/domain/covid-item';
import type { CountryPopulationHistory } from '@/modules/datasets/domain/population-history';
import type { DatasetWriterPort } from '@/modules/datasets/application/ports/dataset-writer.port';
import { normalizeKey } from '@/modules/datasets/application/utils/normalize';

export function placeFileName(countryRegion: string, provinceState: string): string {
  const country = normalizeKey(countryRegion);
  const province = normalizeKey(provinceState);
  return province ? `${country}_${province}.json` : `${country}.json`;
}

@Injectable()
export class JsonDatasetWriterService implements DatasetWriterPort {
  private readonly logger = new Logger(JsonDatasetWriterService.name);

  constructor(@Inject(datasetsConfig.KEY) private readonly config: DatasetsConfig) {}

  async writeByPlace(items: CovidItem[]): Promise<string[]> {
    const dir = join(this.config.outputDir, 'by-country');
    await mkdir(dir, { recursive: true });

    const byFile = new Map<string, CovidItem[]>();
    for (const item of items) {
      const fileName = placeFileName(item.countryRegion, item.provinceState);
      const group = byFile.get(fileName);
      if (!group) {
        byFile.set(fileName, [item]);
        continue;
      }

      const [first] = group;
      if (first.countryRegion !== item.countryRegion || first.provinceState !== item.provinceState) {
        throw new Error(
          `Locais "${this.placeLabel(first)}" e "${this.placeLabel(item)}" resultam no mesmo arquivo ${fileName}`,
        );
      }
      group.push(item);
    }

    const written: string[] = [];
    for (const [fileName, group] of byFile) {
      const path = join(dir, fileName);
      await writeFile(path, JSON.stringify(group, null, 2), 'utf-8');
      written.push(path);
    }

    this.logger.log(`${written.length} arquivos gravados em ${dir}`);
    return written;
  }

  private placeLabel(item: CovidItem): string {
    return item.provinceState ? `${item.countryRegion}/${item.provinceState}` : item.countryRegion;
  }

  async writePopulation(histories: CountryPopulationHistory[]): Promise<string> {
    const dir = join(this.config.outputDir, 'population');
    await mkdir(dir, { recursive: true });

    const path = join(dir, 'history.json');
    await writeFile(path, JSON.stringify(histories, null, 2), 'utf-8');

    this.logger.log(`Histórico populacional de ${histories.length} países gravado em ${path}`);
    return path;
  }
}
