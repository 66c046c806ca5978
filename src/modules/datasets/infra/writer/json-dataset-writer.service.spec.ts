import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  JsonDatasetWriterService,
  placeFileName,
} from '@/modules/datasets/infra/writer/json-dataset-writer.service';
import type { CovidItem } from '@/modules/datasets/domain/covid-item';

describe('JsonDatasetWriterService', () => {
  let outputDir: string;
  let writer: JsonDatasetWriterService;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'datasets-writer-'));
    writer = new JsonDatasetWriterService({
      datasetDir: 'dataset',
      outputDir,
      outputDateFormat: "'d_'yyyyMMdd",
      port: 3000,
    });
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  const item = (status: CovidItem['status'], countryRegion: string, provinceState = ''): CovidItem => ({
    status,
    provinceState,
    countryRegion,
    lat: 1,
    lon: 2,
    timeline: { d_20200321: 1 },
  });

  it('names files after the place', () => {
    expect(placeFileName('Nepal', '')).toBe('nepal.json');
    expect(placeFileName('Australia', 'New South Wales')).toBe('australia_new-south-wales.json');
  });

  it('writes one document per place with every status of that place', async () => {
    const files = await writer.writeByPlace([
      item('confirmed', 'Nepal'),
      item('confirmed', 'Australia', 'Victoria'),
      item('deaths', 'Nepal'),
    ]);

    expect(files).toEqual([
      join(outputDir, 'by-country', 'nepal.json'),
      join(outputDir, 'by-country', 'australia_victoria.json'),
    ]);
    expect((await readdir(join(outputDir, 'by-country'))).sort()).toEqual([
      'australia_victoria.json',
      'nepal.json',
    ]);

    const nepal: unknown = JSON.parse(await readFile(files[0], 'utf-8'));
    expect(nepal).toEqual([item('confirmed', 'Nepal'), item('deaths', 'Nepal')]);
  });

  it('refuses to merge different places that share a file name', async () => {
    await expect(
      writer.writeByPlace([item('confirmed', 'Korea, South'), item('confirmed', 'Korea South')]),
    ).rejects.toThrow(
      'Locais "Korea, South" e "Korea South" resultam no mesmo arquivo korea-south.json',
    );
    await expect(
      writer.writeByPlace([item('deaths', 'Chile'), item('deaths', 'Chile', '???')]),
    ).rejects.toThrow('Locais "Chile" e "Chile/???" resultam no mesmo arquivo chile.json');
    await expect(readdir(join(outputDir, 'by-country'))).resolves.toEqual([]);
  });

  it('writes the population history file', async () => {
    const path = await writer.writePopulation([
      { country: 'Nepal', latestYear: 2019, latestPopulation: 29000000, yearly: { 2019: 29000000 } },
    ]);

    expect(path).toBe(join(outputDir, 'population', 'history.json'));
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual([
      { country: 'Nepal', latestYear: 2019, latestPopulation: 29000000, yearly: { '2019': 29000000 } },
    ]);
  });
});
