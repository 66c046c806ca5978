import { HeaderClassifierService } from '@/modules/datasets/application/services/header-classifier.service';
import { TableNormalizerService } from '@/modules/datasets/application/services/table-normalizer.service';
import {
  MalformedHeaderError,
  RenameCollisionError,
  ValueCastError,
} from '@/modules/datasets/domain/dataset-errors';
import type { RawTable } from '@/modules/datasets/domain/raw-table';

describe('TableNormalizerService', () => {
  const classifier = new HeaderClassifierService();
  const normalizer = new TableNormalizerService(classifier);

  const timeSeries: RawTable = {
    headers: ['Province/State', 'Country/Region', 'Lat', 'Long', '3/21/20', '3/22/20'],
    rows: [
      [null, 'Nepal', '28.1667', '84.25', '1', '2'],
      ['Hubei', 'China', '30.9756', '112.2707', '67800', '67800'],
    ],
  };

  it('renames every column and casts date values to integers', () => {
    const table = normalizer.normalize(timeSeries);

    expect(table.columns.map((c) => c.name)).toEqual([
      'province_state',
      'country_region',
      'lat',
      'lon',
      'd_20200321',
      'd_20200322',
    ]);
    expect(table.columns.map((c) => c.type)).toEqual([
      'string',
      'string',
      'string',
      'string',
      'int64',
      'int64',
    ]);
    expect(table.rows).toEqual([
      [null, 'Nepal', '28.1667', '84.25', 1, 2],
      ['Hubei', 'China', '30.9756', '112.2707', 67800, 67800],
    ]);
  });

  it('keeps the source header of each column', () => {
    const table = normalizer.normalize(timeSeries);
    expect(table.columns[3]).toEqual({ name: 'lon', type: 'string', sourceHeader: 'Long' });
    expect(table.columns[4].sourceHeader).toBe('3/21/20');
  });

  it('renames Long to Lon before classification', () => {
    const table = normalizer.normalize({ headers: ['Lat', 'Long'], rows: [] });
    expect(table.columns.map((c) => c.name)).toEqual(['lat', 'lon']);
  });

  it('does not touch the input table', () => {
    const raw: RawTable = { headers: ['Long', '1/1/20'], rows: [['1', '5']] };
    normalizer.normalize(raw);
    expect(raw).toEqual({ headers: ['Long', '1/1/20'], rows: [['1', '5']] });
  });

  it('is a no-op on names when run on its own output', () => {
    const once = normalizer.normalize(timeSeries);
    const twice = normalizer.normalize({
      headers: once.columns.map((c) => c.name),
      rows: once.rows.map((row) => row.map((cell) => (cell === null ? null : String(cell)))),
    });

    expect(twice.columns.map((c) => c.name)).toEqual(once.columns.map((c) => c.name));
  });

  it('honours a custom output date format', () => {
    const table = normalizer.normalize(
      { headers: ['1/22/20'], rows: [['3']] },
      "'d_'yyyy'_'MM'_'dd",
    );
    expect(table.columns[0].name).toBe('d_2020_01_22');
    expect(table.rows).toEqual([[3]]);
  });

  it('fails on headers that collapse into the same name before casting anything', () => {
    const raw: RawTable = {
      headers: ['Country', 'COUNTRY', '1/1/20'],
      rows: [['A', 'B', 'not a number']],
    };

    expect(() => normalizer.normalize(raw)).toThrow(RenameCollisionError);
    try {
      normalizer.normalize(raw);
    } catch (err) {
      expect(err).toBeInstanceOf(RenameCollisionError);
      expect(err).toMatchObject({ normalizedName: 'country', headers: ['Country', 'COUNTRY'] });
    }
  });

  it('treats Lon next to Long as a collision', () => {
    expect(() => normalizer.normalize({ headers: ['Lon', 'Long'], rows: [] })).toThrow(
      RenameCollisionError,
    );
  });

  it('fails on a count that is not an integer', () => {
    const raw: RawTable = {
      headers: ['Country/Region', '3/21/20'],
      rows: [
        ['Nepal', '1'],
        ['Chile', '1.5'],
      ],
    };

    expect(() => normalizer.normalize(raw)).toThrow(
      new ValueCastError('d_20200321', 2, '1.5', 'int64'),
    );
  });

  it('fails on a blank count', () => {
    const raw: RawTable = { headers: ['3/21/20'], rows: [[null]] };
    expect(() => normalizer.normalize(raw)).toThrow(ValueCastError);
  });

  it('fails on malformed headers', () => {
    expect(() => normalizer.normalize({ headers: ['Lat', ''], rows: [] })).toThrow(
      MalformedHeaderError,
    );
  });

  it('pads short rows with null', () => {
    const table = normalizer.normalize({ headers: ['Country', 'Code'], rows: [['Nepal']] });
    expect(table.rows).toEqual([['Nepal', null]]);
  });

  describe('prependLiteralColumn', () => {
    it('adds the literal as the first column of every row', () => {
      const table = normalizer.prependLiteralColumn(
        normalizer.normalize({ headers: ['Country'], rows: [['Nepal'], ['Chile']] }),
        'status',
        'deaths',
      );

      expect(table.columns[0]).toEqual({ name: 'status', type: 'string', sourceHeader: null });
      expect(table.rows).toEqual([
        ['deaths', 'Nepal'],
        ['deaths', 'Chile'],
      ]);
    });

    it('refuses to shadow an existing column', () => {
      const table = normalizer.normalize({ headers: ['Status'], rows: [] });
      expect(() => normalizer.prependLiteralColumn(table, 'status', 'confirmed')).toThrow(
        RenameCollisionError,
      );
    });
  });
});
