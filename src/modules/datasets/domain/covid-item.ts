export const COVID_STATUSES = ['confirmed', 'deaths', 'recovered'] as const;

export type CovidStatus = (typeof COVID_STATUSES)[number];

/** Date key (e.g. `d_20200321`) to cumulative count, in source column order. */
export type Timeline = Record<string, number>;

export interface CovidItem {
  readonly status: CovidStatus;
  readonly provinceState: string;
  readonly countryRegion: string;
  readonly lat: number;
  readonly lon: number;
  readonly timeline: Readonly<Timeline>;
}

export interface TimeSeriesBundle {
  confirmed: CovidItem[];
  deaths: CovidItem[];
  recovered: CovidItem[];
}
