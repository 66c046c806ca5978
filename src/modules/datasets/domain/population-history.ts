export interface CountryPopulationHistory {
  readonly country: string;
  readonly latestYear: number;
  readonly latestPopulation: number;
  // years with a reported population of 0 are left out
  readonly yearly: Readonly<Record<number, number>>;
}
