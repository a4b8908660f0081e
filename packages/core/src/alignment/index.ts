export { alignWeather, assertMonotonic, inferSamplingPeriod, timeRange } from './aligner';
export type { SeriesOrder, TimeRange } from './aligner';
