/**
 * Aligner
 * Resamples the weather table onto the power series' sampling grid using
 * linear interpolation over time.
 */

import { AlignmentError } from '../errors';
import { WEATHER_FIELDS, WeatherField, WeatherObservation, WeatherTable, WeatherValues } from '../weather/types';

const DAY_MS = 24 * 60 * 60 * 1000;

export type SeriesOrder = 'ascending' | 'descending';

export interface TimeRange {
  start: Date;
  end: Date;
}

type Timestamped = { timestamp: Date };

/**
 * Check that timestamps move strictly in one direction and report which.
 *
 * @throws AlignmentError for fewer than two samples, repeated timestamps or
 * a series that changes direction
 */
export function assertMonotonic(samples: readonly Timestamped[]): SeriesOrder {
  if (samples.length < 2) {
    throw new AlignmentError('At least two power samples are required', { samples: samples.length });
  }

  const order: SeriesOrder =
    samples[1].timestamp.getTime() > samples[0].timestamp.getTime() ? 'ascending' : 'descending';

  for (let i = 1; i < samples.length; i++) {
    const diff = samples[i].timestamp.getTime() - samples[i - 1].timestamp.getTime();
    if (diff === 0 || (diff > 0) !== (order === 'ascending')) {
      throw new AlignmentError('Power series timestamps are not strictly monotonic', {
        index: i,
        timestamp: samples[i].timestamp.toISOString(),
        order,
      });
    }
  }
  return order;
}

/**
 * Sampling period in ms: absolute gap between the first two samples as stored
 */
export function inferSamplingPeriod(samples: readonly Timestamped[]): number {
  if (samples.length < 2) {
    throw new AlignmentError('At least two power samples are required', { samples: samples.length });
  }
  const period = Math.abs(samples[0].timestamp.getTime() - samples[1].timestamp.getTime());
  if (!Number.isFinite(period) || period <= 0) {
    throw new AlignmentError('Sampling period must be positive', { periodMs: period });
  }
  return period;
}

export function timeRange(samples: readonly Timestamped[]): TimeRange {
  if (samples.length === 0) {
    throw new AlignmentError('Cannot compute time range of an empty series');
  }
  let min = samples[0].timestamp.getTime();
  let max = min;
  for (const s of samples) {
    const t = s.timestamp.getTime();
    if (t < min) min = t;
    if (t > max) max = t;
  }
  return { start: new Date(min), end: new Date(max) };
}

interface Point {
  t: number;
  v: number;
}

/**
 * Walks one field's observations forward in time and answers interpolated
 * values for non-decreasing query times.
 */
class FieldInterpolator {
  private j = 0;

  constructor(private readonly points: Point[]) {}

  valueAt(t: number): number | null {
    const pts = this.points;
    if (pts.length === 0 || t < pts[0].t || t > pts[pts.length - 1].t) return null;

    while (this.j + 1 < pts.length && pts[this.j + 1].t <= t) this.j++;

    const left = pts[this.j];
    if (left.t === t) return left.v;

    const right = pts[this.j + 1];
    return left.v + ((right.v - left.v) * (t - left.t)) / (right.t - left.t);
  }
}

function fieldPoints(weather: readonly WeatherObservation[], field: WeatherField): Point[] {
  const out: Point[] = [];
  for (const row of weather) {
    const v = row[field];
    if (v !== null && Number.isFinite(v)) out.push({ t: row.timestamp.getTime(), v });
  }
  return out;
}

/**
 * Resample `weather` to `periodMs`.
 *
 * The grid is anchored at UTC midnight of the first observation's day and
 * spans the observed range only. Each field is interpolated between its own
 * non-null neighbours; outside that field's observed span it stays null.
 *
 * @param coverage time range of the power series; when given it must overlap
 * the weather span
 */
export function alignWeather(
  weather: readonly WeatherObservation[],
  periodMs: number,
  coverage?: TimeRange
): WeatherTable {
  if (!Number.isFinite(periodMs) || periodMs <= 0) {
    throw new AlignmentError('Sampling period must be positive', { periodMs });
  }
  if (weather.length === 0) {
    throw new AlignmentError('Weather series is empty');
  }

  const sorted = [...weather].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const first = sorted[0].timestamp.getTime();
  const last = sorted[sorted.length - 1].timestamp.getTime();

  if (coverage && (coverage.end.getTime() < first || coverage.start.getTime() > last)) {
    throw new AlignmentError('Weather series does not overlap the power series', {
      weatherStart: new Date(first).toISOString(),
      weatherEnd: new Date(last).toISOString(),
      powerStart: coverage.start.toISOString(),
      powerEnd: coverage.end.toISOString(),
    });
  }

  const interpolators = WEATHER_FIELDS.map(
    field => [field, new FieldInterpolator(fieldPoints(sorted, field))] as const
  );

  const origin = Math.floor(first / DAY_MS) * DAY_MS;
  const aligned: WeatherTable = [];
  for (let t = origin + Math.ceil((first - origin) / periodMs) * periodMs; t <= last; t += periodMs) {
    const values: WeatherValues = { clouds: null, windDir: null, windSpeed: null, temp: null, sun: null };
    for (const [field, interpolator] of interpolators) {
      values[field] = interpolator.valueAt(t);
    }
    aligned.push({ timestamp: new Date(t), ...values });
  }
  return aligned;
}
