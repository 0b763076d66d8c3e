import { SessionCache, seriesCacheKey } from './cache';
import { SENSORS } from './sensors';
import type { CleanedSeries, Observation, Series } from './types';

// Bump whenever the cleaning rules change so cached results are not reused
export const CLEANING_POLICY_VERSION = 1;

// Tukey fence multiplier
export const IQR_MULTIPLIER = 1.5;

// Quartiles are meaningless below this many points
export const MIN_POINTS_FOR_FENCING = 4;

export function fahrenheitToCelsius(f: number): number {
  return ((f - 32) * 5) / 9;
}

/**
 * Quantile of an ascending-sorted sample, interpolating linearly between the
 * two nearest order statistics (position `p * (n - 1)`).
 */
export function quantile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return NaN;
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function iqrBounds(values: readonly number[]): { lower: number; upper: number } {
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  return { lower: q1 - IQR_MULTIPLIER * iqr, upper: q3 + IQR_MULTIPLIER * iqr };
}

// Drop IQR outliers (in source units), then convert to the output unit
export function cleanSeries(series: Series): CleanedSeries {
  const sensor = SENSORS[series.sensorKind];
  const source = series.observations;

  let kept: readonly Observation[] = source;
  let bounds: CleanedSeries['bounds'] = null;
  if (source.length >= MIN_POINTS_FOR_FENCING) {
    const fences = iqrBounds(source.map((o) => o.value));
    bounds = Object.freeze(fences);
    kept = source.filter((o) => o.value >= fences.lower && o.value <= fences.upper);
  }

  const convert =
    sensor.sourceUnit === 'fahrenheit' && sensor.outputUnit === 'celsius'
      ? fahrenheitToCelsius
      : (value: number) => value;
  const observations = kept.map((o) => Object.freeze({ ...o, value: convert(o.value) }));

  return Object.freeze({
    stationId: series.stationId,
    sensorKind: series.sensorKind,
    window: series.window,
    unit: sensor.outputUnit,
    observations: Object.freeze(observations),
    policyVersion: CLEANING_POLICY_VERSION,
    removedCount: source.length - kept.length,
    bounds,
  });
}

function cleanedCacheKey(series: Series): string {
  return `${seriesCacheKey(series)}|policy:${CLEANING_POLICY_VERSION}`;
}

interface CleanedEntry {
  source: Series;
  cleaned: CleanedSeries;
}

/**
 * Cleaned series for one session, keyed like raw series plus policy version.
 * An entry is reused only for the raw series it was built from; a refetched
 * series under the same key is cleaned again.
 */
export class SeriesCleaner {
  private readonly cache = new SessionCache<Series, CleanedEntry>(cleanedCacheKey);

  clean(series: Series): CleanedSeries {
    const entry = this.cache.get(series);
    if (entry?.source === series) return entry.cleaned;
    this.cache.delete(series);
    return this.cache.getOrCreate(series, () => ({ source: series, cleaned: cleanSeries(series) })).cleaned;
  }

  clear(): void {
    this.cache.clear();
  }
}
