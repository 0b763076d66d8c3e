import { z } from 'zod';
import { AsyncSessionCache, seriesCacheKey, type SeriesKey } from './cache';
import { DataSourceError, ValidationError, toDataSourceError } from './errors';
import { NUMERIC_TEXT } from './numbers';
import { SENSORS, isSensorKind } from './sensors';
import { assertWindow, isWithinWindow, parseObservationDate } from './window';
import type { DateWindow, Observation, SensorKind, Series, Station, StationDataSource } from './types';

// AWDB sends numbers, but some proxies stringify them
const RawObservationSchema = z.object({
  date: z.string(),
  value: z.union([
    z.number().finite(),
    z
      .string()
      .regex(NUMERIC_TEXT)
      .transform((s) => Number(s)),
  ]),
});

export interface ParsedObservations {
  observations: Observation[];
  rejected: number;
}

// Validate raw (date, value) records one by one. Bad records and records
// outside the window are dropped; the rest are returned sorted by time.
export function parseObservations(
  records: readonly unknown[],
  sensorKind: SensorKind,
  window: DateWindow
): ParsedObservations {
  const observations: Observation[] = [];
  let rejected = 0;

  for (const record of records) {
    const parsed = RawObservationSchema.safeParse(record);
    const day = parsed.success ? parseObservationDate(parsed.data.date) : null;
    if (!parsed.success || day === null || !isWithinWindow(day.ms, window)) {
      rejected++;
      continue;
    }
    observations.push(
      Object.freeze({
        date: day.date,
        timestamp: day.ms / 1000,
        value: parsed.data.value,
        sensorKind,
      })
    );
  }

  // Array.prototype.sort is stable, so same-day duplicates keep source order
  observations.sort((a, b) => a.timestamp - b.timestamp);
  return { observations, rejected };
}

/**
 * Raw per-sensor series for one session, cached per
 * (station, sensor, window). Concurrent requests for one key share a single
 * upstream call; failed calls are not cached.
 */
export class SeriesFetcher {
  private readonly cache = new AsyncSessionCache<SeriesKey, Series>(seriesCacheKey);

  constructor(private readonly source: StationDataSource) {}

  fetch(station: Station, sensorKind: SensorKind, window: DateWindow): Promise<Series> {
    if (!isSensorKind(sensorKind)) {
      return Promise.reject(new ValidationError('Invalid sensor kind', [String(sensorKind)]));
    }
    let checked: DateWindow;
    try {
      checked = assertWindow(window);
    } catch (error) {
      return Promise.reject(error);
    }

    const key: SeriesKey = { stationId: station.id, sensorKind, window: checked };
    return this.cache.getOrLoad(key, () => this.load(key));
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  private async load({ stationId, sensorKind, window }: SeriesKey): Promise<Series> {
    const resource = `${stationId} ${sensorKind}`;
    let payload: unknown;
    try {
      payload = await this.source.fetchObservations(stationId, sensorKind, window);
    } catch (error) {
      throw toDataSourceError(error, resource);
    }
    if (!Array.isArray(payload)) {
      throw new DataSourceError(`Observation payload for ${resource} is not an array`, resource);
    }

    const { observations, rejected } = parseObservations(payload, sensorKind, window);
    if (rejected > 0) {
      console.warn(`Dropped ${rejected} of ${payload.length} observations for ${resource}`);
    }

    return Object.freeze({
      stationId,
      sensorKind,
      window,
      unit: SENSORS[sensorKind].sourceUnit,
      observations: Object.freeze(observations),
    });
  }
}
