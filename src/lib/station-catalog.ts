import KDBush from 'kdbush';
import * as geokdbush from 'geokdbush';
import { z } from 'zod';
import { DataSourceError, ValidationError, toDataSourceError } from './errors';
import { assertCoordinate, distance, CoordinateSchema, MILES_PER_KM } from './geo';
import { DEFAULT_NETWORK } from './config';
import type { Coordinate, RankedStation, Station, StationDataSource } from './types';

const FEET_TO_METERS = 0.3048;

// geokdbush and our haversine use slightly different Earth radii; widen the
// tie query by 10 m so stations tied with the k-th candidate are not missed
const TIE_SLACK_KM = 0.01;

const StationRecordSchema = z.object({
  stationTriplet: z.string().min(1),
  name: z.string(),
  networkCode: z.string(),
  stateCode: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  elevation: z.number().nullish(),
});

export interface NearestOptions {
  radiusMiles?: number;
}

export interface StationCatalogOptions {
  network?: string;
}

interface CatalogIndex {
  stations: readonly Station[];
  index: KDBush | null;
}

export function parseStationRecord(record: unknown): Station | null {
  const parsed = StationRecordSchema.safeParse(record);
  if (!parsed.success) return null;

  const { stationTriplet, name, networkCode, stateCode, latitude, longitude, elevation } = parsed.data;
  const coordinate = CoordinateSchema.safeParse({ latitude, longitude });
  if (!coordinate.success) return null;

  return Object.freeze({
    id: stationTriplet,
    name: name.trim() || stationTriplet,
    coordinate: Object.freeze({ ...coordinate.data }),
    elevation: typeof elevation === 'number' ? elevation * FEET_TO_METERS : null,
    network: networkCode,
    state: stateCode ?? null,
  });
}

function compareRanked(a: RankedStation, b: RankedStation): number {
  if (a.distanceMiles !== b.distanceMiles) return a.distanceMiles - b.distanceMiles;
  if (a.station.id === b.station.id) return 0;
  return a.station.id < b.station.id ? -1 : 1;
}

/**
 * Station list for one session. The list is fetched once and indexed with a
 * k-d tree; `nearest` ranks candidates by haversine miles.
 */
export class StationCatalog {
  private readonly network: string;
  private loading: Promise<CatalogIndex> | null = null;

  constructor(
    private readonly source: StationDataSource,
    options: StationCatalogOptions = {}
  ) {
    this.network = (options.network ?? DEFAULT_NETWORK).toUpperCase();
  }

  async listStations(): Promise<readonly Station[]> {
    const { stations } = await this.load();
    return stations;
  }

  async nearest(
    origin: Coordinate,
    k: number,
    options: NearestOptions = {}
  ): Promise<RankedStation[]> {
    const from = assertCoordinate(origin);
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError('Invalid station count', [`k must be an integer >= 1, got ${k}`]);
    }
    const { radiusMiles } = options;
    if (radiusMiles !== undefined && !(Number.isFinite(radiusMiles) && radiusMiles >= 0)) {
      throw new ValidationError('Invalid search radius', [`radiusMiles must be >= 0, got ${radiusMiles}`]);
    }

    const { stations, index } = await this.load();
    if (!index) return [];

    const maxKm = radiusMiles === undefined ? Infinity : radiusMiles / MILES_PER_KM;
    const candidates = geokdbush.around(index, from.longitude, from.latitude, k, maxKm);
    if (candidates.length === 0) return [];

    const ids = new Set(candidates);
    if (candidates.length === k) {
      const kth = stations[candidates[k - 1]];
      const kthKm = distance(from, kth.coordinate) / MILES_PER_KM;
      const tied = geokdbush.around(
        index,
        from.longitude,
        from.latitude,
        Infinity,
        Math.min(maxKm, kthKm + TIE_SLACK_KM)
      );
      for (const idx of tied) ids.add(idx);
    }

    const ranked = [...ids]
      .map((idx): RankedStation => {
        const station = stations[idx];
        return Object.freeze({ station, distanceMiles: distance(from, station.coordinate) });
      })
      .filter((r) => radiusMiles === undefined || r.distanceMiles <= radiusMiles)
      .sort(compareRanked);

    return ranked.slice(0, k);
  }

  clear(): void {
    this.loading = null;
  }

  private load(): Promise<CatalogIndex> {
    if (!this.loading) {
      const pending = this.fetchIndex().catch((error: unknown) => {
        if (this.loading === pending) this.loading = null;
        throw error;
      });
      this.loading = pending;
    }
    return this.loading;
  }

  private async fetchIndex(): Promise<CatalogIndex> {
    let payload: unknown;
    try {
      payload = await this.source.fetchStations();
    } catch (error) {
      throw toDataSourceError(error, 'station list');
    }
    if (!Array.isArray(payload)) {
      throw new DataSourceError('Station list payload is not an array', 'station list');
    }

    const stations: Station[] = [];
    let skipped = 0;
    for (const record of payload) {
      const station = parseStationRecord(record);
      if (!station) {
        skipped++;
        continue;
      }
      if (station.network.toUpperCase() === this.network) stations.push(station);
    }
    if (skipped > 0) {
      console.warn(`Skipped ${skipped} station records without a usable id or coordinates`);
    }

    if (stations.length === 0) return { stations: Object.freeze(stations), index: null };

    const index = new KDBush(stations.length);
    for (const station of stations) {
      index.add(station.coordinate.longitude, station.coordinate.latitude);
    }
    index.finish();

    return { stations: Object.freeze(stations), index };
  }
}
