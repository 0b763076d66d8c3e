import { AwdbClient } from '@/lib/awdb-client';
import { DEFAULT_CONFIG, type PipelineConfig } from '@/lib/config';
import { DataSourceError } from '@/lib/errors';
import { assertCoordinate } from '@/lib/geo';
import { SeriesCleaner } from '@/lib/series-cleaner';
import { SeriesFetcher } from '@/lib/series-fetcher';
import { StationCatalog } from '@/lib/station-catalog';
import { summarize, toChartAnnotation } from '@/lib/summary';
import { assertWindow, historyWindow } from '@/lib/window';
import type {
  Coordinate,
  DateWindow,
  QueryResult,
  RankedStation,
  SensorKind,
  SensorOutcome,
  Series,
  StationDataSource,
  StationReport,
} from '@/lib/types';

// Everything one user session shares: the data source and its caches
export interface Session {
  readonly config: Readonly<PipelineConfig>;
  readonly catalog: StationCatalog;
  readonly fetcher: SeriesFetcher;
  readonly cleaner: SeriesCleaner;
}

export interface SessionOptions {
  config?: Partial<PipelineConfig>;
  source?: StationDataSource;
}

export interface QueryInput {
  origin: Coordinate;
  k?: number;
  window?: DateWindow;
  radiusMiles?: number;
}

export function createSession(options: SessionOptions = {}): Session {
  const config: PipelineConfig = { ...DEFAULT_CONFIG, ...options.config };
  const source =
    options.source ??
    new AwdbClient({
      baseUrl: config.awdbBaseUrl,
      timeoutMs: config.fetchTimeoutMs,
      maxRetries: config.maxRetries,
    });

  return Object.freeze({
    config: Object.freeze(config),
    catalog: new StationCatalog(source, { network: config.network }),
    fetcher: new SeriesFetcher(source),
    cleaner: new SeriesCleaner(),
  });
}

// Drop every cached station list, raw series and cleaned series
export function clearSession(session: Session): void {
  session.catalog.clear();
  session.fetcher.clear();
  session.cleaner.clear();
}

async function processSensor(
  session: Session,
  ranked: RankedStation,
  sensorKind: SensorKind,
  window: DateWindow
): Promise<SensorOutcome> {
  let raw: Series;
  try {
    raw = await session.fetcher.fetch(ranked.station, sensorKind, window);
  } catch (error) {
    if (!(error instanceof DataSourceError)) throw error;
    console.error(`Sensor fetch error (${error.resource}):`, error.message);
    return { ok: false, error };
  }

  const series = session.cleaner.clean(raw);
  const summary = summarize(series, sensorKind);
  return {
    ok: true,
    value: Object.freeze({
      series,
      summary,
      annotation: summary ? Object.freeze(toChartAnnotation(summary)) : null,
    }),
  };
}

// Run `fn` for every sensor concurrently, keyed by sensor kind
async function forEachSensor<T>(fn: (kind: SensorKind) => Promise<T>): Promise<Record<SensorKind, T>> {
  const [soilMoisture20, soilMoisture40, soilTemp20, soilTemp40, ambientTemp] = await Promise.all([
    fn('soilMoisture20'),
    fn('soilMoisture40'),
    fn('soilTemp20'),
    fn('soilTemp40'),
    fn('ambientTemp'),
  ]);
  return { soilMoisture20, soilMoisture40, soilTemp20, soilTemp40, ambientTemp };
}

/**
 * Rank the stations nearest to `origin`, then fetch, clean and summarize
 * every sensor of every station. Input is validated before any request is
 * made. A failing station list rejects the whole query; a failing sensor is
 * reported as an error outcome beside its siblings.
 */
export async function runQuery(session: Session, input: QueryInput): Promise<QueryResult> {
  const origin = assertCoordinate(input.origin);
  const k = input.k ?? session.config.searchK;
  const window = input.window
    ? assertWindow(input.window)
    : historyWindow(session.config.historyWindowYears);
  const radiusMiles = input.radiusMiles ?? session.config.searchRadiusMiles ?? undefined;

  const stations = await session.catalog.nearest(origin, k, { radiusMiles });

  const reports = await Promise.all(
    stations.map(async (ranked): Promise<StationReport> => {
      const sensors = await forEachSensor((kind) => processSensor(session, ranked, kind, window));
      return Object.freeze({ ranked, sensors: Object.freeze(sensors) });
    })
  );

  return Object.freeze({
    origin,
    k,
    window,
    stations: Object.freeze(stations),
    reports: Object.freeze(reports),
  });
}
