export { createSession, clearSession, runQuery } from './app/query';
export type { Session, SessionOptions, QueryInput } from './app/query';
export { AwdbClient, fetchWithTimeoutAndRetry } from './lib/awdb-client';
export type { AwdbClientOptions } from './lib/awdb-client';
export { SessionCache, AsyncSessionCache, seriesCacheKey } from './lib/cache';
export { loadConfig, DEFAULT_CONFIG } from './lib/config';
export type { PipelineConfig } from './lib/config';
export { ValidationError, DataSourceError } from './lib/errors';
export { buildExportFiles, parseCsv, toCsv, toRows, summaryColumn } from './lib/export';
export type { ExportCell, ExportFile, ExportInput, ExportRow, ExportTable } from './lib/export';
export { assertCoordinate, distance, EARTH_RADIUS_MILES } from './lib/geo';
export { SENSORS, SENSOR_KINDS, sensorLabel } from './lib/sensors';
export {
  SeriesCleaner,
  cleanSeries,
  fahrenheitToCelsius,
  iqrBounds,
  quantile,
  CLEANING_POLICY_VERSION,
} from './lib/series-cleaner';
export { SeriesFetcher, parseObservations } from './lib/series-fetcher';
export { StationCatalog, parseStationRecord } from './lib/station-catalog';
export type { NearestOptions } from './lib/station-catalog';
export { summarize, combinedMoistureMinimum, toChartAnnotation, EXTREMUM_POLICY } from './lib/summary';
export { assertWindow, historyWindow } from './lib/window';
export type * from './lib/types';
