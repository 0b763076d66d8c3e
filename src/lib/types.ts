import type { DataSourceError } from './errors';

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface Station {
  readonly id: string;            // Station triplet, e.g. "2197:CO:SCAN"
  readonly name: string;
  readonly coordinate: Coordinate;
  readonly elevation: number | null; // meters
  readonly network: string;
  readonly state: string | null;
}

export interface RankedStation {
  readonly station: Station;
  readonly distanceMiles: number;
}

export type SensorKind =
  | 'soilMoisture20'
  | 'soilMoisture40'
  | 'soilTemp20'
  | 'soilTemp40'
  | 'ambientTemp';

export type MeasurementUnit = 'percent' | 'fahrenheit' | 'celsius';

// Inclusive date range, both ends as YYYY-MM-DD
export interface DateWindow {
  readonly begin: string;
  readonly end: string;
}

export interface Observation {
  readonly date: string;       // YYYY-MM-DD
  readonly timestamp: number;  // Unix timestamp in seconds (UTC)
  readonly value: number;
  readonly sensorKind: SensorKind;
}

export interface Series {
  readonly stationId: string;
  readonly sensorKind: SensorKind;
  readonly window: DateWindow;
  readonly unit: MeasurementUnit;
  readonly observations: readonly Observation[];
}

export interface CleanedSeries extends Series {
  readonly policyVersion: number;
  readonly removedCount: number;
  // Fences in source units; null when the series was too short to fence
  readonly bounds: { readonly lower: number; readonly upper: number } | null;
}

export type ExtremumKind = 'min' | 'max';

export interface SummaryPoint {
  readonly sensorKind: SensorKind;
  readonly depthInches: number | null;
  readonly extremum: ExtremumKind;
  readonly value: number;
  readonly timestamp: number;
  readonly date: string;
  readonly unit: MeasurementUnit;
}

export interface ChartAnnotation {
  readonly x: number; // Unix timestamp in milliseconds
  readonly y: number;
  readonly label: string;
}

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// Upstream provider of station metadata and observations. Payloads are
// untrusted and validated by the catalog and fetcher.
export interface StationDataSource {
  fetchStations(): Promise<unknown>;
  fetchObservations(
    stationId: string,
    sensorKind: SensorKind,
    window: DateWindow
  ): Promise<unknown>;
}

export interface SensorReport {
  readonly series: CleanedSeries;
  readonly summary: SummaryPoint | null;
  readonly annotation: ChartAnnotation | null;
}

export type SensorOutcome = Result<SensorReport, DataSourceError>;

export interface StationReport {
  readonly ranked: RankedStation;
  readonly sensors: Readonly<Record<SensorKind, SensorOutcome>>;
}

export interface QueryResult {
  readonly origin: Coordinate;
  readonly k: number;
  readonly window: DateWindow;
  readonly stations: readonly RankedStation[];
  readonly reports: readonly StationReport[];
}
