import { SENSORS, unitSymbol } from './sensors';
import type {
  ChartAnnotation,
  CleanedSeries,
  ExtremumKind,
  Observation,
  SensorKind,
  SummaryPoint,
} from './types';

// Moisture is reported as its driest day, temperatures as their hottest
export const EXTREMUM_POLICY: Record<SensorKind, ExtremumKind> = {
  soilMoisture20: 'min',
  soilMoisture40: 'min',
  soilTemp20: 'max',
  soilTemp40: 'max',
  ambientTemp: 'max',
};

/**
 * Extremum of a cleaned series per `EXTREMUM_POLICY`, taken verbatim from one
 * of its observations so that the reported value sits on the plotted line.
 * Equal extremes resolve to the earliest observation. Returns null for an
 * empty series.
 */
export function summarize(cleaned: CleanedSeries, sensorKind: SensorKind): SummaryPoint | null {
  const extremum = EXTREMUM_POLICY[sensorKind];
  let best: Observation | null = null;

  for (const observation of cleaned.observations) {
    if (
      best === null ||
      (extremum === 'min' ? observation.value < best.value : observation.value > best.value) ||
      (observation.value === best.value && observation.timestamp < best.timestamp)
    ) {
      best = observation;
    }
  }
  if (best === null) return null;

  return Object.freeze({
    sensorKind,
    depthInches: SENSORS[sensorKind].depthInches,
    extremum,
    value: best.value,
    timestamp: best.timestamp,
    date: best.date,
    unit: cleaned.unit,
  });
}

// Lower of the 20in and 40in moisture minima, as shown in the overview table
export function combinedMoistureMinimum(
  points: readonly (SummaryPoint | null)[]
): SummaryPoint | null {
  let lowest: SummaryPoint | null = null;
  for (const point of points) {
    if (!point || SENSORS[point.sensorKind].quantity !== 'moisture') continue;
    if (
      lowest === null ||
      point.value < lowest.value ||
      (point.value === lowest.value && point.timestamp < lowest.timestamp)
    ) {
      lowest = point;
    }
  }
  return lowest;
}

// Marker for the chart layer, e.g. "Max 0.6 C on 2021-07-04"
export function toChartAnnotation(point: SummaryPoint): ChartAnnotation {
  const kind = point.extremum === 'min' ? 'Min' : 'Max';
  return {
    x: point.timestamp * 1000,
    y: point.value,
    label: `${kind} ${point.value.toFixed(1)} ${unitSymbol(point.unit)} on ${point.date}`,
  };
}
