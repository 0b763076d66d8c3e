import { describe, it, expect } from 'vitest';
import { combinedMoistureMinimum, summarize, toChartAnnotation } from './summary';
import { cleanSeries } from './series-cleaner';
import type { CleanedSeries, Observation, SensorKind, SummaryPoint } from './types';

const WINDOW = { begin: '2023-01-01', end: '2023-12-31' };

function observation(sensorKind: SensorKind, day: number, value: number): Observation {
  const ms = Date.UTC(2023, 6, day);
  return { date: new Date(ms).toISOString().slice(0, 10), timestamp: ms / 1000, value, sensorKind };
}

function cleaned(sensorKind: SensorKind, values: number[]): CleanedSeries {
  const unit = sensorKind.startsWith('soilMoisture') ? 'percent' : 'celsius';
  return {
    stationId: '2197:CO:SCAN',
    sensorKind,
    window: WINDOW,
    unit,
    observations: values.map((value, i) => observation(sensorKind, i + 1, value)),
    policyVersion: 1,
    removedCount: 0,
    bounds: null,
  };
}

describe('summarize', () => {
  it('reports the hottest cleaned soil temperature', () => {
    const series = cleanSeries({
      stationId: '2197:CO:SCAN',
      sensorKind: 'soilTemp20',
      window: WINDOW,
      unit: 'fahrenheit',
      observations: [30, 31, 32, 33, 200].map((v, i) => observation('soilTemp20', i + 1, v)),
    });

    const point = summarize(series, 'soilTemp20');
    expect(point).not.toBeNull();
    expect(point?.extremum).toBe('max');
    expect(point?.value).toBeCloseTo(0.5555555555555556, 12);
    expect(point?.date).toBe('2023-07-04');
    expect(point?.timestamp).toBe(Date.UTC(2023, 6, 4) / 1000);
    expect(point?.unit).toBe('celsius');
    expect(point?.depthInches).toBe(20);
  });

  it('reports the driest soil moisture', () => {
    const point = summarize(cleaned('soilMoisture40', [22.5, 18.1, 19, 25]), 'soilMoisture40');
    expect(point).toEqual({
      sensorKind: 'soilMoisture40',
      depthInches: 40,
      extremum: 'min',
      value: 18.1,
      timestamp: Date.UTC(2023, 6, 2) / 1000,
      date: '2023-07-02',
      unit: 'percent',
    });
  });

  it('uses the earliest observation when extremes tie', () => {
    const point = summarize(cleaned('ambientTemp', [20, 31, 25, 31]), 'ambientTemp');
    expect(point?.date).toBe('2023-07-02');
    expect(point?.depthInches).toBeNull();
  });

  it('returns a value that belongs to the series', () => {
    const series = cleaned('soilTemp40', [12.25, 14.5, 13.75]);
    const point = summarize(series, 'soilTemp40');
    expect(series.observations.some((o) => o.value === point?.value && o.timestamp === point?.timestamp)).toBe(
      true
    );
  });

  it('returns null for an empty series', () => {
    expect(summarize(cleaned('soilMoisture20', []), 'soilMoisture20')).toBeNull();
  });
});

describe('combinedMoistureMinimum', () => {
  const moisture20 = summarize(cleaned('soilMoisture20', [15, 12, 14]), 'soilMoisture20');
  const moisture40 = summarize(cleaned('soilMoisture40', [18, 11, 20]), 'soilMoisture40');
  const temperature = summarize(cleaned('soilTemp20', [-5, -3]), 'soilTemp20');

  it('picks the lower of the two moisture minima', () => {
    const lowest = combinedMoistureMinimum([moisture20, moisture40, temperature]);
    expect(lowest?.sensorKind).toBe('soilMoisture40');
    expect(lowest?.value).toBe(11);
  });

  it('ignores missing and non-moisture points', () => {
    expect(combinedMoistureMinimum([null, moisture20, temperature])?.value).toBe(12);
    expect(combinedMoistureMinimum([null, temperature])).toBeNull();
    expect(combinedMoistureMinimum([])).toBeNull();
  });
});

describe('toChartAnnotation', () => {
  it('places the marker at the extremum in milliseconds', () => {
    const point: SummaryPoint = {
      sensorKind: 'soilTemp20',
      depthInches: 20,
      extremum: 'max',
      value: 0.5555555555555556,
      timestamp: Date.UTC(2023, 6, 4) / 1000,
      date: '2023-07-04',
      unit: 'celsius',
    };
    expect(toChartAnnotation(point)).toEqual({
      x: Date.UTC(2023, 6, 4),
      y: 0.5555555555555556,
      label: 'Max 0.6 C on 2023-07-04',
    });
  });

  it('labels moisture minima in percent', () => {
    const point = summarize(cleaned('soilMoisture20', [15, 12.34, 14]), 'soilMoisture20');
    expect(point && toChartAnnotation(point).label).toBe('Min 12.3 % on 2023-07-02');
  });
});
