import type { MeasurementUnit, SensorKind } from './types';

export type SensorQuantity = 'moisture' | 'temperature';

export interface SensorDefinition {
  kind: SensorKind;
  elementCode: string;      // AWDB element code (daily duration)
  name: string;
  quantity: SensorQuantity;
  depthInches: number | null;
  sourceUnit: MeasurementUnit;
  outputUnit: MeasurementUnit;
}

export const SENSORS: Record<SensorKind, SensorDefinition> = {
  soilMoisture20: {
    kind: 'soilMoisture20',
    elementCode: 'SMN:-20',
    name: 'Soil Moisture',
    quantity: 'moisture',
    depthInches: 20,
    sourceUnit: 'percent',
    outputUnit: 'percent',
  },
  soilMoisture40: {
    kind: 'soilMoisture40',
    elementCode: 'SMN:-40',
    name: 'Soil Moisture',
    quantity: 'moisture',
    depthInches: 40,
    sourceUnit: 'percent',
    outputUnit: 'percent',
  },
  soilTemp20: {
    kind: 'soilTemp20',
    elementCode: 'STX:-20',
    name: 'Soil Temp',
    quantity: 'temperature',
    depthInches: 20,
    sourceUnit: 'fahrenheit',
    outputUnit: 'celsius',
  },
  soilTemp40: {
    kind: 'soilTemp40',
    elementCode: 'STX:-40',
    name: 'Soil Temp',
    quantity: 'temperature',
    depthInches: 40,
    sourceUnit: 'fahrenheit',
    outputUnit: 'celsius',
  },
  ambientTemp: {
    kind: 'ambientTemp',
    elementCode: 'TMAX',
    name: 'Ambient Temp',
    quantity: 'temperature',
    depthInches: null,
    sourceUnit: 'fahrenheit',
    outputUnit: 'celsius',
  },
};

export const SENSOR_KINDS: SensorKind[] = [
  'soilMoisture20',
  'soilMoisture40',
  'soilTemp20',
  'soilTemp40',
  'ambientTemp',
];

export function isSensorKind(value: string): value is SensorKind {
  return Object.prototype.hasOwnProperty.call(SENSORS, value);
}

// "Soil Moisture 20in", "Ambient Temp"
export function sensorLabel(kind: SensorKind): string {
  const { name, depthInches } = SENSORS[kind];
  return depthInches === null ? name : `${name} ${depthInches}in`;
}

// Column-name suffix for a unit, e.g. "Soil Temp 20in (C)"
export function unitSymbol(unit: MeasurementUnit): string {
  switch (unit) {
    case 'percent':
      return '%';
    case 'fahrenheit':
      return 'F';
    case 'celsius':
      return 'C';
  }
}
