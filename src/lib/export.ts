import { isNumericText } from './numbers';
import { SENSORS, SENSOR_KINDS, sensorLabel, unitSymbol } from './sensors';
import { combinedMoistureMinimum, EXTREMUM_POLICY } from './summary';
import type {
  CleanedSeries,
  QueryResult,
  RankedStation,
  SensorKind,
  StationReport,
  SummaryPoint,
} from './types';

export type ExportCell = string | number | null;
export type ExportRow = Record<string, ExportCell>;

export interface ExportTable {
  columns: string[];
  rows: ExportRow[];
}

export type ExportInput =
  | { kind: 'stations'; stations: readonly RankedStation[] }
  | { kind: 'overview'; reports: readonly StationReport[] }
  | { kind: 'series'; series: CleanedSeries };

export interface ExportFile {
  fileName: string;
  contents: string;
}

const STATION_COLUMNS = [
  'Station Triplet',
  'SCAN Site',
  'State',
  'Elevation (m)',
  'Distance to Location (mi)',
  'Latitude',
  'Longitude',
];

const COMBINED_MOISTURE_COLUMN = 'Soil Moisture Minimum (%)';

// e.g. "Soil Moisture Minimum 20in (%)", "Ambient Temp Maximum (C)"
export function summaryColumn(kind: SensorKind): string {
  const { name, depthInches, outputUnit } = SENSORS[kind];
  const extremum = EXTREMUM_POLICY[kind] === 'min' ? 'Minimum' : 'Maximum';
  const depth = depthInches === null ? '' : ` ${depthInches}in`;
  return `${name} ${extremum}${depth} (${unitSymbol(outputUnit)})`;
}

function stationRows(stations: readonly RankedStation[]): ExportTable {
  return {
    columns: [...STATION_COLUMNS],
    rows: stations.map(({ station, distanceMiles }) => ({
      'Station Triplet': station.id,
      'SCAN Site': station.name,
      'State': station.state,
      'Elevation (m)': station.elevation,
      'Distance to Location (mi)': distanceMiles,
      'Latitude': station.coordinate.latitude,
      'Longitude': station.coordinate.longitude,
    })),
  };
}

function overviewRows(reports: readonly StationReport[]): ExportTable {
  const sensorColumns = SENSOR_KINDS.map(summaryColumn);
  const columns = [
    'Station Triplet',
    'SCAN Site',
    'Elevation (m)',
    'Distance to Location (mi)',
    COMBINED_MOISTURE_COLUMN,
    ...sensorColumns,
  ];

  const rows = reports.map(({ ranked, sensors }) => {
    const summaries: (SummaryPoint | null)[] = SENSOR_KINDS.map((kind) => {
      const outcome = sensors[kind];
      return outcome.ok ? outcome.value.summary : null;
    });
    const row: ExportRow = {
      'Station Triplet': ranked.station.id,
      'SCAN Site': ranked.station.name,
      'Elevation (m)': ranked.station.elevation,
      'Distance to Location (mi)': ranked.distanceMiles,
      [COMBINED_MOISTURE_COLUMN]: combinedMoistureMinimum(summaries)?.value ?? null,
    };
    SENSOR_KINDS.forEach((kind, i) => {
      row[summaryColumn(kind)] = summaries[i]?.value ?? null;
    });
    return row;
  });

  return { columns, rows };
}

function seriesRows(series: CleanedSeries): ExportTable {
  const valueColumn = `${sensorLabel(series.sensorKind)} (${unitSymbol(series.unit)})`;
  return {
    columns: ['Station Triplet', 'Date', 'Timestamp', valueColumn],
    rows: series.observations.map((o) => ({
      'Station Triplet': series.stationId,
      'Date': o.date,
      'Timestamp': o.timestamp,
      [valueColumn]: o.value,
    })),
  };
}

/**
 * Flatten pipeline output into a table. Units live in the column names;
 * measurement cells hold plain numbers, or null when there is no data.
 */
export function toRows(input: ExportInput): ExportTable {
  switch (input.kind) {
    case 'stations':
      return stationRows(input.stations);
    case 'overview':
      return overviewRows(input.reports);
    case 'series':
      return seriesRows(input.series);
  }
}

function formatCell(value: ExportCell | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  // Quote text that would otherwise read back as a number or as "no data"
  if (value === '' || isNumericText(value) || /[",\r\n]/.test(value) || value.trim() !== value) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

// Numbers are written with String(), which round-trips exactly
export function toCsv(table: ExportTable): string {
  const lines = [table.columns.map(formatCell).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => formatCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

interface RawCell {
  text: string;
  quoted: boolean;
}

function splitCsv(text: string): RawCell[][] {
  const records: RawCell[][] = [];
  let record: RawCell[] = [];
  let cell: RawCell = { text: '', quoted: false };
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        cell.text += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        cell.text += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
      cell.quoted = true;
    } else if (ch === ',') {
      record.push(cell);
      cell = { text: '', quoted: false };
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      record.push(cell);
      records.push(record);
      record = [];
      cell = { text: '', quoted: false };
    } else {
      cell.text += ch;
    }
  }
  if (cell.text !== '' || cell.quoted || record.length > 0) {
    record.push(cell);
    records.push(record);
  }
  return records;
}

function readCell(cell: RawCell | undefined): ExportCell {
  if (!cell) return null;
  if (cell.quoted) return cell.text;
  if (cell.text === '') return null;
  return isNumericText(cell.text) ? Number(cell.text) : cell.text;
}

// Inverse of toCsv
export function parseCsv(text: string): ExportTable {
  const [header, ...records] = splitCsv(text);
  if (!header) return { columns: [], rows: [] };
  const columns = header.map((cell) => cell.text);
  const rows = records.map((record) => {
    const row: ExportRow = {};
    columns.forEach((column, i) => {
      row[column] = readCell(record[i]);
    });
    return row;
  });
  return { columns, rows };
}

export function buildExportFiles(result: QueryResult): ExportFile[] {
  return [
    {
      fileName: 'scan_sites.csv',
      contents: toCsv(toRows({ kind: 'stations', stations: result.stations })),
    },
    {
      fileName: 'scan_overview.csv',
      contents: toCsv(toRows({ kind: 'overview', reports: result.reports })),
    },
  ];
}
