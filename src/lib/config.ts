import { DEFAULT_HISTORY_YEARS } from './window';

export const DEFAULT_AWDB_BASE_URL = 'https://wcc.sc.egov.usda.gov/awdbRestApi/services/v1';
export const DEFAULT_SEARCH_K = 5;
export const DEFAULT_NETWORK = 'SCAN';
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;
export const DEFAULT_MAX_RETRIES = 3;

export interface PipelineConfig {
  searchK: number;
  historyWindowYears: number;
  searchRadiusMiles: number | null;
  network: string;
  awdbBaseUrl: string;
  fetchTimeoutMs: number;
  maxRetries: number;
  outlierMethod: 'iqr';
  temperatureUnitOut: 'celsius';
}

export const DEFAULT_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  searchK: DEFAULT_SEARCH_K,
  historyWindowYears: DEFAULT_HISTORY_YEARS,
  searchRadiusMiles: null,
  network: DEFAULT_NETWORK,
  awdbBaseUrl: DEFAULT_AWDB_BASE_URL,
  fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
  maxRetries: DEFAULT_MAX_RETRIES,
  outlierMethod: 'iqr',
  temperatureUnitOut: 'celsius',
});

type Env = Record<string, string | undefined>;

function parseIntInRange(
  env: Env,
  name: string,
  min: number,
  max: number,
  fallback: number
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    console.warn(`Ignoring ${name}=${raw}: expected an integer in [${min}, ${max}], using ${fallback}`);
    return fallback;
  }
  return value;
}

function parseRadius(env: Env): number | null {
  const raw = env.SCAN_SEARCH_RADIUS_MILES?.trim();
  if (!raw) return null;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 10 || value > 200) {
    console.warn(`Ignoring SCAN_SEARCH_RADIUS_MILES=${raw}: expected miles in [10, 200]`);
    return null;
  }
  return value;
}

function parseBaseUrl(env: Env): string {
  const raw = env.AWDB_BASE_URL?.trim();
  if (!raw) return DEFAULT_AWDB_BASE_URL;
  try {
    const url = new URL(raw);
    return url.toString().replace(/\/+$/, '');
  } catch {
    console.warn(`Ignoring AWDB_BASE_URL=${raw}: not a valid URL`);
    return DEFAULT_AWDB_BASE_URL;
  }
}

// Read pipeline options from the environment. Invalid values fall back to
// their defaults with a warning rather than failing startup.
export function loadConfig(env: Env = process.env): PipelineConfig {
  return {
    searchK: parseIntInRange(env, 'SCAN_SEARCH_K', 1, 10, DEFAULT_SEARCH_K),
    historyWindowYears: parseIntInRange(env, 'SCAN_HISTORY_YEARS', 1, 30, DEFAULT_HISTORY_YEARS),
    searchRadiusMiles: parseRadius(env),
    network: env.SCAN_NETWORK?.trim().toUpperCase() || DEFAULT_NETWORK,
    awdbBaseUrl: parseBaseUrl(env),
    fetchTimeoutMs: parseIntInRange(env, 'AWDB_TIMEOUT_MS', 1000, 120000, DEFAULT_FETCH_TIMEOUT_MS),
    maxRetries: parseIntInRange(env, 'AWDB_MAX_RETRIES', 1, 5, DEFAULT_MAX_RETRIES),
    outlierMethod: 'iqr',
    temperatureUnitOut: 'celsius',
  };
}
