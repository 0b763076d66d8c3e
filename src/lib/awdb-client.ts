import { z } from 'zod';
import { DataSourceError, toDataSourceError } from './errors';
import { DEFAULT_AWDB_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_MAX_RETRIES } from './config';
import { SENSORS } from './sensors';
import type { DateWindow, SensorKind, StationDataSource } from './types';

// The station list is several thousand records; give it longer than a series
const STATION_LIST_TIMEOUT_MS = 30000;

export interface AwdbClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Fetch `url` and read its body with `read`, under one timeout per attempt.
 * The abort timer stays armed until `read` settles, so a stalled body times
 * out like a stalled connection. Failed attempts are retried after
 * `backoffMs * 2^attempt`.
 */
export async function fetchWithTimeoutAndRetry<T>(
  url: string,
  read: (response: Response) => Promise<T>,
  options: RequestInit & { timeoutMs?: number } = {},
  retries: number = DEFAULT_MAX_RETRIES,
  backoffMs: number = 500,
  fetchImpl: typeof fetch = fetch
): Promise<T> {
  const { timeoutMs = DEFAULT_FETCH_TIMEOUT_MS, ...init } = options;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < retries; attempt++) {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(new Error(`Timed out after ${timeoutMs}ms`)), {
        once: true,
      });
    });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([
        fetchImpl(url, { ...init, signal: controller.signal }).then(read),
        timedOut,
      ]);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (controller.signal.aborted) {
        lastError = new Error(`Timed out after ${timeoutMs}ms`, { cause: error });
      }
    } finally {
      clearTimeout(timeoutId);
    }

    if (attempt < retries - 1) {
      await new Promise((resolve) => setTimeout(resolve, backoffMs * Math.pow(2, attempt)));
    }
  }

  throw lastError || new Error('Fetch failed after retries');
}

interface RawBody {
  ok: boolean;
  status: number;
  text: string;
}

// Error statuses are returned, not thrown, so they are not retried
async function readBody(response: Response): Promise<RawBody> {
  if (!response.ok) {
    await response.body?.cancel();
    return { ok: false, status: response.status, text: '' };
  }
  return { ok: true, status: response.status, text: await response.text() };
}

// /data returns one entry per station triplet, each with one block per element
const DataEnvelopeSchema = z.array(
  z.object({
    stationTriplet: z.string().optional(),
    data: z
      .array(
        z.object({
          values: z.array(z.unknown()).optional(),
        })
      )
      .optional(),
  })
);

/**
 * Client for the USDA AWDB REST API. Returns station records and daily
 * observation values as received; callers validate individual records.
 */
export class AwdbClient implements StationDataSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AwdbClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_AWDB_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoffMs = options.backoffMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchStations(): Promise<unknown> {
    const params = new URLSearchParams({ format: 'json' });
    const url = `${this.baseUrl}/stations?${params.toString()}`;
    const payload = await this.getJson(url, 'station list', Math.max(this.timeoutMs, STATION_LIST_TIMEOUT_MS));
    if (!Array.isArray(payload)) {
      throw new DataSourceError('Station list payload is not an array', 'station list');
    }
    return payload;
  }

  async fetchObservations(
    stationId: string,
    sensorKind: SensorKind,
    window: DateWindow
  ): Promise<unknown> {
    const params = new URLSearchParams({
      stationTriplets: stationId,
      elements: SENSORS[sensorKind].elementCode,
      duration: 'DAILY',
      beginDate: window.begin,
      endDate: window.end,
      periodRef: 'END',
      centralTendencyType: 'NONE',
      returnFlags: 'false',
      returnOriginalValues: 'false',
      returnSuspectData: 'false',
      format: 'json',
    });
    const resource = `${stationId} ${sensorKind}`;
    const url = `${this.baseUrl}/data?${params.toString()}`;
    const payload = await this.getJson(url, resource, this.timeoutMs);

    const envelope = DataEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new DataSourceError(`Malformed data payload for ${resource}`, resource, {
        cause: envelope.error,
      });
    }

    // No station entry or no element block: the sensor has no data in range
    return envelope.data[0]?.data?.[0]?.values ?? [];
  }

  private async getJson(url: string, resource: string, timeoutMs: number): Promise<unknown> {
    let body: RawBody;
    try {
      body = await fetchWithTimeoutAndRetry(
        url,
        readBody,
        { headers: { Accept: 'application/json' }, timeoutMs },
        this.maxRetries,
        this.backoffMs,
        this.fetchImpl
      );
    } catch (error) {
      throw toDataSourceError(error, resource);
    }

    if (!body.ok) {
      throw new DataSourceError(`AWDB returned ${body.status} for ${resource}`, resource);
    }

    try {
      const payload: unknown = JSON.parse(body.text);
      return payload;
    } catch (error) {
      throw new DataSourceError(`AWDB returned invalid JSON for ${resource}`, resource, { cause: error });
    }
  }
}
