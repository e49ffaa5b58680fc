import type { Sensor } from '../types.js';
import { ApiClient, ApiRequestError } from './apiClient.js';
import { parseNumber } from './numeric.js';
import {
  buildTableUrl,
  readObjectId,
  readText,
  TableResponse,
  type Credentials,
  type TableRow
} from './table.js';

export const SENSOR_PAGE_SIZE = 10_000;

export const SENSOR_COLUMNS = [
  'objid',
  'device',
  'probe',
  'group',
  'sensor',
  'lastvalue',
  'lastvalue_'
] as const;

export interface SensorFetcherOptions {
  client: ApiClient;
  server: string;
  credentials: Credentials;
}

export class SensorFetcher {
  private readonly client: ApiClient;
  private readonly url: URL;

  constructor(options: SensorFetcherOptions) {
    this.client = options.client;
    this.url = buildTableUrl(
      options.server,
      { content: 'sensors', columns: SENSOR_COLUMNS, count: SENSOR_PAGE_SIZE },
      options.credentials
    );
  }

  async fetchSensors(signal?: AbortSignal): Promise<Sensor[]> {
    const response = await this.client.send(
      () => new Request(this.url, { method: 'GET', headers: { accept: 'application/json' } }),
      signal
    );
    const text = await response.text();
    if (!response.ok) {
      throw new ApiRequestError(response.status, 'sensors');
    }

    const sensors: Sensor[] = [];
    for (const row of TableResponse.parse(text, 'sensors').items) {
      const sensor = toSensor(row);
      if (sensor) {
        sensors.push(sensor);
      }
    }
    return sensors;
  }
}

export function toSensor(row: TableRow): Sensor | null {
  const id = readObjectId(row);
  if (id === null) {
    return null;
  }

  const lastValue = readText(row, 'lastvalue');
  const lastValueAlt = readText(row, 'lastvalue_');
  return {
    id,
    device: readText(row, 'device'),
    probe: readText(row, 'probe'),
    group: readText(row, 'group'),
    name: readText(row, 'sensor'),
    lastValue,
    lastValueAlt,
    value: parseNumber(lastValue) ?? parseNumber(lastValueAlt)
  };
}
