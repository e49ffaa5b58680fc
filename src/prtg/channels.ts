import type { Channel } from '../types.js';
import { ApiClient, ApiRequestError } from './apiClient.js';
import { firstNumber, parseNumber, toRawNumber } from './numeric.js';
import {
  buildTableUrl,
  readObjectId,
  readText,
  TableResponse,
  type Credentials,
  type TableRow
} from './table.js';

export const CHANNEL_PAGE_SIZE = 1_000;

// name and unit are requested as textraw so PRTG skips its display formatting
export const CHANNEL_COLUMNS = [
  'objid',
  'name=textraw',
  'unit=textraw',
  'lastvalue',
  'lastvalue_raw',
  'lastvalue_'
] as const;

export interface ChannelFetcherOptions {
  client: ApiClient;
  server: string;
  credentials: Credentials;
}

export class ChannelFetcher {
  private readonly client: ApiClient;
  private readonly server: string;
  private readonly credentials: Credentials;

  constructor(options: ChannelFetcherOptions) {
    this.client = options.client;
    this.server = options.server;
    this.credentials = options.credentials;
  }

  async fetchChannels(sensorId: number, signal?: AbortSignal): Promise<Channel[]> {
    const url = buildTableUrl(
      this.server,
      { content: 'channels', id: sensorId, columns: CHANNEL_COLUMNS, count: CHANNEL_PAGE_SIZE },
      this.credentials
    );

    const response = await this.client.send(
      () => new Request(url, { method: 'GET', headers: { accept: 'application/json' } }),
      signal
    );
    const text = await response.text();
    if (!response.ok) {
      throw new ApiRequestError(response.status, 'channels');
    }

    return TableResponse.parse(text, 'channels').items.map(row => toChannel(sensorId, row));
  }
}

export function toChannel(sensorId: number, row: TableRow): Channel {
  const lastValue = readText(row, 'lastvalue');
  const lastValueRaw = row.lastvalue_raw;
  const lastValueAlt = readText(row, 'lastvalue_');
  return {
    sensorId,
    id: readObjectId(row),
    name: readText(row, 'name'),
    unit: readText(row, 'unit'),
    lastValue,
    lastValueRaw,
    lastValueAlt,
    value: firstNumber(
      () => toRawNumber(lastValueRaw),
      () => parseNumber(lastValue),
      () => parseNumber(lastValueAlt)
    )
  };
}
