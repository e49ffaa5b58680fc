import type { PrtgConfig } from '../config/index.js';
import type { Channel, Sensor, SensorSource } from '../types.js';
import { ApiClient, type ApiClientOptions } from './apiClient.js';
import { ChannelFetcher } from './channels.js';
import { SensorFetcher } from './sensors.js';

export type PrtgClientOptions = Omit<ApiClientOptions, 'timeoutMs'> & {
  client?: ApiClient;
};

export class PrtgClient implements SensorSource {
  private readonly sensors: SensorFetcher;
  private readonly channels: ChannelFetcher;

  constructor(config: PrtgConfig, options: PrtgClientOptions = {}) {
    const { client: providedClient, ...clientOptions } = options;
    const client =
      providedClient ?? new ApiClient({ ...clientOptions, timeoutMs: config.timeoutMs });
    const credentials = { username: config.username, passhash: config.password };
    this.sensors = new SensorFetcher({ client, server: config.server, credentials });
    this.channels = new ChannelFetcher({ client, server: config.server, credentials });
  }

  fetchSensors(signal?: AbortSignal): Promise<Sensor[]> {
    return this.sensors.fetchSensors(signal);
  }

  fetchChannels(sensorId: number, signal?: AbortSignal): Promise<Channel[]> {
    return this.channels.fetchChannels(sensorId, signal);
  }
}

export { ApiClient, ApiRequestError, ResponseParseError } from './apiClient.js';
export { parseNumber, toRawNumber } from './numeric.js';
