import loggerModule from '../logger.js';
import metricsModule, {
  CHANNEL_FAILURES_METRIC,
  EVICTED_SAMPLES_METRIC,
  MetricsRegistry
} from '../metrics/index.js';
import type { Channel, ChannelLabels, Sensor, SensorLabels, SensorSource } from '../types.js';
import { ConcurrencyLimiter } from '../utils/limiter.js';

export const MAX_CONCURRENT_CHANNEL_CALLS = 6;

type OrchestratorLogger = Pick<typeof loggerModule, 'debug' | 'warn'>;

export interface RefreshOrchestratorOptions {
  source: SensorSource;
  metrics?: MetricsRegistry;
  logger?: OrchestratorLogger;
  /** Evict PRTG samples not refreshed within this many cycles; 0 keeps them forever. */
  staleAfterCycles?: number;
  concurrency?: number;
}

export type RefreshSummary = {
  sensors: number;
  sensorSamples: number;
  channelSamples: number;
  failedSensors: number[];
  evictedSamples: number;
  durationMs: number;
  cancelled: boolean;
};

export function sensorLabels(sensor: Sensor): SensorLabels {
  return {
    sensor_id: String(sensor.id),
    device: sensor.device ?? '',
    sensor: sensor.name ?? '',
    probe: sensor.probe ?? '',
    group: sensor.group ?? ''
  };
}

export function channelLabels(sensor: Sensor, channel: Channel): ChannelLabels {
  return {
    ...sensorLabels(sensor),
    channel: channel.name ?? '',
    unit: channel.unit ?? ''
  };
}

/**
 * One refresh pass: a single sensor listing, then one channel listing per
 * sensor through a bounded limiter. A failing channel fetch only costs that
 * sensor's samples; the previous values stay published.
 */
export class RefreshOrchestrator {
  private readonly source: SensorSource;
  private readonly metrics: MetricsRegistry;
  private readonly logger: OrchestratorLogger;
  private readonly staleAfterCycles: number;
  private readonly concurrency: number;

  constructor(options: RefreshOrchestratorOptions) {
    this.source = options.source;
    this.metrics = options.metrics ?? metricsModule;
    this.logger = options.logger ?? loggerModule;
    this.staleAfterCycles = options.staleAfterCycles ?? 0;
    this.concurrency = options.concurrency ?? MAX_CONCURRENT_CHANNEL_CALLS;
  }

  async refresh(signal?: AbortSignal): Promise<RefreshSummary> {
    const startedAt = Date.now();
    const summary: RefreshSummary = {
      sensors: 0,
      sensorSamples: 0,
      channelSamples: 0,
      failedSensors: [],
      evictedSamples: 0,
      durationMs: 0,
      cancelled: false
    };

    let sensors: Sensor[];
    try {
      sensors = await this.source.fetchSensors(signal);
    } catch (error) {
      if (signal?.aborted) {
        return this.finish(summary, startedAt, true);
      }
      throw error;
    }

    this.metrics.beginCycle();
    summary.sensors = sensors.length;

    for (const sensor of sensors) {
      if (sensor.value !== null) {
        this.metrics.setSensorValue(sensorLabels(sensor), sensor.value);
        summary.sensorSamples += 1;
      }
    }

    const limiter = new ConcurrencyLimiter(this.concurrency);
    await Promise.all(
      sensors.map(sensor =>
        limiter
          .run(() => this.source.fetchChannels(sensor.id, signal), signal)
          .then(channels => {
            summary.channelSamples += this.publishChannels(sensor, channels);
          })
          .catch((error: unknown) => {
            if (signal?.aborted) {
              return;
            }
            summary.failedSensors.push(sensor.id);
            this.metrics.increment(CHANNEL_FAILURES_METRIC);
            this.logger.warn({ err: error, sensorId: sensor.id }, 'Failed to fetch channels for sensor');
          })
      )
    );

    if (signal?.aborted) {
      return this.finish(summary, startedAt, true);
    }

    if (this.staleAfterCycles > 0) {
      summary.evictedSamples = this.metrics.evictStale(this.staleAfterCycles);
      if (summary.evictedSamples > 0) {
        this.metrics.increment(EVICTED_SAMPLES_METRIC, [], summary.evictedSamples);
        this.logger.debug({ evicted: summary.evictedSamples }, 'Evicted stale PRTG samples');
      }
    }

    return this.finish(summary, startedAt, false);
  }

  private publishChannels(sensor: Sensor, channels: Channel[]): number {
    let written = 0;
    for (const channel of channels) {
      if (channel.value === null) {
        continue;
      }
      this.metrics.setChannelValue(channelLabels(sensor, channel), channel.value);
      written += 1;
    }
    return written;
  }

  private finish(summary: RefreshSummary, startedAt: number, cancelled: boolean): RefreshSummary {
    summary.cancelled = cancelled;
    summary.durationMs = Date.now() - startedAt;
    return summary;
  }
}
