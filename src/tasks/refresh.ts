import loggerModule from '../logger.js';
import metricsModule, {
  MetricsRegistry,
  REFRESH_DURATION_METRIC,
  REFRESH_SKIPPED_METRIC,
  REFRESH_SUCCESS_METRIC,
  REFRESH_TOTAL_METRIC
} from '../metrics/index.js';
import type { OverlapPolicy } from '../config/index.js';
import type { RefreshSummary } from '../exporter/orchestrator.js';

type RefreshLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

export interface Refreshable {
  refresh(signal?: AbortSignal): Promise<RefreshSummary>;
}

export interface RefreshTaskOptions {
  orchestrator: Refreshable;
  intervalMs: number;
  overlapPolicy?: OverlapPolicy;
  logger?: RefreshLogger;
  metrics?: MetricsRegistry;
}

export type RefreshRunResult =
  | { status: 'completed'; summary: RefreshSummary }
  | { status: 'cancelled'; summary: RefreshSummary | null }
  | { status: 'failed'; error: unknown }
  | { status: 'skipped' };

/**
 * Runs the orchestrator once on start and then once per interval. Runs never
 * overlap, and a failed run is logged without stopping the schedule.
 */
export class RefreshTask {
  private readonly orchestrator: Refreshable;
  private readonly intervalMs: number;
  private readonly overlapPolicy: OverlapPolicy;
  private readonly logger: RefreshLogger;
  private readonly metrics: MetricsRegistry;
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<RefreshRunResult> | null = null;
  private stopped = false;

  constructor(options: RefreshTaskOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`Refresh interval must be positive (received ${options.intervalMs})`);
    }
    this.orchestrator = options.orchestrator;
    this.intervalMs = options.intervalMs;
    this.overlapPolicy = options.overlapPolicy ?? 'skip';
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  start() {
    if (this.timer || this.inFlight) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort(new Error('Refresh task stopped'));
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /** Runs one refresh now unless one is already in flight. */
  runNow(): Promise<RefreshRunResult> {
    if (this.inFlight) {
      this.metrics.increment(REFRESH_SKIPPED_METRIC);
      return Promise.resolve({ status: 'skipped' });
    }

    const run = this.execute().finally(() => {
      this.inFlight = null;
      this.controller = null;
    });
    this.inFlight = run;
    return run;
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick() {
    const startedAt = Date.now();
    await this.runNow();
    this.scheduleNext(this.nextDelay(Date.now() - startedAt));
  }

  private nextDelay(elapsedMs: number): number {
    if (elapsedMs <= this.intervalMs) {
      return Math.max(0, this.intervalMs - elapsedMs);
    }

    const missed = Math.floor(elapsedMs / this.intervalMs);
    if (this.overlapPolicy === 'queue') {
      this.logger.warn({ elapsedMs, intervalMs: this.intervalMs }, 'Refresh overran its interval');
      return 0;
    }

    this.metrics.increment(REFRESH_SKIPPED_METRIC, [], missed);
    this.logger.warn(
      { elapsedMs, intervalMs: this.intervalMs, skipped: missed },
      'Refresh overran its interval, skipping ticks'
    );
    return this.intervalMs - (elapsedMs % this.intervalMs);
  }

  private async execute(): Promise<RefreshRunResult> {
    const controller = new AbortController();
    this.controller = controller;

    try {
      const summary = await this.orchestrator.refresh(controller.signal);
      if (summary.cancelled) {
        this.metrics.increment(REFRESH_TOTAL_METRIC, ['cancelled']);
        return { status: 'cancelled', summary };
      }

      this.metrics.increment(REFRESH_TOTAL_METRIC, ['success']);
      this.metrics.set(REFRESH_DURATION_METRIC, [], summary.durationMs / 1000);
      this.metrics.set(REFRESH_SUCCESS_METRIC, [], Math.floor(Date.now() / 1000));
      this.logger.info(
        {
          sensors: summary.sensors,
          sensorSamples: summary.sensorSamples,
          channelSamples: summary.channelSamples,
          failedSensors: summary.failedSensors.length,
          evictedSamples: summary.evictedSamples,
          durationMs: summary.durationMs
        },
        'Refresh completed'
      );
      return { status: 'completed', summary };
    } catch (error) {
      if (controller.signal.aborted) {
        this.metrics.increment(REFRESH_TOTAL_METRIC, ['cancelled']);
        return { status: 'cancelled', summary: null };
      }
      this.metrics.increment(REFRESH_TOTAL_METRIC, ['failure']);
      this.logger.error({ err: error }, 'Refresh failed');
      return { status: 'failed', error };
    }
  }
}

export function startRefreshTask(options: RefreshTaskOptions): RefreshTask {
  const task = new RefreshTask(options);
  task.start();
  return task;
}
