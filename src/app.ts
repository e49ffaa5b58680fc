import { fileURLToPath } from 'node:url';
import logger, { setLogLevel } from './logger.js';
import metricsModule, { MetricsRegistry } from './metrics/index.js';
import {
  loadConfigFromFile,
  loadExporterConfig,
  type PrtgExporterConfig
} from './config/index.js';
import { PrtgClient, type PrtgClientOptions } from './prtg/index.js';
import { RefreshOrchestrator } from './exporter/orchestrator.js';
import { startRefreshTask, type RefreshTask } from './tasks/refresh.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import type { SensorSource } from './types.js';

export interface BootstrapOptions {
  config?: PrtgExporterConfig;
  metrics?: MetricsRegistry;
  /** Replaces the PRTG client, e.g. with an in-process fake. */
  source?: SensorSource;
  client?: PrtgClientOptions;
}

export interface ExporterRuntime {
  config: PrtgExporterConfig;
  http: HttpServerRuntime;
  task: RefreshTask;
  orchestrator: RefreshOrchestrator;
  stop: () => Promise<void>;
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<ExporterRuntime> {
  const exporterConfig = options.config ?? loadExporterConfig();
  const metrics = options.metrics ?? metricsModule;

  if (exporterConfig.logging.level !== logger.level) {
    setLogLevel(exporterConfig.logging.level);
  }

  logger.info(
    {
      server: exporterConfig.prtg.server,
      username: exporterConfig.prtg.username,
      refreshIntervalSeconds: exporterConfig.exporter.refreshIntervalSeconds
    },
    'PRTG exporter starting'
  );

  const source = options.source ?? new PrtgClient(exporterConfig.prtg, options.client);
  const orchestrator = new RefreshOrchestrator({
    source,
    metrics,
    staleAfterCycles: exporterConfig.exporter.staleAfterCycles
  });

  const http = await startHttpServer({
    port: exporterConfig.exporter.port,
    host: exporterConfig.exporter.host,
    metricsPath: exporterConfig.exporter.metricsPath,
    metrics
  });

  const task = startRefreshTask({
    orchestrator,
    intervalMs: exporterConfig.exporter.refreshIntervalSeconds * 1000,
    overlapPolicy: exporterConfig.exporter.overlapPolicy,
    metrics
  });

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (!stopping) {
      stopping = (async () => {
        logger.info('PRTG exporter stopping');
        await task.stop();
        await http.close();
      })();
    }
    return stopping;
  };

  return { config: exporterConfig, http, task, orchestrator, stop };
}

export function resolveConfigPath(argv: string[]): string | null {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--config' || token === '-c') {
      const next = argv[index + 1];
      if (!next) {
        throw new Error(`Missing value for ${token}`);
      }
      return next;
    }
    if (token?.startsWith('--config=')) {
      const value = token.slice('--config='.length);
      if (!value) {
        throw new Error('Missing value for --config');
      }
      return value;
    }
  }
  return null;
}

async function main(argv: string[]) {
  const configPath = resolveConfigPath(argv);
  const runtime = await bootstrap({
    config: configPath ? loadConfigFromFile(configPath) : undefined
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    runtime
      .stop()
      .catch(error => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main(process.argv.slice(2)).catch(error => {
    logger.error({ err: error }, 'PRTG exporter failed to start');
    process.exitCode = 1;
  });
}
