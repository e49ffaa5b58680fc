import { afterEach, describe, expect, it } from 'vitest';
import { startHttpServer, type HttpServerRuntime } from '../src/server/http.js';
import {
  PROMETHEUS_CONTENT_TYPE,
  SENSOR_VALUE_METRIC,
  createMetricsRegistry
} from '../src/metrics/index.js';

describe('metrics HTTP endpoint', () => {
  let runtime: HttpServerRuntime | null = null;

  afterEach(async () => {
    await runtime?.close();
    runtime = null;
  });

  async function start(metricsPath?: string, host: string | undefined = '127.0.0.1') {
    const metrics = createMetricsRegistry();
    metrics.setSensorValue(
      { sensor_id: '100', device: 'web-01', sensor: 'CPU Load', probe: 'Local Probe', group: 'Servers' },
      12
    );
    runtime = await startHttpServer({ port: 0, host, metricsPath, metrics });
    return { metrics, baseUrl: `http://127.0.0.1:${runtime.port}` };
  }

  it('serves the exposition text on the metrics path', async () => {
    const { metrics, baseUrl } = await start();

    const response = await fetch(`${baseUrl}/metrics`);
    const body = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe(PROMETHEUS_CONTENT_TYPE);
    expect(body).toBe(metrics.snapshot());
    expect(body.split('\n')).toContain(
      `${SENSOR_VALUE_METRIC}{sensor_id="100",device="web-01",sensor="CPU Load",probe="Local Probe",group="Servers"} 12`
    );
  });

  it('ignores the query string and the request method', async () => {
    const { metrics, baseUrl } = await start();

    const response = await fetch(`${baseUrl}/metrics?debug=1`, { method: 'POST' });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe(metrics.snapshot());
  });

  it('answers HEAD with headers only', async () => {
    const { metrics, baseUrl } = await start();

    const response = await fetch(`${baseUrl}/metrics`, { method: 'HEAD' });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-length')).toBe(
      String(Buffer.byteLength(metrics.snapshot()))
    );
    expect(await response.text()).toBe('');
  });

  it('returns 404 for any other path', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('listens on every interface when no host is given', async () => {
    const { baseUrl } = await start(undefined, '');

    const response = await fetch(`${baseUrl}/metrics`);
    await response.text();

    expect(response.status).toBe(200);
    const address = runtime?.server.address();
    expect(typeof address === 'object' && address !== null ? address.address : null).toMatch(
      /^(::|0\.0\.0\.0)$/
    );
  });

  it('serves a custom metrics path', async () => {
    const { baseUrl } = await start('/prtg');

    const custom = await fetch(`${baseUrl}/prtg`);
    await custom.text();
    const fallback = await fetch(`${baseUrl}/metrics`);
    await fallback.text();

    expect(custom.status).toBe(200);
    expect(fallback.status).toBe(404);
  });
});
