import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { handleHealthRequest, probeHealth, type HealthPayload } from '../src/health.js';
import { StatsCollector } from '../src/stats.js';
import { closeServer, createMockServer, type MockServer } from './helpers.js';

function payload(ok = true): HealthPayload {
  return {
    ok,
    uptime: 12,
    version: '0.1.0',
    providers: ['local', 'cloud'],
    stats: new StatsCollector().getStats(),
  };
}

describe('Health endpoint', () => {
  let mock: MockServer;
  let nextPayload: HealthPayload = payload();

  beforeAll(async () => {
    mock = await createMockServer((req, res) => {
      if (req.url === '/health') {
        handleHealthRequest(res, nextPayload);
      } else {
        res.writeHead(404);
        res.end('not json');
      }
    });
  });

  afterAll(async () => {
    await closeServer(mock.server);
  });

  it('serves the payload as JSON', async () => {
    const res = await fetch(`${mock.url}/health`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual(payload());
  });

  it('probeHealth returns the payload for a healthy relay', async () => {
    nextPayload = payload();
    expect(await probeHealth(mock.url)).toEqual(payload());
  });

  it('probeHealth returns null when the relay reports not ok', async () => {
    nextPayload = payload(false);
    expect(await probeHealth(mock.url)).toBeNull();
    nextPayload = payload();
  });

  it('probeHealth returns null for an unreachable relay', async () => {
    const closed = await createMockServer(() => {});
    await closeServer(closed.server);

    expect(await probeHealth(closed.url, 500)).toBeNull();
  });
});
