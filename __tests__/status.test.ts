import { describe, it, expect } from 'vitest';
import { formatStatus } from '../src/status.js';
import { StatsCollector } from '../src/stats.js';
import type { HealthPayload } from '../src/health.js';

function makePayload(stats = new StatsCollector()): HealthPayload {
  return {
    ok: true,
    uptime: 42,
    version: '0.1.0',
    providers: ['local', 'cloud'],
    stats: stats.getStats(),
  };
}

describe('formatStatus', () => {
  it('renders the header and relay details', () => {
    const lines = formatStatus(makePayload(), 'http://127.0.0.1:11434').split('\n');
    expect(lines[0]).toBe('Ollama Relay Status');
    expect(lines).toContain('Relay URL:      http://127.0.0.1:11434');
    expect(lines).toContain('Healthy:        Yes');
    expect(lines).toContain('Uptime:         42s');
    expect(lines).toContain('Providers:      local, cloud');
  });

  it('includes request counts and latency', () => {
    const stats = new StatsCollector();
    const now = Date.now();
    stats.recordRequest({ timestamp: now, latencyMs: 100, provider: 'local', status: 200, streamed: true, success: true });
    stats.recordRequest({ timestamp: now, latencyMs: 50, provider: 'cloud', status: 502, streamed: false, success: false });

    const lines = formatStatus(makePayload(stats), 'http://127.0.0.1:11434').split('\n');
    expect(lines).toContain('Total:          2');
    expect(lines).toContain('Failed:         1');
    expect(lines).toContain('Streamed:       1');
    expect(lines).toContain('Average:        75ms');
    expect(lines).toContain('local           1 (0 failed)');
    expect(lines).toContain('cloud           1 (1 failed)');
  });

  it('omits the per-provider section with no traffic', () => {
    const output = formatStatus(makePayload(), 'http://127.0.0.1:11434');
    expect(output).not.toContain('By provider');
  });
});
