/**
 * Health endpoint handler + active health probe.
 * @packageDocumentation
 */

import * as http from 'node:http';
import { z } from 'zod';
import type { StatsSnapshot } from './stats.js';

export interface HealthPayload {
  ok: boolean;
  /** Seconds since the relay started */
  uptime: number;
  version: string;
  /** Configured provider names, in config order */
  providers: string[];
  stats: StatsSnapshot;
}

const ProviderStatsSchema = z.object({ requests: z.number(), failed: z.number() });

const HealthPayloadSchema = z.object({
  ok: z.boolean(),
  uptime: z.number(),
  version: z.string(),
  providers: z.array(z.string()),
  stats: z.object({
    totalRequests: z.number(),
    successfulRequests: z.number(),
    failedRequests: z.number(),
    streamedRequests: z.number(),
    avgLatencyMs: z.number(),
    p50LatencyMs: z.number(),
    p95LatencyMs: z.number(),
    p99LatencyMs: z.number(),
    providers: z.record(ProviderStatsSchema),
  }),
});

/**
 * Handle GET /health on the relay server.
 */
export function handleHealthRequest(res: http.ServerResponse, payload: HealthPayload): void {
  const body = JSON.stringify(payload);
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

/**
 * Probe a relay's /health endpoint.
 * Resolves the payload if healthy, null on any error/timeout.
 */
export function probeHealth(relayUrl: string, timeoutMs = 2000): Promise<HealthPayload | null> {
  const url = new URL('/health', relayUrl);
  return new Promise((resolve) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      let data = '';
      res.on('data', (c: Buffer) => (data += c.toString('utf-8')));
      res.on('end', () => {
        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch {
          resolve(null);
          return;
        }
        const parsed = HealthPayloadSchema.safeParse(json);
        resolve(parsed.success && parsed.data.ok ? parsed.data : null);
      });
    });
    req.on('error', () => resolve(null));
    req.on('timeout', () => {
      req.destroy();
      resolve(null);
    });
  });
}
