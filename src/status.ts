/**
 * Status Reporter for Ollama Relay
 * @packageDocumentation
 */

import type { HealthPayload } from './health.js';

/**
 * Render a running relay's health payload for the terminal.
 */
export function formatStatus(payload: HealthPayload, relayUrl: string): string {
  const s = payload.stats;
  const lines = [
    `Ollama Relay Status`,
    `═══════════════════`,
    `Relay URL:      ${relayUrl}`,
    `Healthy:        ${payload.ok ? 'Yes' : 'No'}`,
    `Version:        ${payload.version}`,
    `Uptime:         ${payload.uptime}s`,
    `Providers:      ${payload.providers.join(', ')}`,
    ``,
    `Requests (last hour)`,
    `────────────────────`,
    `Total:          ${s.totalRequests}`,
    `Successful:     ${s.successfulRequests}`,
    `Failed:         ${s.failedRequests}`,
    `Streamed:       ${s.streamedRequests}`,
    ``,
    `Latency`,
    `───────`,
    `Average:        ${s.avgLatencyMs}ms`,
    `P50:            ${s.p50LatencyMs}ms`,
    `P95:            ${s.p95LatencyMs}ms`,
    `P99:            ${s.p99LatencyMs}ms`,
  ];

  const perProvider = Object.entries(s.providers);
  if (perProvider.length > 0) {
    lines.push(``, `By provider`, `───────────`);
    for (const [name, counts] of perProvider) {
      lines.push(`${name.padEnd(16)}${counts.requests} (${counts.failed} failed)`);
    }
  }
  return lines.join('\n');
}
