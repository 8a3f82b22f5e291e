/**
 * Stats Collector for Ollama Relay
 *
 * Tracks per-request metrics with a rolling 1-hour window.
 * No external dependencies.
 *
 * @packageDocumentation
 */

export interface RequestRecord {
  timestamp: number;
  latencyMs: number;
  /** Provider the request was routed to, null when routing failed */
  provider: string | null;
  /** Status sent downstream, 0 when the caller left first */
  status: number;
  streamed: boolean;
  success: boolean;
}

export interface ProviderStats {
  requests: number;
  failed: number;
}

export interface StatsSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  streamedRequests: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  providers: Record<string, ProviderStats>;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector {
  private requests: RequestRecord[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /** Record a completed request. */
  recordRequest(record: RequestRecord): void {
    this.requests.push(record);
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const reqs = this.requests;
    const successful = reqs.filter(r => r.success);
    const latencies = reqs.map(r => r.latencyMs).sort((a, b) => a - b);

    const providers: Record<string, ProviderStats> = {};
    for (const r of reqs) {
      if (r.provider === null) continue;
      const entry = providers[r.provider] ?? { requests: 0, failed: 0 };
      entry.requests++;
      if (!r.success) entry.failed++;
      providers[r.provider] = entry;
    }

    return {
      totalRequests: reqs.length,
      successfulRequests: successful.length,
      failedRequests: reqs.length - successful.length,
      streamedRequests: reqs.filter(r => r.streamed).length,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
      providers,
    };
  }

  private prune(): void {
    const cutoff = this.now() - ROLLING_WINDOW_MS;
    this.requests = this.requests.filter(r => r.timestamp >= cutoff);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
