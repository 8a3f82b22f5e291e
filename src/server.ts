/**
 * Ollama Relay Server
 *
 * Local HTTP server that speaks the Ollama and OpenAI APIs. Catalog and
 * liveness endpoints are answered locally; model-bearing requests are routed
 * to their provider and relayed back.
 *
 * Each request is handled on its own; no state is shared between requests
 * except the read-only provider registry and the stats collector.
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { nanoid } from 'nanoid';
import { RelayError, RoutingError, errorMessage, toErrorBody } from './errors.js';
import { handleHealthRequest, type HealthPayload } from './health.js';
import { type Logger, defaultLogger } from './logger.js';
import { type FetchFn, type RelayResult, createResponseSink, relay } from './relay.js';
import { dialectOf, route } from './router.js';
import type { ProviderRegistry } from './routing/registry.js';
import { StatsCollector } from './stats.js';
import type { Dialect, OutboundCall, RelayConfig, TimeoutConfig } from './types.js';

/** Largest accepted request body */
export const MAX_BODY_BYTES = 10 * 1024 * 1024;

const DEFAULT_TIMEOUTS: TimeoutConfig = {
  connectMs: 10_000,
  idleMs: 120_000,
  drainMs: 30_000,
};

/**
 * Relay server configuration
 */
export interface RelayServerConfig {
  registry: ProviderRegistry;
  /** Port to listen on, 0 for any free port (default: 11434) */
  port?: number;
  /** Host to bind to (default: 127.0.0.1) */
  host?: string;
  /** Reported on GET /api/version (default: 0.6.0) */
  ollamaVersion?: string;
  /** Relay version reported on GET /health */
  version?: string;
  timeouts?: Partial<TimeoutConfig>;
  logger?: Logger;
  /** Fetch used for upstream calls (default: global fetch) */
  fetch?: FetchFn;
  stats?: StatsCollector;
  maxBodyBytes?: number;
}

export class RelayServer {
  private server: http.Server | null = null;
  private stopping = false;
  private activeRequests = 0;
  private readonly registry: ProviderRegistry;
  private readonly port: number;
  private readonly host: string;
  private readonly ollamaVersion: string;
  private readonly version: string;
  private readonly timeouts: TimeoutConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn | undefined;
  private readonly stats: StatsCollector;
  private readonly maxBodyBytes: number;
  private readonly startedAt = Date.now();

  constructor(config: RelayServerConfig) {
    this.registry = config.registry;
    this.port = config.port ?? 11434;
    this.host = config.host ?? '127.0.0.1';
    this.ollamaVersion = config.ollamaVersion ?? '0.6.0';
    this.version = config.version ?? '0.0.0';
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...config.timeouts };
    this.logger = config.logger ?? defaultLogger;
    this.fetchFn = config.fetch;
    this.stats = config.stats ?? new StatsCollector();
    this.maxBodyBytes = config.maxBodyBytes ?? MAX_BODY_BYTES;
  }

  static fromConfig(
    config: RelayConfig,
    registry: ProviderRegistry,
    extra: Pick<RelayServerConfig, 'logger' | 'fetch' | 'stats' | 'version'> = {}
  ): RelayServer {
    return new RelayServer({
      registry,
      port: config.port,
      host: config.host,
      ollamaVersion: config.ollamaVersion,
      timeouts: config.timeouts,
      ...extra,
    });
  }

  /** Bound address, null when not listening. */
  get address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr !== 'string' ? addr : null;
  }

  /** Number of requests currently being handled. */
  get inFlight(): number {
    return this.activeRequests;
  }

  /**
   * Start the relay server
   */
  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Relay server is already running');
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error(`Unhandled error: ${errorMessage(err)}`);
        if (!res.headersSent) {
          this.sendError(res, new RelayError('internal_error', 'Internal relay error'), 'ollama');
        } else {
          res.end();
        }
      });
    });
    // The idle timeout covers long generations; Node's defaults would cut them off.
    server.requestTimeout = 0;
    server.headersTimeout = 60_000;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.stopping = false;
    const address = this.address;
    if (!address) {
      throw new Error('Relay server is not bound to a TCP address');
    }
    this.logger.info(`Ollama Relay listening on http://${address.address}:${address.port}`);
    return address;
  }

  /**
   * Stop accepting connections, let in-flight requests finish for up to
   * `drainMs`, then close whatever is left.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.stopping = true;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    server.closeIdleConnections();

    if (this.activeRequests > 0) {
      this.logger.info(`Draining ${this.activeRequests} in-flight request(s)`);
    }
    const forceClose = setTimeout(() => {
      this.logger.warn(`Drain timed out after ${this.timeouts.drainMs}ms, closing remaining connections`);
      server.closeAllConnections();
    }, this.timeouts.drainMs);
    forceClose.unref();

    await closed;
    clearTimeout(forceClose);
    this.server = null;
    this.logger.info('Relay server stopped');
  }

  /**
   * Health payload served on GET /health
   */
  getHealth(): HealthPayload {
    return {
      ok: true,
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      version: this.version,
      providers: this.registry.list().map((p) => p.name),
      stats: this.stats.getStats(),
    };
  }

  /**
   * Handle incoming request
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = nanoid(10);
    const startedAt = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://relay.local');
    const dialect = dialectOf(url.pathname);

    res.setHeader('X-Request-Id', requestId);
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, HEAD, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (this.stopping) {
      res.setHeader('Connection', 'close');
    }

    if (this.handleLocal(method, url.pathname, res)) {
      this.logger.debug(`${method} ${url.pathname} ${res.statusCode} (local) [${requestId}]`);
      return;
    }

    this.activeRequests++;
    let call: OutboundCall | null = null;
    try {
      const body = await this.readBody(req);
      call = route({ method, path: req.url ?? '/', headers: req.headers, body }, this.registry);

      const result = await relay(call, createResponseSink(res, { idleTimeoutMs: this.timeouts.idleMs }), {
        fetch: this.fetchFn,
        connectTimeoutMs: this.timeouts.connectMs,
        idleTimeoutMs: this.timeouts.idleMs,
        logger: this.logger,
        requestId,
      });
      this.recordRelay(call, result, startedAt, requestId);
    } catch (err) {
      const relayError =
        err instanceof RelayError ? err : new RelayError('internal_error', 'Internal relay error', { cause: err });
      if (!(err instanceof RelayError)) {
        this.logger.error(`Unhandled error: ${errorMessage(err)} [${requestId}]`);
      }
      this.sendError(res, relayError, dialect);
      this.recordFailure(method, url.pathname, call, relayError, startedAt, requestId);
    } finally {
      this.activeRequests--;
      if (this.stopping) this.server?.closeIdleConnections();
    }
  }

  /**
   * Endpoints answered without any upstream call.
   * Returns false when the request must be routed.
   */
  private handleLocal(method: string, pathname: string, res: http.ServerResponse): boolean {
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return true;
    }
    if (method !== 'GET' && method !== 'HEAD') return false;

    switch (pathname) {
      case '/':
        res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
        res.end('Ollama is running');
        return true;
      case '/health':
        handleHealthRequest(res, this.getHealth());
        return true;
      case '/api/version':
        this.sendJson(res, 200, { version: this.ollamaVersion });
        return true;
      case '/api/tags':
        this.sendJson(res, 200, { models: this.ollamaModelList() });
        return true;
      case '/api/ps':
        this.sendJson(res, 200, { models: [] });
        return true;
      case '/v1/models':
        this.sendJson(res, 200, { object: 'list', data: this.openAIModelList() });
        return true;
      default:
        return false;
    }
  }

  private ollamaModelList(): Record<string, unknown>[] {
    const modifiedAt = new Date(this.startedAt).toISOString();
    return this.registry.listTaggedModels().map((m) => ({
      name: m.tagged,
      model: m.tagged,
      modified_at: modifiedAt,
      size: 0,
      digest: '',
      details: {
        parent_model: '',
        format: '',
        family: m.provider.name,
        families: [m.provider.name],
        parameter_size: '',
        quantization_level: '',
      },
    }));
  }

  private openAIModelList(): Record<string, unknown>[] {
    const created = Math.floor(this.startedAt / 1000);
    return this.registry.listTaggedModels().map((m) => ({
      id: m.tagged,
      object: 'model',
      created,
      owned_by: m.provider.name,
    }));
  }

  private recordRelay(call: OutboundCall, result: RelayResult, startedAt: number, requestId: string): void {
    const latencyMs = Date.now() - startedAt;
    const success = result.outcome === 'completed' && result.status > 0 && result.status < 400;
    this.stats.recordRequest({
      timestamp: startedAt,
      latencyMs,
      provider: call.provider.name,
      status: result.status,
      streamed: result.mode !== 'buffered',
      success,
    });

    const detail = result.outcome === 'completed' ? '' : `, ${result.outcome.replace('_', ' ')}`;
    const line =
      `${success ? '✓' : '✗'} ${call.taggedModel} → ${call.provider.name}/${call.nativeModel} ` +
      `${result.status} (${result.mode}, ${result.units} units${detail}) ${latencyMs}ms [${requestId}]`;
    if (success) {
      this.logger.info(line);
    } else {
      this.logger.warn(line);
    }
  }

  private recordFailure(
    method: string,
    pathname: string,
    call: OutboundCall | null,
    err: RelayError,
    startedAt: number,
    requestId: string
  ): void {
    const latencyMs = Date.now() - startedAt;
    const provider = err instanceof RoutingError ? null : (call?.provider.name ?? null);
    this.stats.recordRequest({
      timestamp: startedAt,
      latencyMs,
      provider,
      status: err.status,
      streamed: false,
      success: false,
    });

    const target = call ? `${call.taggedModel} → ${call.provider.name}/${call.nativeModel}` : `${method} ${pathname}`;
    this.logger.warn(`✗ ${target} ${err.status} ${err.code}: ${err.message} ${latencyMs}ms [${requestId}]`);
  }

  /**
   * Read request body, capped at maxBodyBytes
   */
  private readBody(req: http.IncomingMessage): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;

      const onData = (chunk: Buffer) => {
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          req.off('data', onData);
          req.resume();
          reject(new RoutingError('payload_too_large', `Request body exceeds ${this.maxBodyBytes} bytes`));
          return;
        }
        chunks.push(chunk);
      };

      req.on('data', onData);
      req.on('end', () => resolve(Buffer.concat(chunks)));
      req.on('error', reject);
    });
  }

  private sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
    const body = JSON.stringify(payload);
    res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
    res.end(body);
  }

  /**
   * Send error response in the caller's dialect.
   * Once headers are out the response can only be ended.
   */
  private sendError(res: http.ServerResponse, err: RelayError, dialect: Dialect): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    if (err.code === 'payload_too_large') {
      res.setHeader('Connection', 'close');
    }
    this.sendJson(res, err.status, toErrorBody(err, dialect));
  }
}
