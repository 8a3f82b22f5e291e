/**
 * Stream Relay
 *
 * Performs one upstream call and copies its response back to the local
 * caller. Streamed bodies go through an explicit read → write loop: one
 * upstream chunk becomes one downstream write, in arrival order, with the next
 * read only issued once the previous write has drained.
 *
 * Cancellation is explicit: a downstream close aborts the upstream fetch and
 * cancels its body reader.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import { OpenAIStreamTranslator, fromOpenAICompletion } from './bridge/ollama-openai.js';
import { UpstreamUnreachableError, errorMessage } from './errors.js';
import { parseJsonObject } from './json.js';
import { type Logger, defaultLogger } from './logger.js';
import type { BridgeEndpoint, OutboundCall } from './types.js';

// ============================================================================
// Downstream sink
// ============================================================================

/**
 * The local caller's side of a relay.
 */
export interface DownstreamSink {
  readonly headersSent: boolean;
  writeHead(status: number, headers: Record<string, string>): void;
  /** Resolves once the sink can take more data. */
  write(chunk: Uint8Array | string): Promise<void>;
  end(chunk?: Uint8Array | string): void;
  /** Registers a close listener; returns its remover. */
  onClose(listener: () => void): () => void;
}

export interface ResponseSinkOptions {
  /** Max wait for a blocked write to drain before the response is destroyed (default: 120000) */
  idleTimeoutMs?: number;
}

/**
 * Adapt an http.ServerResponse to a DownstreamSink.
 */
export function createResponseSink(res: http.ServerResponse, opts: ResponseSinkOptions = {}): DownstreamSink {
  const idleTimeoutMs = opts.idleTimeoutMs ?? 120_000;

  return {
    get headersSent() {
      return res.headersSent;
    },
    writeHead(status, headers) {
      res.writeHead(status, headers);
    },
    write(chunk) {
      if (res.destroyed || res.writableEnded) return Promise.resolve();
      if (res.write(chunk)) return Promise.resolve();

      return new Promise<void>((resolve) => {
        const stalled = setTimeout(() => {
          res.destroy(new Error(`Downstream write stalled for ${idleTimeoutMs}ms`));
        }, idleTimeoutMs);
        const done = () => {
          clearTimeout(stalled);
          res.off('drain', done);
          res.off('close', done);
          resolve();
        };
        res.on('drain', done);
        res.on('close', done);
      });
    },
    end(chunk) {
      if (res.writableEnded) return;
      if (chunk === undefined) {
        res.end();
      } else {
        res.end(chunk);
      }
    },
    onClose(listener) {
      res.on('close', listener);
      return () => {
        res.off('close', listener);
      };
    },
  };
}

// ============================================================================
// Relay
// ============================================================================

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface RelayOptions {
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Max wait for upstream response headers (default: 10000) */
  connectTimeoutMs?: number;
  /** Max wait for each upstream body read (default: 120000) */
  idleTimeoutMs?: number;
  logger?: Logger;
  requestId?: string;
}

export type RelayMode = 'buffered' | 'streamed' | 'bridged';

export type RelayOutcome = 'completed' | 'downstream_closed' | 'upstream_failed' | 'idle_timeout';

export interface RelayResult {
  /** Status sent downstream, 0 when nothing was sent */
  status: number;
  mode: RelayMode;
  /** Downstream writes of body data */
  units: number;
  /** Upstream body bytes read */
  bytes: number;
  outcome: RelayOutcome;
}

type AbortReason = 'connect' | 'idle' | 'downstream';

interface RelayState {
  abortReason: AbortReason | null;
  settled: boolean;
  timer: ReturnType<typeof setTimeout> | null;
}

/** Response headers never copied downstream */
const DROPPED_RESPONSE_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'content-length',
  'content-encoding',
]);

export function copyResponseHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    if (!DROPPED_RESPONSE_HEADERS.has(key.toLowerCase())) out[key] = value;
  });
  return out;
}

/**
 * True when the upstream signals an incremental body (SSE or NDJSON).
 */
export function isStreamingContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const type = contentType.toLowerCase();
  return type.includes('text/event-stream') || type.includes('application/x-ndjson');
}

function describeFetchError(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) {
    return `${err.message} (${err.cause.message})`;
  }
  return errorMessage(err);
}

/**
 * Relay one routed call to its provider and back.
 *
 * Throws UpstreamUnreachableError only while nothing has been sent downstream;
 * once headers are out, failures end the downstream response explicitly and
 * are reported in the result.
 */
export async function relay(call: OutboundCall, sink: DownstreamSink, opts: RelayOptions = {}): Promise<RelayResult> {
  const fetchFn: FetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
  const connectTimeoutMs = opts.connectTimeoutMs ?? 10_000;
  const idleTimeoutMs = opts.idleTimeoutMs ?? 120_000;
  const logger = opts.logger ?? defaultLogger;
  const tag = opts.requestId ? ` [${opts.requestId}]` : '';
  const providerName = call.provider.name;

  const controller = new AbortController();
  const state: RelayState = { abortReason: null, settled: false, timer: null };

  const abort = (reason: AbortReason) => {
    if (state.abortReason === null) state.abortReason = reason;
    controller.abort();
  };
  const disarm = () => {
    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
  };
  const arm = (ms: number, reason: AbortReason) => {
    disarm();
    state.timer = setTimeout(() => abort(reason), ms);
  };

  const removeCloseListener = sink.onClose(() => {
    if (!state.settled) abort('downstream');
  });

  /** Outcome for an error raised by a body read or write */
  const failureOutcome = (err: unknown): RelayOutcome => {
    switch (state.abortReason) {
      case 'downstream':
        return 'downstream_closed';
      case 'idle':
        logger.warn(`Provider ${providerName} went idle for ${idleTimeoutMs}ms, closing stream${tag}`);
        return 'idle_timeout';
      default:
        logger.error(`Stream from ${providerName} failed: ${errorMessage(err)}${tag}`);
        return 'upstream_failed';
    }
  };

  const readBody = async (body: ReadableStream<Uint8Array> | null): Promise<Buffer> => {
    if (!body) return Buffer.alloc(0);
    const reader = body.getReader();
    const chunks: Uint8Array[] = [];
    try {
      while (true) {
        arm(idleTimeoutMs, 'idle');
        const { done, value } = await reader.read();
        disarm();
        if (done) break;
        chunks.push(value);
      }
    } finally {
      disarm();
      reader.releaseLock();
    }
    return Buffer.concat(chunks);
  };

  /** Read a buffered body; null when the caller left first */
  const readWholeBody = async (body: ReadableStream<Uint8Array> | null): Promise<Buffer | null> => {
    try {
      return await readBody(body);
    } catch (err) {
      if (state.abortReason === 'downstream') return null;
      throw new UpstreamUnreachableError(
        state.abortReason === 'idle' ? 'upstream_timeout' : 'upstream_unreachable',
        providerName,
        `Provider '${providerName}' failed while sending its response: ${describeFetchError(err)}`,
        { cause: err }
      );
    }
  };

  const cancelReader = async (reader: ReadableStreamDefaultReader<Uint8Array>) => {
    await reader.cancel().catch((err: unknown) => {
      logger.debug(`Cancel of ${providerName} body reported: ${errorMessage(err)}${tag}`);
    });
  };

  try {
    // === Connect ===
    let response: Response;
    arm(connectTimeoutMs, 'connect');
    try {
      response = await fetchFn(call.url, {
        method: call.method,
        headers: call.headers,
        body: call.body,
        signal: controller.signal,
        redirect: 'manual',
      });
    } catch (err) {
      if (state.abortReason === 'downstream') {
        return { status: 0, mode: 'buffered', units: 0, bytes: 0, outcome: 'downstream_closed' };
      }
      if (state.abortReason === 'connect') {
        throw new UpstreamUnreachableError(
          'upstream_timeout',
          providerName,
          `Provider '${providerName}' sent no response within ${connectTimeoutMs}ms`
        );
      }
      throw new UpstreamUnreachableError(
        'upstream_unreachable',
        providerName,
        `Cannot reach provider '${providerName}': ${describeFetchError(err)}`,
        { cause: err }
      );
    } finally {
      disarm();
    }

    const headers = copyResponseHeaders(response.headers);
    const contentType = response.headers.get('content-type');

    // === Streamed: one upstream chunk → one downstream write ===
    if (response.ok && response.body && !call.bridge && isStreamingContentType(contentType)) {
      return await pumpStream(response.status, headers, response.body);
    }

    // === Bridged: translate OpenAI back into Ollama's shape ===
    if (response.ok && call.bridge) {
      if (response.body && isStreamingContentType(contentType)) {
        return await pumpBridgedStream(call.bridge, response.body);
      }
      return await sendBridgedBuffered(call.bridge, response.status, headers, response.body);
    }

    // === Buffered, including upstream error statuses, forwarded verbatim ===
    return await sendBuffered(response.status, headers, response.body);
  } finally {
    state.settled = true;
    disarm();
    removeCloseListener();
  }

  async function sendBuffered(
    status: number,
    headers: Record<string, string>,
    body: ReadableStream<Uint8Array> | null
  ): Promise<RelayResult> {
    const data = await readWholeBody(body);
    if (!data) return { status: 0, mode: 'buffered', units: 0, bytes: 0, outcome: 'downstream_closed' };

    sink.writeHead(status, headers);
    sink.end(data);
    return { status, mode: 'buffered', units: 1, bytes: data.byteLength, outcome: 'completed' };
  }

  async function pumpStream(
    status: number,
    headers: Record<string, string>,
    body: ReadableStream<Uint8Array>
  ): Promise<RelayResult> {
    sink.writeHead(status, headers);

    const reader = body.getReader();
    let units = 0;
    let bytes = 0;
    let outcome: RelayOutcome = 'completed';

    try {
      while (true) {
        arm(idleTimeoutMs, 'idle');
        const { done, value } = await reader.read();
        disarm();
        if (done) break;

        units++;
        bytes += value.byteLength;
        await sink.write(value);

        if (state.abortReason === 'downstream') {
          outcome = 'downstream_closed';
          break;
        }
      }
    } catch (err) {
      outcome = failureOutcome(err);
    } finally {
      disarm();
      if (outcome !== 'completed') await cancelReader(reader);
      reader.releaseLock();
    }

    sink.end();
    return { status, mode: 'streamed', units, bytes, outcome };
  }

  async function pumpBridgedStream(endpoint: BridgeEndpoint, body: ReadableStream<Uint8Array>): Promise<RelayResult> {
    sink.writeHead(200, { 'content-type': 'application/x-ndjson' });

    const translator = new OpenAIStreamTranslator(endpoint, call.taggedModel);
    const decoder = new TextDecoder();
    const reader = body.getReader();
    let units = 0;
    let bytes = 0;
    let outcome: RelayOutcome = 'completed';

    const forward = async (lines: string[]) => {
      for (const line of lines) {
        units++;
        await sink.write(`${line}\n`);
      }
    };

    try {
      while (!translator.done) {
        arm(idleTimeoutMs, 'idle');
        const { done, value } = await reader.read();
        disarm();
        if (done) {
          await forward(translator.push(decoder.decode()));
          await forward(translator.finish());
          break;
        }

        bytes += value.byteLength;
        await forward(translator.push(decoder.decode(value, { stream: true })));

        if (state.abortReason === 'downstream') {
          outcome = 'downstream_closed';
          break;
        }
      }
    } catch (err) {
      outcome = failureOutcome(err);
    } finally {
      disarm();
      if (outcome !== 'completed' || translator.done) await cancelReader(reader);
      reader.releaseLock();
    }

    sink.end();
    return { status: 200, mode: 'bridged', units, bytes, outcome };
  }

  async function sendBridgedBuffered(
    endpoint: BridgeEndpoint,
    status: number,
    headers: Record<string, string>,
    body: ReadableStream<Uint8Array> | null
  ): Promise<RelayResult> {
    const data = await readWholeBody(body);
    if (!data) return { status: 0, mode: 'bridged', units: 0, bytes: 0, outcome: 'downstream_closed' };

    const payload = parseJsonObject(data.toString('utf-8'));
    if (!payload) {
      // Not a chat completion; hand it over untouched.
      sink.writeHead(status, headers);
      sink.end(data);
      return { status, mode: 'buffered', units: 1, bytes: data.byteLength, outcome: 'completed' };
    }

    const converted = JSON.stringify(fromOpenAICompletion(payload, endpoint, call.taggedModel));
    sink.writeHead(200, {
      'content-type': call.stream ? 'application/x-ndjson' : 'application/json',
    });
    sink.end(call.stream ? `${converted}\n` : converted);
    return { status: 200, mode: 'bridged', units: 1, bytes: data.byteLength, outcome: 'completed' };
  }
}
