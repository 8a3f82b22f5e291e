/**
 * Request Router
 *
 * Turns an inbound request into an OutboundCall: finds the model field,
 * resolves the owning provider, rewrites the body to the native model name,
 * builds the upstream URL and attaches credentials. No retries and no provider
 * fallback: one resolved provider is used or the request fails.
 *
 * @packageDocumentation
 */

import { injectAuth } from './auth.js';
import { OPENAI_CHAT_PATH, toOpenAIChatRequest } from './bridge/ollama-openai.js';
import { RoutingError } from './errors.js';
import { parseJsonObject } from './json.js';
import type { ProviderRegistry } from './routing/registry.js';
import type { BridgeEndpoint, Dialect, HeaderRecord, InboundRequest, OutboundCall, Provider } from './types.js';

/**
 * A relayed, model-bearing endpoint
 */
export interface EndpointRule {
  dialect: Dialect;
  /** Body fields that may hold the model name, in lookup order */
  modelFields: readonly string[];
  /** Set for the endpoints the Ollama → OpenAI bridge understands */
  bridge: BridgeEndpoint | null;
}

export const RELAYED_ENDPOINTS: Readonly<Record<string, EndpointRule>> = {
  '/api/chat': { dialect: 'ollama', modelFields: ['model'], bridge: 'chat' },
  '/api/generate': { dialect: 'ollama', modelFields: ['model'], bridge: 'generate' },
  '/api/embed': { dialect: 'ollama', modelFields: ['model'], bridge: null },
  '/api/embeddings': { dialect: 'ollama', modelFields: ['model'], bridge: null },
  '/api/show': { dialect: 'ollama', modelFields: ['model', 'name'], bridge: null },
  '/v1/chat/completions': { dialect: 'openai', modelFields: ['model'], bridge: null },
  '/v1/completions': { dialect: 'openai', modelFields: ['model'], bridge: null },
  '/v1/embeddings': { dialect: 'openai', modelFields: ['model'], bridge: null },
};

/** Request headers never forwarded upstream */
const DROPPED_REQUEST_HEADERS = new Set([
  'host',
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'content-length',
  'authorization',
  'accept-encoding',
]);

/**
 * Dialect of a path, for shaping local error bodies.
 */
export function dialectOf(pathname: string): Dialect {
  return pathname.startsWith('/v1/') ? 'openai' : 'ollama';
}

export function findEndpoint(method: string, pathname: string): EndpointRule | null {
  if (method !== 'POST') return null;
  return RELAYED_ENDPOINTS[pathname] ?? null;
}

/**
 * Provider base URL joined with the inbound path and query, unchanged.
 */
export function joinUpstreamUrl(baseUrl: string, pathname: string, search: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${pathname}${search}`;
}

/**
 * Forwardable inbound headers, plus the ones every upstream call carries.
 */
export function buildOutboundHeaders(inbound: HeaderRecord, provider: Provider): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(inbound)) {
    const lower = key.toLowerCase();
    if (value === undefined || DROPPED_REQUEST_HEADERS.has(lower)) continue;
    headers[lower] = Array.isArray(value) ? value.join(', ') : value;
  }
  headers['content-type'] = 'application/json';
  headers['accept-encoding'] = 'identity';
  return injectAuth(provider, headers);
}

/**
 * Whether the caller asked for a streamed response.
 * Ollama streams by default; OpenAI only on request.
 */
function wantsStream(dialect: Dialect, body: Record<string, unknown>): boolean {
  return dialect === 'ollama' ? body['stream'] !== false : body['stream'] === true;
}

/**
 * Route an inbound request to its provider.
 * Throws RoutingError; nothing is sent upstream on failure.
 */
export function route(inbound: InboundRequest, registry: ProviderRegistry): OutboundCall {
  const url = new URL(inbound.path, 'http://relay.local');
  const endpoint = findEndpoint(inbound.method, url.pathname);
  if (!endpoint) {
    throw new RoutingError('not_found', `Unknown endpoint: ${inbound.method} ${url.pathname}`);
  }

  const body = parseJsonObject(inbound.body.toString('utf-8'));
  if (!body) {
    throw new RoutingError('malformed_request', 'Request body must be a JSON object');
  }

  const modelField = endpoint.modelFields.find((field) => body[field] !== undefined);
  const model = modelField === undefined ? undefined : body[modelField];
  if (modelField === undefined || typeof model !== 'string' || model.length === 0) {
    throw new RoutingError('malformed_request', `'${endpoint.modelFields[0]}' must be a non-empty string`);
  }

  const { provider, nativeModel } = registry.resolve(model);
  const stream = wantsStream(endpoint.dialect, body);
  const headers = buildOutboundHeaders(inbound.headers, provider);

  if (endpoint.dialect === 'ollama' && provider.apiType === 'OpenAI') {
    if (!endpoint.bridge) {
      throw new RoutingError(
        'unsupported_endpoint',
        `${url.pathname} is not available for model '${model}': provider '${provider.name}' speaks the OpenAI API`
      );
    }
    return {
      provider,
      taggedModel: model,
      nativeModel,
      method: 'POST',
      url: joinUpstreamUrl(provider.url, OPENAI_CHAT_PATH, ''),
      headers,
      body: JSON.stringify(toOpenAIChatRequest(body, endpoint.bridge, nativeModel)),
      dialect: endpoint.dialect,
      stream,
      bridge: endpoint.bridge,
    };
  }

  return {
    provider,
    taggedModel: model,
    nativeModel,
    method: inbound.method,
    url: joinUpstreamUrl(provider.url, url.pathname, url.search),
    headers,
    body: JSON.stringify({ ...body, [modelField]: nativeModel }),
    dialect: endpoint.dialect,
    stream,
    bridge: null,
  };
}
