/**
 * ollama-relay
 *
 * A local Ollama-compatible endpoint that routes each request to one of many
 * configured model providers by the prefix of its model name, streaming the
 * response back as it arrives.
 *
 * @example
 * ```typescript
 * import { loadConfig, ProviderRegistry, RelayServer } from 'ollama-relay';
 *
 * const config = loadConfig();
 * const server = RelayServer.fromConfig(config, ProviderRegistry.fromConfig(config));
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Server
export { RelayServer, MAX_BODY_BYTES } from './server.js';
export type { RelayServerConfig } from './server.js';

// Configuration
export { loadConfig, parseConfig, getConfigPath, writeDefaultConfig, maskSecret, DEFAULT_CONFIG } from './config.js';
export type { ConfigFile, ProviderFileEntry } from './config.js';

// Routing
export { ProviderRegistry, tagModel } from './routing/index.js';
export type { RegistryOptions } from './routing/index.js';
export { route, dialectOf, findEndpoint, joinUpstreamUrl, buildOutboundHeaders, RELAYED_ENDPOINTS } from './router.js';
export type { EndpointRule } from './router.js';
export { authSchemeFor, buildAuthorization, injectAuth } from './auth.js';
export type { AuthScheme } from './auth.js';

// Relay
export { relay, createResponseSink, copyResponseHeaders, isStreamingContentType } from './relay.js';
export type { DownstreamSink, FetchFn, RelayOptions, RelayResult, RelayMode, RelayOutcome } from './relay.js';
export { toOpenAIChatRequest, fromOpenAICompletion, OpenAIStreamTranslator } from './bridge/ollama-openai.js';

// Errors
export { RelayError, RoutingError, UpstreamUnreachableError, ConfigurationError, toErrorBody } from './errors.js';
export type { RelayErrorCode, RoutingErrorKind, UpstreamErrorKind } from './errors.js';

// Observability
export { handleHealthRequest, probeHealth } from './health.js';
export type { HealthPayload } from './health.js';
export { StatsCollector } from './stats.js';
export type { RequestRecord, StatsSnapshot } from './stats.js';
export { formatStatus } from './status.js';
export { createLogger, defaultLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export type {
  ApiType,
  Provider,
  UnknownModelPolicy,
  ResolvedModel,
  TaggedModel,
  Dialect,
  InboundRequest,
  OutboundCall,
  RelayConfig,
  TimeoutConfig,
} from './types.js';
