/**
 * Ollama Relay Core Types
 *
 * Shared shapes for the provider table, the routing pipeline and the relay.
 *
 * @packageDocumentation
 */

// ============================================================================
// Providers
// ============================================================================

/**
 * API dialects an upstream provider can speak.
 * Decides the request shape the upstream expects and its auth scheme.
 */
export const ApiTypes = ['Ollama', 'OpenAI'] as const;

export type ApiType = (typeof ApiTypes)[number];

/**
 * A configured upstream endpoint.
 */
export interface Provider {
  /** Unique name, also the prefix of every tagged model name it serves */
  readonly name: string;
  /** Base URL; the inbound request path is appended to it */
  readonly url: string;
  /** Credential material, `null` for an unauthenticated upstream */
  readonly secret: string | null;
  readonly apiType: ApiType;
  /**
   * Native model identifiers served by this provider.
   * `null` when the provider declares no catalog and accepts any model.
   */
  readonly models: readonly string[] | null;
}

/**
 * What to do when a tagged name picks a provider but the native model is not
 * in that provider's declared catalog.
 */
export const UnknownModelPolicies = ['reject', 'passthrough'] as const;

export type UnknownModelPolicy = (typeof UnknownModelPolicies)[number];

/**
 * Result of resolving a tagged model name.
 */
export interface ResolvedModel {
  provider: Provider;
  nativeModel: string;
}

/**
 * One entry of the caller-facing model catalog.
 */
export interface TaggedModel {
  tagged: string;
  provider: Provider;
  nativeModel: string;
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Request shape family of an inbound endpoint.
 */
export type Dialect = 'ollama' | 'openai';

/**
 * Ollama endpoints the bridge can translate into OpenAI chat completions.
 */
export type BridgeEndpoint = 'chat' | 'generate';

export type HeaderRecord = Record<string, string | string[] | undefined>;

/**
 * An inbound request as received from the local caller.
 */
export interface InboundRequest {
  method: string;
  /** Path including the query string */
  path: string;
  headers: HeaderRecord;
  body: Buffer;
}

/**
 * A fully routed upstream call, derived from one InboundRequest.
 */
export interface OutboundCall {
  provider: Provider;
  /** Model name as the caller sent it */
  taggedModel: string;
  nativeModel: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string;
  /** Dialect of the inbound endpoint, used to shape error bodies */
  dialect: Dialect;
  /** Whether the caller asked for a streamed response */
  stream: boolean;
  /** Set when the response must be translated back into Ollama's shape */
  bridge: BridgeEndpoint | null;
}

// ============================================================================
// Configuration
// ============================================================================

export interface TimeoutConfig {
  /** Max wait for upstream response headers */
  connectMs: number;
  /** Max silence between two body reads, and for a blocked downstream write */
  idleMs: number;
  /** Max wait for in-flight requests on shutdown */
  drainMs: number;
}

/**
 * Validated relay configuration.
 */
export interface RelayConfig {
  port: number;
  host: string;
  unknownModelPolicy: UnknownModelPolicy;
  /** Version reported on GET /api/version */
  ollamaVersion: string;
  timeouts: TimeoutConfig;
  providers: readonly Provider[];
}
