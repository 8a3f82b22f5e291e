/**
 * Relay error taxonomy.
 *
 * Every error the relay turns into a local HTTP response carries its own
 * status and code. Upstream failure statuses are never wrapped here: they are
 * forwarded verbatim by the relay.
 *
 * @packageDocumentation
 */

import type { Dialect } from './types.js';

export type RoutingErrorKind =
  | 'not_found'
  | 'malformed_request'
  | 'payload_too_large'
  | 'unknown_provider'
  | 'unknown_model'
  | 'unsupported_endpoint';

export type UpstreamErrorKind = 'upstream_unreachable' | 'upstream_timeout';

export type RelayErrorCode =
  | RoutingErrorKind
  | UpstreamErrorKind
  | 'configuration_invalid'
  | 'internal_error';

const STATUS_BY_CODE: Record<RelayErrorCode, number> = {
  not_found: 404,
  malformed_request: 400,
  payload_too_large: 413,
  unknown_provider: 404,
  unknown_model: 404,
  unsupported_endpoint: 400,
  upstream_unreachable: 502,
  upstream_timeout: 504,
  configuration_invalid: 500,
  internal_error: 500,
};

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly status: number;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

/**
 * Client-caused failure found while routing; no upstream call was made.
 */
export class RoutingError extends RelayError {
  readonly kind: RoutingErrorKind;

  constructor(kind: RoutingErrorKind, message: string) {
    super(kind, message);
    this.name = 'RoutingError';
    this.kind = kind;
  }
}

/**
 * The upstream could not be reached, or sent no response headers in time.
 */
export class UpstreamUnreachableError extends RelayError {
  readonly provider: string;

  constructor(kind: UpstreamErrorKind, provider: string, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = 'UpstreamUnreachableError';
    this.provider = provider;
  }
}

/**
 * Invalid provider table or settings. Only raised at startup.
 */
export class ConfigurationError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('configuration_invalid', `Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error body in the caller's dialect.
 * Ollama clients read `error` as a string; OpenAI clients expect an object.
 */
export function toErrorBody(err: RelayError, dialect: Dialect): Record<string, unknown> {
  if (dialect === 'openai') {
    return {
      error: {
        message: err.message,
        type: err.status >= 500 ? 'server_error' : 'invalid_request_error',
        code: err.code,
      },
    };
  }
  return { error: err.message };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
