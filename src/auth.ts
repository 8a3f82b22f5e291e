/**
 * Auth Injector
 *
 * Outbound credentials are a pure function of the provider's api_type and
 * whether it has a secret. Secrets are never logged from here.
 *
 * @packageDocumentation
 */

import type { ApiType, Provider } from './types.js';

export type AuthScheme = 'Basic' | 'Bearer';

/**
 * Authorization scheme used by each dialect.
 * Remote Ollama deployments sit behind HTTP basic auth; OpenAI-compatible
 * APIs take a bearer token.
 */
export function authSchemeFor(apiType: ApiType): AuthScheme {
  switch (apiType) {
    case 'Ollama':
      return 'Basic';
    case 'OpenAI':
      return 'Bearer';
    default: {
      const unreachable: never = apiType;
      throw new Error(`Unhandled api_type: ${String(unreachable)}`);
    }
  }
}

/**
 * Authorization header value for a provider, or null when it has no secret.
 * For Basic the secret is the `user:password` pair itself.
 */
export function buildAuthorization(provider: Pick<Provider, 'apiType' | 'secret'>): string | null {
  if (provider.secret === null) return null;

  const scheme = authSchemeFor(provider.apiType);
  switch (scheme) {
    case 'Basic':
      return `Basic ${Buffer.from(provider.secret, 'utf8').toString('base64')}`;
    case 'Bearer':
      return `Bearer ${provider.secret}`;
  }
}

/**
 * Copy of `headers` carrying the provider's credential.
 * Any authorization already present is dropped.
 */
export function injectAuth(
  provider: Pick<Provider, 'apiType' | 'secret'>,
  headers: Record<string, string>
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== 'authorization') out[key] = value;
  }

  const authorization = buildAuthorization(provider);
  if (authorization !== null) {
    out['authorization'] = authorization;
  }
  return out;
}
