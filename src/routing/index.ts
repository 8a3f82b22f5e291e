/**
 * Routing module exports.
 *
 * @packageDocumentation
 */

export { ProviderRegistry, tagModel } from './registry.js';
export type { RegistryOptions } from './registry.js';
