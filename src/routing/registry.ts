/**
 * Provider Registry
 *
 * The process-lifetime provider table and the model resolver over it.
 * Built once at startup; never mutated afterwards, so concurrent requests read
 * it without coordination.
 *
 * @packageDocumentation
 */

import { ConfigurationError, RoutingError } from '../errors.js';
import type { Provider, RelayConfig, ResolvedModel, TaggedModel, UnknownModelPolicy } from '../types.js';

export interface RegistryOptions {
  /** Policy for a native model missing from the provider catalog (default: 'reject') */
  unknownModelPolicy?: UnknownModelPolicy;
}

/**
 * Caller-facing name of a provider's native model.
 */
export function tagModel(providerName: string, nativeModel: string): string {
  return `${providerName}-${nativeModel}`;
}

export class ProviderRegistry {
  readonly unknownModelPolicy: UnknownModelPolicy;
  private readonly providers: readonly Provider[];
  private readonly byName: ReadonlyMap<string, Provider>;
  /** Providers ordered by name length, longest first */
  private readonly prefixOrder: readonly Provider[];

  constructor(providers: readonly Provider[], opts: RegistryOptions = {}) {
    if (providers.length === 0) {
      throw new ConfigurationError(['at least one provider is required']);
    }

    const byName = new Map<string, Provider>();
    const duplicates: string[] = [];
    for (const provider of providers) {
      if (byName.has(provider.name)) {
        duplicates.push(`duplicate provider name: ${provider.name}`);
      }
      byName.set(provider.name, provider);
    }
    if (duplicates.length > 0) {
      throw new ConfigurationError(duplicates);
    }

    this.unknownModelPolicy = opts.unknownModelPolicy ?? 'reject';
    this.providers = Object.freeze([...providers]);
    this.byName = byName;
    this.prefixOrder = Object.freeze([...providers].sort((a, b) => b.name.length - a.name.length));
  }

  static fromConfig(config: RelayConfig): ProviderRegistry {
    return new ProviderRegistry(config.providers, { unknownModelPolicy: config.unknownModelPolicy });
  }

  get size(): number {
    return this.providers.length;
  }

  /** Providers in configuration order. */
  list(): readonly Provider[] {
    return this.providers;
  }

  get(name: string): Provider | undefined {
    return this.byName.get(name);
  }

  /**
   * Resolve a tagged model name to its provider and native model.
   *
   * Matching is an exact, case-sensitive `"<name>-"` prefix test. When several
   * provider names match, the longest one wins; the remainder after it goes
   * upstream untouched.
   */
  resolve(model: string): ResolvedModel {
    const provider = this.prefixOrder.find((p) => model.startsWith(`${p.name}-`));
    if (!provider) {
      throw new RoutingError('unknown_provider', `model '${model}' not found: no provider matches its prefix`);
    }

    const nativeModel = model.slice(provider.name.length + 1);
    if (nativeModel.length === 0) {
      throw new RoutingError('unknown_model', `model '${model}' not found: no model name after provider '${provider.name}'`);
    }

    if (
      provider.models !== null &&
      !provider.models.includes(nativeModel) &&
      this.unknownModelPolicy === 'reject'
    ) {
      throw new RoutingError(
        'unknown_model',
        `model '${model}' not found: provider '${provider.name}' does not serve '${nativeModel}'`
      );
    }

    return { provider, nativeModel };
  }

  /**
   * Every declared model of every provider, in configuration order.
   * Providers without a catalog contribute nothing.
   */
  listTaggedModels(): TaggedModel[] {
    return this.providers.flatMap((provider) =>
      (provider.models ?? []).map((nativeModel) => ({
        tagged: tagModel(provider.name, nativeModel),
        provider,
        nativeModel,
      }))
    );
  }
}
