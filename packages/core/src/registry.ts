import {
  RegistryError,
  formatValidationResult,
  validateProviderConfig,
  type Config,
  type ConfigValidationResult,
  type Logger,
  type ProviderConfig,
} from '@patchfix/shared';
import {
  AnthropicAdapter,
  FakeAdapter,
  OpenAIAdapter,
  type ProviderAdapter,
} from '@patchfix/adapters';

export { RegistryError } from '@patchfix/shared';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

export interface ProviderRegistryOptions {
  env?: NodeJS.ProcessEnv;
  /** Receives configuration warnings */
  logger?: Logger;
}

/**
 * Registry for LLM provider adapters. Maps a provider id from config to an
 * adapter built by the factory registered for its `type`, and caches it.
 *
 * @example
 * ```typescript
 * const registry = createProviderRegistry(config);
 * const providerId = registry.resolveProviderId(flags.provider, config.generator.provider);
 * const adapter = registry.getAdapter(providerId);
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly config: Pick<Config, 'providers'>,
    private readonly options: ProviderRegistryOptions = {},
  ) {
    this.env = options.env ?? process.env;
  }

  /**
   * Register a factory for creating adapters of a specific type.
   * @param type - The provider type identifier (e.g., 'openai', 'anthropic')
   */
  registerFactory(type: string, factory: AdapterFactory): void {
    this.factories.set(type, factory);
  }

  /**
   * Picks the provider to use: an explicit request first, then the configured
   * default, then the only configured provider.
   *
   * @throws {RegistryError} If the choice is ambiguous or nothing is configured
   */
  resolveProviderId(requested?: string, configuredDefault?: string): string {
    const chosen = requested ?? configuredDefault;
    if (chosen) return chosen;

    const ids = Object.keys(this.config.providers ?? {});
    if (ids.length === 1) return ids[0];
    if (ids.length === 0) {
      throw new RegistryError('No providers configured; add one under `providers` in .patchfix.yaml');
    }
    throw new RegistryError(
      `Several providers configured (${ids.join(', ')}); choose one with --provider or generator.provider`,
    );
  }

  /**
   * Validates every configured provider whose type has a factory.
   *
   * @returns Map of provider ID to validation result
   */
  validateAllProviders(): Map<string, ConfigValidationResult> {
    const results = new Map<string, ConfigValidationResult>();
    for (const [providerId, providerConfig] of Object.entries(this.config.providers ?? {})) {
      const factory = this.factories.get(providerConfig.type);
      if (!factory) continue;
      const adapter = factory({ ...providerConfig, api_key: providerConfig.api_key || 'validation-placeholder' });
      results.set(providerId, validateProviderConfig(providerConfig, adapter.capabilities(), providerId));
    }
    return results;
  }

  /**
   * Get an adapter instance for the given provider ID, creating and caching
   * it on first use.
   *
   * @throws {RegistryError} If the provider is unknown, its factory is not
   *   registered, its key variable is unset, or its config is invalid
   */
  async getAdapter(providerId: string): Promise<ProviderAdapter> {
    const cached = this.adapters.get(providerId);
    if (cached) return cached;

    const providerConfig = this.config.providers?.[providerId];
    if (!providerConfig) {
      throw new RegistryError(`Provider '${providerId}' not found`);
    }

    const factory = this.factories.get(providerConfig.type);
    if (!factory) {
      throw new RegistryError(
        `Unknown provider type '${providerConfig.type}' for provider '${providerId}'`,
      );
    }

    let resolvedConfig = providerConfig;
    if (providerConfig.api_key_env && !providerConfig.api_key) {
      const fromEnv = this.env[providerConfig.api_key_env];
      if (!fromEnv) {
        throw new RegistryError(
          `Missing environment variable '${providerConfig.api_key_env}' for provider '${providerId}'`,
        );
      }
      resolvedConfig = { ...providerConfig, api_key: fromEnv };
    }

    let adapter: ProviderAdapter;
    try {
      adapter = factory(resolvedConfig);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RegistryError(`Could not create provider '${providerId}': ${message}`, { cause: error });
    }

    const validation = validateProviderConfig(resolvedConfig, adapter.capabilities(), providerId);
    if (!validation.valid) {
      throw new RegistryError(
        `Invalid configuration for provider '${providerId}':\n${formatValidationResult(validation)}`,
      );
    }
    if (validation.warnings.length > 0) {
      await this.options.logger?.warn(formatValidationResult(validation));
    }

    this.adapters.set(providerId, adapter);
    return adapter;
  }
}

/**
 * Registry with the built-in adapter types: `anthropic`, `openai` and the
 * offline `fake`.
 */
export function createProviderRegistry(
  config: Pick<Config, 'providers'>,
  options: ProviderRegistryOptions = {},
): ProviderRegistry {
  const registry = new ProviderRegistry(config, options);
  registry.registerFactory('anthropic', (cfg) => new AnthropicAdapter(cfg));
  registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
  registry.registerFactory('fake', (cfg) => new FakeAdapter(cfg));
  return registry;
}
