import type { ProviderPlugin } from '../types/index.js';
import { UNKNOWN_PROVIDER } from '../types/index.js';
import { DuplicateProviderIdError, ProviderError, UnknownProviderError } from '../utils/index.js';

/**
 * Holds the provider plugins known to one process. Construct it once at
 * start-up, register plugins, `freeze()` it and pass it by reference.
 * Lookups never mutate, so a frozen registry can be shared freely.
 */
export class ProviderRegistry {
  private readonly entries = new Map<string, ProviderPlugin>();
  private frozen = false;

  register(plugin: ProviderPlugin): this {
    if (this.frozen) {
      throw new ProviderError(plugin.providerId, 'Registry is frozen; register plugins before start-up completes');
    }
    if (plugin.providerId === UNKNOWN_PROVIDER) {
      throw new ProviderError(plugin.providerId, 'Provider id is reserved');
    }
    if (this.entries.has(plugin.providerId)) {
      throw new DuplicateProviderIdError(plugin.providerId);
    }
    this.entries.set(plugin.providerId, plugin);
    return this;
  }

  get(providerId: string): ProviderPlugin {
    const plugin = this.entries.get(providerId);
    if (!plugin) throw new UnknownProviderError(providerId, this.list());
    return plugin;
  }

  has(providerId: string): boolean {
    return this.entries.has(providerId);
  }

  /** Provider ids in registration order. */
  list(): string[] {
    return [...this.entries.keys()];
  }

  plugins(): ProviderPlugin[] {
    return [...this.entries.values()];
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
