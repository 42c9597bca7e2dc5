/**
 * Provider Registry: capability name to provider instance.
 *
 * Providers are constructed lazily on first lookup, in registration order;
 * the first one that constructs and passes `validateConnection()` is cached
 * for the capability until teardown. Lookups never throw: failure is an
 * `Unavailable` value, and only `getRequired` turns it into an error.
 */

import type { Capability, ProviderSelection } from '../core/types.js';
import { ProviderError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { withTimeout } from '../utils/retry.js';
import {
  isUnavailable,
  type Provider,
  type ProviderAttempt,
  type ProviderFactoryContext,
  type ProviderRegistration,
  type Unavailable,
} from './types.js';

type Lookup = Provider | Unavailable;

interface Construction {
  provider?: Provider;
  reason?: string;
}

export interface ProviderRegistryOptions {
  /** Upper bound for constructing and validating one provider */
  timeoutMs?: number;
  events?: EventBus;
}

export class ProviderRegistry {
  private cache = new Map<Capability, Promise<Lookup>>();
  /** Per registration, so a provider serving two capabilities is built once */
  private constructions = new Map<string, Promise<Construction>>();
  private selectionLog: ProviderSelection[] = [];
  private logger = getLogger();

  constructor(
    private readonly registrations: readonly ProviderRegistration[],
    private readonly context: ProviderFactoryContext,
    private readonly options: ProviderRegistryOptions = {},
  ) {}

  /** Registered provider names for a capability, in selection order */
  candidates(capability: Capability): string[] {
    return this.registrations.filter(r => r.capabilities.includes(capability)).map(r => r.name);
  }

  get(capability: Capability): Promise<Lookup> {
    let lookup = this.cache.get(capability);
    if (!lookup) {
      lookup = this.select(capability);
      this.cache.set(capability, lookup);
    }
    return lookup;
  }

  async getRequired(capability: Capability): Promise<Provider> {
    const result = await this.get(capability);
    if (isUnavailable(result)) {
      throw new ProviderError(
        `Required capability "${capability}" is unavailable: ${result.reason}`,
        capability,
        result.attempts[0]?.provider,
      );
    }
    return result;
  }

  /** Selections made so far, in lookup order */
  selections(): ProviderSelection[] {
    return [...this.selectionLog];
  }

  /** Drop every cached provider; later lookups construct afresh */
  async teardown(): Promise<void> {
    const built = await Promise.all(this.constructions.values());
    this.cache.clear();
    this.constructions.clear();

    const disposals = await Promise.allSettled(
      built.flatMap(c => (c.provider?.dispose ? [c.provider.dispose()] : [])),
    );
    for (const outcome of disposals) {
      if (outcome.status === 'rejected') {
        this.logger.warn({ error: String(outcome.reason) }, 'Provider dispose failed');
      }
    }
  }

  private async select(capability: Capability): Promise<Lookup> {
    const attempts: ProviderAttempt[] = [];

    for (const registration of this.registrations) {
      if (!registration.capabilities.includes(capability)) continue;

      const { provider, reason } = await this.construct(registration);
      if (provider) {
        this.record({ capability, provider: provider.name });
        return provider;
      }
      attempts.push({ provider: registration.name, reason: reason ?? 'unknown failure' });
    }

    const reason = attempts.length === 0
      ? 'no provider registered'
      : attempts.map(a => `${a.provider}: ${a.reason}`).join('; ');
    this.record({ capability, provider: null, reason });
    return { kind: 'unavailable', capability, reason, attempts };
  }

  private construct(registration: ProviderRegistration): Promise<Construction> {
    let construction = this.constructions.get(registration.name);
    if (!construction) {
      construction = this.attempt(registration);
      this.constructions.set(registration.name, construction);
    }
    return construction;
  }

  private async attempt(registration: ProviderRegistration): Promise<Construction> {
    const build = async (): Promise<Provider> => {
      const provider = await registration.create(this.context);
      if (!(await provider.validateConnection())) {
        throw new Error('connection check failed');
      }
      return provider;
    };

    try {
      const provider = this.options.timeoutMs
        ? await withTimeout(build(), this.options.timeoutMs, `timed out after ${this.options.timeoutMs}ms`)
        : await build();
      this.logger.debug({ provider: registration.name }, 'Provider constructed');
      return { provider };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.debug({ provider: registration.name, reason }, 'Provider unavailable');
      return { reason };
    }
  }

  private record(selection: ProviderSelection): void {
    this.selectionLog.push(selection);
    this.options.events?.emit('provider:selected', selection);
  }
}
