import type { Capability, ProjectConfig } from '../core/types.js';

/**
 * A capability-specific request. `action` names the side effect, e.g.
 * `init-repository` or `build-image`; `cwd` is where it happens.
 */
export interface ProviderRequest {
  action: string;
  cwd?: string;
  params?: Record<string, string | number | boolean>;
}

export interface ProviderResult {
  ok: boolean;
  output: string;
  data?: Record<string, string | number | boolean>;
}

export interface Provider {
  readonly name: string;
  readonly capabilities: readonly Capability[];

  /** Readiness check without side effects */
  validateConnection(): Promise<boolean>;
  execute(request: ProviderRequest): Promise<ProviderResult>;
  dispose?(): Promise<void>;
}

/** What a provider constructor may look at. Never the process environment directly. */
export interface ProviderFactoryContext {
  config: ProjectConfig;
  env: Readonly<Record<string, string | undefined>>;
}

/** One row of the startup registration table */
export interface ProviderRegistration {
  name: string;
  capabilities: readonly Capability[];
  /** May throw, e.g. on missing credentials */
  create(context: ProviderFactoryContext): Provider | Promise<Provider>;
}

export interface ProviderAttempt {
  provider: string;
  reason: string;
}

/** Returned instead of a provider when nothing registered for a capability could be constructed */
export interface Unavailable {
  readonly kind: 'unavailable';
  readonly capability: Capability;
  readonly reason: string;
  readonly attempts: readonly ProviderAttempt[];
}

export function isUnavailable(value: Provider | Unavailable): value is Unavailable {
  return 'kind' in value && value.kind === 'unavailable';
}
