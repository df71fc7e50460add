import { ProviderAdapter } from "./provider-adapter";
import { RetryOptions } from "./provider-http";
import { canonicalPlatform } from "./request-descriptor";

export type AdapterDeps = {
  retry: RetryOptions;
  /** Upper bound on a startup handshake, for adapters that perform one. */
  handshakeTimeoutMs?: number;
};

/**
 * One entry per adapter type. `create` receives the platform's credential
 * bundle verbatim and should throw ProviderInitError when it is unusable.
 */
export interface AdapterRegistration {
  platform: string;
  create(credentials: unknown, deps: AdapterDeps): Promise<ProviderAdapter>;
}

export class AdapterRegistry {
  private readonly entries = new Map<string, AdapterRegistration>();

  constructor(registrations: AdapterRegistration[] = []) {
    for (const r of registrations) this.register(r);
  }

  register(registration: AdapterRegistration) {
    const key = canonicalPlatform(registration.platform);
    if (this.entries.has(key)) {
      throw new Error(`Adapter for platform "${key}" is already registered`);
    }
    this.entries.set(key, registration);
    return this;
  }

  has(platform: string) {
    return this.entries.has(canonicalPlatform(platform));
  }

  get(platform: string): AdapterRegistration | undefined {
    return this.entries.get(canonicalPlatform(platform));
  }

  platforms(): string[] {
    return [...this.entries.keys()];
  }
}
