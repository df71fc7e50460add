import { Logger } from "@nestjs/common";
import { PlatformCapabilities, RequestDescriptor, WordList } from "@core";
import { AdapterDeps, AdapterRegistry } from "./adapter.registry";
import { FetchOptions, ProviderAdapter } from "./provider-adapter";
import { DEFAULT_RETRY } from "./provider-http";
import { canonicalPlatform } from "./request-descriptor";
import { ProviderInitError, UnknownPlatformError, errorMessage } from "./word-list.errors";

export type InitPolicy = "fail-soft" | "fail-fast";

export type InitializeOptions = {
  exclude?: Iterable<string>;
  /** fail-soft (default) drops a platform whose adapter cannot be built; fail-fast rethrows. */
  initPolicy?: InitPolicy;
  deps?: Partial<AdapterDeps>;
};

export type Credentials = Record<string, unknown>;

/**
 * Owns one adapter per platform and routes descriptors to them.
 * Only initialize() creates instances, so a half-built manager never escapes.
 */
export class InterfaceManager {
  private static readonly logger = new Logger(InterfaceManager.name);

  private constructor(private readonly adapters: ReadonlyMap<string, ProviderAdapter>) {}

  static async initialize(
    registry: AdapterRegistry,
    credentials: Credentials,
    options: InitializeOptions = {},
  ): Promise<InterfaceManager> {
    const logger = InterfaceManager.logger;
    const exclude = new Set([...(options.exclude ?? [])].map(canonicalPlatform));
    const policy = options.initPolicy ?? "fail-soft";
    const deps: AdapterDeps = {
      retry: options.deps?.retry ?? DEFAULT_RETRY,
      handshakeTimeoutMs: options.deps?.handshakeTimeoutMs,
    };

    const adapters = new Map<string, ProviderAdapter>();

    for (const [rawName, bundle] of Object.entries(credentials)) {
      const platform = canonicalPlatform(rawName);

      if (exclude.has(platform)) {
        logger.debug(`Skipping ${platform}: excluded`);
        continue;
      }

      const registration = registry.get(platform);
      if (!registration) {
        logger.warn(`Skipping ${platform}: no adapter registered`);
        continue;
      }
      if (adapters.has(platform)) {
        logger.warn(`Skipping duplicate credentials for ${platform}`);
        continue;
      }

      try {
        const adapter = await registration.create(bundle, deps);
        if (adapter.platformName !== platform) {
          throw new ProviderInitError(
            platform,
            `adapter reports platform "${adapter.platformName}"`,
          );
        }
        adapters.set(platform, adapter);
        logger.log(`Initialized ${platform} (${[...adapter.supportedSourceTypes].join(", ")})`);
      } catch (err) {
        const initErr =
          err instanceof ProviderInitError ? err : new ProviderInitError(platform, errorMessage(err), { cause: err });
        if (policy === "fail-fast") throw initErr;
        logger.warn(`Skipping ${platform}: ${initErr.message}`);
      }
    }

    return new InterfaceManager(adapters);
  }

  platforms(): string[] {
    return [...this.adapters.keys()];
  }

  has(platform: string) {
    return this.adapters.has(canonicalPlatform(platform));
  }

  get(platform: string): ProviderAdapter | undefined {
    return this.adapters.get(canonicalPlatform(platform));
  }

  capabilities(): PlatformCapabilities[] {
    return [...this.adapters.values()].map(a => a.capabilities());
  }

  async dispatch(request: RequestDescriptor, options?: FetchOptions): Promise<WordList> {
    const adapter = this.adapters.get(request.platform);
    if (!adapter) throw new UnknownPlatformError(request.platform, this.platforms());
    return adapter.fetch(request, options);
  }
}
