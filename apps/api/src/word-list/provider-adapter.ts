import { Logger } from "@nestjs/common";
import { PlatformCapabilities, RequestDescriptor, SourceItem, WordList } from "@core";
import { isAbortError, linkSignal } from "./cancellation";
import { isWithinWindow } from "./request-descriptor";
import { WordListAccumulator } from "./word-list";
import {
  CancelledError,
  ProviderFetchError,
  UnsupportedSortModeError,
  UnsupportedSourceTypeError,
  UnsupportedTimeWindowError,
  WordListError,
  errorMessage,
} from "./word-list.errors";

export type FetchOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Overrides the adapter's cancelPolicy for this call. */
  partialOnCancel?: boolean;
};

/**
 * What an adapter does when a fetch is cancelled or hits its deadline:
 * "partial" returns the words gathered so far flagged partial,
 * "error" throws CancelledError.
 */
export type CancelPolicy = "partial" | "error";

export type RouteContext = {
  signal: AbortSignal;
  sort: string | null;
  /** Items still wanted; use it to size pages. */
  remaining(): number;
  logger: Logger;
};

export interface SourceRoute {
  /**
   * undefined: ordering is not meaningful here and sortMode is ignored.
   * A set (even an empty one): sortMode must be one of its members.
   */
  sortModes?: ReadonlySet<string>;
  defaultSort?: string;
  /** Whether items carry timestamps the adapter can filter on. */
  timeWindow: boolean;
  fetch(request: RequestDescriptor, ctx: RouteContext): AsyncIterable<SourceItem>;
}

export type DispatchTable = Readonly<Record<string, SourceRoute>>;

export interface ProviderAdapter {
  readonly platformName: string;
  readonly supportedSourceTypes: ReadonlySet<string>;
  readonly supportedSortModes: ReadonlySet<string>;
  readonly cancelPolicy: CancelPolicy;
  capabilities(): PlatformCapabilities;
  fetch(request: RequestDescriptor, options?: FetchOptions): Promise<WordList>;
}

export abstract class BaseProviderAdapter implements ProviderAdapter {
  protected readonly logger: Logger;
  readonly supportedSourceTypes: ReadonlySet<string>;
  readonly supportedSortModes: ReadonlySet<string>;
  private readonly table: ReadonlyMap<string, SourceRoute>;

  protected constructor(
    readonly platformName: string,
    routes: DispatchTable,
    readonly cancelPolicy: CancelPolicy,
  ) {
    this.logger = new Logger(`${this.constructor.name}`);
    this.table = new Map(Object.entries(routes));
    this.supportedSourceTypes = new Set(this.table.keys());

    const sorts = new Set<string>();
    for (const r of this.table.values()) r.sortModes?.forEach(s => sorts.add(s));
    this.supportedSortModes = sorts;
  }

  capabilities(): PlatformCapabilities {
    return {
      platform: this.platformName,
      sourceTypes: [...this.supportedSourceTypes],
      sortModes: [...this.supportedSortModes],
      routes: [...this.table.entries()].map(([sourceType, r]) => ({
        sourceType,
        sortModes: r.sortModes ? [...r.sortModes] : null,
        defaultSort: r.defaultSort ?? null,
        timeWindow: r.timeWindow,
      })),
    };
  }

  async fetch(request: RequestDescriptor, options: FetchOptions = {}): Promise<WordList> {
    const route = this.resolve(request);
    if (request.maxItems === 0) return { words: [], items: 0, partial: false };

    const acc = new WordListAccumulator(request.maxItems);
    const { signal, dispose } = linkSignal(options.signal, options.timeoutMs);
    const sort = route.sortModes ? request.sortMode ?? route.defaultSort ?? null : null;
    const window = request.timeWindow;

    const ctx: RouteContext = {
      signal,
      sort,
      remaining: () => request.maxItems - acc.items,
      logger: this.logger,
    };

    try {
      signal.throwIfAborted();
      for await (const item of route.fetch(request, ctx)) {
        signal.throwIfAborted();
        if (window && item.createdAt && !isWithinWindow(item.createdAt, window)) continue;
        acc.add(item.text);
        if (acc.full) break;
      }
      this.logger.debug(
        `${request.sourceType}:${request.sourceValue} -> ${acc.items} items, ${acc.wordCount} words`,
      );
      return acc.result();
    } catch (err) {
      if (isAbortError(err, signal)) {
        const partial = options.partialOnCancel ?? this.cancelPolicy === "partial";
        if (partial) {
          this.logger.warn(`${request.sourceType}:${request.sourceValue} cancelled, returning ${acc.items} items`);
          return acc.result(true);
        }
        throw new CancelledError(this.platformName, acc.wordCount, { cause: err });
      }
      if (err instanceof WordListError) throw err;
      throw new ProviderFetchError(this.platformName, errorMessage(err), undefined, { cause: err });
    } finally {
      dispose();
    }
  }

  private resolve(request: RequestDescriptor): SourceRoute {
    const route = this.table.get(request.sourceType);
    if (!route) {
      throw new UnsupportedSourceTypeError(this.platformName, request.sourceType, [...this.supportedSourceTypes]);
    }
    if (route.sortModes && request.sortMode && !route.sortModes.has(request.sortMode)) {
      throw new UnsupportedSortModeError(
        this.platformName,
        request.sourceType,
        request.sortMode,
        [...route.sortModes],
      );
    }
    if (request.timeWindow && !route.timeWindow) {
      throw new UnsupportedTimeWindowError(this.platformName, request.sourceType);
    }
    return route;
  }
}
