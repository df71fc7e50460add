export type WordListErrorCode =
  | "invalid_request"
  | "unknown_platform"
  | "unsupported_source_type"
  | "unsupported_sort_mode"
  | "unsupported_time_window"
  | "provider_init"
  | "provider_fetch"
  | "cancelled";

export abstract class WordListError extends Error {
  abstract readonly code: WordListErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends WordListError {
  readonly code = "invalid_request" as const;
}

export class UnknownPlatformError extends WordListError {
  readonly code = "unknown_platform" as const;

  constructor(readonly platform: string, available: string[]) {
    super(`No adapter for platform "${platform}". Available: ${available.join(", ") || "(none)"}`);
  }
}

export class UnsupportedSourceTypeError extends WordListError {
  readonly code = "unsupported_source_type" as const;

  constructor(readonly platform: string, readonly sourceType: string, supported: string[]) {
    super(`${platform} does not support source type "${sourceType}" (supported: ${supported.join(", ")})`);
  }
}

export class UnsupportedSortModeError extends WordListError {
  readonly code = "unsupported_sort_mode" as const;

  constructor(
    readonly platform: string,
    readonly sourceType: string,
    readonly sortMode: string,
    supported: string[],
  ) {
    super(
      supported.length
        ? `${platform}/${sourceType} does not support sort "${sortMode}" (supported: ${supported.join(", ")})`
        : `${platform}/${sourceType} has no sort modes, got "${sortMode}"`,
    );
  }
}

export class UnsupportedTimeWindowError extends WordListError {
  readonly code = "unsupported_time_window" as const;

  constructor(readonly platform: string, readonly sourceType: string) {
    super(`${platform}/${sourceType} cannot filter by time window`);
  }
}

export class ProviderInitError extends WordListError {
  readonly code = "provider_init" as const;

  constructor(readonly platform: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to initialize ${platform}: ${reason}`, options);
  }
}

export class ProviderFetchError extends WordListError {
  readonly code = "provider_fetch" as const;

  constructor(
    readonly platform: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${platform}: ${message}`, options);
  }
}

export class CancelledError extends WordListError {
  readonly code = "cancelled" as const;

  constructor(readonly platform: string, readonly wordsSoFar: number, options?: { cause?: unknown }) {
    super(`${platform} fetch cancelled after ${wordsSoFar} words`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
