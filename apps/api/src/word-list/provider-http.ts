import { Logger } from "@nestjs/common";
import { request } from "undici";
import { z } from "zod";
import { isAbortError, sleep } from "./cancellation";
import { ProviderFetchError, errorMessage } from "./word-list.errors";

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export type HttpInit = {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

type Attempt =
  | { ok: true; text: string }
  | { ok: false; transient: boolean; status?: number; message: string; retryAfterMs?: number; cause?: unknown };

/**
 * JSON-over-HTTP for one provider: bounded retry with exponential backoff on
 * 429, 5xx and network faults, then a zod check of the payload shape.
 * Aborts are rethrown untouched so the adapter can decide partial vs cancelled.
 */
export class ProviderHttp {
  private readonly logger: Logger;

  constructor(
    private readonly platform: string,
    private readonly retry: RetryOptions = DEFAULT_RETRY,
    private readonly userAgent = "word-list/0.1",
  ) {
    this.logger = new Logger(`ProviderHttp:${platform}`);
  }

  async json<S extends z.ZodTypeAny>(url: string | URL, schema: S, init: HttpInit = {}): Promise<z.infer<S>> {
    const text = await this.send(url.toString(), init);

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      throw new ProviderFetchError(this.platform, `non-JSON response: ${text.slice(0, 200)}`, undefined, { cause: err });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderFetchError(
        this.platform,
        `unexpected response shape from ${redact(url)}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return parsed.data;
  }

  private async send(url: string, init: HttpInit): Promise<string> {
    const attempts = Math.max(1, this.retry.attempts);

    for (let attempt = 1; ; attempt++) {
      const res = await this.attempt(url, init);
      if (res.ok) return res.text;

      if (!res.transient) {
        throw new ProviderFetchError(this.platform, res.message, res.status, { cause: res.cause });
      }
      if (attempt >= attempts) {
        throw new ProviderFetchError(
          this.platform,
          `${res.message} (gave up after ${attempts} attempts)`,
          res.status,
          { cause: res.cause },
        );
      }

      const backoff = Math.min(this.retry.maxDelayMs, this.retry.baseDelayMs * 2 ** (attempt - 1));
      const delay = Math.min(this.retry.maxDelayMs, res.retryAfterMs ?? backoff);
      this.logger.warn(`${res.message}; retry ${attempt}/${attempts - 1} in ${delay}ms`);
      await sleep(delay, init.signal);
    }
  }

  private async attempt(url: string, init: HttpInit): Promise<Attempt> {
    try {
      const { statusCode, headers, body } = await request(url, {
        method: init.method ?? "GET",
        headers: { "user-agent": this.userAgent, accept: "application/json", ...init.headers },
        body: init.body,
        signal: init.signal,
      });
      const text = await body.text();

      if (statusCode >= 200 && statusCode < 300) return { ok: true, text };

      const message = `HTTP ${statusCode} from ${redact(url)}: ${text.slice(0, 200)}`;
      if (statusCode === 429 || statusCode >= 500) {
        return { ok: false, transient: true, status: statusCode, message, retryAfterMs: retryAfter(headers["retry-after"]) };
      }
      return { ok: false, transient: false, status: statusCode, message };
    } catch (err) {
      if (isAbortError(err, init.signal)) throw err;
      return { ok: false, transient: true, message: `network error on ${redact(url)}: ${errorMessage(err)}`, cause: err };
    }
  }
}

function retryAfter(raw: string | string[] | undefined): number | undefined {
  const v = Array.isArray(raw) ? raw[0] : raw;
  if (!v) return undefined;
  const secs = Number(v);
  return Number.isFinite(secs) && secs >= 0 ? secs * 1000 : undefined;
}

function redact(url: string | URL) {
  const u = new URL(url.toString());
  return `${u.origin}${u.pathname}`;
}
