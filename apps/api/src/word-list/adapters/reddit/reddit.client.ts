import { Logger } from "@nestjs/common";
import { z } from "zod";
import { AdapterDeps } from "../../adapter.registry";
import { abortable, linkSignal } from "../../cancellation";
import { ProviderHttp } from "../../provider-http";
import {
  Listing,
  ListingParams,
  RedditApi,
  RedditCredentials,
  Thing,
  commentsPageSchema,
  listingSchema,
  moreChildrenSchema,
  tokenSchema,
} from "./reddit.types";

const AUTH_BASE = "https://www.reddit.com";
const API_BASE = "https://oauth.reddit.com";

// refresh a minute before reddit says the token expires
const TOKEN_SKEW_MS = 60_000;
const HANDSHAKE_TIMEOUT_MS = 30_000;

export class RedditClient implements RedditApi {
  private readonly logger = new Logger(RedditClient.name);
  private token: { value: string; expiresAt: number } | null = null;
  private refreshing: Promise<string> | null = null;

  private constructor(
    private readonly creds: RedditCredentials,
    private readonly http: ProviderHttp,
  ) {}

  /** Creates the client and performs the OAuth handshake once, within the handshake timeout. */
  static async connect(creds: RedditCredentials, deps: AdapterDeps): Promise<RedditClient> {
    const client = new RedditClient(creds, new ProviderHttp("reddit", deps.retry, creds.userAgent));
    const { signal, dispose } = linkSignal(undefined, deps.handshakeTimeoutMs ?? HANDSHAKE_TIMEOUT_MS);
    try {
      await client.accessToken(signal);
    } finally {
      dispose();
    }
    return client;
  }

  async listing(path: string, params: ListingParams, signal?: AbortSignal): Promise<Listing> {
    return this.get(path, { ...params, raw_json: 1 }, listingSchema, signal);
  }

  async comments(
    postId: string,
    params: { sort?: string | null; comment?: string; depth?: number; limit?: number },
    signal?: AbortSignal,
  ): Promise<[Listing, Listing]> {
    return this.get(
      `/comments/${encodeURIComponent(postId)}`,
      {
        sort: params.sort ?? undefined,
        comment: params.comment,
        depth: params.depth,
        limit: params.limit,
        raw_json: 1,
      },
      commentsPageSchema,
      signal,
    );
  }

  async moreChildren(linkId: string, children: string[], sort: string | null, signal?: AbortSignal): Promise<Thing[]> {
    const res = await this.get(
      "/api/morechildren",
      {
        api_type: "json",
        link_id: linkId,
        children: children.join(","),
        sort: sort ?? undefined,
        limit_children: "false",
        raw_json: 1,
      },
      moreChildrenSchema,
      signal,
    );
    return res.json.data?.things ?? [];
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    params: ListingParams,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.infer<S>> {
    const url = new URL(path, this.creds.apiBaseUrl ?? API_BASE);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined && v !== "") url.searchParams.set(k, String(v));
    }
    const token = await this.accessToken(signal);
    this.logger.debug(`GET ${url.pathname}${url.search}`);
    return this.http.json(url, schema, {
      headers: { authorization: `bearer ${token}` },
      signal,
    });
  }

  // Concurrent fetches share one handle, so a refresh is single-flight and never
  // aborted; each caller stops waiting on its own signal instead.
  private async accessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) return this.token.value;
    if (!this.refreshing) {
      this.refreshing = this.requestToken().finally(() => {
        this.refreshing = null;
      });
    }
    return abortable(this.refreshing, signal);
  }

  private async requestToken(): Promise<string> {
    const { clientId, clientSecret, username, password } = this.creds;
    const form = new URLSearchParams(
      username && password
        ? { grant_type: "password", username, password }
        : { grant_type: "client_credentials" },
    );
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    const res = await this.http.json(new URL("/api/v1/access_token", this.creds.authBaseUrl ?? AUTH_BASE), tokenSchema, {
      method: "POST",
      headers: {
        authorization: `Basic ${basic}`,
        "content-type": "application/x-www-form-urlencoded",
      },
      body: form.toString(),
    });

    this.token = {
      value: res.access_token,
      expiresAt: Date.now() + Math.max(0, res.expires_in * 1000 - TOKEN_SKEW_MS),
    };
    this.logger.debug(`Obtained access token, expires in ${res.expires_in}s`);
    return res.access_token;
  }
}
