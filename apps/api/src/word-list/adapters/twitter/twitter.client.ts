import { Logger } from "@nestjs/common";
import { z } from "zod";
import { AdapterDeps } from "../../adapter.registry";
import { ProviderHttp } from "../../provider-http";
import { ProviderFetchError } from "../../word-list.errors";
import {
  PageParams,
  Tweet,
  TweetPage,
  TwitterApi,
  TwitterCredentials,
  tweetLookupSchema,
  tweetPageSchema,
  userLookupSchema,
} from "./twitter.types";

const API_BASE = "https://api.twitter.com";
const TWEET_FIELDS = "created_at,conversation_id";

export class TwitterClient implements TwitterApi {
  private readonly logger = new Logger(TwitterClient.name);
  private readonly http: ProviderHttp;
  private readonly userIds = new Map<string, string>();

  constructor(private readonly creds: TwitterCredentials, deps: AdapterDeps) {
    this.http = new ProviderHttp("twitter", deps.retry);
  }

  async searchRecent(query: string, params: PageParams, signal?: AbortSignal): Promise<TweetPage> {
    const res = await this.get(
      "/2/tweets/search/recent",
      {
        query,
        max_results: params.maxResults,
        next_token: params.next,
        start_time: params.startTime,
        end_time: params.endTime,
        "tweet.fields": TWEET_FIELDS,
      },
      tweetPageSchema,
      signal,
    );
    return { tweets: res.data ?? [], nextToken: res.meta?.next_token };
  }

  async userId(username: string, signal?: AbortSignal): Promise<string> {
    const key = username.toLowerCase();
    const cached = this.userIds.get(key);
    if (cached) return cached;

    const res = await this.get(`/2/users/by/username/${encodeURIComponent(username)}`, {}, userLookupSchema, signal);
    if (!res.data) {
      throw new ProviderFetchError("twitter", `user @${username} not found: ${res.errors?.[0]?.detail ?? "no data"}`, 404);
    }
    this.userIds.set(key, res.data.id);
    return res.data.id;
  }

  async userTweets(
    userId: string,
    params: PageParams & { exclude?: string[] },
    signal?: AbortSignal,
  ): Promise<TweetPage> {
    const res = await this.get(
      `/2/users/${encodeURIComponent(userId)}/tweets`,
      {
        max_results: params.maxResults,
        pagination_token: params.next,
        start_time: params.startTime,
        end_time: params.endTime,
        exclude: params.exclude?.length ? params.exclude.join(",") : undefined,
        "tweet.fields": TWEET_FIELDS,
      },
      tweetPageSchema,
      signal,
    );
    return { tweets: res.data ?? [], nextToken: res.meta?.next_token };
  }

  async tweet(id: string, signal?: AbortSignal): Promise<Tweet> {
    const res = await this.get(`/2/tweets/${encodeURIComponent(id)}`, { "tweet.fields": TWEET_FIELDS }, tweetLookupSchema, signal);
    if (!res.data) {
      throw new ProviderFetchError("twitter", `tweet ${id} not found: ${res.errors?.[0]?.detail ?? "no data"}`, 404);
    }
    return res.data;
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string | number | undefined>,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.infer<S>> {
    const url = new URL(path, this.creds.baseUrl ?? API_BASE);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }
    this.logger.debug(`GET ${url.pathname}`);
    return this.http.json(url, schema, {
      headers: { authorization: `Bearer ${this.creds.bearerToken}` },
      signal,
    });
  }
}
