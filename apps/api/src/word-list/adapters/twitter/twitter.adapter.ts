import { RequestDescriptor, SourceItem } from "@core";
import { AdapterRegistration } from "../../adapter.registry";
import { BaseProviderAdapter, DispatchTable, RouteContext } from "../../provider-adapter";
import { InvalidRequestError, ProviderInitError } from "../../word-list.errors";
import { TwitterClient } from "./twitter.client";
import { PageParams, Tweet, TweetPage, TwitterApi, twitterCredentialsSchema } from "./twitter.types";

const SEARCH_PAGE = { min: 10, max: 100 };
const TIMELINE_PAGE = { min: 5, max: 100 };

const USER_EXCLUDES = new Set(["retweets", "replies"]);

// neither the recent-search stream nor a timeline can be reordered
const NO_SORT: ReadonlySet<string> = new Set();

/**
 * X/Twitter v2: hashtag search, a user's timeline, and a single conversation.
 * Cancellation throws CancelledError; pass partialOnCancel to get what was read.
 */
export class TwitterAdapter extends BaseProviderAdapter {
  constructor(api: TwitterApi) {
    super("twitter", twitterRoutes(api), "error");
  }
}

export function twitterRoutes(api: TwitterApi): DispatchTable {
  return {
    hashtag: {
      sortModes: NO_SORT,
      timeWindow: true,
      fetch: (req, ctx) => {
        const tag = req.sourceValue.replace(/^#/, "");
        let query = `#${tag}`;
        if (req.extraOptions.excludeRetweets === true) query += " -is:retweet";
        return pages(ctx, SEARCH_PAGE, params => api.searchRecent(query, withWindow(params, req), ctx.signal));
      },
    },

    user: {
      sortModes: NO_SORT,
      timeWindow: true,
      fetch: (req, ctx) => userTimeline(api, req, ctx),
    },

    // replies come back in whatever order search returns them; sortMode is ignored
    tweet: {
      timeWindow: true,
      fetch: (req, ctx) => conversation(api, req, ctx),
    },
  };
}

export const twitterRegistration: AdapterRegistration = {
  platform: "twitter",
  async create(credentials, deps) {
    const parsed = twitterCredentialsSchema.safeParse(credentials);
    if (!parsed.success) {
      throw new ProviderInitError("twitter", `invalid credentials: ${parsed.error.issues.map(i => i.message).join("; ")}`);
    }
    return new TwitterAdapter(new TwitterClient(parsed.data, deps));
  },
};

/* ===================== routines ===================== */

async function* pages(
  ctx: RouteContext,
  bounds: { min: number; max: number },
  load: (params: PageParams) => Promise<TweetPage>,
): AsyncGenerator<SourceItem> {
  let next: string | undefined;
  do {
    const maxResults = Math.min(bounds.max, Math.max(bounds.min, ctx.remaining()));
    const page = await load({ maxResults, next });
    for (const t of page.tweets) yield toItem(t);
    next = page.nextToken;
  } while (next);
}

async function* userTimeline(api: TwitterApi, req: RequestDescriptor, ctx: RouteContext): AsyncGenerator<SourceItem> {
  const exclude = excludeOption(req);
  const userId = await api.userId(req.sourceValue.replace(/^@/, ""), ctx.signal);
  yield* pages(ctx, TIMELINE_PAGE, params => api.userTweets(userId, { ...withWindow(params, req), exclude }, ctx.signal));
}

async function* conversation(api: TwitterApi, req: RequestDescriptor, ctx: RouteContext): AsyncGenerator<SourceItem> {
  const root = await api.tweet(req.sourceValue, ctx.signal);
  yield toItem(root);

  const conversationId = root.conversation_id ?? root.id;
  // search also matches the root itself while it is recent enough
  yield* pages(ctx, SEARCH_PAGE, async params => {
    const page = await api.searchRecent(`conversation_id:${conversationId}`, withWindow(params, req), ctx.signal);
    return { ...page, tweets: page.tweets.filter(t => t.id !== root.id) };
  });
}

function toItem(t: Tweet): SourceItem {
  const createdAt = t.created_at ? new Date(t.created_at) : undefined;
  return { text: t.text, createdAt: createdAt && !isNaN(createdAt.getTime()) ? createdAt : undefined };
}

// end_time is exclusive and must lie at least 10s in the past
const END_TIME_STEP_MS = 1000;
const END_TIME_LAG_MS = 10_000;

/** Widens the window server-side; the base adapter trims it back to the inclusive bounds. */
function withWindow(params: PageParams, req: RequestDescriptor): PageParams {
  if (!req.timeWindow) return params;
  const start = req.timeWindow.start.getTime();
  const end = Math.min(req.timeWindow.end.getTime() + END_TIME_STEP_MS, Date.now() - END_TIME_LAG_MS);
  return {
    ...params,
    startTime: new Date(start).toISOString(),
    endTime: end > start ? new Date(end).toISOString() : undefined,
  };
}

function excludeOption(req: RequestDescriptor): string[] | undefined {
  const v = req.extraOptions.exclude;
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === "string" && USER_EXCLUDES.has(x))) {
    throw new InvalidRequestError(`extraOptions.exclude must be a list of: ${[...USER_EXCLUDES].join(", ")}`);
  }
  return v;
}
