import { RequestDescriptor, SourceItem } from "@core";
import { AdapterRegistration } from "../../adapter.registry";
import { BaseProviderAdapter, DispatchTable, RouteContext } from "../../provider-adapter";
import { InvalidRequestError, ProviderInitError, errorMessage } from "../../word-list.errors";
import { RedditClient } from "./reddit.client";
import { ThreadWalker, toNodes } from "./reddit.thread";
import {
  ListingParams,
  RedditApi,
  Thing,
  commentDataSchema,
  linkDataSchema,
  redditCredentialsSchema,
} from "./reddit.types";

const PAGE_MAX = 100;

const SUBREDDIT_SORTS = new Set(["hot", "new", "top", "rising", "controversial"]);
const USER_SORTS = new Set(["hot", "new", "top", "controversial"]);
const COMMENT_SORTS = new Set(["confidence", "top", "new", "controversial", "old", "qa"]);

const TIME_FILTERS = new Set(["hour", "day", "week", "month", "year", "all"]);
const USER_HISTORY = new Set(["submitted", "comments", "overview"]);

/**
 * Reddit: subreddit listings, a user's own history, and a single thread.
 * Cancellation returns what was gathered so far (partial), since a fully
 * expanded thread can take arbitrarily long.
 */
export class RedditAdapter extends BaseProviderAdapter {
  constructor(api: RedditApi) {
    super("reddit", redditRoutes(api), "partial");
  }
}

export function redditRoutes(api: RedditApi): DispatchTable {
  return {
    subreddit: {
      sortModes: SUBREDDIT_SORTS,
      defaultSort: "hot",
      timeWindow: true,
      fetch: (req, ctx) => {
        const name = req.sourceValue.replace(/^\/?r\//i, "");
        const sort = ctx.sort ?? "hot";
        return paginate(api, `/r/${encodeURIComponent(name)}/${sort}`, timeFilterParams(req, sort), req, ctx);
      },
    },

    // ordering applies to the user's own history, not a global feed
    user: {
      sortModes: USER_SORTS,
      defaultSort: "new",
      timeWindow: true,
      fetch: (req, ctx) => {
        const name = req.sourceValue.replace(/^\/?u(ser)?\//i, "");
        const sort = ctx.sort ?? "new";
        const history = optionIn(req, "history", USER_HISTORY) ?? "submitted";
        return paginate(
          api,
          `/user/${encodeURIComponent(name)}/${history}`,
          { sort, ...timeFilterParams(req, sort) },
          req,
          ctx,
        );
      },
    },

    post: {
      sortModes: COMMENT_SORTS,
      defaultSort: "confidence",
      timeWindow: true,
      fetch: (req, ctx) => threadItems(api, req, ctx),
    },
  };
}

export const redditRegistration: AdapterRegistration = {
  platform: "reddit",
  async create(credentials, deps) {
    const parsed = redditCredentialsSchema.safeParse(credentials);
    if (!parsed.success) {
      throw new ProviderInitError("reddit", `invalid credentials: ${parsed.error.issues.map(i => i.message).join("; ")}`);
    }
    try {
      return new RedditAdapter(await RedditClient.connect(parsed.data, deps));
    } catch (err) {
      throw new ProviderInitError("reddit", `handshake failed: ${errorMessage(err)}`, { cause: err });
    }
  },
};

/* ===================== routines ===================== */

async function* paginate(
  api: RedditApi,
  path: string,
  params: ListingParams,
  req: RequestDescriptor,
  ctx: RouteContext,
): AsyncGenerator<SourceItem> {
  // "new" is newest-first, so nothing older than the window start can follow
  const stopBefore = params.sort === "new" || path.endsWith("/new") ? req.timeWindow?.start : undefined;
  let after: string | undefined;
  let page = 0;

  do {
    const limit = Math.min(PAGE_MAX, Math.max(1, ctx.remaining()));
    const listing = await api.listing(path, { ...params, limit, after }, ctx.signal);
    const children = listing.data.children;
    page++;
    ctx.logger.debug(`${path} page ${page}: ${children.length} items`);

    for (const child of children) {
      const item = toItem(child);
      if (!item) continue;
      if (stopBefore && item.createdAt && item.createdAt < stopBefore) return;
      yield item;
    }

    if (children.length === 0) return;
    after = listing.data.after ?? undefined;
  } while (after);
}

async function* threadItems(api: RedditApi, req: RequestDescriptor, ctx: RouteContext): AsyncGenerator<SourceItem> {
  const postId = req.sourceValue.replace(/^t3_/, "");
  const expand = req.extraOptions.expandReplies === true;

  const [post, tree] = await api.comments(
    postId,
    { sort: ctx.sort, depth: expand ? undefined : 1 },
    ctx.signal,
  );

  for (const child of post.data.children) {
    const item = toItem(child);
    if (item) yield item;
  }

  const walker = new ThreadWalker(api, postId, ctx.sort, expand, ctx.signal);
  try {
    yield* walker.walk(toNodes(tree.data.children));
  } finally {
    if (walker.expanded) ctx.logger.debug(`post ${postId}: ${walker.expanded} placeholder expansions`);
  }
}

function toItem(thing: Thing): SourceItem | null {
  if (thing.kind === "t3") {
    const link = linkDataSchema.safeParse(thing.data);
    return link.success ? { text: link.data.title, createdAt: new Date(link.data.created_utc * 1000) } : null;
  }
  if (thing.kind === "t1") {
    const c = commentDataSchema.safeParse(thing.data);
    return c.success ? { text: c.data.body, createdAt: new Date(c.data.created_utc * 1000) } : null;
  }
  return null;
}

function timeFilterParams(req: RequestDescriptor, sort: string): ListingParams {
  const t = optionIn(req, "timeFilter", TIME_FILTERS);
  return t && (sort === "top" || sort === "controversial") ? { t } : {};
}

function optionIn(req: RequestDescriptor, key: string, allowed: ReadonlySet<string>): string | undefined {
  const v = req.extraOptions[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string" || !allowed.has(v)) {
    throw new InvalidRequestError(`extraOptions.${key} must be one of ${[...allowed].join(", ")}`);
  }
  return v;
}
