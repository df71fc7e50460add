import { createRequestDescriptor, RequestDescriptorInput } from "../../request-descriptor";
import { DEFAULT_RETRY } from "../../provider-http";
import {
  CancelledError,
  InvalidRequestError,
  ProviderInitError,
  UnsupportedSortModeError,
} from "../../word-list.errors";
import { TwitterAdapter, twitterRegistration } from "./twitter.adapter";
import { PageParams, Tweet, TweetPage, TwitterApi } from "./twitter.types";

const tweet = (id: string, text: string, extra: Partial<Tweet> = {}): Tweet => ({
  id,
  text,
  created_at: "2024-03-10T12:00:00.000Z",
  ...extra,
});

class FakeTwitterApi implements TwitterApi {
  readonly searches: Array<{ query: string; params: PageParams }> = [];
  readonly timelines: Array<{ userId: string; params: PageParams & { exclude?: string[] } }> = [];
  readonly lookups: string[] = [];
  /** pages served in order, for search and timelines alike */
  pages: TweetPage[] = [];
  root: Tweet = tweet("100", "root tweet", { conversation_id: "100" });
  stall = false;

  async searchRecent(query: string, params: PageParams, signal?: AbortSignal): Promise<TweetPage> {
    this.searches.push({ query, params });
    return this.serve(signal);
  }

  async userId(username: string): Promise<string> {
    this.lookups.push(username);
    return `id-${username}`;
  }

  async userTweets(userId: string, params: PageParams & { exclude?: string[] }, signal?: AbortSignal) {
    this.timelines.push({ userId, params });
    return this.serve(signal);
  }

  async tweet(id: string): Promise<Tweet> {
    this.lookups.push(id);
    return this.root;
  }

  private serve(signal?: AbortSignal): Promise<TweetPage> {
    if (this.stall && signal) {
      return new Promise((_, reject) => signal.addEventListener("abort", () => reject(signal.reason), { once: true }));
    }
    return Promise.resolve(this.pages.shift() ?? { tweets: [] });
  }
}

function request(overrides: Partial<RequestDescriptorInput>) {
  return createRequestDescriptor({
    platform: "twitter",
    sourceType: "hashtag",
    sourceValue: "#typescript",
    maxItems: 25,
    ...overrides,
  });
}

describe("TwitterAdapter", () => {
  let api: FakeTwitterApi;
  let adapter: TwitterAdapter;

  beforeEach(() => {
    api = new FakeTwitterApi();
    adapter = new TwitterAdapter(api);
  });

  it("declares no sort modes at all", () => {
    expect(adapter.platformName).toBe("twitter");
    expect([...adapter.supportedSourceTypes]).toEqual(["hashtag", "user", "tweet"]);
    expect(adapter.supportedSortModes.size).toBe(0);
    expect(adapter.cancelPolicy).toBe("error");
  });

  describe("hashtag", () => {
    it("searches recent tweets page by page", async () => {
      api.pages = [
        { tweets: [tweet("1", "hello #typescript"), tweet("2", "types are nice")], nextToken: "n1" },
        { tweets: [tweet("3", "last one")] },
      ];

      const res = await adapter.fetch(request({}));

      expect(res).toEqual({
        words: ["hello", "#typescript", "types", "are", "nice", "last", "one"],
        items: 3,
        partial: false,
      });
      expect(api.searches).toEqual([
        { query: "#typescript", params: { maxResults: 25, next: undefined } },
        { query: "#typescript", params: { maxResults: 23, next: "n1" } },
      ]);
    });

    it("asks for at least the smallest page search allows", async () => {
      await adapter.fetch(request({ maxItems: 3 }));
      await adapter.fetch(request({ maxItems: 500 }));

      expect(api.searches.map(s => s.params.maxResults)).toEqual([10, 100]);
    });

    it("drops retweets and sends the window when asked", async () => {
      await adapter.fetch(
        request({
          sourceValue: "ts",
          extraOptions: { excludeRetweets: true },
          timeWindow: { start: "2024-03-01T00:00:00Z", end: "2024-03-31T00:00:00Z" },
        }),
      );

      expect(api.searches[0]).toEqual({
        query: "#ts -is:retweet",
        params: {
          maxResults: 25,
          next: undefined,
          startTime: "2024-03-01T00:00:00.000Z",
          endTime: "2024-03-31T00:00:01.000Z",
        },
      });
    });

    it("keeps end_time at least ten seconds behind the clock", async () => {
      jest.spyOn(Date, "now").mockReturnValue(Date.parse("2024-04-01T00:00:05Z"));
      try {
        await adapter.fetch(
          request({ timeWindow: { start: "2024-03-25T00:00:00Z", end: "2024-04-01T00:00:00Z" } }),
        );
      } finally {
        jest.restoreAllMocks();
      }

      expect(api.searches[0]?.params).toMatchObject({
        startTime: "2024-03-25T00:00:00.000Z",
        endTime: "2024-03-31T23:59:55.000Z",
      });
    });

    it("returns a tweet stamped exactly at the window end", async () => {
      api.pages = [
        {
          tweets: [
            tweet("1", "on the dot", { created_at: "2024-03-31T00:00:00.000Z" }),
            tweet("2", "a second late", { created_at: "2024-03-31T00:00:01.000Z" }),
          ],
        },
      ];

      const res = await adapter.fetch(
        request({ timeWindow: { start: "2024-03-01T00:00:00Z", end: "2024-03-31T00:00:00Z" } }),
      );

      expect(res.words).toEqual(["on", "the", "dot"]);
    });

    it("rejects any sort mode", async () => {
      await expect(adapter.fetch(request({ sortMode: "top" }))).rejects.toBeInstanceOf(UnsupportedSortModeError);
      expect(api.searches).toHaveLength(0);
    });
  });

  describe("user", () => {
    it("resolves the handle and reads the timeline with exclusions", async () => {
      api.pages = [{ tweets: [tweet("7", "morning all")] }];

      const res = await adapter.fetch(
        request({ sourceType: "user", sourceValue: "@someone", maxItems: 2, extraOptions: { exclude: ["replies"] } }),
      );

      expect(res.words).toEqual(["morning", "all"]);
      expect(api.lookups).toEqual(["someone"]);
      expect(api.timelines).toEqual([
        { userId: "id-someone", params: { maxResults: 5, next: undefined, exclude: ["replies"] } },
      ]);
    });

    it("rejects an unknown exclusion before any call", async () => {
      await expect(
        adapter.fetch(request({ sourceType: "user", sourceValue: "someone", extraOptions: { exclude: ["likes"] } })),
      ).rejects.toBeInstanceOf(InvalidRequestError);
      expect(api.lookups).toHaveLength(0);
    });
  });

  describe("tweet", () => {
    it("yields the root, then its replies without repeating the root", async () => {
      api.pages = [
        { tweets: [tweet("101", "first reply"), tweet("100", "root tweet")], nextToken: "n1" },
        { tweets: [tweet("102", "second reply")] },
      ];

      const res = await adapter.fetch(request({ sourceType: "tweet", sourceValue: "100", sortMode: "ignored" }));

      expect(res.words).toEqual(["root", "tweet", "first", "reply", "second", "reply"]);
      expect(res.items).toBe(3);
      expect(api.searches.map(s => s.query)).toEqual(["conversation_id:100", "conversation_id:100"]);
    });

    it("searches the conversation of a reply, not the reply itself", async () => {
      api.root = tweet("205", "a reply", { conversation_id: "200" });

      await adapter.fetch(request({ sourceType: "tweet", sourceValue: "205" }));

      expect(api.searches[0]?.query).toBe("conversation_id:200");
    });
  });

  describe("cancellation", () => {
    it("throws CancelledError when the deadline passes", async () => {
      api.stall = true;

      await expect(adapter.fetch(request({}), { timeoutMs: 30 })).rejects.toBeInstanceOf(CancelledError);
    });

    it("returns what it has when partial results are requested", async () => {
      api.stall = true;

      const res = await adapter.fetch(request({ sourceType: "tweet", sourceValue: "100" }), {
        timeoutMs: 30,
        partialOnCancel: true,
      });

      expect(res).toEqual({ words: ["root", "tweet"], items: 1, partial: true });
    });
  });

  describe("registration", () => {
    it("needs a bearer token", async () => {
      await expect(twitterRegistration.create({}, { retry: DEFAULT_RETRY })).rejects.toBeInstanceOf(ProviderInitError);
    });

    it("builds an adapter without touching the network", async () => {
      const created = await twitterRegistration.create({ bearerToken: "test-secret" }, { retry: DEFAULT_RETRY });

      expect(created.platformName).toBe("twitter");
    });
  });
});
