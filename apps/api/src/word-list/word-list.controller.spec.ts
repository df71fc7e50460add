import { INestApplication } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import request from "supertest";
import { WordListConfig } from "../config/word-list.config";
import { AdapterRegistry } from "./adapter.registry";
import { sleep } from "./cancellation";
import { BaseProviderAdapter } from "./provider-adapter";
import { WordListModule } from "./word-list.module";

class StubAdapter extends BaseProviderAdapter {
  constructor() {
    super(
      "stub",
      {
        feed: {
          sortModes: new Set(["new"]),
          defaultSort: "new",
          timeWindow: true,
          fetch: async function* () {
            yield { text: "hello big world" };
            yield { text: "again" };
          },
        },
        slow: {
          timeWindow: false,
          fetch: async function* (_req, ctx) {
            yield { text: "early bird" };
            await sleep(10_000, ctx.signal);
          },
        },
        broken: {
          timeWindow: false,
          fetch: async function* () {
            throw new Error("upstream exploded");
          },
        },
      },
      "error",
    );
  }
}

const config: WordListConfig = {
  credentials: { stub: {} },
  exclude: [],
  initPolicy: "fail-fast",
  timeoutMs: 5000,
  maxItemsLimit: 50,
  retry: { attempts: 1, baseDelayMs: 1, maxDelayMs: 1 },
};

describe("WordListController", () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => ({ wordList: config })] }),
        WordListModule,
      ],
    })
      .overrideProvider(AdapterRegistry)
      .useValue(new AdapterRegistry([{ platform: "stub", create: async () => new StubAdapter() }]))
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  const post = (body: object) => request(app.getHttpServer()).post("/word-list").send(body);

  it("GET /word-list/platforms lists what each adapter supports", async () => {
    const res = await request(app.getHttpServer()).get("/word-list/platforms").expect(200);

    expect(res.body).toEqual([
      {
        platform: "stub",
        sourceTypes: ["feed", "slow", "broken"],
        sortModes: ["new"],
        routes: [
          { sourceType: "feed", sortModes: ["new"], defaultSort: "new", timeWindow: true },
          { sourceType: "slow", sortModes: null, defaultSort: null, timeWindow: false },
          { sourceType: "broken", sortModes: null, defaultSort: null, timeWindow: false },
        ],
      },
    ]);
  });

  it("POST /word-list returns the flattened words", async () => {
    const res = await post({ platform: " Stub ", sourceType: "feed", sourceValue: "anything", maxItems: 5 }).expect(200);

    expect(res.body).toEqual({
      platform: "stub",
      sourceType: "feed",
      sourceValue: "anything",
      items: 2,
      partial: false,
      words: ["hello", "big", "world", "again"],
    });
  });

  it("maps an unknown platform to 404", async () => {
    const res = await post({ platform: "nowhere", sourceType: "feed", sourceValue: "x", maxItems: 5 }).expect(404);

    expect(res.body).toEqual({
      statusCode: 404,
      error: "unknown_platform",
      message: 'No adapter for platform "nowhere". Available: stub',
    });
  });

  it("maps a malformed body to 400", async () => {
    const res = await post({ platform: "stub", sourceType: "feed", maxItems: 5 }).expect(400);

    expect(res.body).toMatchObject({ error: "invalid_request", message: "sourceValue: Required" });
  });

  it("enforces the configured maxItems ceiling", async () => {
    const res = await post({ platform: "stub", sourceType: "feed", sourceValue: "x", maxItems: 99 }).expect(400);

    expect(res.body.message).toBe("maxItems 99 exceeds the limit of 50");
  });

  it("rejects a timeoutMs beyond what a timer can wait", async () => {
    const res = await post({
      platform: "stub",
      sourceType: "feed",
      sourceValue: "x",
      maxItems: 5,
      timeoutMs: 3_000_000_000,
    }).expect(400);

    expect(res.body.error).toBe("invalid_request");
  });

  it("maps an unsupported sort mode to 400", async () => {
    const res = await post({ platform: "stub", sourceType: "feed", sourceValue: "x", maxItems: 5, sortMode: "top" }).expect(
      400,
    );

    expect(res.body.error).toBe("unsupported_sort_mode");
  });

  it("maps a provider failure to 502", async () => {
    const res = await post({ platform: "stub", sourceType: "broken", sourceValue: "x", maxItems: 5 }).expect(502);

    expect(res.body.message).toBe("stub: upstream exploded");
  });

  it("maps a deadline to 504, or partial words when asked", async () => {
    const body = { platform: "stub", sourceType: "slow", sourceValue: "x", maxItems: 5, timeoutMs: 20 };

    const failed = await post(body).expect(504);
    const partial = await post({ ...body, partialOnCancel: true }).expect(200);

    expect(failed.body.error).toBe("cancelled");
    expect(partial.body).toMatchObject({ partial: true, items: 1, words: ["early", "bird"] });
  });
});
