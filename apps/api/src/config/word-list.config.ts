import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../word-list/cancellation";

const platformsFileSchema = z
  .object({
    // platform -> credential bundle; each adapter validates its own bundle
    platforms: z.record(z.unknown()).default({}),
    exclude: z.array(z.string()).default([]),
    initPolicy: z.enum(["fail-soft", "fail-fast"]).default("fail-soft"),
  })
  .default({});

export type WordListConfig = {
  credentials: Record<string, unknown>;
  exclude: string[];
  initPolicy: "fail-soft" | "fail-fast";
  timeoutMs: number;
  maxItemsLimit: number;
  retry: {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
};

export function loadWordListConfig(env: NodeJS.ProcessEnv = process.env): WordListConfig {
  const file = path.resolve(process.cwd(), env.PLATFORMS_FILE || "platforms.yml");
  const raw = fs.existsSync(file) ? yaml.load(fs.readFileSync(file, "utf-8")) : undefined;

  const parsed = platformsFileSchema.safeParse(interpolate(raw, env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${file}: ${issue?.path.join(".")} ${issue?.message}`);
  }

  const envExclude = (env.WORDLIST_EXCLUDE ?? "")
    .split(",")
    .map(s => s.trim())
    .filter(Boolean);

  return {
    credentials: parsed.data.platforms,
    exclude: [...parsed.data.exclude, ...envExclude],
    initPolicy: parsed.data.initPolicy,
    timeoutMs: Math.min(num(env.WORDLIST_TIMEOUT_MS, 30000), MAX_TIMEOUT_MS),
    maxItemsLimit: num(env.WORDLIST_MAX_ITEMS_LIMIT, 5000),
    retry: {
      attempts: num(env.WORDLIST_RETRY_ATTEMPTS, 3),
      baseDelayMs: num(env.WORDLIST_RETRY_BASE_MS, 500),
      maxDelayMs: num(env.WORDLIST_RETRY_MAX_MS, 8000),
    },
  };
}

export default () => ({
  wordList: loadWordListConfig(),
});

/** Replaces ${NAME} in string values with the environment variable, or "" when unset. */
export function interpolate(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(value)) return value.map(v => interpolate(v, env));
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, interpolate(v, env)]));
  }
  return value;
}

function num(raw: string | undefined, fallback: number) {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}
