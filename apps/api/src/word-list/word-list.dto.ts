import { z } from "zod";
import { MAX_TIMEOUT_MS } from "./cancellation";
import { RequestDescriptorInput } from "./request-descriptor";
import { InvalidRequestError } from "./word-list.errors";

export const wordListBodySchema = z.object({
  platform: z.string().min(1),
  sourceType: z.string().min(1),
  sourceValue: z.string().min(1),
  maxItems: z.number().int().min(0),
  timeWindow: z.object({ start: z.string(), end: z.string() }).nullable().optional(),
  sortMode: z.string().nullable().optional(),
  extraOptions: z.record(z.unknown()).optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  partialOnCancel: z.boolean().optional(),
});

export type WordListBody = z.infer<typeof wordListBodySchema>;

export type WordListResponse = {
  platform: string;
  sourceType: string;
  sourceValue: string;
  items: number;
  partial: boolean;
  words: string[];
};

export function parseWordListBody(body: unknown, maxItemsLimit: number): {
  input: RequestDescriptorInput;
  timeoutMs?: number;
  partialOnCancel?: boolean;
} {
  const parsed = wordListBodySchema.safeParse(body);
  if (!parsed.success) {
    const msg = parsed.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new InvalidRequestError(msg);
  }

  const { timeoutMs, partialOnCancel, ...input } = parsed.data;
  if (input.maxItems > maxItemsLimit) {
    throw new InvalidRequestError(`maxItems ${input.maxItems} exceeds the limit of ${maxItemsLimit}`);
  }
  return { input, timeoutMs, partialOnCancel };
}
