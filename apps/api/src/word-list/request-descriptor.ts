import { RequestDescriptor, TimeWindow } from "@core";
import { InvalidRequestError } from "./word-list.errors";

export type RequestDescriptorInput = {
  platform: string;
  sourceType: string;
  sourceValue: string;
  maxItems: number;
  timeWindow?: { start: Date | string; end: Date | string } | null;
  sortMode?: string | null;
  extraOptions?: Record<string, unknown>;
};

export function canonicalPlatform(name: string) {
  return name.trim().toLowerCase();
}

/**
 * Builds a frozen descriptor. Only adapter-independent rules are checked here;
 * source type and sort mode membership depend on the adapter that receives it.
 */
export function createRequestDescriptor(input: RequestDescriptorInput): RequestDescriptor {
  const platform = canonicalPlatform(input.platform ?? "");
  const sourceType = (input.sourceType ?? "").trim();
  const sourceValue = (input.sourceValue ?? "").trim();

  if (!platform) throw new InvalidRequestError("platform is required");
  if (!sourceType) throw new InvalidRequestError("sourceType is required");
  if (!sourceValue) throw new InvalidRequestError("sourceValue is required");

  if (!Number.isInteger(input.maxItems) || input.maxItems < 0) {
    throw new InvalidRequestError(`maxItems must be a non-negative integer, got ${input.maxItems}`);
  }

  const timeWindow = input.timeWindow ? toTimeWindow(input.timeWindow) : null;
  const sortMode = input.sortMode?.trim() || null;

  return Object.freeze({
    platform,
    sourceType,
    sourceValue,
    maxItems: input.maxItems,
    timeWindow,
    sortMode,
    extraOptions: Object.freeze({ ...(input.extraOptions ?? {}) }),
  });
}

function toTimeWindow(raw: { start: Date | string; end: Date | string }): Readonly<TimeWindow> {
  const start = toDate(raw.start, "timeWindow.start");
  const end = toDate(raw.end, "timeWindow.end");
  if (start.getTime() > end.getTime()) {
    throw new InvalidRequestError(
      `timeWindow.start (${start.toISOString()}) is after timeWindow.end (${end.toISOString()})`,
    );
  }
  return Object.freeze({ start, end });
}

function toDate(v: Date | string, field: string) {
  const d = v instanceof Date ? new Date(v.getTime()) : new Date(v);
  if (isNaN(d.getTime())) throw new InvalidRequestError(`${field} is not a valid date: ${String(v)}`);
  return d;
}

export function isWithinWindow(date: Date, window: Readonly<TimeWindow>) {
  const t = date.getTime();
  return t >= window.start.getTime() && t <= window.end.getTime();
}
