export type TimeWindow = {
  start: Date;
  end: Date;
};

export type ExtraOptions = Readonly<Record<string, unknown>>;

export interface RequestDescriptor {
  readonly platform: string;
  readonly sourceType: string;
  readonly sourceValue: string;
  readonly maxItems: number;
  readonly timeWindow: Readonly<TimeWindow> | null;
  readonly sortMode: string | null;
  readonly extraOptions: ExtraOptions;
}

/** One provider-native item reduced to the text field that gets tokenized. */
export interface SourceItem {
  text: string;
  createdAt?: Date;
}

export interface WordList {
  words: string[];
  items: number; // raw items consumed, never above maxItems
  partial: boolean; // true only when cancellation cut the fetch short
}

export interface PlatformCapabilities {
  platform: string;
  sourceTypes: string[];
  sortModes: string[];
  routes: Array<{
    sourceType: string;
    sortModes: string[] | null; // null = sort not meaningful, ignored
    defaultSort: string | null;
    timeWindow: boolean;
  }>;
}
