import { z } from "zod";

export const twitterCredentialsSchema = z.object({
  bearerToken: z.string().min(1),
  baseUrl: z.string().url().optional(),
});

export type TwitterCredentials = z.infer<typeof twitterCredentialsSchema>;

export const tweetSchema = z.object({
  id: z.string(),
  text: z.string(),
  created_at: z.string().optional(),
  conversation_id: z.string().optional(),
});

export type Tweet = z.infer<typeof tweetSchema>;

const apiErrorSchema = z.object({ detail: z.string().optional(), title: z.string().optional() });

export const tweetPageSchema = z.object({
  data: z.array(tweetSchema).optional(), // absent when nothing matched
  meta: z
    .object({
      result_count: z.number().optional(),
      next_token: z.string().optional(),
    })
    .optional(),
});

export const tweetLookupSchema = z.object({
  data: tweetSchema.optional(),
  errors: z.array(apiErrorSchema).optional(),
});

export const userLookupSchema = z.object({
  data: z.object({ id: z.string(), username: z.string() }).optional(),
  errors: z.array(apiErrorSchema).optional(),
});

export type TweetPage = {
  tweets: Tweet[];
  nextToken?: string;
};

export type PageParams = {
  maxResults: number;
  next?: string;
  startTime?: string;
  endTime?: string;
};

/** The slice of the X/Twitter v2 API the adapter needs. Tests substitute a fake. */
export interface TwitterApi {
  searchRecent(query: string, params: PageParams, signal?: AbortSignal): Promise<TweetPage>;
  userId(username: string, signal?: AbortSignal): Promise<string>;
  userTweets(userId: string, params: PageParams & { exclude?: string[] }, signal?: AbortSignal): Promise<TweetPage>;
  tweet(id: string, signal?: AbortSignal): Promise<Tweet>;
}
