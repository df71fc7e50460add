import { z } from "zod";

export const redditCredentialsSchema = z
  .object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    userAgent: z.string().min(1),
    // script apps may authenticate as a user; otherwise app-only
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    authBaseUrl: z.string().url().optional(),
    apiBaseUrl: z.string().url().optional(),
  })
  .refine(c => !c.username === !c.password, { message: "username and password must be given together" });

export type RedditCredentials = z.infer<typeof redditCredentialsSchema>;

export const tokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
});

export const thingSchema = z.object({
  kind: z.string(),
  data: z.record(z.unknown()),
});

export type Thing = z.infer<typeof thingSchema>;

export const listingSchema = z.object({
  kind: z.literal("Listing"),
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(thingSchema),
  }),
});

export type Listing = z.infer<typeof listingSchema>;

/** /comments/{id} answers with [submission listing, comment tree listing]. */
export const commentsPageSchema = z.tuple([listingSchema, listingSchema]);

export const moreChildrenSchema = z.object({
  json: z.object({
    errors: z.array(z.unknown()).optional(),
    data: z.object({ things: z.array(thingSchema) }).optional(),
  }),
});

// t3
export const linkDataSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  title: z.string(),
  created_utc: z.number(),
});

// t1
export const commentDataSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  parent_id: z.string().optional(),
  body: z.string(),
  created_utc: z.number(),
  replies: z.unknown().optional(), // Listing, or "" when there are none
});

export const moreDataSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  parent_id: z.string(),
  count: z.number().optional(),
  children: z.array(z.string()),
});

export type ListingParams = Record<string, string | number | undefined>;

/** The slice of the Reddit API the adapter needs. Tests substitute a fake. */
export interface RedditApi {
  listing(path: string, params: ListingParams, signal?: AbortSignal): Promise<Listing>;
  comments(
    postId: string,
    params: { sort?: string | null; comment?: string; depth?: number; limit?: number },
    signal?: AbortSignal,
  ): Promise<[Listing, Listing]>;
  moreChildren(linkId: string, children: string[], sort: string | null, signal?: AbortSignal): Promise<Thing[]>;
}
