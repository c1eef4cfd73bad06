import { z } from 'zod';

const postPayloadSchema = z.object({
  id: z.string(),
  platform: z.string(),
  caption: z.string(),
  scheduled_datetime: z.string(),
  link_or_asset_note: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  is_posted: z.boolean()
});

const analyticsRowSchema = z.object({
  key: z.string(),
  name: z.string(),
  color: z.string(),
  followers: z.number(),
  views_7d: z.number(),
  posts_scheduled: z.number(),
  top_posts: z.array(z.object({ title: z.string(), engagement: z.number(), date: z.string() }))
});

export async function readPost(res: Response) {
  return postPayloadSchema.parse(await res.json());
}

export async function readPosts(res: Response) {
  return z.array(postPayloadSchema).parse(await res.json());
}

export async function readAnalyticsRows(res: Response) {
  return z.array(analyticsRowSchema).parse(await res.json());
}
