import { nanoid } from 'nanoid';
import type { Store } from './db.js';
import type { Platform, PostInput, PostPatch, PostPayload, PostRecord } from './models.js';
import { formatLocalIso } from './dates.js';

function byScheduledTime(a: PostRecord, b: PostRecord) {
  return a.scheduledAt - b.scheduledAt || a.createdAt - b.createdAt;
}

// upcoming posts, soonest first
export function listScheduledPosts(db: Store): PostRecord[] {
  db.read();
  return db.data.posts.filter((p) => !p.isPosted).sort(byScheduledTime);
}

export function findPost(db: Store, id: string): PostRecord | undefined {
  db.read();
  return db.data.posts.find((p) => p.id === id);
}

export function createPost(db: Store, input: PostInput, now = Date.now()): PostRecord {
  const post: PostRecord = {
    id: nanoid(),
    platform: input.platform,
    caption: input.caption,
    scheduledAt: input.scheduledAt,
    linkOrAssetNote: input.linkOrAssetNote ?? '',
    isPosted: false,
    createdAt: now,
    updatedAt: now
  };
  db.read();
  db.data.posts.push(post);
  db.write();
  return post;
}

export function updatePost(db: Store, id: string, patch: PostPatch, now = Date.now()): PostRecord | undefined {
  db.read();
  const post = db.data.posts.find((p) => p.id === id);
  if (!post) return undefined;

  if (patch.platform !== undefined) post.platform = patch.platform;
  if (patch.caption !== undefined) post.caption = patch.caption;
  if (patch.scheduledAt !== undefined) {
    post.scheduledAt = patch.scheduledAt;
    // rescheduled into the future: back in the queue for the sweep
    if (patch.scheduledAt > now) post.isPosted = false;
  }
  if (patch.linkOrAssetNote !== undefined) post.linkOrAssetNote = patch.linkOrAssetNote;
  post.updatedAt = now;
  db.write();
  return post;
}

export function deletePost(db: Store, id: string): boolean {
  db.read();
  const idx = db.data.posts.findIndex((p) => p.id === id);
  if (idx === -1) return false;
  db.data.posts.splice(idx, 1);
  db.write();
  return true;
}

/**
 * Flags every unposted post whose time has come and returns them in
 * schedule order.
 */
export function markDuePostsPosted(db: Store, now = Date.now()): PostRecord[] {
  db.read();
  const due = db.data.posts.filter((p) => !p.isPosted && p.scheduledAt <= now).sort(byScheduledTime);
  if (due.length === 0) return due;
  for (const p of due) {
    p.isPosted = true;
    p.updatedAt = now;
  }
  db.write();
  return due;
}

export function countScheduledByPlatform(db: Store): Record<Platform, number> {
  const counts: Record<Platform, number> = { tiktok: 0, youtube: 0, instagram: 0, facebook: 0, linkedin: 0, threads: 0 };
  for (const post of listScheduledPosts(db)) counts[post.platform] += 1;
  return counts;
}

export function serializePost(post: PostRecord): PostPayload {
  return {
    id: post.id,
    platform: post.platform,
    caption: post.caption,
    scheduled_datetime: formatLocalIso(post.scheduledAt),
    link_or_asset_note: post.linkOrAssetNote,
    created_at: formatLocalIso(post.createdAt),
    updated_at: formatLocalIso(post.updatedAt),
    is_posted: post.isPosted
  };
}
