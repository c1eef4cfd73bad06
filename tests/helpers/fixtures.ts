import { LowSync, MemorySync } from 'lowdb';
import type { Store } from '../../src/db.js';
import { createPost } from '../../src/posts.js';
import type { DBSchema, Platform, PostRecord } from '../../src/models.js';

export function seedPost(
  db: Store,
  overrides: Partial<{ platform: Platform; caption: string; scheduledAt: number; linkOrAssetNote: string }> = {},
  now?: number
): PostRecord {
  return createPost(
    db,
    {
      platform: overrides.platform ?? 'instagram',
      caption: overrides.caption ?? 'Behind the scenes',
      scheduledAt: overrides.scheduledAt ?? new Date(2030, 0, 15, 9, 30).getTime(),
      linkOrAssetNote: overrides.linkOrAssetNote
    },
    now
  );
}

// A store whose every read fails, for the server-error paths.
class UnreadableStore extends LowSync<DBSchema> {
  override read(): void {
    throw new Error('disk unavailable');
  }
}

export function createUnreadableDb(): Store {
  return new UnreadableStore(new MemorySync<DBSchema>(), { posts: [] });
}
