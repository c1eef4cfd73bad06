export const PLATFORMS = ['tiktok', 'youtube', 'instagram', 'facebook', 'linkedin', 'threads'] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface PlatformInfo {
  name: string;
  color: string;
}

export const PLATFORM_INFO: Record<Platform, PlatformInfo> = {
  tiktok: { name: 'TikTok', color: '#000000' },
  youtube: { name: 'YouTube', color: '#FF0000' },
  instagram: { name: 'Instagram', color: '#E1306C' },
  facebook: { name: 'Facebook', color: '#1877F2' },
  linkedin: { name: 'LinkedIn', color: '#0A66C2' },
  threads: { name: 'Threads', color: '#333333' }
};

export interface PostRecord {
  id: string;
  platform: Platform;
  caption: string;
  scheduledAt: number; // epoch ms
  linkOrAssetNote: string;
  isPosted: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface PostInput {
  platform: Platform;
  caption: string;
  scheduledAt: number;
  linkOrAssetNote?: string;
}

export type PostPatch = Partial<PostInput>;

// JSON shape served by /api/posts
export interface PostPayload {
  id: string;
  platform: Platform;
  caption: string;
  scheduled_datetime: string;
  link_or_asset_note: string;
  created_at: string;
  updated_at: string;
  is_posted: boolean;
}

export interface DBSchema {
  posts: PostRecord[];
}
