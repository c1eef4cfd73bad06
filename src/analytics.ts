import type { Store } from './db.js';
import { PLATFORMS, PLATFORM_INFO } from './models.js';
import type { Platform } from './models.js';
import { countScheduledByPlatform } from './posts.js';

export interface TopPost {
  title: string;
  engagement: number;
  date: string;
}

export interface PlatformAnalytics {
  key: Platform;
  name: string;
  color: string;
  followers: number;
  views7d: number;
  postsScheduled: number;
  topPosts: TopPost[];
}

// JSON shape served by /api/analytics
export interface PlatformAnalyticsPayload {
  key: Platform;
  name: string;
  color: string;
  followers: number;
  views_7d: number;
  posts_scheduled: number;
  top_posts: TopPost[];
}

export interface AnalyticsSummary {
  followers: number;
  views7d: number;
  postsScheduled: number;
}

// Placeholder figures until the platform APIs are wired in.
const MOCK_FOLLOWERS: Record<Platform, number> = {
  tiktok: 15000,
  youtube: 8500,
  instagram: 12000,
  facebook: 5000,
  linkedin: 3200,
  threads: 2100
};

const MOCK_VIEWS_7D: Record<Platform, number> = {
  tiktok: 125000,
  youtube: 45000,
  instagram: 38000,
  facebook: 12000,
  linkedin: 5600,
  threads: 8900
};

const MOCK_ENGAGEMENT = [450, 380, 290];

function mockTopPosts(): TopPost[] {
  return MOCK_ENGAGEMENT.map((engagement, i) => ({
    title: `Top post #${i + 1}`,
    engagement,
    date: '2024-01-20'
  }));
}

/**
 * One row per platform in display order. Only `postsScheduled` is live; the
 * rest is mocked.
 */
export function getAnalyticsData(db: Store): PlatformAnalytics[] {
  const scheduled = countScheduledByPlatform(db);
  return PLATFORMS.map((key) => ({
    key,
    name: PLATFORM_INFO[key].name,
    color: PLATFORM_INFO[key].color,
    followers: MOCK_FOLLOWERS[key],
    views7d: MOCK_VIEWS_7D[key],
    postsScheduled: scheduled[key],
    topPosts: mockTopPosts()
  }));
}

export function summarizeAnalytics(rows: PlatformAnalytics[]): AnalyticsSummary {
  return rows.reduce<AnalyticsSummary>(
    (acc, row) => ({
      followers: acc.followers + row.followers,
      views7d: acc.views7d + row.views7d,
      postsScheduled: acc.postsScheduled + row.postsScheduled
    }),
    { followers: 0, views7d: 0, postsScheduled: 0 }
  );
}

export function serializeAnalytics(row: PlatformAnalytics): PlatformAnalyticsPayload {
  return {
    key: row.key,
    name: row.name,
    color: row.color,
    followers: row.followers,
    views_7d: row.views7d,
    posts_scheduled: row.postsScheduled,
    top_posts: row.topPosts
  };
}
