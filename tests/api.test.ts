import assert from 'node:assert/strict';
import { after, before, beforeEach, test } from 'node:test';
import { markDuePostsPosted } from '../src/posts.js';
import { INVALID_DATETIME, INVALID_PLATFORM, MISSING_FIELDS } from '../src/validation.js';
import { readAnalyticsRows, readPost, readPosts } from './helpers/payloads.js';
import { createUnreadableDb } from './helpers/fixtures.js';
import { startTestServer } from './helpers/server.js';
import type { TestServer } from './helpers/server.js';

let server: TestServer;

before(async () => {
  server = await startTestServer();
});

after(async () => {
  await server.close();
});

beforeEach(() => {
  server.db.data.posts = [];
  server.db.write();
});

function postJson(path: string, body: unknown, method = 'POST') {
  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

test('POST /api/posts persists a valid post and GET lists it', async () => {
  const created = await postJson('/api/posts', {
    platform: 'YouTube',
    caption: 'New video out',
    scheduled_datetime: '2030-01-15T09:30',
    link_or_asset_note: 'https://example.com/v'
  });

  assert.equal(created.status, 201);
  const post = await readPost(created);
  assert.equal(post.platform, 'youtube');
  assert.equal(post.caption, 'New video out');
  assert.equal(post.scheduled_datetime, '2030-01-15T09:30:00');
  assert.equal(post.link_or_asset_note, 'https://example.com/v');
  assert.equal(post.is_posted, false);

  const listed = await fetch(`${server.baseUrl}/api/posts`);
  assert.equal(listed.status, 200);
  assert.deepEqual(await listed.json(), [post]);
});

test('POST /api/posts rejects an invalid platform', async () => {
  const res = await postJson('/api/posts', { platform: 'myspace', caption: 'Hi', scheduled_datetime: '2030-01-15T09:30' });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), { error: INVALID_PLATFORM });
});

test('POST /api/posts rejects missing fields and bad datetimes', async () => {
  const missing = await postJson('/api/posts', { platform: 'tiktok' });
  assert.equal(missing.status, 400);
  assert.deepEqual(await missing.json(), { error: MISSING_FIELDS });

  const badDate = await postJson('/api/posts', { platform: 'tiktok', caption: 'Hi', scheduled_datetime: 'next friday' });
  assert.equal(badDate.status, 400);
  assert.deepEqual(await badDate.json(), { error: INVALID_DATETIME });
});

test('POST /api/posts answers malformed JSON with 400', async () => {
  const res = await fetch(`${server.baseUrl}/api/posts`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: '{"platform":'
  });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), { error: 'Malformed JSON body' });
});

test('PUT /api/posts/:id updates the given fields', async () => {
  const created = await readPost(
    await postJson('/api/posts', { platform: 'facebook', caption: 'Old', scheduled_datetime: '2030-01-15T09:30' })
  );

  const res = await postJson(`/api/posts/${created.id}`, { caption: 'New', platform: 'Threads' }, 'PUT');
  assert.equal(res.status, 200);
  const updated = await readPost(res);
  assert.equal(updated.id, created.id);
  assert.equal(updated.caption, 'New');
  assert.equal(updated.platform, 'threads');
  assert.equal(updated.scheduled_datetime, '2030-01-15T09:30:00');

  const invalid = await postJson(`/api/posts/${created.id}`, { scheduled_datetime: '2030-02-30T10:00' }, 'PUT');
  assert.equal(invalid.status, 400);
  assert.deepEqual(await invalid.json(), { error: INVALID_DATETIME });
});

test('PUT /api/posts/:id answers 404 for an unknown post', async () => {
  const res = await postJson('/api/posts/nope', { caption: 'x' }, 'PUT');
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: 'Post not found' });
});

test('DELETE /api/posts/:id removes the post', async () => {
  const created = await readPost(
    await postJson('/api/posts', { platform: 'linkedin', caption: 'Bye', scheduled_datetime: '2030-01-15T09:30' })
  );

  const res = await fetch(`${server.baseUrl}/api/posts/${created.id}`, { method: 'DELETE' });
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), { message: 'Post deleted' });

  const again = await fetch(`${server.baseUrl}/api/posts/${created.id}`, { method: 'DELETE' });
  assert.equal(again.status, 404);
  assert.deepEqual(await (await fetch(`${server.baseUrl}/api/posts`)).json(), []);
});

test('GET /api/posts leaves out posts already posted', async () => {
  await postJson('/api/posts', { platform: 'tiktok', caption: 'Past', scheduled_datetime: '2020-01-01T10:00' });
  await postJson('/api/posts', { platform: 'tiktok', caption: 'Future', scheduled_datetime: '2030-01-01T10:00' });
  markDuePostsPosted(server.db, new Date(2025, 0, 1).getTime());

  const posts = await readPosts(await fetch(`${server.baseUrl}/api/posts`));
  assert.deepEqual(
    posts.map((p) => p.caption),
    ['Future']
  );
});

test('GET /api/analytics counts scheduled posts', async () => {
  await postJson('/api/posts', { platform: 'instagram', caption: 'Reel', scheduled_datetime: '2030-01-15T09:30' });

  const res = await fetch(`${server.baseUrl}/api/analytics`);
  assert.equal(res.status, 200);
  const rows = await readAnalyticsRows(res);
  assert.equal(rows.length, 6);
  assert.equal(rows.find((r) => r.key === 'instagram')?.posts_scheduled, 1);
  assert.deepEqual(rows[0], {
    key: 'tiktok',
    name: 'TikTok',
    color: '#000000',
    followers: 15000,
    views_7d: 125000,
    posts_scheduled: 0,
    top_posts: [
      { title: 'Top post #1', engagement: 450, date: '2024-01-20' },
      { title: 'Top post #2', engagement: 380, date: '2024-01-20' },
      { title: 'Top post #3', engagement: 290, date: '2024-01-20' }
    ]
  });
});

test('unknown API routes answer JSON 404', async () => {
  const res = await fetch(`${server.baseUrl}/api/nope`);
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: 'Not found' });
});

test('GET /health reports ok', async () => {
  const res = await fetch(`${server.baseUrl}/health`);
  assert.equal(res.status, 200);
  const body = await res.json();
  assert.ok(typeof body === 'object' && body !== null && 'status' in body && body.status === 'ok');
});

test('unexpected failures answer 500 with a generic message', async () => {
  const failing = await startTestServer(createUnreadableDb());
  try {
    const res = await fetch(`${failing.baseUrl}/api/posts`);
    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { error: 'Server error' });
  } finally {
    await failing.close();
  }
});

test('unexpected failures expose their message in development', async () => {
  const failing = await startTestServer(createUnreadableDb(), 'development');
  try {
    const res = await fetch(`${failing.baseUrl}/api/posts`);
    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { error: 'disk unavailable' });
  } finally {
    await failing.close();
  }
});
