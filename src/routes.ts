import express from 'express';
import type { Store } from './db.js';
import { logger } from './logger.js';
import { HttpError } from './errors.js';
import { createPost, deletePost, listScheduledPosts, serializePost, updatePost } from './posts.js';
import { parsePostInput, parsePostPatch } from './validation.js';
import { getAnalyticsData, serializeAnalytics } from './analytics.js';

const log = logger.child({ route: 'api' });

export function createApiRouter(db: Store) {
  const router = express.Router();

  // list upcoming posts
  router.get('/posts', (_req, res) => {
    res.send(listScheduledPosts(db).map(serializePost));
  });

  // schedule post
  router.post('/posts', (req, res) => {
    const parsed = parsePostInput(req.body);
    if (!parsed.success) return res.status(400).send({ error: parsed.error });

    const post = createPost(db, parsed.data);
    log.info('post scheduled', { postId: post.id, platform: post.platform });
    res.status(201).send(serializePost(post));
  });

  router.put('/posts/:id', (req, res, next) => {
    const parsed = parsePostPatch(req.body);
    if (!parsed.success) return res.status(400).send({ error: parsed.error });

    const post = updatePost(db, req.params.id, parsed.data);
    if (!post) return next(new HttpError(404, 'Post not found'));
    log.info('post updated', { postId: post.id });
    res.send(serializePost(post));
  });

  router.delete('/posts/:id', (req, res, next) => {
    if (!deletePost(db, req.params.id)) return next(new HttpError(404, 'Post not found'));
    log.info('post deleted', { postId: req.params.id });
    res.send({ message: 'Post deleted' });
  });

  // mocked metrics, same rows as the analytics page
  router.get('/analytics', (_req, res) => {
    res.send(getAnalyticsData(db).map(serializeAnalytics));
  });

  return router;
}
