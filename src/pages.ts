import express from 'express';
import type { Store } from './db.js';
import { logger } from './logger.js';
import { HttpError } from './errors.js';
import { createPost, deletePost, listScheduledPosts } from './posts.js';
import { parsePostInput, readPostForm } from './validation.js';
import type { PostFormValues } from './validation.js';
import { getAnalyticsData, summarizeAnalytics } from './analytics.js';
import { buildCalendar } from './calendar.js';
import { parseDateKey } from './dates.js';
import { schedulerPage } from './views/scheduler.js';
import { analyticsPage } from './views/analytics.js';

const log = logger.child({ route: 'pages' });

const NOTICES: Record<string, string> = {
  created: 'Post scheduled.',
  deleted: 'Post deleted.'
};

interface SchedulerRender {
  start?: Date;
  form?: PostFormValues;
  errors?: string[];
  notice?: string;
}

function renderScheduler(db: Store, { start, form, errors, notice }: SchedulerRender) {
  const posts = listScheduledPosts(db);
  return schedulerPage({
    posts,
    calendar: buildCalendar(start ?? new Date(), posts),
    form,
    errors,
    notice
  });
}

function noticeFor(query: express.Request['query']): string | undefined {
  for (const [key, text] of Object.entries(NOTICES)) {
    if (query[key] === '1') return text;
  }
  return undefined;
}

export function createPagesRouter(db: Store) {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.redirect('/scheduler');
  });

  router.get('/scheduler', (req, res) => {
    const start = typeof req.query.start === 'string' ? parseDateKey(req.query.start) : undefined;
    res.send(renderScheduler(db, { start, notice: noticeFor(req.query) }));
  });

  router.post('/scheduler', (req, res) => {
    const form = readPostForm(req.body);
    const parsed = parsePostInput(form);
    if (!parsed.success) {
      return res.status(400).send(renderScheduler(db, { form, errors: [parsed.error] }));
    }

    const post = createPost(db, parsed.data);
    log.info('post scheduled', { postId: post.id, platform: post.platform });
    res.redirect(303, '/scheduler?created=1');
  });

  router.post('/scheduler/posts/:id/delete', (req, res, next) => {
    if (!deletePost(db, req.params.id)) return next(new HttpError(404, 'Post not found'));
    log.info('post deleted', { postId: req.params.id });
    res.redirect(303, '/scheduler?deleted=1');
  });

  router.get('/analytics', (_req, res) => {
    const rows = getAnalyticsData(db);
    res.send(analyticsPage({ rows, summary: summarizeAnalytics(rows) }));
  });

  return router;
}
