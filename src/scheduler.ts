import cron from 'cron';
import type { Store } from './db.js';
import type { PostRecord } from './models.js';
import { PLATFORM_INFO } from './models.js';
import { logger } from './logger.js';
import { markDuePostsPosted } from './posts.js';

const log = logger.child({ job: 'publish-sweep' });

// Nothing is sent to the platforms yet; publishing is a log line.
function publishMock(post: PostRecord) {
  log.info(`MOCK POST to ${PLATFORM_INFO[post.platform].name}: ${post.caption.slice(0, 80)}`, { postId: post.id });
}

/**
 * Marks every due post as posted and hands it to the publisher.
 */
export function runPublishSweep(db: Store, now = Date.now()): PostRecord[] {
  const due = markDuePostsPosted(db, now);
  for (const post of due) publishMock(post);
  if (due.length) log.info('sweep complete', { published: due.length });
  return due;
}

export function startScheduler(db: Store, cronTime = '* * * * *') {
  const job = new cron.CronJob(cronTime, () => {
    try {
      runPublishSweep(db);
    } catch (e) {
      log.error('scheduler error', undefined, e);
    }
  });
  job.start();
  log.info('scheduler started', { cron: cronTime });
  return job;
}
