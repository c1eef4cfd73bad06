import 'dotenv/config';
import { loadConfig } from './config.js';
import { createDb } from './db.js';
import { createApp } from './app.js';
import { logger } from './logger.js';
import { startScheduler } from './scheduler.js';

const config = loadConfig();
const db = createDb(config.dataFile);
const app = createApp({ db, config });

app.listen(config.port, () => {
  logger.info(`listening http://localhost:${config.port}`, { dataFile: config.dataFile });
  if (config.publishSweep.enabled) startScheduler(db, config.publishSweep.cron);
});
