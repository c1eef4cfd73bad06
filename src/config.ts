import { join } from 'path';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  dataFile: string;
  staticDir: string;
  publishSweep: {
    enabled: boolean;
    cron: string;
  };
}

const DISABLED = ['off', 'false', '0', 'no'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = env.PORT ? Number(env.PORT) : 3000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    nodeEnv: env.NODE_ENV || 'development',
    dataFile: env.DATA_FILE || join(process.cwd(), 'data', 'db.json'),
    staticDir: env.STATIC_DIR || join(process.cwd(), 'public'),
    publishSweep: {
      enabled: !DISABLED.includes((env.PUBLISH_SWEEP || '').trim().toLowerCase()),
      // every minute
      cron: env.PUBLISH_SWEEP_CRON || '* * * * *'
    }
  };
}
