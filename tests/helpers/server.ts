import type { Server } from 'node:http';
import { join } from 'node:path';
import { createApp } from '../../src/app.js';
import { createMemoryDb } from '../../src/db.js';
import type { Store } from '../../src/db.js';

export interface TestServer {
  db: Store;
  baseUrl: string;
  close: () => Promise<void>;
}

export async function startTestServer(db: Store = createMemoryDb(), nodeEnv = 'test'): Promise<TestServer> {
  const app = createApp({
    db,
    config: { nodeEnv, staticDir: join(process.cwd(), 'public') }
  });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('test server has no port');
  }

  return {
    db,
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
