import { LowSync, MemorySync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import type { DBSchema } from './models.js';

export type Store = LowSync<DBSchema>;

function emptyData(): DBSchema {
  return { posts: [] };
}

// JSON file store, e.g. ./data/db.json
export function createDb(file: string): Store {
  const dir = dirname(file);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  const db = new LowSync<DBSchema>(new JSONFileSync<DBSchema>(file), emptyData());
  db.read();
  if (!Array.isArray(db.data.posts)) db.data.posts = [];
  db.write();
  return db;
}

export function createMemoryDb(): Store {
  const db = new LowSync<DBSchema>(new MemorySync<DBSchema>(), emptyData());
  db.read();
  return db;
}
