import { Low, Memory } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { mkdir } from 'fs/promises';
import type { PriceFrame } from '../types/data';

export interface CachedFrame {
  tickers: string[];
  start: string;
  end: string;
  savedAt: string;
  frame: PriceFrame;
}

interface PriceCacheSchema {
  frames: Record<string, CachedFrame>;
  metadata: {
    lastUpdated: string;
    version: string;
  };
}

function createDefaultData(): PriceCacheSchema {
  return {
    frames: {},
    metadata: {
      lastUpdated: new Date().toISOString(),
      version: '1.0.0',
    },
  };
}

/**
 * Canonical key for a price request: tickers sorted, '/' replaced so the
 * key stays file-name safe, then the date range.
 */
export function priceCacheKey(tickers: readonly string[], start: string, end: string): string {
  const slug = [...tickers]
    .map((t) => t.replace(/\//g, '-'))
    .sort()
    .join('_');
  return `adjclose_${slug}_${start}_${end}`;
}

export function isPriceFrame(value: unknown): value is PriceFrame {
  if (typeof value !== 'object' || value === null) return false;
  if (!('dates' in value) || !('columns' in value)) return false;

  const { dates, columns } = value;
  if (!Array.isArray(dates) || !dates.every((d) => typeof d === 'string')) return false;
  if (typeof columns !== 'object' || columns === null) return false;

  return Object.values(columns).every(
    (col: unknown) =>
      Array.isArray(col) &&
      col.length === dates.length &&
      col.every((v) => v === null || typeof v === 'number')
  );
}

/** Key-value store of downloaded price frames, kept in a lowdb JSON file. */
export class PriceCache {
  private db: Low<PriceCacheSchema> | null = null;
  private dbPath: string;

  constructor(dbPath: string = 'data/prices.json') {
    if (dbPath === ':memory:') {
      this.dbPath = ':memory:';
    } else {
      const __dirname = dirname(fileURLToPath(import.meta.url));
      this.dbPath = join(__dirname, '../../', dbPath);
    }
  }

  get path(): string {
    return this.dbPath;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    if (this.dbPath === ':memory:') {
      this.db = new Low<PriceCacheSchema>(new Memory<PriceCacheSchema>(), createDefaultData());
      return;
    }

    await mkdir(dirname(this.dbPath), { recursive: true });

    const adapter = new JSONFile<PriceCacheSchema>(this.dbPath);
    this.db = new Low<PriceCacheSchema>(adapter, createDefaultData());
    await this.db.read();

    if (typeof this.db.data.frames !== 'object' || this.db.data.frames === null) {
      this.db.data = createDefaultData();
      await this.db.write();
    }
  }

  async close(): Promise<void> {
    if (this.db && this.dbPath !== ':memory:') {
      await this.db.write();
    }
    this.db = null;
  }

  private requireDb(): Low<PriceCacheSchema> {
    if (!this.db) throw new Error('Price cache not initialized');
    return this.db;
  }

  async keys(): Promise<string[]> {
    return Object.keys(this.requireDb().data.frames);
  }

  /** The stored frame, or null when absent or malformed. */
  async get(key: string): Promise<PriceFrame | null> {
    const entry = this.requireDb().data.frames[key];
    if (!entry || !isPriceFrame(entry.frame)) return null;
    return entry.frame;
  }

  async put(key: string, entry: Omit<CachedFrame, 'savedAt'>): Promise<void> {
    const db = this.requireDb();
    db.data.frames[key] = { ...entry, savedAt: new Date().toISOString() };
    db.data.metadata.lastUpdated = new Date().toISOString();
    if (this.dbPath !== ':memory:') await db.write();
  }

  async delete(key: string): Promise<void> {
    const db = this.requireDb();
    delete db.data.frames[key];
    if (this.dbPath !== ':memory:') await db.write();
  }
}
