import Redis from 'ioredis';
import { env } from './config';

// Generic async key-value store; the session manager only ever talks to this
export interface KeyValueStore<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  delete(key: string): Promise<void>;
}

// --------------------- In-memory store (dev / long-polling) ---------------------
const SWEEP_INTERVAL_MS = 60 * 1000;

export class MemoryStore<V> implements KeyValueStore<V> {
  private readonly data = new Map<string, { value: V; expiresAt: number }>();
  private nextSweepAt = 0;

  constructor(
    private readonly ttlSeconds = 60 * 60 * 24,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<V | undefined> {
    const entry = this.data.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: V): Promise<void> {
    const now = this.now();
    if (now >= this.nextSweepAt) {
      this.sweep(now);
      this.nextSweepAt = now + SWEEP_INTERVAL_MS;
    }
    this.data.set(key, { value, expiresAt: now + this.ttlSeconds * 1000 });
  }

  /** Entries held, including expired ones not swept yet. */
  get size(): number {
    return this.data.size;
  }

  // Drops expired entries whose keys are never read again
  private sweep(now: number): void {
    for (const [key, entry] of this.data) {
      if (entry.expiresAt <= now) this.data.delete(key);
    }
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }
}

// --------------------- Redis-backed store (prod / webhook) ---------------------
export class RedisStore<V> implements KeyValueStore<V> {
  private readonly redis: Redis;

  constructor(redisUrl: string, private readonly ttlSeconds = 60 * 60 * 24) {
    this.redis = new Redis(redisUrl, {
      // Connect on first command – keeps webhook cold starts short
      lazyConnect: true,
      maxRetriesPerRequest: 1,
    });
  }

  private async ensureConnected() {
    if (this.redis.status === 'end' || this.redis.status === 'close') {
      await this.redis.connect();
    }
  }

  async get(key: string): Promise<V | undefined> {
    await this.ensureConnected();
    const json = await this.redis.get(key);
    if (!json) return undefined;
    try {
      return JSON.parse(json) as V;
    } catch (err) {
      console.warn(`[sessionStore] dropping unreadable session ${key}`, err);
      return undefined;
    }
  }

  async set(key: string, value: V): Promise<void> {
    await this.ensureConnected();
    await this.redis.set(key, JSON.stringify(value), 'EX', this.ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.ensureConnected();
    await this.redis.del(key);
  }
}

// --------------------- Factory ---------------------
export function createSessionStore<V>(): KeyValueStore<V> {
  const redisUrl = env.REDIS_URL;
  const ttl = env.SESSION_TTL_SECONDS;
  if (redisUrl) {
    console.log('[sessionStore] using Redis session store');
    return new RedisStore<V>(redisUrl, ttl);
  }
  return new MemoryStore<V>(ttl);
}
