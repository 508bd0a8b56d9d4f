import { SolveReport } from "@breach-path/shared";

/** Solve outcomes keyed by layout hash and options. */
export interface SolveCache {
  get(key: string): Promise<SolveReport | null>;
  set(key: string, report: SolveReport): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function cacheKey(layoutHash: string, allowDirect: boolean): string {
  return `${layoutHash}:${allowDirect ? "direct" : "breach"}`;
}

type MemoryOptions = { ttlSec: number; maxEntries: number; now?: () => number };

export class MemorySolveCache implements SolveCache {
  private entries = new Map<string, { report: SolveReport; expiresAt: number }>();
  private readonly now: () => number;

  constructor(private readonly opts: MemoryOptions) {
    this.now = opts.now ?? Date.now;
  }

  async get(key: string): Promise<SolveReport | null> {
    const e = this.entries.get(key);
    if (!e) return null;
    if (e.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return e.report;
  }

  async set(key: string, report: SolveReport): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { report, expiresAt: this.now() + this.opts.ttlSec * 1000 });
    // Map keeps insertion order: oldest first
    while (this.entries.size > this.opts.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** The slice of an ioredis client the cache talks to. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export class RedisSolveCache implements SolveCache {
  constructor(private readonly redis: RedisLike, private readonly ttlSec: number, private readonly prefix = "solve:") {}

  async get(key: string): Promise<SolveReport | null> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null) return null;
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return null; // not written by this cache
    }
    const parsed = SolveReport.safeParse(value);
    return parsed.success ? parsed.data : null;
  }

  async set(key: string, report: SolveReport): Promise<void> {
    await this.redis.set(this.prefix + key, JSON.stringify(report), "EX", this.ttlSec);
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === "PONG";
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
