import "dotenv/config";
import http from "node:http";
import Redis from "ioredis";
import { Registry } from "prom-client";

import { loadConfig } from "./config";
import { startTracing } from "./otel";
import { createMetrics } from "./metrics";
import { MemorySolveCache, RedisSolveCache, type SolveCache } from "./cache";
import { SolveService } from "./solveService";
import { createApp } from "./app";

// --- ENV -------------------------------------------------------
const config = loadConfig();
const tracing = startTracing(config);

// --- INFRA -----------------------------------------------------
const registry = new Registry();
const metrics = createMetrics(registry);

function makeCache(): SolveCache {
  if (config.CACHE_DRIVER === "memory") {
    return new MemorySolveCache({ ttlSec: config.CACHE_TTL_SEC, maxEntries: config.CACHE_MAX_ENTRIES });
  }
  const redis = new Redis(config.REDIS_URL, { maxRetriesPerRequest: 1 });
  redis.on("error", (err: Error) => console.warn(`[redis] ${err.message}`));
  return new RedisSolveCache(redis, config.CACHE_TTL_SEC);
}
const cache = makeCache();

const service = new SolveService({ cache, metrics, maxTiles: config.MAX_TILES });
const app = createApp({ service, cache, registry, seedSalt: config.SEED_SALT });
const server = http.createServer(app);

// --- BOOT ------------------------------------------------------
server.listen(config.SERVER_PORT, () => {
  console.log(`Solve authority http on :${config.SERVER_PORT} (cache=${config.CACHE_DRIVER})`);
});

async function shutdown(signal: string) {
  console.log(`${signal} received, shutting down`);
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  await cache.close();
  await tracing?.shutdown();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      console.error("[boot] shutdown failed", err);
      process.exitCode = 1;
    });
  });
}
