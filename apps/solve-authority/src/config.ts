import { z } from "zod";

const flag = z.enum(["true", "false"]).default("false").transform((v) => v === "true");

export const Config = z.object({
  SERVER_PORT: z.coerce.number().int().positive().default(8080),
  CACHE_DRIVER: z.enum(["memory", "redis"]).default("memory"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  CACHE_TTL_SEC: z.coerce.number().int().positive().default(3600),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
  MAX_TILES: z.coerce.number().int().positive().default(250_000),
  SEED_SALT: z.string().default("salt"),
  OTEL_ENABLED: flag,
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().default("http://localhost:4318"),
  OTEL_SERVICE_NAME: z.string().default("solve-authority")
});
export type Config = z.output<typeof Config>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return Config.parse(env);
}
