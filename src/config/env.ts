import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  PORT: z.coerce.number().int().min(1).max(65535).default(6688),
  HTTP_ENABLED: booleanFlag,
  SERPAPI_KEY: z.string().default(""),
  SERPAPI_BASE_URL: z.string().url().default("https://serpapi.com"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(15000),
  STORE_DRIVER: z.enum(["file", "memory", "redis"]).default("file"),
  STORE_PATH: z.string().default("data/observations.json"),
  REDIS_URL: z.string().default(""),
  REDIS_PREFIX: z.string().default("rank-monitor"),
  MONITOR_CONFIG_PATH: z.string().default("config/monitor.json"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
  CORS_ORIGIN: z.string().default("*"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
