import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { createRateLimitMiddleware } from "./middleware/rate-limit.js";
import { createV1Router } from "./routes/v1.js";
import type { ObservationStore } from "./services/observation-store.js";
import type { RankMonitor } from "./services/rank-monitor.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  store: ObservationStore;
  monitor?: RankMonitor;
  rateLimitWindowMs?: number;
  rateLimitMax?: number;
}

function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();
  const { store, monitor } = options;

  app.use("*", async (c, next) => {
    const start = Date.now();
    const requestId = c.req.header("x-request-id")?.trim() || generateRequestId();
    c.header("x-request-id", requestId);
    await next();
    logger.info("request", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "*",
    cors({
      origin: env.CORS_ORIGIN,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.use(
    "/api/*",
    createRateLimitMiddleware({
      windowMs: options.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS,
      max: options.rateLimitMax ?? env.RATE_LIMIT_MAX,
      scope: "api",
    }),
  );

  app.get("/healthz", async (c) => {
    const storeReachable = await store.ping();
    const data = {
      status: storeReachable ? "ok" : "degraded",
      monitor: monitor?.currentState ?? "disabled",
      storeReachable,
    };
    const statusCode = storeReachable ? 200 : 503;
    return c.json({ code: statusCode, message: data.status, data }, statusCode);
  });

  app.route("/api/v1", createV1Router(store, monitor));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}
