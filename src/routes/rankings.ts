import { Hono } from "hono";
import { AppError } from "../middleware/error-handler.js";
import type { ObservationStore } from "../services/observation-store.js";

const DEFAULT_HISTORY_LIMIT = 10;
const MAX_HISTORY_LIMIT = 500;
const DEFAULT_CHANGE_WINDOW_HOURS = 24;

function toPositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function requireParam(value: string | undefined, name: string): string {
  const trimmed = value?.trim();
  if (!trimmed) throw new AppError(`Missing query parameter: ${name}`, 400);
  return trimmed;
}

export function createRankingsRouter(store: ObservationStore): Hono {
  const app = new Hono();

  app.get("/keywords", async (c) => {
    return c.json({ code: 200, message: "ok", data: await store.distinctKeywords() }, 200);
  });

  app.get("/domains", async (c) => {
    return c.json({ code: 200, message: "ok", data: await store.distinctDomains() }, 200);
  });

  app.get("/history", async (c) => {
    const keyword = requireParam(c.req.query("keyword"), "keyword");
    const domain = requireParam(c.req.query("domain"), "domain");
    const limit = Math.min(MAX_HISTORY_LIMIT, toPositiveInt(c.req.query("limit"), DEFAULT_HISTORY_LIMIT));
    const items = await store.history(keyword, domain, limit);
    return c.json({ code: 200, message: "ok", data: { keyword, domain, items } }, 200);
  });

  app.get("/latest", async (c) => {
    const keyword = requireParam(c.req.query("keyword"), "keyword");
    const domain = requireParam(c.req.query("domain"), "domain");
    const latest = await store.latest(keyword, domain);
    if (!latest) throw new AppError("Observation Not Found", 404);
    return c.json({ code: 200, message: "ok", data: latest }, 200);
  });

  app.get("/changes", async (c) => {
    const keyword = requireParam(c.req.query("keyword"), "keyword");
    const domain = requireParam(c.req.query("domain"), "domain");
    const hours = toPositiveInt(c.req.query("hours"), DEFAULT_CHANGE_WINDOW_HOURS);
    const items = await store.changesWithin(keyword, domain, hours);
    return c.json({ code: 200, message: "ok", data: { keyword, domain, hours, items } }, 200);
  });

  return app;
}
