import { Hono } from "hono";
import type { RankMonitor } from "../services/rank-monitor.js";

export function createMonitorRouter(monitor: RankMonitor): Hono {
  const app = new Hono();

  app.get("/status", (c) => {
    return c.json({ code: 200, message: "ok", data: monitor.status() }, 200);
  });

  app.post("/run", async (c) => {
    const report = await monitor.runOnce();
    return c.json({ code: 200, message: "ok", data: report }, 200);
  });

  return app;
}
