import { Hono } from "hono";
import type { ObservationStore } from "../services/observation-store.js";
import type { RankMonitor } from "../services/rank-monitor.js";
import { createMonitorRouter } from "./monitor.js";
import { createRankingsRouter } from "./rankings.js";

export function createV1Router(store: ObservationStore, monitor?: RankMonitor): Hono {
  const app = new Hono();

  app.route("/rankings", createRankingsRouter(store));

  if (monitor) {
    app.route("/monitor", createMonitorRouter(monitor));
  }

  return app;
}
