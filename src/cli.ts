import type { EventEmitter } from "node:events";
import { serve, type ServerType } from "@hono/node-server";
import type { Hono } from "hono";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { ConfigurationError } from "./domain/errors.js";
import { readMonitorConfig, type MonitorFileConfig } from "./services/monitor-config.js";
import type { ObservationStore } from "./services/observation-store.js";
import { RankMonitor } from "./services/rank-monitor.js";
import { SerpApiProber, type RankingProber } from "./services/serpapi-prober.js";
import { createObservationStore } from "./services/store-factory.js";
import type { RankChangeEvent } from "./types/ranking.js";
import { buildHistoryReport, type HistorySection } from "./utils/history-report.js";
import { errorMessage, logger } from "./utils/logger.js";

export const USAGE = `Usage: serp-rank-monitor [option]

  (no option)            Monitor continuously until SIGINT/SIGTERM
  --once                 Run a single check cycle and exit
  --history [--limit N]  Print the last N observations per keyword/domain (default 10)
  --purge [--days N]     Delete observations older than N days
  -h, --help             Show this help
`;

const DEFAULT_HISTORY_LIMIT = 10;
const FALLBACK_RETENTION_DAYS = 90;

export type CliMode = "monitor" | "once" | "history" | "purge" | "help";

export interface CliOptions {
  mode: CliMode;
  limit?: number;
  days?: number;
}

export interface CliDeps {
  config?: MonitorFileConfig;
  store?: ObservationStore;
  prober?: RankingProber;
  signals?: EventEmitter;
  httpEnabled?: boolean;
  startServer?: (app: Hono) => ServerType;
  write?: (text: string) => void;
  writeError?: (text: string) => void;
}

const MODE_FLAGS = new Map<string, CliMode>([
  ["--once", "once"],
  ["--history", "history"],
  ["--purge", "purge"],
  ["-h", "help"],
  ["--help", "help"],
]);

const MODE_OPTIONS: Partial<Record<CliMode, "--limit" | "--days">> = {
  history: "--limit",
  purge: "--days",
};

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const [flag, ...rest] = argv;
  if (flag === undefined) return { mode: "monitor" };

  const mode = MODE_FLAGS.get(flag);
  if (!mode) throw new ConfigurationError(`Unknown option: ${flag}`);
  if (rest.length === 0) return { mode };

  const allowed = MODE_OPTIONS[mode];
  const [name, value] = rest;
  if (!allowed || name !== allowed || rest.length !== 2) {
    throw new ConfigurationError(`Unexpected arguments for ${flag}: ${rest.join(" ")}`);
  }
  const parsed = Number.parseInt(value ?? "", 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value) {
    throw new ConfigurationError(`${name} expects a positive integer`);
  }
  return allowed === "--limit" ? { mode, limit: parsed } : { mode, days: parsed };
}

function logRankChange(event: RankChangeEvent): void {
  logger.info("rank_change_detected", { ...event });
}

function buildMonitor(config: MonitorFileConfig, store: ObservationStore, prober: RankingProber): RankMonitor {
  const monitor = new RankMonitor({
    prober,
    store,
    intervalMs: config.intervalMinutes * 60 * 1000,
    probeDelayMs: config.probeDelayMs,
    retentionDays: config.retentionDays,
  });
  monitor.configure(config.keywords, config.domains, config.searchParams);
  monitor.onChange(logRankChange);
  return monitor;
}

function closeServer(server: ServerType | undefined): Promise<void> {
  if (!server) return Promise.resolve();
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

function startHttpServer(app: Hono): ServerType {
  return serve({ fetch: app.fetch, port: env.PORT }, () => {
    logger.info("server_started", { port: env.PORT, env: env.NODE_ENV });
  });
}

interface ContinuousRun {
  monitor: RankMonitor;
  store: ObservationStore;
  runImmediately: boolean;
  signals: EventEmitter;
  startServer?: (app: Hono) => ServerType;
}

function runContinuous({ monitor, store, runImmediately, signals, startServer }: ContinuousRun): Promise<number> {
  return new Promise<number>((resolve) => {
    let server: ServerType | undefined;
    let finished = false;

    const finish = (code: number, reason: string) => {
      if (finished) return;
      finished = true;
      signals.off("SIGINT", onSigint);
      signals.off("SIGTERM", onSigterm);
      logger.info("shutdown_requested", { reason });
      void monitor
        .stop()
        .then(() => closeServer(server))
        .then(() => store.close())
        .then(
          () => resolve(code),
          (error: unknown) => {
            logger.error("shutdown_failed", { error: errorMessage(error) });
            resolve(1);
          },
        );
    };
    const onSigint = () => finish(0, "SIGINT");
    const onSigterm = () => finish(0, "SIGTERM");

    signals.on("SIGINT", onSigint);
    signals.on("SIGTERM", onSigterm);

    if (startServer) {
      server = startServer(createApp({ store, monitor }));
      server.on("error", (error) => {
        logger.error("server_start_failed", {
          port: env.PORT,
          env: env.NODE_ENV,
          error: errorMessage(error),
        });
        finish(1, "server_failed");
      });
    }

    monitor.start(runImmediately).catch((error: unknown) => {
      logger.error("monitor_start_failed", { error: errorMessage(error) });
      finish(1, "start_failed");
    });
  });
}

async function printHistory(
  config: MonitorFileConfig,
  store: ObservationStore,
  limit: number,
  write: (text: string) => void,
): Promise<void> {
  const sections: HistorySection[] = [];
  for (const keyword of config.keywords) {
    for (const domain of config.domains) {
      sections.push({ keyword, domain, records: await store.history(keyword, domain, limit) });
    }
  }
  write(buildHistoryReport(sections));
}

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const writeError = deps.writeError ?? ((text: string) => process.stderr.write(text));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    writeError(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }
  if (options.mode === "help") {
    write(USAGE);
    return 0;
  }

  let config: MonitorFileConfig;
  let store: ObservationStore;
  try {
    config = deps.config ?? (await readMonitorConfig(env.MONITOR_CONFIG_PATH));
    store = deps.store ?? createObservationStore();
    await store.init();
  } catch (error) {
    logger.error("startup_failed", { mode: options.mode, error: errorMessage(error) });
    return 1;
  }

  if (options.mode === "monitor") {
    let monitor: RankMonitor;
    try {
      monitor = buildMonitor(config, store, deps.prober ?? new SerpApiProber());
    } catch (error) {
      logger.error("startup_failed", { mode: options.mode, error: errorMessage(error) });
      await store.close();
      return 1;
    }
    logger.info("monitor_mode_started", {
      keywords: config.keywords.length,
      domains: config.domains.length,
      intervalMinutes: config.intervalMinutes,
    });
    return runContinuous({
      monitor,
      store,
      runImmediately: config.runImmediately,
      signals: deps.signals ?? process,
      startServer: (deps.httpEnabled ?? env.HTTP_ENABLED) ? (deps.startServer ?? startHttpServer) : undefined,
    });
  }

  try {
    switch (options.mode) {
      case "once": {
        const monitor = buildMonitor(config, store, deps.prober ?? new SerpApiProber());
        const report = await monitor.runOnce();
        write(
          `Check completed: ${report.checked} checked, ${report.found} found, ` +
            `${report.changes.length} changed, ${report.failed} failed\n`,
        );
        break;
      }
      case "history":
        await printHistory(config, store, options.limit ?? DEFAULT_HISTORY_LIMIT, write);
        break;
      case "purge": {
        const days = options.days ?? (config.retentionDays > 0 ? config.retentionDays : FALLBACK_RETENTION_DAYS);
        const deleted = await store.purgeOlderThan(days);
        write(`Deleted ${deleted} observations older than ${days} days\n`);
        break;
      }
    }
    return 0;
  } catch (error) {
    logger.error("command_failed", { mode: options.mode, error: errorMessage(error) });
    return 1;
  } finally {
    await store.close();
  }
}
