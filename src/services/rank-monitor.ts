import { ConfigurationError } from "../domain/errors.js";
import type {
  CycleReport,
  MonitorState,
  MonitorStatus,
  RankChangeListener,
  SearchParams,
} from "../types/ranking.js";
import { errorMessage, logger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import { ChangeDetector } from "./change-detector.js";
import type { ObservationStore } from "./observation-store.js";
import { RankChecker } from "./rank-checker.js";
import type { RankingProber } from "./serpapi-prober.js";

export const DEFAULT_SEARCH_PARAMS: Readonly<SearchParams> = {
  engine: "google",
  google_domain: "google.com",
  gl: "us",
  hl: "en",
  location: "United States",
};

const DEFAULT_INTERVAL_MS = 60 * 60 * 1000;
const DEFAULT_PROBE_DELAY_MS = 1000;
const DEFAULT_STOP_GRACE_MS = 5000;

export interface RankMonitorOptions {
  prober: RankingProber;
  store: ObservationStore;
  intervalMs?: number;
  /** Courtesy pause between two probes of the same cycle. */
  probeDelayMs?: number;
  /** Purge records older than this after each scheduled cycle; 0 disables. */
  retentionDays?: number;
  stopGraceMs?: number;
  nowFn?: () => number;
}

interface MonitorMatrix {
  keywords: string[];
  domains: string[];
  searchParams: SearchParams;
}

type CycleReason = "startup" | "schedule" | "manual";

function toOrderedSet(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return Array.from(seen);
}

/**
 * Polls every keyword × domain pair once per cycle and sleeps `intervalMs`
 * between cycles. Lifecycle is idle → running → stopped; a stopped monitor
 * cannot be restarted.
 *
 * A stop request lets the pair being processed finish, then starts no further
 * pairs; the interval wait and the courtesy delay end immediately.
 */
export class RankMonitor {
  private readonly store: ObservationStore;
  private readonly checker: RankChecker;
  private readonly detector: ChangeDetector;
  private readonly intervalMs: number;
  private readonly probeDelayMs: number;
  private readonly retentionDays: number;
  private readonly stopGraceMs: number;
  private readonly nowFn: () => number;
  private readonly stopController = new AbortController();

  private matrix?: MonitorMatrix;
  private state: MonitorState = "idle";
  private loop?: Promise<void>;
  private stopping?: Promise<void>;
  private cycleQueue: Promise<void> = Promise.resolve();
  private lastCycle?: CycleReport;

  constructor(options: RankMonitorOptions) {
    this.store = options.store;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.checker = new RankChecker({ prober: options.prober, nowFn: this.nowFn });
    this.detector = new ChangeDetector({ store: options.store, nowFn: this.nowFn });
    this.intervalMs = Math.max(1, options.intervalMs ?? DEFAULT_INTERVAL_MS);
    this.probeDelayMs = Math.max(0, options.probeDelayMs ?? DEFAULT_PROBE_DELAY_MS);
    this.retentionDays = Math.max(0, options.retentionDays ?? 0);
    this.stopGraceMs = Math.max(0, options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS);
  }

  get currentState(): MonitorState {
    return this.state;
  }

  configure(keywords: readonly string[], domains: readonly string[], searchParams: SearchParams = {}): void {
    const orderedKeywords = toOrderedSet(keywords);
    const orderedDomains = toOrderedSet(domains);
    if (orderedKeywords.length === 0) {
      throw new ConfigurationError("At least one keyword must be configured");
    }
    if (orderedDomains.length === 0) {
      throw new ConfigurationError("At least one domain must be configured");
    }

    const merged: SearchParams = { ...DEFAULT_SEARCH_PARAMS, ...searchParams };
    this.matrix = { keywords: orderedKeywords, domains: orderedDomains, searchParams: merged };

    logger.info("monitor_configured", {
      keywords: orderedKeywords.length,
      domains: orderedDomains.length,
      intervalMs: this.intervalMs,
    });
  }

  /** Single listener; registering again replaces it. Register before start(). */
  onChange(listener: RankChangeListener): void {
    this.detector.onChange(listener);
  }

  status(): MonitorStatus {
    return {
      state: this.state,
      keywords: [...(this.matrix?.keywords ?? [])],
      domains: [...(this.matrix?.domains ?? [])],
      intervalMs: this.intervalMs,
      searchParams: { ...(this.matrix?.searchParams ?? {}) },
      lastCycle: this.lastCycle
        ? { ...this.lastCycle, changes: this.lastCycle.changes.map((change) => ({ ...change })) }
        : undefined,
    };
  }

  private requireMatrix(): MonitorMatrix {
    if (!this.matrix) {
      throw new ConfigurationError("Monitor must be configured with keywords and domains first");
    }
    return this.matrix;
  }

  /**
   * With `runImmediately` one cycle completes before this resolves. The
   * background loop then runs cycle, wait, cycle, wait... starting with a
   * cycle either way.
   */
  async start(runImmediately = true): Promise<void> {
    if (this.state === "running") {
      logger.warn("monitor_already_running");
      return;
    }
    if (this.state === "stopped") {
      logger.warn("monitor_restart_ignored", { state: this.state });
      return;
    }
    this.requireMatrix();
    this.state = "running";

    const firstCycle = runImmediately ? this.runGuarded("startup") : Promise.resolve();
    this.loop = firstCycle.then(() => this.runLoop());

    logger.info("monitor_started", { intervalMs: this.intervalMs, runImmediately });
    await firstCycle;
  }

  stop(): Promise<void> {
    if (this.state === "idle") {
      logger.info("monitor_not_running");
      return Promise.resolve();
    }
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /** Runs one full cycle without scheduling further ones. */
  async runOnce(): Promise<CycleReport> {
    this.requireMatrix();
    return this.enqueueCycle("manual");
  }

  private async shutdown(): Promise<void> {
    logger.info("monitor_stopping");
    this.stopController.abort();

    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<"timeout">((resolve) => {
      graceTimer = setTimeout(() => resolve("timeout"), this.stopGraceMs);
    });
    const outcome = await Promise.race([(this.loop ?? Promise.resolve()).then(() => "done" as const), grace]);
    clearTimeout(graceTimer);

    if (outcome === "timeout") {
      logger.warn("monitor_stop_timeout", { graceMs: this.stopGraceMs });
    }
    this.state = "stopped";
    logger.info("monitor_stopped");
  }

  private async runLoop(): Promise<void> {
    const signal = this.stopController.signal;
    while (!signal.aborted) {
      await this.runGuarded("schedule");
      if (this.retentionDays > 0 && !signal.aborted) {
        await this.purgeExpired();
      }
      await sleep(this.intervalMs, signal);
    }
  }

  private async runGuarded(reason: CycleReason): Promise<void> {
    try {
      await this.enqueueCycle(reason);
    } catch (error) {
      logger.error("monitor_loop_error", { reason, error: errorMessage(error) });
    }
  }

  // cycles of one instance never overlap
  private enqueueCycle(reason: CycleReason): Promise<CycleReport> {
    const run = this.cycleQueue.then(() => this.runCycle(reason));
    this.cycleQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runCycle(reason: CycleReason): Promise<CycleReport> {
    // keywords, domains and search params are fixed for the whole cycle
    const { keywords, domains, searchParams } = this.requireMatrix();
    const signal = this.stopController.signal;
    const pairs = keywords.flatMap((keyword) => domains.map((domain) => ({ keyword, domain })));
    const startedMs = this.nowFn();
    const report: CycleReport = {
      startedAt: new Date(startedMs).toISOString(),
      finishedAt: "",
      checked: 0,
      found: 0,
      failed: 0,
      changes: [],
      interrupted: false,
    };

    logger.info("monitor_cycle_started", { reason, pairs: pairs.length });

    for (const [index, { keyword, domain }] of pairs.entries()) {
      if (signal.aborted) {
        report.interrupted = true;
        break;
      }

      try {
        const observation = await this.checker.checkDomainRanking(keyword, domain, searchParams);
        report.checked += 1;
        if (observation.found) report.found += 1;
        await this.store.save(observation);
        const change = await this.detector.detectChange(keyword, domain, observation);
        if (change) report.changes.push(change);
      } catch (error) {
        report.failed += 1;
        logger.error("monitor_pair_failed", { keyword, domain, error: errorMessage(error) });
      }

      if (index < pairs.length - 1) {
        await sleep(this.probeDelayMs, signal);
      }
    }

    report.finishedAt = new Date(this.nowFn()).toISOString();
    this.lastCycle = report;
    logger.info("monitor_cycle_completed", {
      reason,
      checked: report.checked,
      found: report.found,
      failed: report.failed,
      changes: report.changes.length,
      interrupted: report.interrupted,
      durationMs: this.nowFn() - startedMs,
    });
    return report;
  }

  private async purgeExpired(): Promise<void> {
    try {
      const deleted = await this.store.purgeOlderThan(this.retentionDays);
      logger.info("observations_purged", { deleted, retentionDays: this.retentionDays });
    } catch (error) {
      logger.warn("observation_purge_failed", { error: errorMessage(error) });
    }
  }
}
