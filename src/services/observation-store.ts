import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { PersistenceError } from "../domain/errors.js";
import type {
  ObservationId,
  RankingObservation,
  StoredObservation,
} from "../types/ranking.js";
import { errorMessage, logger } from "../utils/logger.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface ObservationStore {
  init(): Promise<void>;
  save(observation: RankingObservation): Promise<ObservationId>;
  /** Most recent first. */
  history(keyword: string, domain: string, limit: number): Promise<StoredObservation[]>;
  latest(keyword: string, domain: string): Promise<StoredObservation | null>;
  changesWithin(keyword: string, domain: string, hours: number): Promise<StoredObservation[]>;
  distinctKeywords(): Promise<string[]>;
  distinctDomains(): Promise<string[]>;
  purgeOlderThan(days: number): Promise<number>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export interface ObservationStoreOptions {
  nowFn?: () => number;
}

/**
 * Returns a timestamp strictly later than `previous`, keeping `candidate`
 * when it already is.
 */
export function nextTimestamp(previous: string | undefined, candidate: string): string {
  if (previous === undefined) return candidate;
  const previousMs = Date.parse(previous);
  const candidateMs = Date.parse(candidate);
  if (Number.isFinite(candidateMs) && candidateMs > previousMs) return candidate;
  return new Date(previousMs + 1).toISOString();
}

export function retentionCutoffMs(nowMs: number, days: number): number {
  return nowMs - days * DAY_MS;
}

export function windowCutoffMs(nowMs: number, hours: number): number {
  return nowMs - hours * HOUR_MS;
}

function seriesKey(keyword: string, domain: string): string {
  return `${keyword}::${domain}`;
}

export class InMemoryObservationStore implements ObservationStore {
  // oldest first within each series
  protected readonly series = new Map<string, StoredObservation[]>();

  protected readonly nowFn: () => number;

  constructor(options: ObservationStoreOptions = {}) {
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  async init(): Promise<void> {}

  async save(observation: RankingObservation): Promise<ObservationId> {
    const key = seriesKey(observation.keyword, observation.domain);
    const records = this.series.get(key) ?? [];
    const previous = records[records.length - 1];
    const record: StoredObservation = {
      ...structuredClone(observation),
      timestamp: nextTimestamp(previous?.timestamp, observation.timestamp),
      id: randomUUID(),
    };
    records.push(record);
    this.series.set(key, records);
    return record.id;
  }

  async history(keyword: string, domain: string, limit: number): Promise<StoredObservation[]> {
    if (limit <= 0) return [];
    const records = this.series.get(seriesKey(keyword, domain)) ?? [];
    return records.slice(-limit).reverse().map((record) => structuredClone(record));
  }

  async latest(keyword: string, domain: string): Promise<StoredObservation | null> {
    const [record] = await this.history(keyword, domain, 1);
    return record ?? null;
  }

  async changesWithin(keyword: string, domain: string, hours: number): Promise<StoredObservation[]> {
    const cutoffMs = windowCutoffMs(this.nowFn(), hours);
    const records = this.series.get(seriesKey(keyword, domain)) ?? [];
    return records
      .filter((record) => Date.parse(record.timestamp) >= cutoffMs)
      .reverse()
      .map((record) => structuredClone(record));
  }

  async distinctKeywords(): Promise<string[]> {
    return this.distinct((record) => record.keyword);
  }

  async distinctDomains(): Promise<string[]> {
    return this.distinct((record) => record.domain);
  }

  async purgeOlderThan(days: number): Promise<number> {
    const cutoffMs = retentionCutoffMs(this.nowFn(), days);
    let deleted = 0;
    for (const [key, records] of this.series) {
      const kept = records.filter((record) => Date.parse(record.timestamp) >= cutoffMs);
      deleted += records.length - kept.length;
      if (kept.length === 0) {
        this.series.delete(key);
      } else if (kept.length !== records.length) {
        this.series.set(key, kept);
      }
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}

  protected insertLoaded(record: StoredObservation): void {
    const key = seriesKey(record.keyword, record.domain);
    const records = this.series.get(key) ?? [];
    records.push(record);
    this.series.set(key, records);
  }

  protected removeRecord(keyword: string, domain: string, id: ObservationId): void {
    const key = seriesKey(keyword, domain);
    const kept = (this.series.get(key) ?? []).filter((record) => record.id !== id);
    if (kept.length === 0) {
      this.series.delete(key);
    } else {
      this.series.set(key, kept);
    }
  }

  protected snapshotSeries(): Map<string, StoredObservation[]> {
    return new Map(Array.from(this.series, ([key, records]) => [key, [...records]]));
  }

  protected restoreSeries(snapshot: Map<string, StoredObservation[]>): void {
    this.series.clear();
    for (const [key, records] of snapshot) {
      this.series.set(key, records);
    }
  }

  protected allRecords(): StoredObservation[] {
    return Array.from(this.series.values()).flat();
  }

  private distinct(pick: (record: StoredObservation) => string): string[] {
    const values = new Set<string>();
    for (const records of this.series.values()) {
      const first = records[0];
      if (first) values.add(pick(first));
    }
    return Array.from(values).sort();
  }
}

const observationBase = {
  id: z.string().min(1),
  keyword: z.string(),
  domain: z.string(),
  timestamp: z.string().datetime(),
  totalResults: z.number().nullable(),
  searchParams: z.record(z.string()),
};

const storedObservationSchema = z.discriminatedUnion("found", [
  z.object({
    ...observationBase,
    found: z.literal(true),
    position: z.number().int().positive(),
    link: z.string(),
    title: z.string().nullable(),
    snippet: z.string().nullable(),
  }),
  z.object({
    ...observationBase,
    found: z.literal(false),
    position: z.null(),
    link: z.null(),
    title: z.null(),
    snippet: z.null(),
  }),
]);

export function parseStoredObservation(value: unknown): StoredObservation | null {
  const parsed = storedObservationSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

interface StoreFileShapeV1 {
  version: 1;
  updatedAt: string;
  observations: StoredObservation[];
}

export class FileBackedObservationStore extends InMemoryObservationStore {
  private readonly storePath: string;
  private readonly tmpPath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(storePath: string, options: ObservationStoreOptions = {}) {
    super(options);
    const absolute = path.isAbsolute(storePath) ? storePath : path.resolve(process.cwd(), storePath);
    this.storePath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  override async init(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return;
      throw new PersistenceError(`Cannot read observation store ${this.storePath}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Observation store ${this.storePath} is not valid JSON`, error);
    }

    const items = z.object({ observations: z.array(z.unknown()) }).safeParse(parsed);
    if (!items.success) {
      throw new PersistenceError(`Observation store ${this.storePath} has an unexpected shape`);
    }

    let skipped = 0;
    for (const item of items.data.observations) {
      const record = parseStoredObservation(item);
      if (!record) {
        skipped += 1;
        continue;
      }
      this.insertLoaded(record);
    }
    for (const records of this.series.values()) {
      records.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
    }
    if (skipped > 0) {
      logger.warn("observation_store_records_skipped", { path: this.storePath, skipped });
    }
  }

  // memory only keeps what reached the file
  override async save(observation: RankingObservation): Promise<ObservationId> {
    const id = await super.save(observation);
    try {
      await this.flush();
    } catch (error) {
      this.removeRecord(observation.keyword, observation.domain, id);
      throw error;
    }
    return id;
  }

  override async purgeOlderThan(days: number): Promise<number> {
    const snapshot = this.snapshotSeries();
    const deleted = await super.purgeOlderThan(days);
    if (deleted === 0) return 0;
    try {
      await this.flush();
    } catch (error) {
      this.restoreSeries(snapshot);
      throw error;
    }
    return deleted;
  }

  override async close(): Promise<void> {
    await this.writeQueue;
  }

  private flush(): Promise<void> {
    const write = this.writeQueue.then(() => this.writeFile());
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async writeFile(): Promise<void> {
    const payload: StoreFileShapeV1 = {
      version: 1,
      updatedAt: new Date(this.nowFn()).toISOString(),
      observations: this.allRecords(),
    };
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
      await fs.rename(this.tmpPath, this.storePath);
    } catch (error) {
      logger.error("observation_store_write_failed", {
        path: this.storePath,
        error: errorMessage(error),
      });
      throw new PersistenceError(`Cannot write observation store ${this.storePath}`, error);
    }
  }
}
