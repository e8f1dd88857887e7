import { randomUUID } from "node:crypto";
import { Redis } from "ioredis";
import { z } from "zod";
import { env } from "../config/env.js";
import { PersistenceError } from "../domain/errors.js";
import type {
  ObservationId,
  RankingObservation,
  StoredObservation,
} from "../types/ranking.js";
import { errorMessage, logger } from "../utils/logger.js";
import {
  nextTimestamp,
  parseStoredObservation,
  retentionCutoffMs,
  windowCutoffMs,
  type ObservationStore,
} from "./observation-store.js";

interface RedisStoreOptions {
  client?: Redis;
  redisUrl?: string;
  redisPrefix?: string;
  nowFn?: () => number;
}

const seriesMemberSchema = z.tuple([z.string(), z.string()]);

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * One sorted set per (keyword, domain) scored by capture time in epoch ms,
 * members are the serialized records. `<prefix>:series` indexes the pairs.
 */
export class RedisObservationStore implements ObservationStore {
  private readonly redis: Redis;
  private readonly redisPrefix: string;
  private readonly nowFn: () => number;

  constructor(options: RedisStoreOptions = {}) {
    const redisUrl = options.redisUrl ?? env.REDIS_URL;
    if (!options.client && !redisUrl) {
      throw new PersistenceError("REDIS_URL is required when STORE_DRIVER=redis");
    }
    this.redis =
      options.client ??
      new Redis(redisUrl, {
        lazyConnect: true,
        maxRetriesPerRequest: 1,
      });
    this.redisPrefix = options.redisPrefix ?? env.REDIS_PREFIX;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  private seriesIndexKey(): string {
    return `${this.redisPrefix}:series`;
  }

  private seriesKey(keyword: string, domain: string): string {
    return `${this.redisPrefix}:obs:${encodeURIComponent(keyword)}:${encodeURIComponent(domain)}`;
  }

  private parseRecords(raw: string[]): StoredObservation[] {
    const records: StoredObservation[] = [];
    for (const item of raw) {
      const record = parseStoredObservation(parseJson(item));
      if (record) {
        records.push(record);
      } else {
        logger.warn("redis_record_unreadable", { length: item.length });
      }
    }
    return records;
  }

  private async seriesPairs(): Promise<Array<[string, string]>> {
    const members = await this.run("smembers", () => this.redis.smembers(this.seriesIndexKey()));
    const pairs: Array<[string, string]> = [];
    for (const member of members) {
      const parsed = seriesMemberSchema.safeParse(parseJson(member));
      if (parsed.success) pairs.push(parsed.data);
    }
    return pairs;
  }

  private async run<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new PersistenceError(`Redis ${command} failed: ${errorMessage(error)}`, error);
    }
  }

  async init(): Promise<void> {
    if (this.redis.status === "wait") {
      await this.run("connect", () => this.redis.connect());
    }
    await this.run("ping", () => this.redis.ping());
  }

  async save(observation: RankingObservation): Promise<ObservationId> {
    const key = this.seriesKey(observation.keyword, observation.domain);
    const [previous] = await this.history(observation.keyword, observation.domain, 1);
    const record: StoredObservation = {
      ...observation,
      timestamp: nextTimestamp(previous?.timestamp, observation.timestamp),
      id: randomUUID(),
    };
    await this.run("zadd", () => this.redis.zadd(key, Date.parse(record.timestamp), JSON.stringify(record)));
    await this.run("sadd", () =>
      this.redis.sadd(this.seriesIndexKey(), JSON.stringify([record.keyword, record.domain])),
    );
    return record.id;
  }

  async history(keyword: string, domain: string, limit: number): Promise<StoredObservation[]> {
    if (limit <= 0) return [];
    const raw = await this.run("zrevrange", () =>
      this.redis.zrevrange(this.seriesKey(keyword, domain), 0, limit - 1),
    );
    return this.parseRecords(raw);
  }

  async latest(keyword: string, domain: string): Promise<StoredObservation | null> {
    const [record] = await this.history(keyword, domain, 1);
    return record ?? null;
  }

  async changesWithin(keyword: string, domain: string, hours: number): Promise<StoredObservation[]> {
    const cutoffMs = windowCutoffMs(this.nowFn(), hours);
    const raw = await this.run("zrevrangebyscore", () =>
      this.redis.zrevrangebyscore(this.seriesKey(keyword, domain), "+inf", cutoffMs),
    );
    return this.parseRecords(raw);
  }

  async distinctKeywords(): Promise<string[]> {
    const pairs = await this.seriesPairs();
    return Array.from(new Set(pairs.map(([keyword]) => keyword))).sort();
  }

  async distinctDomains(): Promise<string[]> {
    const pairs = await this.seriesPairs();
    return Array.from(new Set(pairs.map(([, domain]) => domain))).sort();
  }

  async purgeOlderThan(days: number): Promise<number> {
    const cutoffMs = retentionCutoffMs(this.nowFn(), days);
    let deleted = 0;
    for (const [keyword, domain] of await this.seriesPairs()) {
      const key = this.seriesKey(keyword, domain);
      deleted += await this.run("zremrangebyscore", () =>
        this.redis.zremrangebyscore(key, "-inf", `(${cutoffMs}`),
      );
      const remaining = await this.run("zcard", () => this.redis.zcard(key));
      if (remaining === 0) {
        await this.run("srem", () => this.redis.srem(this.seriesIndexKey(), JSON.stringify([keyword, domain])));
      }
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
