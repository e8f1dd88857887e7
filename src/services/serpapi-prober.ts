import { z } from "zod";
import { env } from "../config/env.js";
import { ConfigurationError, ProviderError } from "../domain/errors.js";
import type { OrganicResult, SearchParams, SearchResponse } from "../types/ranking.js";
import { errorMessage, logger } from "../utils/logger.js";

export interface RankingProber {
  /** Resolves to null when the provider could not be queried. */
  search(keyword: string, params: SearchParams): Promise<SearchResponse | null>;
}

const organicResultSchema = z
  .object({
    position: z.number().int().positive().optional(),
    link: z.string().optional(),
    title: z.string().optional(),
    snippet: z.string().optional(),
  })
  .passthrough();

const serpApiResponseSchema = z
  .object({
    error: z.string().optional(),
    organic_results: z.array(organicResultSchema).optional(),
    search_information: z
      .object({
        total_results: z.union([z.number(), z.string()]).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export function parseTotalResults(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const digits = value.replace(/\D+/g, "");
  if (!digits) {
    return null;
  }
  const parsed = Number.parseInt(digits, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

export function toSearchResponse(body: unknown): SearchResponse {
  const parsed = serpApiResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError(`Malformed provider response: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }

  const data = parsed.data;
  const response: SearchResponse = {
    meta: { totalResults: parseTotalResults(data.search_information?.total_results) },
  };
  if (data.organic_results) {
    response.organicResults = data.organic_results.map(
      (item): OrganicResult => ({
        position: item.position,
        link: item.link,
        title: item.title,
        snippet: item.snippet,
      }),
    );
  }
  return response;
}

export class SerpApiProber implements RankingProber {
  private readonly apiKey: string;

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  constructor(options?: { apiKey?: string; baseUrl?: string; timeoutMs?: number }) {
    this.apiKey = options?.apiKey ?? env.SERPAPI_KEY;
    this.baseUrl = options?.baseUrl ?? env.SERPAPI_BASE_URL;
    this.timeoutMs = options?.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
    if (!this.apiKey.trim()) {
      throw new ConfigurationError("SERPAPI_KEY is required");
    }
  }

  private buildUrl(keyword: string, params: SearchParams): string {
    const url = new URL("/search.json", this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== "") {
        url.searchParams.set(key, value);
      }
    }
    url.searchParams.set("q", keyword);
    url.searchParams.set("api_key", this.apiKey);
    return url.toString();
  }

  private async request(keyword: string, params: SearchParams): Promise<SearchResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.buildUrl(keyword, params), {
        method: "GET",
        headers: { accept: "application/json" },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new ProviderError(`Provider returned ${response.status}`, { status: response.status });
      }
      const body = (await response.json()) as unknown;
      return toSearchResponse(body);
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Provider request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  async search(keyword: string, params: SearchParams): Promise<SearchResponse | null> {
    const startedAt = Date.now();
    try {
      const response = await this.request(keyword, params);
      logger.debug("serpapi_request_ok", {
        keyword,
        organicResults: response.organicResults?.length ?? 0,
        durationMs: Date.now() - startedAt,
      });
      return response;
    } catch (error) {
      logger.warn("serpapi_request_failed", {
        keyword,
        status: error instanceof ProviderError ? error.status : undefined,
        durationMs: Date.now() - startedAt,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
