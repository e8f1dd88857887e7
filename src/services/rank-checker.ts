import type {
  NotFoundObservation,
  RankingObservation,
  SearchParams,
  SearchResponse,
} from "../types/ranking.js";
import { errorMessage, logger } from "../utils/logger.js";
import type { RankingProber } from "./serpapi-prober.js";

interface RankCheckerOptions {
  prober: RankingProber;
  searchParams?: SearchParams;
  nowFn?: () => number;
}

export class RankChecker {
  private readonly prober: RankingProber;
  private readonly nowFn: () => number;
  private searchParams: SearchParams;

  constructor(options: RankCheckerOptions) {
    this.prober = options.prober;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.searchParams = { ...(options.searchParams ?? {}) };
  }

  configure(searchParams: SearchParams): void {
    this.searchParams = { ...searchParams };
  }

  private async probe(keyword: string, searchParams: SearchParams): Promise<SearchResponse | null> {
    try {
      return await this.prober.search(keyword, searchParams);
    } catch (error) {
      logger.warn("provider_probe_failed", { keyword, error: errorMessage(error) });
      return null;
    }
  }

  /** `params` replaces the configured search parameters for this check only. */
  async checkDomainRanking(
    keyword: string,
    domain: string,
    params: SearchParams = this.searchParams,
  ): Promise<RankingObservation> {
    const searchParams = { ...params };
    const response = await this.probe(keyword, searchParams);
    const timestamp = new Date(this.nowFn()).toISOString();
    const totalResults = response?.meta.totalResults ?? null;

    const notFound: NotFoundObservation = {
      keyword,
      domain,
      timestamp,
      found: false,
      position: null,
      link: null,
      title: null,
      snippet: null,
      totalResults,
      searchParams,
    };

    const results = response?.organicResults;
    if (!results) {
      logger.info("rank_check_no_results", { keyword, domain, totalResults });
      return notFound;
    }

    // raw substring match on the URL, first hit wins
    const index = results.findIndex((result) => result.link?.includes(domain) ?? false);
    const match = results[index];
    if (!match?.link) {
      logger.info("rank_check_not_found", { keyword, domain, scanned: results.length });
      return notFound;
    }

    const position = match.position ?? index + 1;
    logger.info("rank_check_found", { keyword, domain, position, link: match.link });
    return {
      keyword,
      domain,
      timestamp,
      found: true,
      position,
      link: match.link,
      title: match.title ?? null,
      snippet: match.snippet ?? null,
      totalResults,
      searchParams,
    };
  }
}
