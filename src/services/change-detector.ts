import type {
  RankChangeEvent,
  RankChangeListener,
  RankingObservation,
} from "../types/ranking.js";
import { errorMessage, logger } from "../utils/logger.js";
import type { ObservationStore } from "./observation-store.js";

interface ChangeDetectorOptions {
  store: ObservationStore;
  nowFn?: () => number;
}

export class ChangeDetector {
  private readonly store: ObservationStore;
  private readonly nowFn: () => number;
  private listener?: RankChangeListener;

  constructor(options: ChangeDetectorOptions) {
    this.store = options.store;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  /** Replaces any previously registered listener. */
  onChange(listener: RankChangeListener | undefined): void {
    this.listener = listener;
  }

  /**
   * Compares `current`, which must already be saved, against the record
   * stored before it.
   */
  async detectChange(
    keyword: string,
    domain: string,
    current: RankingObservation,
  ): Promise<RankChangeEvent | null> {
    const history = await this.store.history(keyword, domain, 2);
    const baseline = history[1];
    if (!baseline) return null;
    if (baseline.position === current.position) return null;

    const event: RankChangeEvent = {
      keyword,
      domain,
      previousPosition: baseline.position,
      currentPosition: current.position,
      detectedAt: new Date(this.nowFn()).toISOString(),
    };
    logger.info("rank_changed", { ...event });

    if (this.listener) {
      try {
        this.listener(event);
      } catch (error) {
        logger.error("rank_change_listener_failed", {
          keyword,
          domain,
          error: errorMessage(error),
        });
      }
    }
    return event;
  }
}
