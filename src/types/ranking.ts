export type SearchParams = Record<string, string>;

interface ObservationBase {
  keyword: string;
  domain: string;
  /** ISO-8601 capture time. */
  timestamp: string;
  totalResults: number | null;
  searchParams: SearchParams;
}

export interface FoundObservation extends ObservationBase {
  found: true;
  position: number;
  link: string;
  title: string | null;
  snippet: string | null;
}

export interface NotFoundObservation extends ObservationBase {
  found: false;
  position: null;
  link: null;
  title: null;
  snippet: null;
}

export type RankingObservation = FoundObservation | NotFoundObservation;

export type ObservationId = string;

export type StoredObservation = RankingObservation & { id: ObservationId };

export interface RankChangeEvent {
  keyword: string;
  domain: string;
  previousPosition: number | null;
  currentPosition: number | null;
  detectedAt: string;
}

export type RankChangeListener = (event: RankChangeEvent) => void;

export interface OrganicResult {
  position?: number;
  link?: string;
  title?: string;
  snippet?: string;
}

export interface SearchResponse {
  organicResults?: OrganicResult[];
  meta: {
    totalResults: number | null;
  };
}

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  checked: number;
  found: number;
  failed: number;
  changes: RankChangeEvent[];
  /** True when a stop request cut the cycle short. */
  interrupted: boolean;
}

export type MonitorState = "idle" | "running" | "stopped";

export interface MonitorStatus {
  state: MonitorState;
  keywords: string[];
  domains: string[];
  intervalMs: number;
  searchParams: SearchParams;
  lastCycle?: CycleReport;
}
