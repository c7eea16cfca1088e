import type { MirrorRecord } from '../status/schema';

export type { MirrorRecord, MirrorCatalog } from '../status/schema';

export enum TargetRepository {
  CORE = 'core',
  EXTRA = 'extra',
  COMMUNITY = 'community',
}

/**
 * A catalog entry after benchmarking and scoring. Both fields stay undefined
 * until the prober and the scorer have written them.
 */
export interface RankedMirror extends MirrorRecord {
  transfer_rate?: number;
  weighted_score?: number;
}

export type ExclusionKind = 'domain' | 'country' | 'country_code';

export interface ExclusionRule {
  kind: ExclusionKind;
  value: string; // always lowercase
  negate: boolean;
}

export type ProbeOutcome =
  | { url: string; ok: true; rate: number }
  | { url: string; ok: false; reason: string };

export interface ProbeReport {
  mirrors: RankedMirror[];
  outcomes: ProbeOutcome[];
}

export interface RankerConfig {
  sourceUrl: string;
  targetDb: TargetRepository;
  mirrors: number;
  threads: number;
  maxCheck: number;
  outputFile?: string;
  statsFile?: string;
  exclude: string[];
  excludeFrom?: string;
  retryAttempts: number;
  retryDelayMs: number;
  probeTimeoutMs: number;
}

export enum ErrorCode {
  FETCH_FAILURE = 'FETCH_FAILURE',
  PARSE_FAILURE = 'PARSE_FAILURE',
  NO_CANDIDATES = 'NO_CANDIDATES',
  PROBE_FAILURE = 'PROBE_FAILURE',
  NO_BEST_MIRRORS = 'NO_BEST_MIRRORS',
  CONFIG_ERROR = 'CONFIG_ERROR',
  OUTPUT_ERROR = 'OUTPUT_ERROR',
}
