import { MirrorRanker } from './ranker/mirrorRanker';
import { ConfigManager } from './config/configManager';
import { logger } from './utils/logger';

// Export all the main classes for programmatic usage
export { MirrorRanker, ConfigManager, logger };

export { fetchMirrorStatus, parseMirrorCatalog } from './status/statusSource';
export { MirrorCatalogSchema, MirrorRecordSchema } from './status/schema';
export {
  buildExclusionRules,
  isExcluded,
  loadExclusionFile,
  parseExclusionRule,
  parseExclusionRules,
} from './exclusion/exclusionRules';
export { filterSyncedMirrors, isSynced } from './mirrors/syncFilter';
export { createProbePool, probeAll, probeMirror } from './mirrors/benchmarkProber';
export {
  computeMaxScore,
  evaluate,
  scoreMirrors,
  selectMirrors,
  sortByWeightedScore,
} from './mirrors/weightedScorer';
export { renderMirrorlist, toPacmanMirrorList, writeMirrorlistFile } from './output/mirrorlist';
export { toStatsCsv, writeStatsFile } from './output/statsCsv';
export { MirrorRankError, formatError, isRankError } from './utils/errors';
export { defaultConfig } from './config/default';
export { run } from './cli';

// Export types
export * from './types';
export type { RankResult } from './ranker/mirrorRanker';
export type { ProbeOptions, ProbePool } from './mirrors/benchmarkProber';
