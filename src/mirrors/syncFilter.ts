import { ErrorCode, ExclusionRule, MirrorCatalog, MirrorRecord } from '../types';
import { SYNC_LIMITS } from '../config/default';
import { isExcluded } from '../exclusion/exclusionRules';
import { createRankError } from '../utils/errors';
import { logger } from '../utils/logger';

type SyncedMirror = MirrorRecord & { completion_pct: number; delay: number };

const SYNC_PROTOCOLS: readonly string[] = SYNC_LIMITS.PROTOCOLS;

/**
 * Active, served over http(s), fully replicated and less than an hour behind.
 */
export function isSynced(mirror: MirrorRecord): mirror is SyncedMirror {
  return (
    mirror.active &&
    SYNC_PROTOCOLS.includes(mirror.protocol) &&
    mirror.completion_pct !== null &&
    Math.abs(mirror.completion_pct - 1) <= SYNC_LIMITS.COMPLETION_EPSILON &&
    mirror.delay !== null &&
    mirror.delay < SYNC_LIMITS.MAX_DELAY_SECONDS
  );
}

/**
 * Select the best synced mirrors from a catalog, least delayed first.
 *
 * @param maxCheck - keep at most this many; 0 keeps all
 * @param rules - exclusion rules; omitted means nothing is banned
 */
export function filterSyncedMirrors(
  catalog: MirrorCatalog,
  maxCheck: number,
  rules?: readonly ExclusionRule[]
): MirrorRecord[] {
  const synced = catalog.urls.filter(isSynced);
  let candidates = synced;

  if (rules) {
    candidates = synced.filter(mirror => !isExcluded(mirror, rules));
    logger.debug(`Excluded ${synced.length - candidates.length} synced mirrors by rule`);
  }

  // Array.prototype.sort is stable, so equal delays keep catalog order
  const sorted = candidates.map(mirror => ({ ...mirror })).sort((a, b) => a.delay - b.delay);
  const selected = maxCheck > 0 ? sorted.slice(0, maxCheck) : sorted;

  if (selected.length === 0) {
    throw createRankError(
      `No synced mirrors left out of ${catalog.urls.length} in the catalog`,
      ErrorCode.NO_CANDIDATES,
      { catalogSize: catalog.urls.length, synced: synced.length }
    );
  }

  logger.info(
    `Selected ${selected.length} of ${catalog.urls.length} mirrors (${synced.length} synced)`
  );
  return selected;
}
