import { ErrorCode, MirrorRecord, RankedMirror, TargetRepository } from '../types';
import { ProbeOptions, ProbePool, probeAll } from './benchmarkProber';
import { createRankError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Highest upstream score in the set, 0 when no mirror has one. The upstream
 * score is a penalty (lower is better), so the worst mirror defines the top.
 */
export function computeMaxScore(mirrors: readonly MirrorRecord[]): number {
  return mirrors.reduce(
    (max, mirror) => (mirror.score !== null && mirror.score > max ? mirror.score : max),
    0
  );
}

/**
 * weighted_score = transfer_rate × (maxScore − score)
 *
 * An unmeasured mirror counts as rate 0. A mirror without an upstream score
 * gets NaN.
 */
export function scoreMirrors(mirrors: readonly RankedMirror[]): RankedMirror[] {
  const maxScore = computeMaxScore(mirrors);
  return mirrors.map(mirror => ({
    ...mirror,
    weighted_score: (mirror.transfer_rate ?? 0) * (maxScore - (mirror.score ?? NaN)),
  }));
}

function rankValue(mirror: RankedMirror): number {
  return mirror.weighted_score ?? NaN;
}

/**
 * Descending by weighted score. NaN (and unscored) mirrors go last; ties keep
 * their previous order.
 */
export function sortByWeightedScore(mirrors: readonly RankedMirror[]): RankedMirror[] {
  return [...mirrors].sort((a, b) => {
    const aa = rankValue(a);
    const bb = rankValue(b);
    const aMissing = Number.isNaN(aa);
    const bMissing = Number.isNaN(bb);

    if (aMissing || bMissing) {
      return Number(aMissing) - Number(bMissing);
    }
    if (aa === bb) {
      return 0;
    }
    return aa > bb ? -1 : 1;
  });
}

export function selectMirrors(mirrors: readonly RankedMirror[], n: number): RankedMirror[] {
  return mirrors.slice(0, Math.max(0, n));
}

/**
 * Benchmark the candidates and return the `selectN` best of them.
 */
export async function evaluate(
  mirrors: readonly MirrorRecord[],
  selectN: number,
  target: TargetRepository,
  pool: ProbePool,
  options: ProbeOptions = {}
): Promise<RankedMirror[]> {
  const report = await probeAll(mirrors, target, pool, options);
  const ranked = selectMirrors(sortByWeightedScore(scoreMirrors(report.mirrors)), selectN);

  if (ranked.length === 0) {
    throw createRankError(
      `No best mirrors out of ${mirrors.length} candidates`,
      ErrorCode.NO_BEST_MIRRORS,
      { candidates: mirrors.length, selectN }
    );
  }

  logger.debug(`Selected ${ranked.length} best mirrors out of ${mirrors.length} candidates`);
  return ranked;
}
