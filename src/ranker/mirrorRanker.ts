import { ExclusionRule, MirrorCatalog, MirrorRecord, RankedMirror, RankerConfig } from '../types';
import { fetchMirrorStatus } from '../status/statusSource';
import { filterSyncedMirrors } from '../mirrors/syncFilter';
import { createProbePool } from '../mirrors/benchmarkProber';
import { evaluate } from '../mirrors/weightedScorer';
import { logger } from '../utils/logger';

export interface RankResult {
  catalog: MirrorCatalog;
  candidates: MirrorRecord[];
  selected: RankedMirror[];
}

function formatRate(rate: number | undefined): string {
  if (rate === undefined) {
    return '-';
  }
  return `${(rate / 1024).toFixed(1)} KiB/s`;
}

export class MirrorRanker {
  private config: RankerConfig;

  constructor(config: RankerConfig) {
    this.config = config;
  }

  /**
   * Fetch the status catalog, keep the synced candidates, benchmark them and
   * return the best `config.mirrors` of them.
   */
  async rank(rules?: readonly ExclusionRule[]): Promise<RankResult> {
    const { sourceUrl, targetDb, mirrors, threads, maxCheck } = this.config;

    logger.section('Mirror status');
    const catalog = await fetchMirrorStatus(sourceUrl, {
      retryAttempts: this.config.retryAttempts,
      retryDelayMs: this.config.retryDelayMs,
    });
    logger.stats({
      Source: sourceUrl,
      'Last check': catalog.last_check,
      Checks: catalog.num_checks,
      'Check frequency': `${catalog.check_frequency}s`,
      Cutoff: `${catalog.cutoff}s`,
      Version: catalog.version,
      Mirrors: catalog.urls.length,
    });

    const candidates = filterSyncedMirrors(catalog, maxCheck, rules);

    logger.section(`Benchmarking ${candidates.length} mirrors with ${threads} threads`);
    const pool = createProbePool(threads);
    const selected = await evaluate(candidates, mirrors, targetDb, pool, {
      timeoutMs: this.config.probeTimeoutMs,
    });

    logger.section('Best mirrors');
    logger.table(
      ['#', 'Mirror', 'Country', 'Rate', 'Score'],
      selected.map((mirror, index) => [
        index + 1,
        mirror.url,
        mirror.country || '-',
        formatRate(mirror.transfer_rate),
        mirror.score ?? '-',
      ])
    );

    return { catalog, candidates, selected };
  }
}
