import fetch from 'node-fetch';
import https from 'https';
import pLimit from 'p-limit';
import {
  ErrorCode,
  MirrorRecord,
  ProbeOutcome,
  ProbeReport,
  RankedMirror,
  TargetRepository,
} from '../types';
import { USER_AGENT, defaultConfig, targetDbPath } from '../config/default';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ProbePool = ReturnType<typeof pLimit>;

export interface ProbeOptions {
  timeoutMs?: number;
}

// Mirrors often serve mismatched or self-signed certificates. The probe only
// measures throughput, so certificate errors must not hide a fast mirror.
const insecureAgent = new https.Agent({ rejectUnauthorized: false });

export function createProbePool(concurrency: number): ProbePool {
  return pLimit(Math.max(1, Math.floor(concurrency)));
}

export function probeUrl(baseUrl: string, target: TargetRepository): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(targetDbPath(target), base).toString();
}

/**
 * Download the target database from one mirror and measure bytes/second.
 * One deadline covers the request and the body read. Never throws: every
 * failure comes back as `{ ok: false }`.
 */
export async function probeMirror(
  mirror: Pick<MirrorRecord, 'url'>,
  target: TargetRepository,
  options: ProbeOptions = {}
): Promise<ProbeOutcome> {
  const timeoutMs = options.timeoutMs ?? defaultConfig.probeTimeoutMs;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  let url = mirror.url;

  try {
    url = probeUrl(mirror.url, target);
    const start = Date.now();
    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      compress: false,
      signal: controller.signal,
      agent: parsedUrl => (parsedUrl.protocol === 'https:' ? insecureAgent : undefined),
    });

    if (response.status !== 200) {
      return probeFailed(url, `HTTP ${response.status}: ${response.statusText}`);
    }

    const contentLength = response.headers.get('content-length');
    if (contentLength === null || !/^\d+$/.test(contentLength.trim())) {
      return probeFailed(url, 'response has no Content-Length');
    }

    const body = await response.buffer();
    const elapsedMs = Math.max(Date.now() - start, 1);
    const rate = (body.length * 1000) / elapsedMs;

    logger.debug(`Probed ${url}: ${body.length} bytes in ${elapsedMs}ms`);
    return { url, ok: true, rate };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return probeFailed(url, `timed out after ${timeoutMs}ms`);
    }
    return probeFailed(url, errorMessage(error));
  } finally {
    clearTimeout(timeoutId);
    // Closes the socket of a response whose body was left unread
    controller.abort();
  }
}

function probeFailed(url: string, reason: string): ProbeOutcome {
  logger.warn(`[${ErrorCode.PROBE_FAILURE}] Could not measure transfer rate of ${url}: ${reason}`);
  return { url, ok: false, reason };
}

/**
 * Probe every mirror through the pool. Each task owns one slot of the
 * result, so the output order always equals the input order regardless of
 * completion order.
 */
export async function probeAll(
  mirrors: readonly MirrorRecord[],
  target: TargetRepository,
  pool: ProbePool,
  options: ProbeOptions = {}
): Promise<ProbeReport> {
  const results: RankedMirror[] = mirrors.map(mirror => ({ ...mirror }));
  let completed = 0;

  logger.progress('Measuring transfer rates', 0, results.length);
  const outcomes = await Promise.all(
    results.map(mirror =>
      pool(async () => {
        const outcome = await probeMirror(mirror, target, options);
        mirror.transfer_rate = outcome.ok ? outcome.rate : undefined;
        completed++;
        logger.progress('Measuring transfer rates', completed, results.length);
        return outcome;
      })
    )
  );

  const failed = outcomes.filter(outcome => !outcome.ok).length;
  if (failed > 0) {
    logger.warn(`${failed} of ${results.length} mirrors could not be measured`);
  }

  return { mirrors: results, outcomes };
}
