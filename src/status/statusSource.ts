import fetch, { FetchError } from 'node-fetch';
import { fileURLToPath } from 'url';
import { MirrorCatalog, MirrorCatalogSchema } from './schema';
import { ErrorCode } from '../types';
import { USER_AGENT, defaultConfig } from '../config/default';
import { createRankError, errorMessage, isRankError, isRetryableError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';

export interface FetchStatusOptions {
  retryAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

const STATUS_TIMEOUT_MS = 30000;

/**
 * Delay before retry number `attempt` (1-based): base, 2×base, 4×base, ...
 */
export function backoffDelay(baseMs: number, attempt: number): number {
  return baseMs * 2 ** (attempt - 1);
}

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Fetch and parse the mirror status document. Remote sources are retried on
 * transport failures; a body that does not parse is never retried.
 */
export async function fetchMirrorStatus(
  source: string,
  options: FetchStatusOptions = {}
): Promise<MirrorCatalog> {
  const body = isRemoteSource(source)
    ? await downloadStatus(source, options)
    : await readStatusFile(source);

  return parseMirrorCatalog(body, source);
}

export function parseMirrorCatalog(body: string, source: string): MirrorCatalog {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw createRankError(
      `Mirror status from ${source} is not valid JSON`,
      ErrorCode.PARSE_FAILURE,
      { source },
      false,
      error
    );
  }

  const result = MirrorCatalogSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw createRankError(
      `Mirror status from ${source} does not match the expected format (${issues})`,
      ErrorCode.PARSE_FAILURE,
      { source, issueCount: result.error.issues.length }
    );
  }

  return result.data;
}

async function downloadStatus(url: string, options: FetchStatusOptions): Promise<string> {
  const attempts = Math.max(1, options.retryAttempts ?? defaultConfig.retryAttempts);
  const baseDelay = options.retryDelayMs ?? defaultConfig.retryDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      logger.debug(`Fetching mirror status from ${url} (attempt ${attempt}/${attempts})`);
      const response = await fetch(url, {
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/json',
        },
        timeout: options.timeoutMs ?? STATUS_TIMEOUT_MS,
      });

      if (!response.ok) {
        throw createRankError(
          `HTTP ${response.status}: ${response.statusText}`,
          ErrorCode.FETCH_FAILURE,
          { url, status: response.status },
          response.status >= 500 || response.status === 429
        );
      }

      return await response.text();
    } catch (error) {
      lastError = error;

      if (!(error instanceof FetchError) && !isRetryableError(error)) {
        throw isRankError(error)
          ? error
          : createRankError(
              `Failed to fetch mirror status from ${url}: ${errorMessage(error)}`,
              ErrorCode.FETCH_FAILURE,
              { url },
              false,
              error
            );
      }

      if (attempt < attempts) {
        const delay = backoffDelay(baseDelay, attempt);
        logger.warn(
          `Fetching mirror status failed, attempt ${attempt}/${attempts}. Retrying in ${delay}ms... Error: ${errorMessage(error)}`
        );
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  throw createRankError(
    `Failed to fetch mirror status from ${url} after ${attempts} attempts`,
    ErrorCode.FETCH_FAILURE,
    { url, attempts },
    false,
    lastError
  );
}

async function readStatusFile(source: string): Promise<string> {
  const filePath = source.startsWith('file://') ? fileURLToPath(source) : source;

  try {
    return await FileUtils.readText(filePath);
  } catch (error) {
    throw createRankError(
      `Could not read mirror status file \`${filePath}\``,
      ErrorCode.FETCH_FAILURE,
      { path: filePath },
      false,
      error
    );
  }
}
