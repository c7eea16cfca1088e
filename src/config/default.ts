import { RankerConfig, TargetRepository } from '../types';

export const APP_NAME = 'mirror-ranker';
export const APP_VERSION = '1.0.0';
export const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

export const DEFAULT_SOURCE_URL = 'https://archlinux.org/mirrors/status/json/';

export const defaultConfig: RankerConfig = {
  sourceUrl: DEFAULT_SOURCE_URL,
  targetDb: TargetRepository.EXTRA,
  mirrors: 10,
  threads: 5,
  maxCheck: 100,
  exclude: [],
  retryAttempts: 5,
  retryDelayMs: 1000,
  probeTimeoutMs: 10000,
};

export const SYNC_LIMITS = {
  MAX_DELAY_SECONDS: 3600,
  COMPLETION_EPSILON: 1e-9,
  PROTOCOLS: ['http', 'https'],
} as const;

export const MAX_THREADS = 64;

export const CONFIG_FILENAME = 'mirror-ranker.json';

export function targetDbPath(target: TargetRepository): string {
  return `${target}/os/x86_64/${target}.db`;
}
