import { ErrorCode, RankerConfig } from '../types';
import { APP_NAME, CONFIG_FILENAME, DEFAULT_SOURCE_URL, defaultConfig } from './default';
import { parseCount, parseTargetRepository } from './configManager';
import { createRankError } from '../utils/errors';
import { LogLevel } from '../utils/logger';

export interface CliOptions {
  configPath?: string;
  overrides: Partial<RankerConfig>;
  verbosity: number;
  help: boolean;
  version: boolean;
}

const SHORT_FLAGS: Record<string, string> = {
  S: 'source-url',
  t: 'target-db',
  o: 'output-file',
  m: 'mirrors',
  T: 'threads',
  c: 'max-check',
  s: 'stats-file',
  e: 'exclude',
  v: 'verbose',
  q: 'quiet',
  h: 'help',
  V: 'version',
};

const SWITCHES = new Set(['verbose', 'quiet', 'help', 'version']);

const VALUE_FLAGS = new Set([
  'source-url',
  'target-db',
  'output-file',
  'mirrors',
  'threads',
  'max-check',
  'stats-file',
  'exclude',
  'exclude-from',
  'config',
]);

export const USAGE = `Usage: ${APP_NAME} [options]

Retrieve the best and latest pacman mirror list, ranked by measured transfer rate.

Options:
  -S, --source-url <url>     Mirror status source: URL or local JSON file
                             (default: ${DEFAULT_SOURCE_URL})
  -t, --target-db <name>     Database downloaded for the speed test: core, extra, community
                             (default: ${defaultConfig.targetDb})
  -o, --output-file <path>   Write the mirrorlist to a new file instead of stdout
  -m, --mirrors <n>          Keep the n mirrors with the highest score (default: ${defaultConfig.mirrors})
  -T, --threads <n>          Number of concurrent speed tests (default: ${defaultConfig.threads})
  -c, --max-check <n>        Speed test at most n synced mirrors, 0 for all (default: ${defaultConfig.maxCheck})
  -s, --stats-file <path>    Write statistics of the selected mirrors as CSV
  -e, --exclude <rules>      Comma-separated exclusion rules, may be repeated
      --exclude-from <path>  Read exclusion rules from a file
      --config <path>        Configuration file (default: ./${CONFIG_FILENAME})
  -v, --verbose              More output, repeat for debug
  -q, --quiet                Less output, repeat for errors only
  -h, --help                 Show this help
  -V, --version              Show version
`;

function configError(message: string, details: Record<string, unknown> = {}): Error {
  return createRankError(message, ErrorCode.CONFIG_ERROR, details);
}

function applyValue(options: CliOptions, flag: string, value: string): void {
  const { overrides } = options;

  switch (flag) {
    case 'source-url':
      overrides.sourceUrl = value;
      break;
    case 'target-db': {
      const target = parseTargetRepository(value);
      if (!target) {
        throw configError(`Invalid target database \`${value}\` (expected core, extra or community)`, {
          targetDb: value,
        });
      }
      overrides.targetDb = target;
      break;
    }
    case 'output-file':
      overrides.outputFile = value;
      break;
    case 'stats-file':
      overrides.statsFile = value;
      break;
    case 'mirrors':
      overrides.mirrors = parseCount(value, '--mirrors');
      break;
    case 'threads':
      overrides.threads = parseCount(value, '--threads');
      break;
    case 'max-check':
      overrides.maxCheck = parseCount(value, '--max-check');
      break;
    case 'exclude':
      overrides.exclude = [
        ...(overrides.exclude ?? []),
        ...value
          .split(',')
          .map(rule => rule.trim())
          .filter(rule => rule.length > 0),
      ];
      break;
    case 'exclude-from':
      overrides.excludeFrom = value;
      break;
    case 'config':
      options.configPath = value;
      break;
  }
}

/**
 * Parse command line arguments (without the node and script entries).
 * Accepts `--flag value`, `--flag=value`, `-f value`, `-fvalue` and stacked
 * `-vv` / `-qq`.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { overrides: {}, verbosity: 0, help: false, version: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let flag: string;
    let inline: string | undefined;

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      flag = eq === -1 ? body : body.slice(0, eq);
      inline = eq === -1 ? undefined : body.slice(eq + 1);
    } else if (arg.startsWith('-') && arg.length > 1) {
      const letters = arg.slice(1);
      if (letters.length > 1 && /^[vq]+$/.test(letters)) {
        for (const letter of letters) {
          options.verbosity += letter === 'v' ? 1 : -1;
        }
        continue;
      }
      flag = SHORT_FLAGS[letters[0]];
      if (!flag) {
        throw configError(`Unknown option: ${arg}`, { option: arg });
      }
      inline = letters.length > 1 ? letters.slice(1).replace(/^=/, '') : undefined;
    } else {
      throw configError(`Unexpected argument: ${arg}`, { argument: arg });
    }

    if (SWITCHES.has(flag)) {
      if (inline !== undefined) {
        throw configError(`Option --${flag} does not take a value`, { option: arg });
      }
      if (flag === 'verbose') options.verbosity++;
      else if (flag === 'quiet') options.verbosity--;
      else if (flag === 'help') options.help = true;
      else options.version = true;
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) {
      throw configError(`Unknown option: ${arg}`, { option: arg });
    }

    const value = inline ?? argv[++i];
    if (value === undefined) {
      throw configError(`Option --${flag} requires a value`, { option: arg });
    }
    applyValue(options, flag, value);
  }

  return options;
}

export function logLevelFor(verbosity: number): LogLevel {
  if (verbosity >= 1) return LogLevel.DEBUG;
  if (verbosity === 0) return LogLevel.INFO;
  if (verbosity === -1) return LogLevel.WARN;
  return LogLevel.ERROR;
}
