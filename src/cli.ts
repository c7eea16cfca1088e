#!/usr/bin/env node
import dotenv from 'dotenv';
import { ErrorCode } from './types';
import { APP_NAME, APP_VERSION } from './config/default';
import { USAGE, logLevelFor, parseArgs } from './config/cliArgs';
import { ConfigManager } from './config/configManager';
import { buildExclusionRules } from './exclusion/exclusionRules';
import { MirrorRanker } from './ranker/mirrorRanker';
import { renderMirrorlist, writeMirrorlistFile } from './output/mirrorlist';
import { writeStatsFile } from './output/statsCsv';
import { createRankError, formatError } from './utils/errors';
import { FileUtils } from './utils/fileUtils';
import { logger } from './utils/logger';

function isBrokenPipe(error: Error): boolean {
  return 'code' in error && error.code === 'EPIPE';
}

/**
 * Write to stdout (or a stand-in) and wait until the data is flushed. A
 * reader that closed the pipe early still counts as success.
 */
function writeOutput(stream: NodeJS.WritableStream, content: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const settle = (error?: Error | null) => {
      if (!error || isBrokenPipe(error)) {
        resolve();
        return;
      }
      reject(
        createRankError('Could not write the mirrorlist', ErrorCode.OUTPUT_ERROR, {}, false, error)
      );
    };

    // Stays attached: a failed write also emits 'error' after the callback
    stream.on('error', settle);
    stream.write(content, settle);
  });
}

async function ensureNewFile(filePath: string | undefined, label: string): Promise<void> {
  if (filePath && (await FileUtils.fileExists(filePath))) {
    throw createRankError(
      `The ${label} file \`${filePath}\` already exists, refusing to overwrite it`,
      ErrorCode.CONFIG_ERROR,
      { path: filePath }
    );
  }
}

/**
 * Run the ranker for the given arguments and resolve to the exit code.
 * Fatal errors are logged here and never thrown.
 */
export async function run(
  argv: readonly string[],
  stdout: NodeJS.WritableStream = process.stdout
): Promise<number> {
  try {
    dotenv.config();

    const options = parseArgs(argv);
    logger.setLogLevel(logLevelFor(options.verbosity));

    if (options.help) {
      await writeOutput(stdout, USAGE);
      return 0;
    }
    if (options.version) {
      await writeOutput(stdout, `${APP_NAME} ${APP_VERSION}\n`);
      return 0;
    }

    const configManager = new ConfigManager(options.configPath);
    await configManager.loadConfig();
    configManager.applyEnvironment();
    configManager.updateConfig(options.overrides);

    const validation = configManager.validateConfig();
    if (!validation.valid) {
      throw createRankError(
        `Invalid configuration: ${validation.errors.join('; ')}`,
        ErrorCode.CONFIG_ERROR,
        { errors: validation.errors }
      );
    }
    const config = configManager.getConfig();

    await ensureNewFile(config.outputFile, 'mirrorlist');
    await ensureNewFile(config.statsFile, 'stats');

    const rules = await buildExclusionRules({
      literals: config.exclude,
      file: config.excludeFrom,
    });

    const ranker = new MirrorRanker(config);
    const { selected } = await ranker.rank(rules);

    if (config.statsFile) {
      await writeStatsFile(config.statsFile, selected);
      logger.success(`Saved stats of ${selected.length} mirrors to ${config.statsFile}`);
    }

    if (config.outputFile) {
      await writeMirrorlistFile(config.outputFile, selected, config.sourceUrl);
      logger.success(`Saved mirrorlist to ${config.outputFile}`);
    } else {
      await writeOutput(stdout, renderMirrorlist(selected, config.sourceUrl));
    }

    return 0;
  } catch (error) {
    logger.error(formatError(error));
    return 1;
  }
}

async function main(): Promise<void> {
  const code = await run(process.argv.slice(2));
  process.exit(code);
}

if (require.main === module) {
  // Handle unhandled rejections
  process.on('unhandledRejection', error => {
    logger.error(`Unhandled rejection: ${formatError(error)}`);
    process.exit(1);
  });

  main().catch(error => {
    logger.error(formatError(error));
    process.exit(1);
  });
}
