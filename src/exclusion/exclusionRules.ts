import { ErrorCode, ExclusionKind, ExclusionRule, MirrorRecord } from '../types';
import { createRankError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';

const KEYWORDS: readonly string[] = [
  'domain',
  'country',
  'country_code',
] satisfies readonly ExclusionKind[];

function isKeyword(value: string): value is ExclusionKind {
  return KEYWORDS.includes(value);
}

/**
 * Parse one rule line:
 *
 *   [!] domain=<host> | country=<name> | country_code=<code> | <host>
 *
 * Text after `#` or `;` is a comment. Matching is case-insensitive, so values
 * are stored lowercase. Returns null for blank and comment-only lines.
 */
export function parseExclusionRule(line: string): ExclusionRule | null {
  const commentStart = line.search(/[#;]/);
  let text = (commentStart === -1 ? line : line.slice(0, commentStart)).trim().toLowerCase();
  if (!text) {
    return null;
  }

  let negate = false;
  if (text.startsWith('!')) {
    negate = true;
    text = text.slice(1).trimStart();
  }

  const eq = text.indexOf('=');
  if (eq !== -1) {
    const keyword = text.slice(0, eq).trim();
    if (isKeyword(keyword)) {
      const [value = '', ...dropped] = text
        .slice(eq + 1)
        .trim()
        .split(/\s+/);
      if (!value) {
        throw createRankError(
          `Exclusion rule \`${line.trim()}\` has no value`,
          ErrorCode.CONFIG_ERROR,
          { line }
        );
      }
      if (dropped.length > 0) {
        logger.warn(
          `Exclusion rule \`${line.trim()}\` matches \`${value}\` only, ignoring \`${dropped.join(' ')}\``
        );
      }
      return { kind: keyword, value, negate };
    }
  }

  if (!text) {
    throw createRankError(`Exclusion rule \`${line.trim()}\` has no value`, ErrorCode.CONFIG_ERROR, {
      line,
    });
  }

  // No keyword: the whole token names a domain
  return { kind: 'domain', value: text, negate };
}

export function parseExclusionRules(text: string): ExclusionRule[] {
  const rules: ExclusionRule[] = [];
  for (const line of text.split(/\r?\n/)) {
    const rule = parseExclusionRule(line);
    if (rule) {
      rules.push(rule);
    }
  }
  return rules;
}

export async function loadExclusionFile(filePath: string): Promise<ExclusionRule[]> {
  let text: string;
  try {
    text = await FileUtils.readText(filePath);
  } catch (error) {
    throw createRankError(
      `Could not open excluded mirror file \`${filePath}\``,
      ErrorCode.CONFIG_ERROR,
      { path: filePath },
      false,
      error
    );
  }

  const rules = parseExclusionRules(text);
  logger.debug(`Loaded ${rules.length} exclusion rules from ${filePath}`);
  return rules;
}

/**
 * Rules from the file come first, so literals given on the command line
 * override them. Returns undefined when neither source is given.
 */
export async function buildExclusionRules(sources: {
  literals?: string[];
  file?: string;
}): Promise<ExclusionRule[] | undefined> {
  const literals = sources.literals ?? [];
  if (!sources.file && literals.length === 0) {
    return undefined;
  }

  const rules = sources.file ? await loadExclusionFile(sources.file) : [];
  for (const literal of literals) {
    const rule = parseExclusionRule(literal);
    if (rule) {
      rules.push(rule);
    }
  }
  return rules;
}

export function mirrorDomain(record: Pick<MirrorRecord, 'url'>): string {
  try {
    return new URL(record.url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * The last rule that matches the record decides: a plain rule excludes it,
 * a negated rule keeps it. No matching rule keeps it.
 */
export function isExcluded(
  record: Pick<MirrorRecord, 'url' | 'country' | 'country_code'>,
  rules: readonly ExclusionRule[]
): boolean {
  const keys: Record<ExclusionKind, string> = {
    domain: mirrorDomain(record),
    country: record.country.toLowerCase(),
    country_code: record.country_code.toLowerCase(),
  };

  for (let i = rules.length - 1; i >= 0; i--) {
    const rule = rules[i];
    if (keys[rule.kind] === rule.value) {
      return !rule.negate;
    }
  }

  return false;
}
