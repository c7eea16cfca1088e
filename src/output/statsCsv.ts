import { ErrorCode, RankedMirror } from '../types';
import { createRankError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';

export const STATS_COLUMNS = [
  'url',
  'protocol',
  'last_sync',
  'completion_pct',
  'delay',
  'duration_avg',
  'duration_stddev',
  'score',
  'active',
  'country',
  'country_code',
  'isos',
  'ipv4',
  'ipv6',
  'details',
  'transfer_rate',
  'weighted_score',
] as const satisfies readonly (keyof RankedMirror)[];

function csvCell(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }

  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toStatsCsv(mirrors: readonly RankedMirror[]): string {
  const rows = mirrors.map(mirror => STATS_COLUMNS.map(column => csvCell(mirror[column])).join(','));
  return [STATS_COLUMNS.join(','), ...rows].map(row => `${row}\n`).join('');
}

export async function writeStatsFile(filePath: string, mirrors: readonly RankedMirror[]): Promise<void> {
  try {
    await FileUtils.writeNewFile(filePath, toStatsCsv(mirrors));
  } catch (error) {
    throw createRankError(
      `Failed to save stats file \`${filePath}\``,
      ErrorCode.OUTPUT_ERROR,
      { path: filePath },
      false,
      error
    );
  }
}
