import { ErrorCode, RankedMirror } from '../types';
import { APP_NAME } from '../config/default';
import { createRankError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time in RFC 2822 form, e.g. `Tue, 1 Jul 2003 10:52:37 +0200`.
 */
export function toRfc2822(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  const abs = Math.abs(offset);
  const zone = `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

  return `${DAYS[date.getDay()]}, ${date.getDate()} ${MONTHS[date.getMonth()]} ${date.getFullYear()} ${time} ${zone}`;
}

export function mirrorlistHeader(sourceUrl: string, when: string): string {
  return [
    '#',
    '# /etc/pacman.d/mirrorlist',
    '#',
    '#',
    `# Arch Linux mirrorlist generated by ${APP_NAME}`,
    '#',
    `# source: ${sourceUrl}`,
    `# when: ${when}`,
    '#',
    '',
    '',
  ].join('\n');
}

export function toPacmanServerLine(mirror: Pick<RankedMirror, 'url'>): string {
  return `Server = ${mirror.url}$repo/os/$arch`;
}

export function toPacmanMirrorList(mirrors: readonly Pick<RankedMirror, 'url'>[]): string {
  return mirrors.map(mirror => `${toPacmanServerLine(mirror)}\n`).join('');
}

/**
 * Full mirrorlist document: commented header followed by one Server line per
 * mirror, best first.
 */
export function renderMirrorlist(
  mirrors: readonly Pick<RankedMirror, 'url'>[],
  sourceUrl: string,
  now: Date = new Date()
): string {
  return mirrorlistHeader(sourceUrl, toRfc2822(now)) + toPacmanMirrorList(mirrors);
}

export async function writeMirrorlistFile(
  filePath: string,
  mirrors: readonly RankedMirror[],
  sourceUrl: string,
  now: Date = new Date()
): Promise<void> {
  const content = renderMirrorlist(mirrors, sourceUrl, now);
  try {
    await FileUtils.writeNewFile(filePath, content);
  } catch (error) {
    throw createRankError(
      `Could not write to mirrorlist file \`${filePath}\``,
      ErrorCode.OUTPUT_ERROR,
      { path: filePath },
      false,
      error
    );
  }
}
