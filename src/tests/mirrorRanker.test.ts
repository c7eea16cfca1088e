import fs from 'fs-extra';
import path from 'path';
import fetch, { Response } from 'node-fetch';
import { MirrorRanker } from '../ranker/mirrorRanker';
import { defaultConfig } from '../config/default';
import { ErrorCode, RankerConfig } from '../types';
import { makeCatalog, makeMirror } from './mirrorFactory';
import { TestPaths, fixturePath } from './test-config';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(fetch);

function serveBytes(bytesByHost: Record<string, number>): void {
  mockedFetch.mockImplementation(async input => {
    const bytes = bytesByHost[new URL(String(input)).hostname];
    if (bytes === undefined) {
      return new Response('', { status: 404 });
    }
    return new Response('x'.repeat(bytes), {
      status: 200,
      headers: { 'Content-Length': String(bytes) },
    });
  });
}

function requestedHosts(): string[] {
  return mockedFetch.mock.calls.map(([input]) => new URL(String(input)).hostname);
}

describe('MirrorRanker', () => {
  const testDir = TestPaths.integration.ranker;

  function configFor(sourceUrl: string, overrides: Partial<RankerConfig> = {}): RankerConfig {
    return { ...defaultConfig, sourceUrl, retryDelayMs: 1, ...overrides };
  }

  beforeEach(async () => {
    await fs.ensureDir(testDir);
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    mockedFetch.mockReset();
    await fs.remove(testDir);
  });

  it('should pick the faster of two synced mirrors with equal scores', async () => {
    const statusFile = path.join(testDir, 'status.json');
    await fs.writeJson(
      statusFile,
      makeCatalog([
        makeMirror({ url: 'https://twenty.example.org/', delay: 100, score: 1.0 }),
        makeMirror({ url: 'https://ten.example.org/', delay: 200, score: 1.0 }),
        makeMirror({ url: 'https://never.example.org/', delay: null, score: 0.5 }),
      ])
    );
    serveBytes({ 'twenty.example.org': 20, 'ten.example.org': 10, 'never.example.org': 99 });

    const ranker = new MirrorRanker(configFor(statusFile, { mirrors: 1 }));
    const { candidates, selected } = await ranker.rank();

    expect(candidates.map(mirror => mirror.url)).toEqual([
      'https://twenty.example.org/',
      'https://ten.example.org/',
    ]);
    expect(selected).toHaveLength(1);
    expect(selected[0].url).toBe('https://twenty.example.org/');
    expect(selected[0].transfer_rate).toBe(20000);
    expect(requestedHosts()).not.toContain('never.example.org');
  });

  it('should rank the catalog by rate weighted with the upstream score', async () => {
    serveBytes({ 'fast.example.org': 10, 'slow.example.net': 40, 'mirror.example.de': 100 });

    const ranker = new MirrorRanker(configFor(fixturePath('mirrors_status.json'), { mirrors: 2 }));
    const result = await ranker.rank();

    expect(result.catalog.urls).toHaveLength(8);
    expect(result.candidates.map(mirror => mirror.url)).toEqual([
      'https://mirror.example.de/archlinux/',
      'https://fast.example.org/archlinux/',
      'http://slow.example.net/arch/',
    ]);
    expect(result.selected.map(mirror => mirror.url)).toEqual([
      'http://slow.example.net/arch/',
      'https://fast.example.org/archlinux/',
    ]);
    expect(result.selected.map(mirror => mirror.weighted_score)).toEqual([40000, 20000]);
    expect(requestedHosts().sort()).toEqual([
      'fast.example.org',
      'mirror.example.de',
      'slow.example.net',
    ]);
  });

  it('should apply exclusion rules before probing', async () => {
    serveBytes({ 'fast.example.org': 10, 'slow.example.net': 40, 'mirror.example.de': 100 });

    const ranker = new MirrorRanker(configFor(fixturePath('mirrors_status.json')));
    const { selected } = await ranker.rank([{ kind: 'country', value: 'france', negate: false }]);

    expect(selected.map(mirror => mirror.url)).toEqual([
      'https://fast.example.org/archlinux/',
      'https://mirror.example.de/archlinux/',
    ]);
    expect(requestedHosts()).not.toContain('slow.example.net');
  });

  it('should probe only max check candidates', async () => {
    serveBytes({ 'fast.example.org': 10, 'mirror.example.de': 100 });

    const ranker = new MirrorRanker(configFor(fixturePath('mirrors_status.json'), { maxCheck: 1 }));
    const { selected } = await ranker.rank();

    expect(selected.map(mirror => mirror.url)).toEqual(['https://mirror.example.de/archlinux/']);
    expect(requestedHosts()).toEqual(['mirror.example.de']);
  });

  it('should fail without probing when no mirror is synced', async () => {
    const statusFile = path.join(testDir, 'stale.json');
    await fs.writeJson(statusFile, makeCatalog([makeMirror({ delay: 7200 })]));

    await expect(new MirrorRanker(configFor(statusFile)).rank()).rejects.toMatchObject({
      code: ErrorCode.NO_CANDIDATES,
    });
    expect(mockedFetch).not.toHaveBeenCalled();
  });
});
