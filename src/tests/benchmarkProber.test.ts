import http from 'http';
import https from 'https';
import { Socket } from 'net';
import fetch, { FetchError, Response } from 'node-fetch';
import { createProbePool, probeAll, probeMirror, probeUrl } from '../mirrors/benchmarkProber';
import { TargetRepository } from '../types';
import { makeMirror } from './mirrorFactory';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(fetch);
const actualFetch = jest.requireActual<typeof import('node-fetch')>('node-fetch').default;

function dbResponse(bytes: number): Response {
  return new Response('x'.repeat(bytes), {
    status: 200,
    headers: { 'Content-Length': String(bytes) },
  });
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function waitFor(condition: () => boolean, timeoutMs: number): Promise<boolean> {
  for (let waited = 0; waited < timeoutMs; waited += 10) {
    if (condition()) {
      return true;
    }
    await delay(10);
  }
  return condition();
}

describe('Benchmark prober', () => {
  beforeEach(() => {
    // Freeze the clock: every probe then takes the 1 ms floor
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
    mockedFetch.mockReset();
  });

  describe('probeUrl', () => {
    it('should append the target database path to the mirror url', () => {
      expect(probeUrl('https://m.example.org/archlinux/', TargetRepository.EXTRA)).toBe(
        'https://m.example.org/archlinux/extra/os/x86_64/extra.db'
      );
      expect(probeUrl('http://m.example.org/arch', TargetRepository.CORE)).toBe(
        'http://m.example.org/arch/core/os/x86_64/core.db'
      );
    });
  });

  describe('probeMirror', () => {
    const mirror = makeMirror({ url: 'https://m.example.org/archlinux/' });
    const url = 'https://m.example.org/archlinux/extra/os/x86_64/extra.db';

    it('should measure bytes per second of the database download', async () => {
      mockedFetch.mockResolvedValue(dbResponse(2048));

      const outcome = await probeMirror(mirror, TargetRepository.EXTRA, { timeoutMs: 500 });

      expect(outcome).toEqual({ url, ok: true, rate: 2048000 });
      expect(mockedFetch).toHaveBeenCalledWith(
        url,
        expect.objectContaining({ compress: false, signal: expect.anything() })
      );
    });

    it('should relax certificate checks for https only', async () => {
      mockedFetch.mockResolvedValue(dbResponse(1));
      await probeMirror(mirror, TargetRepository.EXTRA);

      const agent = mockedFetch.mock.calls[0][1]?.agent;
      expect(typeof agent).toBe('function');
      if (typeof agent === 'function') {
        const httpsAgent = agent(new URL(url));
        expect(httpsAgent).toBeInstanceOf(https.Agent);
        expect(httpsAgent).toMatchObject({ options: { rejectUnauthorized: false } });
        expect(agent(new URL('http://m.example.org/'))).toBeUndefined();
      }
    });

    it('should give up once the default timeout elapses', async () => {
      jest.useFakeTimers();
      mockedFetch.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () =>
              reject(Object.assign(new Error('The user aborted a request.'), { name: 'AbortError' }))
            );
          })
      );

      const pending = probeMirror(mirror, TargetRepository.EXTRA);
      await jest.advanceTimersByTimeAsync(10000);

      await expect(pending).resolves.toEqual({
        url,
        ok: false,
        reason: 'timed out after 10000ms',
      });
    });

    it('should release the response after a failed status', async () => {
      let signal: { aborted: boolean } | null | undefined;
      mockedFetch.mockImplementation(async (_input, init) => {
        signal = init?.signal;
        return new Response('', { status: 503 });
      });

      await probeMirror(mirror, TargetRepository.EXTRA);

      expect(signal?.aborted).toBe(true);
    });

    it('should report a non-success status', async () => {
      mockedFetch.mockResolvedValue(new Response('', { status: 404 }));

      await expect(probeMirror(mirror, TargetRepository.EXTRA)).resolves.toEqual({
        url,
        ok: false,
        reason: 'HTTP 404: Not Found',
      });
    });

    it('should report a response without Content-Length', async () => {
      mockedFetch.mockResolvedValue(new Response('abc', { status: 200 }));

      await expect(probeMirror(mirror, TargetRepository.EXTRA)).resolves.toEqual({
        url,
        ok: false,
        reason: 'response has no Content-Length',
      });
    });

    it('should report transport errors instead of throwing', async () => {
      mockedFetch.mockRejectedValue(
        new FetchError(`network timeout at: ${url}`, 'request-timeout')
      );

      await expect(probeMirror(mirror, TargetRepository.EXTRA)).resolves.toEqual({
        url,
        ok: false,
        reason: `network timeout at: ${url}`,
      });
    });
  });

  describe('probeAll', () => {
    it('should keep input order regardless of completion order', async () => {
      const mirrors = [
        makeMirror({ url: 'https://slow.example.org/' }),
        makeMirror({ url: 'https://down.example.org/' }),
        makeMirror({ url: 'https://quick.example.org/' }),
      ];
      mockedFetch.mockImplementation(async input => {
        const target = String(input);
        if (target.startsWith('https://slow.')) {
          await delay(30);
          return dbResponse(10);
        }
        if (target.startsWith('https://down.')) {
          throw new FetchError('connect ECONNREFUSED', 'system');
        }
        return dbResponse(20);
      });

      const report = await probeAll(mirrors, TargetRepository.EXTRA, createProbePool(3));

      expect(report.mirrors.map(mirror => mirror.url)).toEqual([
        'https://slow.example.org/',
        'https://down.example.org/',
        'https://quick.example.org/',
      ]);
      expect(report.mirrors.map(mirror => mirror.transfer_rate)).toEqual([10000, undefined, 20000]);
      expect(report.outcomes.map(outcome => outcome.ok)).toEqual([true, false, true]);
    });

    it('should not modify the input records', async () => {
      const mirrors = [makeMirror()];
      mockedFetch.mockResolvedValue(dbResponse(5));

      const report = await probeAll(mirrors, TargetRepository.EXTRA, createProbePool(1));

      expect(report.mirrors[0].transfer_rate).toBe(5000);
      expect(mirrors[0]).not.toHaveProperty('transfer_rate');
    });

    it('should never run more probes at once than the pool allows', async () => {
      const mirrors = Array.from({ length: 6 }, (_, i) =>
        makeMirror({ url: `https://m${i}.example.org/` })
      );
      let inFlight = 0;
      let maxInFlight = 0;
      mockedFetch.mockImplementation(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return dbResponse(1);
      });

      await probeAll(mirrors, TargetRepository.EXTRA, createProbePool(2));

      expect(mockedFetch).toHaveBeenCalledTimes(6);
      expect(maxInFlight).toBe(2);
    });

    it('should treat a pool size below one as one', async () => {
      const mirrors = [makeMirror({ url: 'https://a.example.org/' }), makeMirror()];
      let inFlight = 0;
      let maxInFlight = 0;
      mockedFetch.mockImplementation(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return dbResponse(1);
      });

      await probeAll(mirrors, TargetRepository.EXTRA, createProbePool(0));

      expect(maxInFlight).toBe(1);
    });
  });

  describe('against a local server', () => {
    const sockets = new Set<Socket>();
    let server: http.Server | undefined;

    async function serve(handler: http.RequestListener): Promise<string> {
      const listening = http.createServer(handler);
      listening.on('connection', socket => {
        sockets.add(socket);
        socket.on('close', () => sockets.delete(socket));
      });
      await new Promise<void>(resolve => listening.listen(0, '127.0.0.1', resolve));
      server = listening;

      const address = listening.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Server has no TCP address');
      }
      return `http://127.0.0.1:${address.port}/`;
    }

    beforeEach(() => {
      mockedFetch.mockImplementation(actualFetch);
    });

    afterEach(async () => {
      for (const socket of sockets) {
        socket.destroy();
      }
      sockets.clear();
      const listening = server;
      server = undefined;
      if (listening) {
        await new Promise<void>(resolve => listening.close(() => resolve()));
      }
    });

    it('should measure a download that finishes within the timeout', async () => {
      const baseUrl = await serve((_req, res) => {
        res.writeHead(200, { 'Content-Length': '4' });
        res.end('abcd');
      });

      await expect(
        probeMirror({ url: baseUrl }, TargetRepository.EXTRA, { timeoutMs: 1000 })
      ).resolves.toEqual({
        url: `${baseUrl}extra/os/x86_64/extra.db`,
        ok: true,
        rate: 4000,
      });
    });

    it('should apply one timeout to the headers and the body together', async () => {
      const baseUrl = await serve((_req, res) => {
        const timers: NodeJS.Timeout[] = [];
        res.on('close', () => timers.forEach(timer => clearTimeout(timer)));
        timers.push(
          setTimeout(() => {
            res.writeHead(200, { 'Content-Length': '4' });
            res.write('ab');
          }, 200),
          setTimeout(() => res.end('cd'), 400)
        );
      });

      await expect(
        probeMirror({ url: baseUrl }, TargetRepository.EXTRA, { timeoutMs: 300 })
      ).resolves.toEqual({
        url: `${baseUrl}extra/os/x86_64/extra.db`,
        ok: false,
        reason: 'timed out after 300ms',
      });
    });

    it('should close the connection of a failed response with an unread body', async () => {
      const baseUrl = await serve((_req, res) => {
        res.writeHead(404, { 'Content-Length': '1000' });
        res.write('x'.repeat(10));
      });

      const outcome = await probeMirror({ url: baseUrl }, TargetRepository.EXTRA, {
        timeoutMs: 5000,
      });

      expect(outcome).toEqual({
        url: `${baseUrl}extra/os/x86_64/extra.db`,
        ok: false,
        reason: 'HTTP 404: Not Found',
      });
      await expect(waitFor(() => sockets.size === 0, 1000)).resolves.toBe(true);
    });
  });
});
