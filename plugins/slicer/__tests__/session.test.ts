import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { EnvironmentError } from '../src/errors.js';
import { openSession, withSession } from '../src/session.js';
import { makeTempDir } from './helpers.js';

const { launch } = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock('playwright-core', () => ({
  chromium: { launch },
  errors: { TimeoutError: class TimeoutError extends Error {} },
}));

// ── Fake browser ──────────────────────────────────────────────────────────

interface FakeDownload {
  suggestedFilename: () => string;
  saveAs: (path: string) => Promise<void>;
  failure: () => Promise<string | null>;
  cancel: () => Promise<void>;
}

function fakeBrowser() {
  const listeners: Array<(download: FakeDownload) => void> = [];
  const page = {
    on: vi.fn((event: string, listener: (download: FakeDownload) => void) => {
      if (event === 'download') listeners.push(listener);
    }),
  };
  const context = {
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => {}),
  };
  const browser = {
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => {}),
  };
  const emitDownload = (download: FakeDownload) => listeners.forEach((listener) => listener(download));
  return { browser, context, page, emitDownload };
}

function completedDownload(suggested: string, body: string) {
  const saved: string[] = [];
  const download: FakeDownload = {
    suggestedFilename: () => suggested,
    saveAs: vi.fn(async (path: string) => {
      saved.push(path);
      writeFileSync(path, body);
    }),
    failure: async () => null,
    cancel: vi.fn(async () => {}),
  };
  return { download, saved };
}

describe('openSession', () => {
  let dir: string;
  let cleanup: () => void;
  let chromePath: string;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    chromePath = join(dir, 'chrome');
    writeFileSync(chromePath, '');
    launch.mockReset();
  });

  afterEach(() => cleanup());

  test('launches the given Chrome without its own signal handlers', async () => {
    const fake = fakeBrowser();
    launch.mockResolvedValue(fake.browser);

    await openSession({ downloadDir: dir, headless: false, executablePath: chromePath });

    expect(launch).toHaveBeenCalledWith(
      expect.objectContaining({
        executablePath: chromePath,
        headless: false,
        handleSIGINT: false,
        handleSIGTERM: false,
      }),
    );
    expect(fake.browser.newContext).toHaveBeenCalledWith({ acceptDownloads: true });
  });

  test('reports a missing Chrome as an environment error without launching', async () => {
    const missing = join(dir, 'no-chrome');

    await expect(openSession({ downloadDir: dir, headless: true, executablePath: missing })).rejects.toThrow(
      new EnvironmentError(`Chrome not found at ${missing} (CHROME_PATH)`),
    );
    expect(launch).not.toHaveBeenCalled();
  });

  test('reports a failed launch as an environment error', async () => {
    launch.mockRejectedValue(new Error('crashed on startup'));

    const result = openSession({ downloadDir: dir, headless: true, executablePath: chromePath });

    await expect(result).rejects.toBeInstanceOf(EnvironmentError);
    await expect(result).rejects.toThrow('Chrome failed to start: crashed on startup');
  });

  test('saves a download as .part, then renames it to the mapped name', async () => {
    const fake = fakeBrowser();
    launch.mockResolvedValue(fake.browser);
    await openSession({
      downloadDir: dir,
      headless: true,
      executablePath: chromePath,
      nameDownload: (suggested) => `J2807_${suggested}`,
    });
    const { download, saved } = completedDownload('slice.vcf.gz', 'vcf data');

    fake.emitDownload(download);
    const finalPath = join(dir, 'J2807_slice.vcf.gz');
    await vi.waitFor(() => expect(existsSync(finalPath)).toBe(true));

    expect(saved).toEqual([`${finalPath}.part`]);
    expect(existsSync(`${finalPath}.part`)).toBe(false);
    expect(readFileSync(finalPath, 'utf8')).toBe('vcf data');
  });

  test('keeps a server-supplied name inside the download directory', async () => {
    const fake = fakeBrowser();
    launch.mockResolvedValue(fake.browser);
    await openSession({ downloadDir: dir, headless: true, executablePath: chromePath });
    const { download, saved } = completedDownload('../../escape.vcf.gz', 'x');

    fake.emitDownload(download);
    await vi.waitFor(() => expect(existsSync(join(dir, 'escape.vcf.gz'))).toBe(true));

    expect(saved).toEqual([join(dir, 'escape.vcf.gz.part')]);
  });

  test('closes the context and browser once, however often close is called', async () => {
    const fake = fakeBrowser();
    launch.mockResolvedValue(fake.browser);
    const session = await openSession({ downloadDir: dir, headless: true, executablePath: chromePath });

    await session.close();
    await session.close();

    expect(session.closed).toBe(true);
    expect(fake.context.close).toHaveBeenCalledTimes(1);
    expect(fake.browser.close).toHaveBeenCalledTimes(1);
  });

  test('cancels a stalled download and still closes the browser', async () => {
    const fake = fakeBrowser();
    launch.mockResolvedValue(fake.browser);
    const session = await openSession({
      downloadDir: dir,
      headless: true,
      executablePath: chromePath,
      closeTimeoutMs: 50,
    });
    const stalled: FakeDownload = {
      suggestedFilename: () => 'slice.vcf.gz',
      saveAs: () => new Promise<void>(() => {}),
      failure: async () => null,
      cancel: vi.fn(async () => {}),
    };

    fake.emitDownload(stalled);
    await session.close();

    expect(stalled.cancel).toHaveBeenCalledTimes(1);
    expect(fake.browser.close).toHaveBeenCalledTimes(1);
  });

  test('withSession closes the session when the body throws', async () => {
    const fake = fakeBrowser();
    launch.mockResolvedValue(fake.browser);

    await expect(
      withSession(
        () => openSession({ downloadDir: dir, headless: true, executablePath: chromePath }),
        async () => {
          throw new Error('form broke');
        },
      ),
    ).rejects.toThrow('form broke');
    expect(fake.browser.close).toHaveBeenCalledTimes(1);
  });
});
