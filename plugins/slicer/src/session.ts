/**
 * Session controller: one Chrome process, one page and one download
 * directory per run.
 *
 * Downloads are saved as `<name>.part` and renamed once complete, so the
 * final file name only ever appears on a fully written file.
 */

import { rename } from 'fs/promises';
import { basename, join } from 'path';
import { chromium, type Browser, type BrowserContext, type Download } from 'playwright-core';
import { findLocalChrome } from './browser-utils.js';
import { EnvironmentError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { PlaywrightPageDriver, type PageDriver } from './page-driver.js';

export interface SessionConfig {
  downloadDir: string;
  headless: boolean;
  executablePath?: string;
  /** Maps the server's suggested file name to the name saved on disk. */
  nameDownload?: (suggested: string) => string;
  /** Upper bound on waiting for cancelled downloads during `close()`. */
  closeTimeoutMs?: number;
  logger?: Logger;
}

export interface BrowserSession {
  readonly driver: PageDriver;
  readonly downloadDir: string;
  readonly closed: boolean;
  /** Terminates the browser. Safe to call more than once. */
  close(): Promise<void>;
}

export type OpenSession = (config: SessionConfig) => Promise<BrowserSession>;

const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;

/** Resolves `true` when `work` settles within `ms`, `false` otherwise. */
async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([work.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

class PlaywrightSession implements BrowserSession {
  readonly driver: PageDriver;
  private _closed = false;
  private readonly pendingDownloads = new Map<Promise<void>, Download>();

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    driver: PageDriver,
    readonly downloadDir: string,
    private readonly nameDownload: (suggested: string) => string,
    private readonly closeTimeoutMs: number,
    private readonly log: Logger,
  ) {
    this.driver = driver;
  }

  get closed(): boolean {
    return this._closed;
  }

  trackDownload(download: Download): void {
    const pending = this.saveDownload(download)
      .catch((err) => this.log.error(`Download ${download.suggestedFilename()} failed: ${describeError(err)}`))
      .finally(() => this.pendingDownloads.delete(pending));
    this.pendingDownloads.set(pending, download);
  }

  private async saveDownload(download: Download): Promise<void> {
    // Never let a server-supplied name escape the download directory
    const fileName = basename(this.nameDownload(download.suggestedFilename()));
    const finalPath = join(this.downloadDir, fileName);
    const partPath = `${finalPath}.part`;

    this.log.info(`Saving download to ${finalPath}`);
    await download.saveAs(partPath);
    const failure = await download.failure();
    if (failure) {
      throw new Error(failure);
    }
    await rename(partPath, finalPath);
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    // A download still running at this point is abandoned, not awaited
    const pending = [...this.pendingDownloads];
    for (const [, download] of pending) {
      await download
        .cancel()
        .catch((err) => this.log.warn(`Cancelling download: ${describeError(err)}`));
    }
    const saves = Promise.allSettled(pending.map(([save]) => save));
    if (!(await settlesWithin(saves, this.closeTimeoutMs))) {
      this.log.warn(`${pending.length} download(s) still saving after ${this.closeTimeoutMs}ms, closing anyway`);
    }
    await this.context
      .close()
      .catch((err) => this.log.warn(`Closing browser context: ${describeError(err)}`));
    await this.browser
      .close()
      .catch((err) => this.log.warn(`Closing browser: ${describeError(err)}`));
    this.log.info('Browser closed');
  }
}

/**
 * Launches a local Chrome with downloads routed into `config.downloadDir`.
 * Throws `EnvironmentError` when no browser can be started.
 */
export async function openSession(config: SessionConfig): Promise<BrowserSession> {
  const log = config.logger ?? silentLogger;
  const chromePath = findLocalChrome(config.executablePath);
  if (!chromePath) {
    throw new EnvironmentError(
      config.executablePath
        ? `Chrome not found at ${config.executablePath} (CHROME_PATH)`
        : 'Chrome not found. Install Google Chrome or Chromium, or set CHROME_PATH.',
    );
  }

  log.info(`Opening browser (${config.headless ? 'headless' : 'visible'}) from ${chromePath}`);

  let browser: Browser;
  try {
    browser = await chromium.launch({
      executablePath: chromePath,
      headless: config.headless,
      // Interrupts are turned into cancellation by the caller
      handleSIGINT: false,
      handleSIGTERM: false,
      args: ['--window-size=1280,720', '--disable-blink-features=AutomationControlled'],
    });
  } catch (err) {
    throw new EnvironmentError(`Chrome failed to start: ${describeError(err)}`, { cause: err });
  }

  try {
    const context = await browser.newContext({ acceptDownloads: true });
    const page = await context.newPage();
    const session = new PlaywrightSession(
      browser,
      context,
      new PlaywrightPageDriver(page),
      config.downloadDir,
      config.nameDownload ?? ((suggested) => suggested),
      config.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS,
      log,
    );
    page.on('download', (download) => session.trackDownload(download));
    return session;
  } catch (err) {
    await browser.close().catch((closeErr) => log.warn(`Closing browser: ${describeError(closeErr)}`));
    throw new EnvironmentError(`Browser page could not be opened: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Runs `fn` against a freshly opened session and closes it exactly once,
 * whichever way `fn` exits.
 */
export async function withSession<T>(
  open: () => Promise<BrowserSession>,
  fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  const session = await open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
