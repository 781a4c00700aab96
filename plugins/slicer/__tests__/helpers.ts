import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Clock } from '../src/clock.js';
import { createJobRequest, type JobRequest, type JobRequestInput } from '../src/job-request.js';
import type { PageDriver } from '../src/page-driver.js';
import type { BrowserSession } from '../src/session.js';

// ── Fake page ─────────────────────────────────────────────────────────────

/**
 * In-process stand-in for a browser page. Every interaction is appended to
 * `calls` so tests can assert on order.
 */
export class FakePageDriver implements PageDriver {
  readonly calls: string[] = [];
  /** Selectors that never become ready. */
  readonly missing = new Set<string>();
  readonly texts = new Map<string, string>();
  readonly onClick = new Map<string, () => void | Promise<void>>();
  visible: (selector: string) => boolean = () => false;

  async goto(url: string): Promise<void> {
    this.calls.push(`goto:${url}`);
  }

  async title(): Promise<string> {
    return 'Data Slicer';
  }

  async waitForReady(selector: string, _timeoutMs: number): Promise<boolean> {
    const ready = !this.missing.has(selector);
    this.calls.push(`ready:${selector}:${ready}`);
    return ready;
  }

  async waitForHidden(_selector: string, _timeoutMs: number): Promise<boolean> {
    return true;
  }

  async isVisible(selector: string): Promise<boolean> {
    this.calls.push(`visible?:${selector}`);
    return this.visible(selector);
  }

  async textOf(selector: string): Promise<string> {
    return this.texts.get(selector) ?? '';
  }

  async fill(selector: string, value: string): Promise<void> {
    this.calls.push(`fill:${selector}=${value}`);
  }

  async selectByLabel(selector: string, labels: string[]): Promise<void> {
    this.calls.push(`select:${selector}=${labels.join(',')}`);
  }

  async click(selector: string): Promise<void> {
    this.calls.push(`click:${selector}`);
    await this.onClick.get(selector)?.();
  }

  async screenshot(path: string): Promise<void> {
    this.calls.push(`screenshot:${path}`);
  }

  countOf(prefix: string): number {
    return this.calls.filter((call) => call.startsWith(prefix)).length;
  }
}

// ── Fake clock ────────────────────────────────────────────────────────────

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep?: (now: number) => void | Promise<void>;

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    await this.onSleep?.(this.current);
  }
}

// ── Fake session ──────────────────────────────────────────────────────────

export class FakeSession implements BrowserSession {
  closeCount = 0;

  constructor(
    readonly driver: FakePageDriver,
    readonly downloadDir: string,
  ) {}

  get closed(): boolean {
    return this.closeCount > 0;
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

// ── Fixtures ──────────────────────────────────────────────────────────────

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'slicer-test-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function makeRequest(overrides: Partial<JobRequestInput> = {}): JobRequest {
  return createJobRequest({
    outputDir: '/tmp/slicer-out',
    jobName: 'J2807',
    fileFormat: 'VCF',
    region: '3:146142335-146301179',
    genotypeUrl: 'https://example.org/genotypes/chr3.vcf.gz',
    filter: 'populations',
    mappingUrl: 'https://example.org/panel/samples.panel',
    populations: ['CEU'],
    timeoutSeconds: 300,
    headless: true,
    ...overrides,
  });
}
