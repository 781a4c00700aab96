/**
 * The page-automation capability the form driver, monitor and retriever
 * work against. Only `PlaywrightPageDriver` touches playwright-core, so the
 * job logic can be exercised against an in-process fake.
 *
 * Selectors are Playwright selectors (CSS plus `:text-is()` and friends).
 */

import { errors, type Page } from 'playwright-core';

export interface PageDriver {
  goto(url: string): Promise<void>;
  title(): Promise<string>;
  /**
   * Waits until the first element matching `selector` is visible and
   * enabled. Resolves false once `timeoutMs` passes without that happening.
   */
  waitForReady(selector: string, timeoutMs: number): Promise<boolean>;
  /** Resolves false if an element matching `selector` is still visible after `timeoutMs`. */
  waitForHidden(selector: string, timeoutMs: number): Promise<boolean>;
  isVisible(selector: string): Promise<boolean>;
  textOf(selector: string): Promise<string>;
  fill(selector: string, value: string): Promise<void>;
  /** Selects the options whose visible labels are `labels`. */
  selectByLabel(selector: string, labels: string[]): Promise<void>;
  click(selector: string): Promise<void>;
  screenshot(path: string): Promise<void>;
}

const ACTION_TIMEOUT_MS = 10_000;

export class PlaywrightPageDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: 30_000 });
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async waitForReady(selector: string, timeoutMs: number): Promise<boolean> {
    const locator = this.page.locator(selector).first();
    const deadline = Date.now() + timeoutMs;
    try {
      await locator.waitFor({ state: 'visible', timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }

    // Visible but still disabled while the form loads dependent options
    while (!(await locator.isEnabled())) {
      if (Date.now() >= deadline) return false;
      await this.page.waitForTimeout(100);
    }
    return true;
  }

  async waitForHidden(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'hidden', timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async textOf(selector: string): Promise<string> {
    const text = await this.page.locator(selector).first().innerText({ timeout: ACTION_TIMEOUT_MS });
    return text.trim();
  }

  async fill(selector: string, value: string): Promise<void> {
    const target = this.page.locator(selector).first();
    await target.click({ timeout: ACTION_TIMEOUT_MS });
    await target.fill(value, { timeout: ACTION_TIMEOUT_MS });
  }

  async selectByLabel(selector: string, labels: string[]): Promise<void> {
    await this.page
      .locator(selector)
      .first()
      .selectOption(
        labels.map((label) => ({ label })),
        { timeout: ACTION_TIMEOUT_MS },
      );
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: ACTION_TIMEOUT_MS });
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, type: 'png', fullPage: true });
  }
}
