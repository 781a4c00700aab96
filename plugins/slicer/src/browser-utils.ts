import { existsSync } from 'fs';
import { platform } from 'os';
import { join } from 'path';
import type { PageDriver } from './page-driver.js';

/**
 * Candidate Chrome/Chromium executables for an operating system, most
 * common install location first.
 */
export function chromeCandidates(
  systemPlatform: NodeJS.Platform,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  if (systemPlatform === 'darwin') {
    return [
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${env.HOME}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    ];
  }
  if (systemPlatform === 'win32') {
    return [
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    ];
  }
  return [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium',
    '/usr/local/bin/chromium',
    '/opt/google/chrome/chrome',
  ];
}

/**
 * Finds a local Chrome installation. An explicit path wins but must exist.
 */
export function findLocalChrome(
  explicitPath?: string,
  exists: (path: string) => boolean = existsSync,
  systemPlatform: NodeJS.Platform = platform(),
): string | undefined {
  if (explicitPath) {
    return exists(explicitPath) ? explicitPath : undefined;
  }
  return chromeCandidates(systemPlatform).find((p) => exists(p));
}

/**
 * Saves a full-page screenshot beside the run's output so a headless
 * failure can be inspected afterwards. Returns the file path.
 */
export async function captureFailureScreenshot(
  driver: PageDriver,
  outputDir: string,
  jobName: string,
  now: Date = new Date(),
): Promise<string> {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  const screenshotPath = join(outputDir, `${jobName}_failure-${timestamp}.png`);
  await driver.screenshot(screenshotPath);
  return screenshotPath;
}
