/**
 * Runs one Data Slicer job end to end: open the browser, fill and submit
 * the form, wait for the job, download the result, close the browser.
 *
 * The browser is closed exactly once whichever way the run ends.
 */

import { fetchResult, artifactFileName, type Artifact } from './artifact-retriever.js';
import { captureFailureScreenshot } from './browser-utils.js';
import type { Clock } from './clock.js';
import { awaitCompletion, type JobOutcome } from './completion-monitor.js';
import { DEFAULT_SETTINGS, type SlicerSettings } from './config.js';
import { JobCancelledError, JobFailedError, JobTimedOutError, describeError } from './errors.js';
import { fillAndSubmit } from './form-driver.js';
import type { JobRequest } from './job-request.js';
import { silentLogger, type Logger } from './logger.js';
import { openSession, withSession, type BrowserSession, type OpenSession } from './session.js';
import { resolveTargetForm } from './target-form.js';

export interface RunDependencies {
  settings?: SlicerSettings;
  openSession?: OpenSession;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
  /** Save a screenshot next to the output when the run fails. Default true. */
  screenshotOnFailure?: boolean;
}

export type { Artifact } from './artifact-retriever.js';
export type { JobOutcome, JobState } from './completion-monitor.js';
export { createJobRequest, parseRegion, type JobRequest, type JobRequestInput } from './job-request.js';
export * from './errors.js';

async function recordFailure(
  session: BrowserSession,
  request: JobRequest,
  err: unknown,
  log: Logger,
): Promise<void> {
  if (err instanceof JobCancelledError) return;
  try {
    const path = await captureFailureScreenshot(session.driver, request.outputDir, request.jobName);
    log.info(`Saved failure screenshot to ${path}`);
  } catch (screenshotErr) {
    log.warn(`Could not save failure screenshot: ${describeError(screenshotErr)}`);
  }
}

function assertCompleted(outcome: JobOutcome, timeoutMs: number): void {
  if (outcome.state === 'failed') {
    throw new JobFailedError(outcome.message, outcome.elapsedMs);
  }
  if (outcome.state === 'timed_out') {
    throw new JobTimedOutError(outcome.elapsedMs, timeoutMs);
  }
}

export async function runSlicerJob(request: JobRequest, deps: RunDependencies = {}): Promise<Artifact> {
  const settings = deps.settings ?? DEFAULT_SETTINGS;
  const open = deps.openSession ?? openSession;
  const log = deps.logger ?? silentLogger;
  const target = resolveTargetForm(settings);
  const timeoutMs = request.timeoutSeconds * 1000;

  log.info(`Job ${request.jobName}: ${request.fileFormat} ${request.region.text} (${request.filter})`);

  const openForRequest = () =>
    open({
      downloadDir: request.outputDir,
      headless: request.headless,
      executablePath: settings.chromePath,
      nameDownload: (suggested) => artifactFileName(request.jobName, suggested),
      logger: log.child('session'),
    });

  return withSession(openForRequest, async (session) => {
    try {
      await fillAndSubmit(session.driver, request, {
        target,
        fieldTimeoutMs: settings.fieldTimeoutMs,
        spinnerTimeoutMs: settings.spinnerTimeoutMs,
        signal: deps.signal,
        logger: log.child('form'),
      });

      const outcome = await awaitCompletion(session.driver, {
        target,
        timeoutMs,
        pollIntervalMs: settings.pollIntervalMs,
        clock: deps.clock,
        signal: deps.signal,
        logger: log.child('monitor'),
      });
      assertCompleted(outcome, timeoutMs);

      return await fetchResult(session, request, outcome, {
        target,
        fieldTimeoutMs: settings.fieldTimeoutMs,
        timeoutMs: settings.downloadTimeoutMs,
        checkIntervalMs: settings.downloadCheckMs,
        clock: deps.clock,
        signal: deps.signal,
        logger: log.child('download'),
      });
    } catch (err) {
      // The page is still open here; withSession closes it afterwards
      if (deps.screenshotOnFailure ?? true) {
        await recordFailure(session, request, err, log);
      }
      throw err;
    }
  });
}
