/**
 * Completion monitor.
 *
 * The Data Slicer has no job-status API, so completion is read off the
 * page: the job list grows a "[View results]" link when the job is done,
 * or a failure marker when it is not. The page is probed at a fixed
 * interval until one of those shows or the deadline passes.
 */

import { systemClock, type Clock } from './clock.js';
import { JobCancelledError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { PageDriver } from './page-driver.js';
import type { TargetForm } from './target-form.js';

export type JobState = 'submitted' | 'pending' | 'completed' | 'failed' | 'timed_out';

interface OutcomeBase {
  elapsedMs: number;
  polls: number;
}

export type JobOutcome =
  | (OutcomeBase & { state: 'completed' })
  | (OutcomeBase & { state: 'failed'; message: string })
  | (OutcomeBase & { state: 'timed_out' });

export type PageObservation = { state: 'pending' } | { state: 'completed' } | { state: 'failed'; message: string };

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  submitted: ['pending'],
  pending: ['completed', 'failed', 'timed_out'],
  completed: [],
  failed: [],
  timed_out: [],
};

/**
 * Tracks the job's state and refuses transitions out of a terminal state.
 */
export class JobStateMachine {
  private _state: JobState = 'submitted';
  private readonly history: JobState[] = ['submitted'];

  constructor(private readonly onTransition?: (from: JobState, to: JobState) => void) {}

  get state(): JobState {
    return this._state;
  }

  get transitions(): readonly JobState[] {
    return this.history;
  }

  transition(next: JobState): void {
    if (next === this._state) return;
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`Invalid job state transition ${this._state} -> ${next}`);
    }
    const from = this._state;
    this._state = next;
    this.history.push(next);
    this.onTransition?.(from, next);
  }
}

/**
 * One look at the page. Success is checked first: a finished job can still
 * carry an error element elsewhere on the page.
 */
export async function probeJobState(driver: PageDriver, target: TargetForm): Promise<PageObservation> {
  if (await driver.isVisible(target.resultsLink)) {
    return { state: 'completed' };
  }
  if (await driver.isVisible(target.failureMarker)) {
    // The marker can be replaced between the two reads; the state still stands
    const message = await driver.textOf(target.failureMarker).catch(() => '');
    return { state: 'failed', message };
  }
  return { state: 'pending' };
}

export interface AwaitCompletionOptions {
  target: TargetForm;
  timeoutMs: number;
  pollIntervalMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Polls until the job completes, fails or `timeoutMs` elapses. The final
 * probe happens at the deadline at the latest; after a terminal state is
 * reached the page is not probed again.
 */
export async function awaitCompletion(
  driver: PageDriver,
  options: AwaitCompletionOptions,
): Promise<JobOutcome> {
  const { target, timeoutMs, pollIntervalMs, signal } = options;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? silentLogger;
  const machine = new JobStateMachine((from, to) => log.debug(`Job state ${from} -> ${to}`));

  const startedAt = clock.now();
  const elapsed = () => clock.now() - startedAt;
  let polls = 0;

  log.info('Waiting for the results (in the queue)...');

  for (;;) {
    if (signal?.aborted) {
      throw new JobCancelledError('waiting for the job to finish');
    }

    const observation = await probeJobState(driver, target);
    polls++;
    machine.transition('pending');

    if (observation.state === 'completed') {
      machine.transition('completed');
      log.info(`Results are ready after ${elapsed()}ms`);
      return { state: 'completed', elapsedMs: elapsed(), polls };
    }
    if (observation.state === 'failed') {
      machine.transition('failed');
      log.error(`Job failed: ${observation.message}`);
      return { state: 'failed', message: observation.message, elapsedMs: elapsed(), polls };
    }

    const remaining = timeoutMs - elapsed();
    if (remaining <= 0) {
      machine.transition('timed_out');
      log.warn(`Job still pending after ${elapsed()}ms`);
      return { state: 'timed_out', elapsedMs: elapsed(), polls };
    }

    log.debug(`Poll ${polls}: pending, ${remaining}ms left`);
    await clock.sleep(Math.min(pollIntervalMs, remaining), signal);
  }
}
