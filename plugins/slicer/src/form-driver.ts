import { FormInteractionError, JobCancelledError } from './errors.js';
import type { JobRequest } from './job-request.js';
import { silentLogger, type Logger } from './logger.js';
import type { PageDriver } from './page-driver.js';
import type { FormFieldName, TargetForm } from './target-form.js';

const BANNER_TIMEOUT_MS = 3_000;

export type FormAction =
  | { kind: 'fill'; value: string }
  | { kind: 'select'; labels: string[] }
  | { kind: 'click' };

export interface FormStep {
  field: FormFieldName;
  selector: string;
  action: FormAction;
  /** Clicked after the action to make the form load dependent controls. */
  commit?: string;
}

export interface FillOptions {
  target: TargetForm;
  fieldTimeoutMs: number;
  spinnerTimeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * The ordered interactions for a request. Mapping file and populations
 * only exist on the form once the populations filter is chosen.
 */
export function planFormSteps(request: JobRequest, target: TargetForm): FormStep[] {
  const steps: FormStep[] = [
    { field: 'jobName', selector: target.fields.jobName, action: { kind: 'fill', value: request.jobName } },
    {
      field: 'fileFormat',
      selector: target.fields.fileFormat,
      action: { kind: 'select', labels: [request.fileFormat] },
    },
    { field: 'region', selector: target.fields.region, action: { kind: 'fill', value: request.region.text } },
    {
      field: 'genotypeUrl',
      selector: target.fields.genotypeUrl,
      action: { kind: 'fill', value: request.genotypeUrl },
    },
    { field: 'filter', selector: target.filterOption(request.filter), action: { kind: 'click' } },
  ];

  if (request.filter === 'populations') {
    steps.push(
      {
        field: 'mappingUrl',
        selector: target.fields.mappingUrl,
        action: { kind: 'fill', value: request.mappingUrl },
        commit: target.blurTarget,
      },
      {
        field: 'populations',
        selector: target.fields.populations,
        action: { kind: 'select', labels: request.populations },
      },
    );
  }

  return steps;
}

async function applyAction(driver: PageDriver, step: FormStep): Promise<void> {
  switch (step.action.kind) {
    case 'fill':
      await driver.fill(step.selector, step.action.value);
      break;
    case 'select':
      await driver.selectByLabel(step.selector, step.action.labels);
      break;
    case 'click':
      await driver.click(step.selector);
      break;
  }
}

/**
 * Opens the form, sets every planned field once and clicks run. Each
 * control must become ready within `fieldTimeoutMs` or the call fails with
 * `FormInteractionError` before anything is submitted.
 */
export async function fillAndSubmit(
  driver: PageDriver,
  request: JobRequest,
  options: FillOptions,
): Promise<void> {
  const { target, fieldTimeoutMs, spinnerTimeoutMs, signal } = options;
  const log = options.logger ?? silentLogger;

  const checkCancelled = () => {
    if (signal?.aborted) throw new JobCancelledError('filling the form');
  };

  const settle = async () => {
    if (!(await driver.waitForHidden(target.spinner, spinnerTimeoutMs))) {
      log.warn(`Loading spinner still visible after ${spinnerTimeoutMs}ms`);
    }
  };

  log.info(`Opening ${target.url}`);
  await driver.goto(target.url);
  await settle();
  log.info(await driver.title());

  // The consent banner only shows on a first visit from a fresh profile
  if (await driver.waitForReady(target.cookieBanner, Math.min(fieldTimeoutMs, BANNER_TIMEOUT_MS))) {
    log.info('Closing agreement banner');
    await driver.click(target.cookieBanner);
    await settle();
  }

  for (const step of planFormSteps(request, target)) {
    checkCancelled();
    if (!(await driver.waitForReady(step.selector, fieldTimeoutMs))) {
      throw new FormInteractionError(step.field, step.selector, fieldTimeoutMs);
    }
    log.info(`Setting ${step.field}`);
    await applyAction(driver, step);
    if (step.commit) {
      await driver.click(step.commit);
    }
    await settle();
  }

  checkCancelled();
  if (!(await driver.waitForReady(target.submit, fieldTimeoutMs))) {
    throw new FormInteractionError('submit', target.submit, fieldTimeoutMs);
  }
  log.info('Submitting job');
  await driver.click(target.submit);
  await settle();
}
