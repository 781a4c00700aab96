import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { systemClock, type Clock } from './clock.js';
import type { JobOutcome } from './completion-monitor.js';
import { ArtifactNotFoundError, FormInteractionError, JobCancelledError } from './errors.js';
import type { FileFormat, JobRequest } from './job-request.js';
import { silentLogger, type Logger } from './logger.js';
import type { BrowserSession } from './session.js';
import type { TargetForm } from './target-form.js';

export interface Artifact {
  path: string;
  fileName: string;
  sizeBytes: number;
  format: FileFormat;
  jobName: string;
}

export interface FetchResultOptions {
  target: TargetForm;
  fieldTimeoutMs: number;
  timeoutMs: number;
  checkIntervalMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

const FORMAT_EXTENSIONS: Record<FileFormat, string> = {
  VCF: '.vcf',
  BAM: '.bam',
};

const IN_PROGRESS_SUFFIXES = ['.part', '.crdownload', '.download', '.tmp'];

/** The name a download is saved under: the job name, then the server's name. */
export function artifactFileName(jobName: string, suggested: string): string {
  return suggested.startsWith(`${jobName}_`) ? suggested : `${jobName}_${suggested}`;
}

export function artifactPattern(jobName: string, format: FileFormat): string {
  return `${jobName}_*${FORMAT_EXTENSIONS[format]}*`;
}

export function matchesArtifact(fileName: string, jobName: string, format: FileFormat): boolean {
  const lower = fileName.toLowerCase();
  if (IN_PROGRESS_SUFFIXES.some((suffix) => lower.endsWith(suffix))) return false;
  return fileName.startsWith(`${jobName}_`) && lower.includes(FORMAT_EXTENSIONS[format]);
}

export interface FileStamp {
  size: number;
  mtimeMs: number;
}

/** What is in a directory before a download, by file name. */
export type DirectorySnapshot = ReadonlyMap<string, FileStamp>;

async function listFiles(dir: string): Promise<Map<string, FileStamp>> {
  const stamps = new Map<string, FileStamp>();
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const info = await stat(join(dir, entry.name)).catch((err: NodeJS.ErrnoException) => {
      // Renamed or removed between readdir and stat
      if (err.code === 'ENOENT') return null;
      throw err;
    });
    if (info) stamps.set(entry.name, { size: info.size, mtimeMs: info.mtimeMs });
  }
  return stamps;
}

export function snapshotDirectory(dir: string): Promise<DirectorySnapshot> {
  return listFiles(dir);
}

/** A file is new when it was absent from the snapshot or has been rewritten since. */
function isNewSince(baseline: DirectorySnapshot, name: string, stamp: FileStamp): boolean {
  const before = baseline.get(name);
  return !before || before.size !== stamp.size || before.mtimeMs !== stamp.mtimeMs;
}

/**
 * Waits for a new file matching the artifact naming contract to appear in
 * `dir` and stop growing. A file counts as settled when its size is the
 * same on two consecutive checks.
 */
export async function waitForArtifact(
  dir: string,
  baseline: DirectorySnapshot,
  request: Pick<JobRequest, 'jobName' | 'fileFormat'>,
  options: Pick<FetchResultOptions, 'timeoutMs' | 'checkIntervalMs' | 'clock' | 'signal' | 'logger'>,
): Promise<Artifact> {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? silentLogger;
  const startedAt = clock.now();
  const lastSizes = new Map<string, number>();

  for (;;) {
    if (options.signal?.aborted) {
      throw new JobCancelledError('waiting for the download');
    }

    const files = await listFiles(dir);
    const candidates = [...files]
      .filter(
        ([name, stamp]) =>
          isNewSince(baseline, name, stamp) && matchesArtifact(name, request.jobName, request.fileFormat),
      )
      .map(([name, stamp]): [string, number] => [name, stamp.size])
      .sort(([a], [b]) => a.localeCompare(b));

    for (const [name, size] of candidates) {
      if (lastSizes.get(name) === size) {
        return {
          path: join(dir, name),
          fileName: name,
          sizeBytes: size,
          format: request.fileFormat,
          jobName: request.jobName,
        };
      }
      log.debug(`${name}: ${size} bytes, waiting for it to settle`);
    }

    lastSizes.clear();
    for (const [name, size] of candidates) lastSizes.set(name, size);

    const waited = clock.now() - startedAt;
    if (waited >= options.timeoutMs) {
      throw new ArtifactNotFoundError(dir, artifactPattern(request.jobName, request.fileFormat), waited);
    }
    await clock.sleep(Math.min(options.checkIntervalMs, options.timeoutMs - waited), options.signal);
  }
}

/**
 * Opens the results of a completed job, starts the download and returns the
 * file once it has settled in the session's download directory. Any other
 * outcome is rejected.
 */
export async function fetchResult(
  session: BrowserSession,
  request: JobRequest,
  outcome: JobOutcome,
  options: FetchResultOptions,
): Promise<Artifact> {
  if (outcome.state !== 'completed') {
    throw new Error(`Results requested for a job in state ${outcome.state}`);
  }

  const { driver, downloadDir } = session;
  const { target, fieldTimeoutMs } = options;
  const log = options.logger ?? silentLogger;

  const baseline = await snapshotDirectory(downloadDir);

  if (!(await driver.waitForReady(target.resultsLink, fieldTimeoutMs))) {
    throw new FormInteractionError('resultsLink', target.resultsLink, fieldTimeoutMs);
  }
  await driver.click(target.resultsLink);

  if (!(await driver.waitForReady(target.downloadLink, fieldTimeoutMs))) {
    throw new FormInteractionError('downloadLink', target.downloadLink, fieldTimeoutMs);
  }
  log.info('Downloading results...');
  await driver.click(target.downloadLink);

  const artifact = await waitForArtifact(downloadDir, baseline, request, options);
  log.info(`Saved ${artifact.fileName} (${artifact.sizeBytes} bytes)`);
  return artifact;
}
