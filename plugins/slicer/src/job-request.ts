import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { JobRequestValidationError } from './errors.js';

export const FILE_FORMATS = ['VCF', 'BAM'] as const;
export const FILTER_MODES = ['null', 'individuals', 'populations'] as const;

export type FileFormat = (typeof FILE_FORMATS)[number];
export type FilterMode = (typeof FILTER_MODES)[number];

export interface Region {
  chromosome: string;
  start: number;
  end: number;
  /** Canonical `chrom:start-end` form typed into the form. */
  text: string;
}

export interface JobRequest {
  outputDir: string;
  jobName: string;
  fileFormat: FileFormat;
  region: Region;
  genotypeUrl: string;
  filter: FilterMode;
  mappingUrl: string;
  populations: string[];
  timeoutSeconds: number;
  headless: boolean;
}

const REGION_PATTERN = /^([A-Za-z0-9_.]+):([\d,]+)-([\d,]+)$/;

/**
 * Parses `chrom:start-end`. Thousands separators are accepted the way the
 * Ensembl location box accepts them. Returns null for anything else.
 */
export function parseRegion(text: string): Region | null {
  const match = REGION_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, chromosome, rawStart, rawEnd] = match;
  const start = Number(rawStart.replace(/,/g, ''));
  const end = Number(rawEnd.replace(/,/g, ''));
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) return null;
  if (start < 1 || start > end) return null;

  return { chromosome, start, end, text: `${chromosome}:${start}-${end}` };
}

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

const regionSchema = z.string().transform((value, ctx) => {
  const region = parseRegion(value);
  if (!region) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `"${value}" is not a chrom:start-end region with start <= end`,
    });
    return z.NEVER;
  }
  return region;
});

export const jobRequestSchema = z
  .object({
    outputDir: z.string().min(1).transform((dir) => (isAbsolute(dir) ? dir : resolve(dir))),
    jobName: z
      .string()
      .min(1)
      .max(64)
      .regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, ".", "_" and "-"'),
    fileFormat: z.enum(FILE_FORMATS),
    region: regionSchema,
    genotypeUrl: httpUrl,
    filter: z.enum(FILTER_MODES),
    mappingUrl: httpUrl,
    populations: z.array(z.string().trim().min(1)).default([]),
    timeoutSeconds: z.number().positive(),
    headless: z.boolean().default(true),
  })
  .superRefine((request, ctx) => {
    if (request.filter === 'populations' && request.populations.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['populations'],
        message: 'at least one population code is required with the populations filter',
      });
    }
  });

/** Unvalidated parameters, as a CLI or another caller collects them. */
export interface JobRequestInput {
  outputDir: string;
  jobName: string;
  fileFormat: string;
  region: string;
  genotypeUrl: string;
  filter: string;
  mappingUrl: string;
  populations?: string[];
  timeoutSeconds: number;
  headless?: boolean;
}

/**
 * Validates raw parameters into a JobRequest. Throws
 * `JobRequestValidationError` listing every problem found.
 */
export function createJobRequest(input: JobRequestInput): JobRequest {
  const result = jobRequestSchema.safeParse(input);
  if (!result.success) {
    throw new JobRequestValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`),
    );
  }
  return result.data;
}
