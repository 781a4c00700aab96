import { JobRequestValidationError } from './errors.js';
import type { JobRequestInput } from './job-request.js';

export const DEFAULTS = {
  outputDir: 'downloads/',
  fileFormat: 'VCF',
  region: '3:146142335-146301179',
  genotypeUrl:
    'https://ftp.ensembl.org/pub/data_files/homo_sapiens/GRCh38/variation_genotype/ALL.chr1_GRCh38.genotypes.20170504.vcf.gz',
  filter: 'populations',
  mappingUrl:
    'https://ftp.1000genomes.ebi.ac.uk/vol1/ftp/release/20130502/integrated_call_samples_v3.20130502.ALL.panel',
  populations: 'CEU',
  timeoutSeconds: 300,
} as const;

export const USAGE = `Usage: slicer -j <jobname> [options]

Get a subset of data from a BAM or VCF file with the Ensembl Data Slicer.

Options:
  -o,  --outdir <dir>          Output directory (default: ${DEFAULTS.outputDir})
  -j,  --jobname <name>        Name for this job; prefixes the downloaded file
  -ff, --fileformat <fmt>      File format, BAM or VCF (default: ${DEFAULTS.fileFormat})
  -r,  --regionlookup <region> Region as chrom:start-end (default: ${DEFAULTS.region})
  -g,  --genotype <url>        Genotype file URL
  -f,  --filters <mode>        Filters: null, individuals or populations (default: ${DEFAULTS.filter})
  -m,  --mapping <url>         Sample-population mapping file URL
  -p,  --populations <codes>   Comma-separated population codes (default: ${DEFAULTS.populations})
  -to, --timeout <secs>        Seconds to wait for the job (default: ${DEFAULTS.timeoutSeconds})
       --open                  Show the browser window
  -h,  --help                  Show this help`;

export type CliCommand = { kind: 'help' } | { kind: 'run'; input: JobRequestInput };

type ValueFlag =
  | 'outputDir'
  | 'jobName'
  | 'fileFormat'
  | 'region'
  | 'genotypeUrl'
  | 'filter'
  | 'mappingUrl'
  | 'populations'
  | 'timeout';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-o': 'outputDir',
  '--outdir': 'outputDir',
  '-j': 'jobName',
  '--jobname': 'jobName',
  '-ff': 'fileFormat',
  '--fileformat': 'fileFormat',
  '-r': 'region',
  '--regionlookup': 'region',
  '-g': 'genotypeUrl',
  '--genotype': 'genotypeUrl',
  '-f': 'filter',
  '--filters': 'filter',
  '-m': 'mappingUrl',
  '--mapping': 'mappingUrl',
  '-p': 'populations',
  '--populations': 'populations',
  '-to': 'timeout',
  '--timeout': 'timeout',
};

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Turns argv (without node and the script) into request input. Values can
 * follow their flag or be joined with `=` (`--timeout=60`).
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const values: Partial<Record<ValueFlag, string>> = {};
  const problems: string[] = [];
  let open = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '--open') {
      open = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (!key) {
      problems.push(`unknown option ${arg}`);
      continue;
    }

    const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined) {
      problems.push(`${flag} needs a value`);
      continue;
    }
    values[key] = value;
  }

  if (!values.jobName) problems.push('-j/--jobname is required');

  const timeoutSeconds = values.timeout === undefined ? DEFAULTS.timeoutSeconds : Number(values.timeout);
  if (!Number.isInteger(timeoutSeconds)) problems.push(`--timeout must be a whole number of seconds`);

  if (problems.length > 0) throw new JobRequestValidationError(problems);

  return {
    kind: 'run',
    input: {
      outputDir: values.outputDir ?? DEFAULTS.outputDir,
      jobName: values.jobName ?? '',
      fileFormat: (values.fileFormat ?? DEFAULTS.fileFormat).toUpperCase(),
      region: values.region ?? DEFAULTS.region,
      genotypeUrl: values.genotypeUrl ?? DEFAULTS.genotypeUrl,
      filter: values.filter ?? DEFAULTS.filter,
      mappingUrl: values.mappingUrl ?? DEFAULTS.mappingUrl,
      populations: splitList(values.populations ?? DEFAULTS.populations),
      timeoutSeconds,
      headless: !open,
    },
  };
}
