import path from 'node:path';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { loadPipelineConfig, type ChartFormat, type PipelineOptions } from '../config/options.js';
import { describeError } from '../core/errors.js';
import { parseCsvArgument } from '../core/execution-loop.js';
import { log, setLogLevel } from '../core/logger.js';
import { expandReportPaths } from '../loader/report-loader.js';
import { runPipeline } from '../pipeline/pipeline.js';

export const CLI_NAME = 'test-report-insights';
export const CLI_VERSION = '0.1.0';
export const DEFAULT_OUTPUT_DIR = 'test_results_visualization';

/** Parsed command-line flags. */
interface CliOptions {
  file: string[];
  output: string;
  config?: string;
  formats?: ChartFormat[];
  topN?: number;
  verbose?: boolean;
}

/** Where the CLI prints; tests swap these for buffers. */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text)
};

/** Build the commander program. Commander errors are thrown instead of exiting. */
export function createProgram(io: CliIo = processIo): Command {
  return new Command()
    .name(CLI_NAME)
    .description('Summarize JUnit-style XML test reports into charts, insights and a JSON summary')
    .version(CLI_VERSION, '-v, --version', 'print the version')
    .requiredOption('-f, --file <paths...>', 'report files or directories, oldest run first')
    .option('-o, --output <dir>', 'output directory', DEFAULT_OUTPUT_DIR)
    .option('-c, --config <path>', 'YAML config file')
    .option('--formats <list>', 'comma-separated chart formats (svg, png)', parseFormats)
    .option('--top-n <n>', 'length of the slowest cases and classes lists', parsePositiveInteger)
    .option('--verbose', 'debug logging (also -vv)')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

/**
 * Run the CLI and resolve to the process exit code: 0 for success or partial
 * success, 1 for anything fatal.
 */
export async function main(argv: readonly string[] = process.argv, io: CliIo = processIo): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(normalizeArgv(argv));
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }

  const flags = program.opts<CliOptions>();
  if (flags.verbose) {
    setLogLevel('debug');
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    log.cli.warn('interrupted; cancelling');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const fileConfig = flags.config ? await loadPipelineConfig(flags.config) : {};
    const options: Partial<PipelineOptions> = {
      ...fileConfig,
      ...(flags.formats ? { formats: flags.formats } : {}),
      ...(flags.topN !== undefined ? { topN: flags.topN } : {})
    };
    const files = await expandReportPaths(flags.file);
    const outputDir = path.resolve(flags.output);

    const result = await runPipeline({ files, outputDir, options, signal: controller.signal });
    const failed = result.summary.inputs.filter((input) => input.outcome === 'failed');
    for (const input of failed) {
      io.stderr(`warning: ${input.error?.message ?? input.path}\n`);
    }
    io.stdout(`${result.status}: wrote ${result.artifacts.length} files to ${outputDir}\n`);
    return 0;
  } catch (error) {
    log.cli.error({ error: describeError(error) }, 'run failed');
    io.stderr(`error: ${describeError(error)}\n`);
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/** Commander has no multi-letter short flags; map `-vv` onto `--verbose`. */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map((arg) => (arg === '-vv' ? '--verbose' : arg));
}

function parseFormats(raw: string): ChartFormat[] {
  const values = parseCsvArgument(raw);
  if (!values) {
    throw new InvalidArgumentError('expected at least one format');
  }

  const formats: ChartFormat[] = [];
  for (const value of values) {
    if (value !== 'svg' && value !== 'png') {
      throw new InvalidArgumentError(`unknown format '${value}' (expected svg or png)`);
    }
    if (!formats.includes(value)) {
      formats.push(value);
    }
  }
  return formats;
}

function parsePositiveInteger(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return value;
}
