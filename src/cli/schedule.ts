#!/usr/bin/env node

/**
 * CPU Scheduling Simulator CLI
 *
 * Usage:
 *   cpu-schedule-sim <processes.csv> [options]
 */

import { readFileSync, realpathSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { destination, pino, type Logger } from 'pino';
import { z } from 'zod';
import { SchedulerError, toSchedulerError } from '../api/errors.js';
import { assertValidQuantum } from '../api/validators.js';
import { getRenderOptions, getSimulationOptions, loadConfig } from '../config/loader.js';
import { loadProcessFile } from '../io/process-loader.js';
import { renderJson, renderReport } from '../report/renderer.js';
import { ALGORITHMS, getAlgorithm, simulateAll } from '../scheduling/index.js';
import type { AlgorithmName } from '../types/scheduling.js';

export interface CLIArgs {
  _: string[];
  algorithm?: string;
  quantum?: string;
  format?: string;
  config?: string;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

type ValueFlag = 'algorithm' | 'quantum' | 'format' | 'config';
type BooleanFlag = 'verbose' | 'help' | 'version';

const VALUE_FLAGS: readonly ValueFlag[] = ['algorithm', 'quantum', 'format', 'config'];
const BOOLEAN_FLAGS: readonly BooleanFlag[] = ['verbose', 'help', 'version'];

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key);
}

function isBooleanFlag(key: string): key is BooleanFlag {
  return BOOLEAN_FLAGS.some((flag) => flag === key);
}

/**
 * Minimal sink the CLI writes to
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: OutputStream;
  stderr: OutputStream;

  /** Overrides the logger built from configuration */
  logger?: Logger;
}

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const [key, inlineValue] = arg.slice(2).split('=', 2);

    if (isBooleanFlag(key)) {
      result[key] = true;
    } else if (isValueFlag(key)) {
      const value = inlineValue ?? args[i + 1];
      if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
        throw new SchedulerError('InvalidArgs', `--${key} requires a value`, { flag: key });
      }
      result[key] = value;
      if (inlineValue === undefined) {
        i++;
      }
    } else {
      throw new SchedulerError('InvalidArgs', `Unknown option: ${arg}`, { flag: key });
    }
  }

  return result;
}

export const USAGE = `
CPU Scheduling Simulator - replay FCFS, SJF, priority and round-robin schedules

USAGE:
  cpu-schedule-sim <processes.csv> [options]

INPUT:
  One process per line: processID,burstDuration,arrivalTime[,priority]
  Priority defaults to 0 when omitted.

OPTIONS:
  --algorithm <names>     fcfs, sjf, priority, rr or all (comma-separated list allowed)
  --quantum <n|inf>       Round-robin time slice (default from config: 2)
  --format <text|json>    Output format (default from config: text)
  --config <path>         Configuration file (default: config/scheduler.yaml)
  --verbose               Log scheduling decisions to stderr
  --help                  Show this help message
  --version               Show version
`;

function readVersion(): string {
  const packageJsonPath = join(fileURLToPath(new URL('../..', import.meta.url)), 'package.json');
  const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));
  return pkg.version;
}

function parseQuantum(value: string): number {
  const quantum = /^(inf|infinity)$/i.test(value) ? Number.POSITIVE_INFINITY : /^\d+$/.test(value) ? Number(value) : NaN;
  assertValidQuantum(quantum);
  return quantum;
}

function parseAlgorithms(value: string): AlgorithmName[] {
  if (value === 'all') {
    return ALGORITHMS.map((algorithm) => algorithm.name);
  }
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map((name) => getAlgorithm(name).name);
}

function parseFormat(value: string): 'text' | 'json' {
  if (value !== 'text' && value !== 'json') {
    throw new SchedulerError('InvalidArgs', `--format must be text or json, got ${value}`, { format: value });
  }
  return value;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  let logger = io.logger;

  try {
    const args = parseArgs(argv);

    if (args.help) {
      io.stdout.write(USAGE);
      return 0;
    }

    if (args.version) {
      io.stdout.write(`cpu-schedule-sim v${readVersion()}\n`);
      return 0;
    }

    if (args._.length !== 1) {
      throw new SchedulerError(
        'InvalidArgs',
        args._.length === 0
          ? 'must give a scheduling file to process'
          : `expected one scheduling file, got ${args._.length}`
      );
    }

    const config = loadConfig(args.config);
    logger ??= pino(
      { name: 'cpu-schedule-sim', level: args.verbose ? 'debug' : config.logging.level },
      destination(2)
    );

    const simulation = getSimulationOptions(config);
    const quantum = args.quantum !== undefined ? parseQuantum(args.quantum) : simulation.quantum;
    const algorithms = args.algorithm !== undefined ? parseAlgorithms(args.algorithm) : config.scheduling.algorithms;
    const format = args.format !== undefined ? parseFormat(args.format) : config.report.format;

    const processes = await loadProcessFile(args._[0], logger);
    const results = simulateAll(processes, { quantum, logger }, algorithms);

    io.stdout.write(format === 'json' ? renderJson(results) : renderReport(results, getRenderOptions(config)));
    return 0;
  } catch (error) {
    const err = toSchedulerError(error);
    logger?.debug({ err }, 'Simulation failed');
    io.stderr.write(`Error: ${err.message}\n`);
    if (err.code === 'InvalidArgs') {
      io.stderr.write(USAGE);
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
