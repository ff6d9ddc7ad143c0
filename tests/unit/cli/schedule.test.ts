import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { parseArgs, run, USAGE, type OutputStream } from '../../../src/cli/schedule.js';
import { renderReport } from '../../../src/report/renderer.js';
import { simulateAll } from '../../../src/scheduling/index.js';
import { STAGGERED } from '../../helpers/process-tables.js';

class MemoryStream implements OutputStream {
  public text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe('parseArgs', () => {
  it('should split positionals from flags', () => {
    expect(parseArgs(['jobs.csv', '--algorithm', 'rr', '--quantum=3', '--verbose'])).toEqual({
      _: ['jobs.csv'],
      algorithm: 'rr',
      quantum: '3',
      verbose: true,
    });
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
  });

  it('should reject a value flag without a value', () => {
    expect(() => parseArgs(['--quantum'])).toThrow('--quantum requires a value');
    expect(() => parseArgs(['--format', '--verbose'])).toThrow('--format requires a value');
  });
});

describe('run', () => {
  let dir: string;
  let csvPath: string;
  let stdout: MemoryStream;
  let stderr: MemoryStream;
  const logger = pino({ level: 'silent' });

  const cli = (...argv: string[]): Promise<number> => run(argv, { stdout, stderr, logger });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cpu-schedule-sim-cli-'));
    csvPath = join(dir, 'processes.csv');
    await writeFile(csvPath, '1,5,0,2\n2,9,3,1\n3,6,6,3\n');
    stdout = new MemoryStream();
    stderr = new MemoryStream();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should print all four reports by default', async () => {
    await expect(cli(csvPath)).resolves.toBe(0);

    expect(stdout.text).toBe(renderReport(simulateAll(STAGGERED), { ganttCellWidth: 8, decimals: 2 }));
    expect(stderr.text).toBe('');
  });

  it('should run selected algorithms with a custom quantum as JSON', async () => {
    await expect(cli(csvPath, '--algorithm', 'rr', '--quantum', '3', '--format', 'json')).resolves.toBe(0);

    const report = JSON.parse(stdout.text);
    expect(report.schedules).toHaveLength(1);
    expect(report.schedules[0].title).toBe('Round-robin');
    expect(report.schedules[0].results.map((row: { completionTime: number }) => row.completionTime)).toEqual([
      8, 20, 17,
    ]);
  });

  it('should keep the requested algorithm order', async () => {
    await expect(cli(csvPath, '--algorithm=rr,fcfs', '--quantum=inf', '--format=json')).resolves.toBe(0);

    const report = JSON.parse(stdout.text);
    expect(report.schedules.map((schedule: { algorithm: string }) => schedule.algorithm)).toEqual(['rr', 'fcfs']);
    expect(report.schedules[0].timeline).toEqual(report.schedules[1].timeline);
  });

  it('should print usage', async () => {
    await expect(cli('--help')).resolves.toBe(0);

    expect(stdout.text).toBe(USAGE);
  });

  it('should print the package version', async () => {
    await expect(cli('--version')).resolves.toBe(0);

    expect(stdout.text).toBe('cpu-schedule-sim v0.1.0\n');
  });

  it('should require a scheduling file', async () => {
    await expect(cli()).resolves.toBe(1);

    expect(stderr.text).toBe(`Error: must give a scheduling file to process\n${USAGE}`);
    expect(stdout.text).toBe('');
  });

  it('should reject more than one scheduling file', async () => {
    await expect(cli(csvPath, csvPath)).resolves.toBe(1);

    expect(stderr.text).toBe(`Error: expected one scheduling file, got 2\n${USAGE}`);
  });

  it('should reject an invalid quantum without usage', async () => {
    await expect(cli(csvPath, '--quantum', '0')).resolves.toBe(1);

    expect(stderr.text).toBe('Error: Quantum must be a positive integer or Infinity, got 0\n');
  });

  it('should reject an unknown algorithm', async () => {
    await expect(cli(csvPath, '--algorithm', 'lottery')).resolves.toBe(1);

    expect(stderr.text).toBe("Error: Unknown algorithm 'lottery'. Expected one of: fcfs, sjf, priority, rr\n");
  });

  it('should reject an unknown format with usage', async () => {
    await expect(cli(csvPath, '--format', 'xml')).resolves.toBe(1);

    expect(stderr.text).toBe(`Error: --format must be text or json, got xml\n${USAGE}`);
  });

  it('should report a missing scheduling file', async () => {
    await expect(cli(join(dir, 'missing.csv'))).resolves.toBe(1);

    expect(stderr.text).toMatch(/^Error: ENOENT: no such file or directory/);
    expect(stdout.text).toBe('');
  });

  it('should report a malformed scheduling file', async () => {
    await writeFile(csvPath, '1,5,0\n2,x,1\n');

    await expect(cli(csvPath)).resolves.toBe(1);

    expect(stderr.text).toBe('Error: line 2: burst "x" is not an integer\n');
  });

  it('should read settings from a configuration file', async () => {
    const configPath = join(dir, 'scheduler.yaml');
    await writeFile(
      configPath,
      [
        'scheduling:',
        '  round_robin:',
        '    quantum: 3',
        '  algorithms: [rr]',
        'report:',
        '  format: json',
        '  gantt_cell_width: 8',
        '  decimals: 2',
        'logging:',
        '  level: silent',
        '',
      ].join('\n')
    );

    await expect(cli(csvPath, '--config', configPath)).resolves.toBe(0);

    const report = JSON.parse(stdout.text);
    expect(report.schedules[0].results.map((row: { completionTime: number }) => row.completionTime)).toEqual([
      8, 20, 17,
    ]);
  });

  it('should report a missing configuration file', async () => {
    const configPath = join(dir, 'absent.yaml');

    await expect(cli(csvPath, '--config', configPath)).resolves.toBe(1);

    expect(stderr.text).toBe(`Error: Configuration file not found: ${configPath}\n`);
  });

  it('should build its own stderr logger when none is injected', async () => {
    const io = { stdout, stderr };

    await expect(run([csvPath, '--algorithm', 'fcfs'], io)).resolves.toBe(0);
    await expect(run([csvPath, '--algorithm', 'fcfs', '--verbose'], io)).resolves.toBe(0);

    const expected = renderReport(simulateAll(STAGGERED, {}, ['fcfs']), { ganttCellWidth: 8, decimals: 2 });
    expect(stdout.text).toBe(expected + expected);
    expect(stderr.text).toBe('');
  });
});
