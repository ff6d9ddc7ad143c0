/**
 * Schedule Report Renderer
 *
 * Turns ScheduleResults into text (title banner, Gantt chart, schedule
 * table) or JSON. Pure string building; callers decide where it goes.
 */

import { REPORT } from '../config/defaults.js';
import type { ExecutionInterval, ScheduleResult } from '../types/scheduling.js';

export interface RenderOptions {
  /** Width of one Gantt cell */
  ganttCellWidth?: number;

  /** Decimal places for averages and throughput */
  decimals?: number;
}

const TABLE_HEADER = ['ID', 'Priority', 'Burst', 'Arrival', 'Wait', 'Turnaround', 'Exit'];

/**
 * Title framed by dashed lines twice its length
 */
export function renderTitle(title: string): string {
  const rule = '-'.repeat(title.length * 2);
  const indent = ' '.repeat(Math.floor(title.length / 2));
  return [rule, `${indent} ${title}`, rule].join('\n') + '\n';
}

/**
 * Gantt chart: one cell per interval, then the interval boundaries
 */
export function renderGantt(timeline: readonly ExecutionInterval[], cellWidth: number = REPORT.GANTT_CELL_WIDTH): string {
  const cells = timeline.map((interval) => {
    const id = String(interval.processId);
    const padding = ' '.repeat(Math.max(0, Math.floor((cellWidth - id.length) / 2)));
    return `${padding}${id}${padding}|`;
  });

  const boundaries = timeline.map((interval, index) =>
    index === timeline.length - 1 ? `${interval.start}\t${interval.stop}` : `${interval.start}\t`
  );

  return ['Gantt schedule', `|${cells.join('')}`, boundaries.join(''), '', ''].join('\n');
}

/**
 * Bordered table; a cell containing newlines spans several text lines
 */
export function renderTable(rows: readonly string[][], header: readonly string[], footer?: readonly string[]): string {
  const all = footer ? [header, ...rows, footer] : [header, ...rows];
  const widths = header.map((_, column) =>
    Math.max(...all.map((row) => Math.max(...(row[column] ?? '').split('\n').map((line) => line.length))))
  );

  const border = '+' + widths.map((width) => '-'.repeat(width + 2)).join('+') + '+';

  const renderRow = (row: readonly string[]): string[] => {
    const cells = widths.map((_, column) => (row[column] ?? '').split('\n'));
    const height = Math.max(...cells.map((lines) => lines.length));
    const lines: string[] = [];
    for (let line = 0; line < height; line++) {
      lines.push(
        '| ' + cells.map((cellLines, column) => (cellLines[line] ?? '').padEnd(widths[column])).join(' | ') + ' |'
      );
    }
    return lines;
  };

  const output = [border, ...renderRow(header), border];
  for (const row of rows) {
    output.push(...renderRow(row));
  }
  output.push(border);
  if (footer) {
    output.push(...renderRow(footer), border);
  }

  return output.join('\n') + '\n';
}

/**
 * Schedule table with per-process rows and the batch summary as footer
 */
export function renderScheduleTable(result: ScheduleResult, decimals: number = REPORT.DECIMALS): string {
  const rows = result.results.map((row) => [
    String(row.processId),
    String(row.priority),
    String(row.burst),
    String(row.arrival),
    String(row.waitTime),
    String(row.turnaroundTime),
    String(row.completionTime),
  ]);

  const { summary } = result;
  const footer = [
    '',
    '',
    '',
    '',
    `Average\n${summary.averageWait.toFixed(decimals)}`,
    `Average\n${summary.averageTurnaround.toFixed(decimals)}`,
    `Throughput\n${summary.throughput.toFixed(decimals)}/t`,
  ];

  return 'Schedule table\n' + renderTable(rows, TABLE_HEADER, footer);
}

/**
 * Full text report for one algorithm run
 */
export function renderSchedule(result: ScheduleResult, options: RenderOptions = {}): string {
  return (
    renderTitle(result.title) +
    renderGantt(result.timeline, options.ganttCellWidth) +
    renderScheduleTable(result, options.decimals)
  );
}

/**
 * Text report for several runs, in order
 */
export function renderReport(results: readonly ScheduleResult[], options: RenderOptions = {}): string {
  return results.map((result) => renderSchedule(result, options)).join('');
}

/**
 * Machine-readable report
 */
export function renderJson(results: readonly ScheduleResult[]): string {
  return JSON.stringify({ schedules: results }, null, 2) + '\n';
}
