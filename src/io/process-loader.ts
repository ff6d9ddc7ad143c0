/**
 * Process Loader
 *
 * Reads process tables from CSV. One record per line:
 *
 *   processID,burstDuration,arrivalTime[,priority]
 *
 * Priority defaults to 0 when omitted. A field may be wrapped in double
 * quotes, which can hold commas. Any malformed record fails the whole load;
 * no partial table is returned.
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { SchedulerError, toSchedulerError, zodErrorToSchedulerError } from '../api/errors.js';
import type { Process } from '../types/scheduling.js';
import { ProcessTableSchema } from '../types/schemas/process.js';
import { collectResults, Err, Ok, unwrap, type Result } from '../utils/result-helpers.js';

const FIELD_NAMES = ['id', 'burst', 'arrival', 'priority'] as const;
type FieldName = (typeof FIELD_NAMES)[number];

const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface CsvRecord {
  line: number;
  fields: string[];
}

/**
 * Split CSV text into records, skipping blank lines.
 */
export function splitRecords(text: string): Result<CsvRecord[], SchedulerError> {
  const records: Result<CsvRecord, SchedulerError>[] = [];

  text.split(/\r?\n/).forEach((raw, offset) => {
    if (raw.trim() === '') {
      return;
    }
    records.push(splitFields(raw, offset + 1));
  });

  return collectResults(records);
}

function splitFields(raw: string, line: number): Result<CsvRecord, SchedulerError> {
  const fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let quoted = false;

  const malformed = (reason: string): Result<CsvRecord, SchedulerError> =>
    Err(
      new SchedulerError('MalformedCsv', `line ${line}: ${reason} in field ${fields.length + 1}`, {
        line,
        field: fields.length + 1,
      })
    );

  for (const char of raw) {
    if (inQuotes) {
      if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
    } else if (char === ',') {
      fields.push(field.trim());
      field = '';
      quoted = false;
    } else if (char === '"') {
      if (quoted || field.trim() !== '') {
        return malformed('unexpected quote');
      }
      inQuotes = true;
      quoted = true;
    } else if (quoted && char.trim() !== '') {
      return malformed('text after closing quote');
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    return malformed('unterminated quote');
  }
  fields.push(field.trim());

  if (fields.length < 3 || fields.length > 4) {
    return Err(
      new SchedulerError(
        'MalformedCsv',
        `line ${line}: expected 3 or 4 fields, got ${fields.length}`,
        { line, fields: fields.length }
      )
    );
  }

  return Ok({ line, fields });
}

function parseInteger(value: string, line: number, field: FieldName): Result<number, SchedulerError> {
  const parsed = Number(value);
  if (!INTEGER_PATTERN.test(value) || !Number.isSafeInteger(parsed)) {
    return Err(
      new SchedulerError(
        'InvalidInteger',
        `line ${line}: ${field} ${JSON.stringify(value)} is not an integer`,
        { line, field, value }
      )
    );
  }
  return Ok(parsed);
}

function toProcess(record: CsvRecord): Result<Process, SchedulerError> {
  const values = collectResults(
    record.fields.map((value, position) => parseInteger(value, record.line, FIELD_NAMES[position]))
  );
  if (values.err) {
    return values;
  }

  const [id, burst, arrival, priority = 0] = values.val;
  return Ok({ id, burst, arrival, priority });
}

/**
 * Parse CSV text into a validated process table.
 */
export function parseProcesses(text: string): Result<Process[], SchedulerError> {
  const records = splitRecords(text);
  if (records.err) {
    return records;
  }

  const processes = collectResults(records.val.map(toProcess));
  if (processes.err) {
    return processes;
  }

  const validated = ProcessTableSchema.safeParse(processes.val);
  if (!validated.success) {
    const error = zodErrorToSchedulerError(validated.error, 'InvalidProcess');
    const index = validated.error.issues[0]?.path[0];
    const record = typeof index === 'number' ? records.val[index] : undefined;
    return Err(
      record
        ? new SchedulerError('InvalidProcess', `line ${record.line}: ${error.message}`, {
            ...error.details,
            line: record.line,
          })
        : error
    );
  }

  return Ok(processes.val);
}

/**
 * Read and parse a process CSV file.
 *
 * @throws SchedulerError on unreadable files or malformed content
 */
export async function loadProcessFile(path: string, logger?: Logger): Promise<Process[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw toSchedulerError(error, 'FileReadError');
  }

  const processes = unwrap(parseProcesses(text));
  logger?.info({ path, processes: processes.length }, 'Process table loaded');
  return processes;
}
