import { createReadStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { CleaningReport, TornadoEvent } from '../types';
import { COLUMNS, REQUIRED_COLUMNS } from '../constants';
import { CsvRecordSplitter, parseCsv, parseCsvRows, stripBom, toRow } from '../utils/csv';
import { cleanRecord, createCleaningReport, type CleanOptions, type EventRow } from '../utils/parser';
import { DatasetReadError } from './errors';
import { createLogger, formatBytes, type Logger } from './logger';

export type TableEngine = 'in-memory' | 'chunked';

export interface DatasetSummary {
  columns: readonly string[];
  sizeBytes: number;
  eventTypes: ReadonlyMap<string, number>;
}

/**
 * Cleaned, read-only view over the event file. Both engines apply the same
 * cleaning rules; they differ only in when the file is read.
 */
export interface EventTable {
  readonly engine: TableEngine;
  readonly report: Readonly<CleaningReport>;
  readonly summary: DatasetSummary;
  eventsForYear(year: number): Promise<readonly TornadoEvent[]>;
}

export interface LoadedEvents {
  events: readonly TornadoEvent[];
  report: Readonly<CleaningReport>;
  summary: DatasetSummary;
}

export interface OpenTableOptions {
  inMemoryLimitBytes: number;
  chunkSize?: number;
  cacheSize?: number;
  logger?: Logger;
}

interface CsvChunk {
  columns: readonly string[];
  rows: EventRow[];
}

const CHUNK_BYTES = 1024 * 1024;
const DEFAULT_CACHE_SIZE = 4;
const NO_EVENTS: readonly TornadoEvent[] = Object.freeze([]);

const assertColumns = (columns: readonly string[], path: string): void => {
  const missing = REQUIRED_COLUMNS.filter(c => !columns.includes(c));
  if (missing.length > 0) {
    throw new DatasetReadError(`${path} is missing required column(s): ${missing.join(', ')}`);
  }
};

const cleanOptionsFor = (columns: readonly string[], targetCategory: string): CleanOptions => ({
  targetCategory,
  hasFScaleColumn: columns.includes(COLUMNS.fScale),
});

const countEventType = (counts: Map<string, number>, row: EventRow): void => {
  const type = row[COLUMNS.eventType] ?? '';
  counts.set(type, (counts.get(type) ?? 0) + 1);
};

const fileSize = async (path: string): Promise<number> => {
  try {
    return (await stat(path)).size;
  } catch (error) {
    throw new DatasetReadError(`Cannot read event file ${path}`, { cause: error });
  }
};

/**
 * Streams the file in fixed-size chunks and yields the rows of every
 * complete record seen so far. Only one chunk of text is held at a time.
 */
export async function* readCsvChunks(path: string, chunkSize = CHUNK_BYTES): AsyncGenerator<CsvChunk> {
  const splitter = new CsvRecordSplitter();
  const stream = createReadStream(path, { encoding: 'utf8', highWaterMark: chunkSize });
  let header: readonly string[] | null = null;
  let first = true;

  const parseRecords = (text: string): string[][] => {
    const records = parseCsvRows(first ? stripBom(text) : text);
    first = false;
    return records;
  };

  try {
    for await (const chunk of stream) {
      const complete = splitter.push(typeof chunk === 'string' ? chunk : String(chunk));
      if (!complete) continue;

      const records = parseRecords(complete);
      if (header === null) {
        header = records.shift() ?? null;
        if (header === null) continue;
      }
      const columns = header;
      yield { columns, rows: records.map(values => toRow(columns, values)) };
    }

    // Last record without a trailing newline
    const tail = splitter.flush();
    if (tail) {
      const records = parseRecords(tail);
      if (header === null) header = records.shift() ?? null;
      const columns = header;
      if (columns !== null) {
        yield { columns, rows: records.map(values => toRow(columns, values)) };
      }
    }
  } catch (error) {
    if (error instanceof DatasetReadError) throw error;
    throw new DatasetReadError(`Cannot read event file ${path}`, { cause: error });
  } finally {
    stream.destroy();
  }

  if (header === null) {
    throw new DatasetReadError(`${path} is empty`);
  }
}

/**
 * Reads the whole file, keeps rows of `targetCategory` with usable
 * coordinates, derives the year and backfills the severity code.
 */
export const loadAndClean = async (path: string, targetCategory: string): Promise<LoadedEvents> => {
  const sizeBytes = await fileSize(path);

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new DatasetReadError(`Cannot read event file ${path}`, { cause: error });
  }

  const rows = parseCsv(text);
  assertColumns(rows.columns, path);

  const options = cleanOptionsFor(rows.columns, targetCategory);
  const report = createCleaningReport();
  const eventTypes = new Map<string, number>();
  const events: TornadoEvent[] = [];

  for (const row of rows) {
    countEventType(eventTypes, row);
    const event = cleanRecord(row, options, report);
    if (event) events.push(event);
  }

  return {
    events: Object.freeze(events),
    report: Object.freeze(report),
    summary: { columns: Object.freeze([...rows.columns]), sizeBytes, eventTypes },
  };
};

export class InMemoryEventTable implements EventTable {
  readonly engine = 'in-memory';
  private readonly byYear = new Map<number, TornadoEvent[]>();

  constructor(
    events: readonly TornadoEvent[],
    readonly report: Readonly<CleaningReport>,
    readonly summary: DatasetSummary
  ) {
    for (const event of events) {
      if (event.year === null) continue;
      const bucket = this.byYear.get(event.year);
      if (bucket) bucket.push(event);
      else this.byYear.set(event.year, [event]);
    }
    this.byYear.forEach(bucket => Object.freeze(bucket));
  }

  static async open(path: string, targetCategory: string): Promise<InMemoryEventTable> {
    const { events, report, summary } = await loadAndClean(path, targetCategory);
    return new InMemoryEventTable(events, report, summary);
  }

  async eventsForYear(year: number): Promise<readonly TornadoEvent[]> {
    return this.byYear.get(year) ?? NO_EVENTS;
  }
}

/**
 * Lazy engine for files too large to hold: every query re-streams the file
 * and keeps only the requested year. Recent answers sit in a small LRU.
 */
export class ChunkedEventTable implements EventTable {
  readonly engine = 'chunked';
  private readonly cache = new Map<number, readonly TornadoEvent[]>();

  private constructor(
    private readonly path: string,
    private readonly options: CleanOptions,
    readonly report: Readonly<CleaningReport>,
    readonly summary: DatasetSummary,
    private readonly chunkSize: number,
    private readonly cacheSize: number
  ) {}

  static async open(
    path: string,
    targetCategory: string,
    chunkSize = CHUNK_BYTES,
    cacheSize = DEFAULT_CACHE_SIZE
  ): Promise<ChunkedEventTable> {
    const sizeBytes = await fileSize(path);
    const report = createCleaningReport();
    const eventTypes = new Map<string, number>();
    let columns: readonly string[] | null = null;
    let options: CleanOptions | null = null;

    for await (const chunk of readCsvChunks(path, chunkSize)) {
      if (options === null) {
        assertColumns(chunk.columns, path);
        columns = chunk.columns;
        options = cleanOptionsFor(chunk.columns, targetCategory);
      }
      for (const row of chunk.rows) {
        countEventType(eventTypes, row);
        cleanRecord(row, options, report);
      }
    }

    if (options === null || columns === null) {
      throw new DatasetReadError(`${path} has no header row`);
    }

    return new ChunkedEventTable(
      path,
      options,
      Object.freeze(report),
      { columns: Object.freeze([...columns]), sizeBytes, eventTypes },
      chunkSize,
      cacheSize
    );
  }

  async eventsForYear(year: number): Promise<readonly TornadoEvent[]> {
    const cached = this.cache.get(year);
    if (cached) {
      this.cache.delete(year);
      this.cache.set(year, cached);
      return cached;
    }

    const scratch = createCleaningReport();
    const events: TornadoEvent[] = [];
    for await (const chunk of readCsvChunks(this.path, this.chunkSize)) {
      for (const row of chunk.rows) {
        const event = cleanRecord(row, this.options, scratch);
        if (event && event.year === year) events.push(event);
      }
    }

    const result = events.length > 0 ? Object.freeze(events) : NO_EVENTS;
    this.cache.set(year, result);
    if (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) this.cache.delete(oldest);
    }
    return result;
  }
}

const logSummary = (table: EventTable, path: string, log: Logger): void => {
  const { summary, report } = table;
  log.info(`Columns in ${path}: ${summary.columns.join(', ')}`);
  log.info(`File size: ${formatBytes(summary.sizeBytes)} (${table.engine} engine)`);
  log.info(`Event types: ${[...summary.eventTypes.keys()].sort().join(', ')}`);
  log.info(
    `Kept ${report.kept} of ${report.rowsRead} rows; ` +
      `${report.missingCoordinates} dropped for missing coordinates, ` +
      `${report.unparseableTimestamps} with unparseable timestamps, ` +
      `${report.defaultedSeverity} given the default severity`
  );
};

/** Opens the file with the engine its size calls for. */
export const openEventTable = async (
  path: string,
  targetCategory: string,
  options: OpenTableOptions
): Promise<EventTable> => {
  const log = options.logger ?? createLogger('EventTable');
  const sizeBytes = await fileSize(path);

  const table: EventTable =
    sizeBytes <= options.inMemoryLimitBytes
      ? await InMemoryEventTable.open(path, targetCategory)
      : await ChunkedEventTable.open(path, targetCategory, options.chunkSize, options.cacheSize);

  logSummary(table, path, log);
  return table;
};
