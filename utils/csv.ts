import { csvParse, csvParseRows, type DSVRowArray } from 'd3';
import type { EventRow } from './parser';

const QUOTE = 34; // "
const NEWLINE = 10; // \n
const COMMA = 44; // ,

export const stripBom = (text: string): string => (text.charCodeAt(0) === 0xfeff ? text.substring(1) : text);

export const parseCsv = (text: string): DSVRowArray<string> => csvParse(stripBom(text));

export const parseCsvRows = (text: string): string[][] => csvParseRows(text);

export const toRow = (header: readonly string[], values: readonly string[]): EventRow => {
  const row: Record<string, string | undefined> = {};
  header.forEach((column, i) => {
    row[column] = values[i];
  });
  return row;
};

/**
 * Cuts streamed CSV text at record boundaries. A newline inside a quoted
 * field does not end a record, so narratives spanning several lines stay in
 * one piece even when they straddle two read chunks. As in d3-dsv, only a
 * quote that opens a field starts quoting; one inside an unquoted field
 * (`5" hail`) is plain text.
 */
export class CsvRecordSplitter {
  private pending = '';
  private scanned = 0;
  private inQuotes = false;
  private atFieldStart = true;
  // Set right after a closing quote, where `""` reopens as an escaped quote
  private afterQuote = false;

  /** Returns every complete record buffered so far, newline included. */
  push(text: string): string {
    this.pending += text;

    let cut = -1;
    for (let i = this.scanned; i < this.pending.length; i++) {
      const ch = this.pending.charCodeAt(i);

      if (this.inQuotes) {
        if (ch === QUOTE) {
          this.inQuotes = false;
          this.afterQuote = true;
        }
        continue;
      }

      if (ch === QUOTE && (this.atFieldStart || this.afterQuote)) {
        this.inQuotes = true;
        this.atFieldStart = false;
        this.afterQuote = false;
        continue;
      }

      this.afterQuote = false;
      this.atFieldStart = ch === COMMA || ch === NEWLINE;
      if (ch === NEWLINE) cut = i;
    }

    if (cut < 0) {
      this.scanned = this.pending.length;
      return '';
    }

    const complete = this.pending.substring(0, cut + 1);
    this.pending = this.pending.substring(cut + 1);
    this.scanned = this.pending.length;
    return complete;
  }

  /** Returns whatever trails the last newline (a final record without one). */
  flush(): string {
    const rest = this.pending;
    this.pending = '';
    this.scanned = 0;
    this.inQuotes = false;
    this.atFieldStart = true;
    this.afterQuote = false;
    return rest;
  }
}
