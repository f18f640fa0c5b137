import { CleaningReport, FujitaScale, TornadoEvent } from '../types';
import { COLUMNS, DEFAULT_F_SCALE, isFujitaScale } from '../constants';

export type EventRow = Readonly<Record<string, string | undefined>>;

export interface CleanOptions {
  targetCategory: string;
  hasFScaleColumn: boolean;
}

const MONTHS: Record<string, number> = {
  JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6,
  JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
};

export const parseCoordinate = (raw: string | undefined): number | null => {
  if (raw === undefined) return null;
  const clean = raw.trim();
  if (!clean) return null;

  const value = Number(clean);
  return Number.isFinite(value) ? value : null;
};

// Two-digit years: 50-99 -> 19xx, 00-49 -> 20xx
const expandYear = (yearStr: string): number => {
  const y = parseInt(yearStr, 10);
  if (yearStr.length === 4) return y;
  return y >= 50 ? 1900 + y : 2000 + y;
};

const parseTime = (rest: string): [number, number, number] | null => {
  const clean = rest.trim();
  if (!clean) return [0, 0, 0];

  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?\s*(AM|PM)?\s*(Z|[+-]\d{2}:?\d{2})?$/i.exec(clean);
  if (!match) return null;

  let h = parseInt(match[1], 10);
  const min = parseInt(match[2], 10);
  const sec = match[3] ? parseInt(match[3], 10) : 0;

  // 12-hour clock: 12 AM is midnight, 12 PM is noon
  const meridiem = match[4]?.toUpperCase();
  if (meridiem) {
    if (h < 1 || h > 12) return null;
    if (meridiem === 'AM' && h === 12) h = 0;
    if (meridiem === 'PM' && h < 12) h += 12;
  }

  if (h > 23 || min > 59 || sec > 59) return null;
  return [h, min, sec];
};

const buildDate = (y: number, m: number, d: number, rest: string): Date | null => {
  if (m < 1 || m > 12 || d < 1 || d > 31) return null;

  const time = parseTime(rest);
  if (!time) return null;

  const date = new Date(Date.UTC(y, m - 1, d, time[0], time[1], time[2]));
  // Rejects roll-overs such as 31-FEB
  if (date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) return null;
  return date;
};

/**
 * Parses the timestamp shapes found in storm event exports:
 * ISO (`1999-05-03T18:00:00`), US (`05/03/1999 18:00`, `5/3/99 6:00 PM`)
 * and NOAA (`03-MAY-99 18:00:00`). Anything else yields null.
 */
export const parseEventDate = (raw: string | undefined): Date | null => {
  if (!raw) return null;
  const clean = raw.trim();
  if (!clean) return null;

  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](.*))?$/.exec(clean);
  if (iso) {
    return buildDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10), iso[4] ?? '');
  }

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:\s+(.*))?$/.exec(clean);
  if (us) {
    return buildDate(expandYear(us[3]), parseInt(us[1], 10), parseInt(us[2], 10), us[4] ?? '');
  }

  const noaa = /^(\d{1,2})-([A-Za-z]{3})-(\d{2}|\d{4})(?:\s+(.*))?$/.exec(clean);
  if (noaa) {
    const month = MONTHS[noaa[2].toUpperCase()];
    if (month === undefined) return null;
    return buildDate(expandYear(noaa[3]), month, parseInt(noaa[1], 10), noaa[4] ?? '');
  }

  return null;
};

export const parseEventYear = (raw: string | undefined): number | null => {
  const date = parseEventDate(raw);
  return date ? date.getUTCFullYear() : null;
};

/**
 * Maps a raw TOR_F_SCALE cell onto the six Fujita codes. Enhanced-scale
 * ratings (EF0-EF5) fold onto their F counterparts; blanks and unknown
 * ratings such as EFU return null so the caller can apply the default.
 */
export const normalizeFScale = (raw: string | undefined): FujitaScale | null => {
  if (raw === undefined) return null;
  let code = raw.trim().toUpperCase();
  if (!code) return null;
  if (code.startsWith('EF')) code = code.substring(1);
  return isFujitaScale(code) ? code : null;
};

export const createCleaningReport = (): CleaningReport => ({
  rowsRead: 0,
  otherCategory: 0,
  missingCoordinates: 0,
  unparseableTimestamps: 0,
  defaultedSeverity: 0,
  kept: 0,
});

// Cleans one raw row. Returns null for rows that are filtered out; tallies
// every decision into `report`.
export const cleanRecord = (
  row: EventRow,
  options: CleanOptions,
  report: CleaningReport
): TornadoEvent | null => {
  report.rowsRead++;

  if (row[COLUMNS.eventType] !== options.targetCategory) {
    report.otherCategory++;
    return null;
  }

  const lat = parseCoordinate(row[COLUMNS.lat]);
  const lon = parseCoordinate(row[COLUMNS.lon]);
  if (lat === null || lon === null) {
    report.missingCoordinates++;
    return null;
  }

  const beginDateTime = row[COLUMNS.beginDateTime] ?? '';
  const year = parseEventYear(beginDateTime);
  if (year === null) report.unparseableTimestamps++;

  let fScale = options.hasFScaleColumn ? normalizeFScale(row[COLUMNS.fScale]) : null;
  if (fScale === null) {
    fScale = DEFAULT_F_SCALE;
    report.defaultedSeverity++;
  }

  report.kept++;
  return Object.freeze({ beginDateTime, lat, lon, year, fScale });
};
