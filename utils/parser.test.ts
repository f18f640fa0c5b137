import { describe, it, expect } from 'vitest';
import {
  cleanRecord,
  createCleaningReport,
  normalizeFScale,
  parseCoordinate,
  parseEventDate,
  parseEventYear,
} from './parser';

const OPTIONS = { targetCategory: 'Tornado', hasFScaleColumn: true };

const row = (overrides: Record<string, string | undefined> = {}) => ({
  EVENT_TYPE: 'Tornado',
  BEGIN_DATE_TIME: '03-MAY-99 18:00:00',
  BEGIN_LAT: '35.1',
  BEGIN_LON: '-97.5',
  TOR_F_SCALE: 'F3',
  ...overrides,
});

describe('parseCoordinate', () => {
  it('parses trimmed decimals', () => {
    expect(parseCoordinate(' 35.5 ')).toBe(35.5);
    expect(parseCoordinate('-97.25')).toBe(-97.25);
  });

  it('returns null for blank or non-numeric cells', () => {
    expect(parseCoordinate('')).toBeNull();
    expect(parseCoordinate('   ')).toBeNull();
    expect(parseCoordinate(undefined)).toBeNull();
    expect(parseCoordinate('12abc')).toBeNull();
    expect(parseCoordinate('NaN')).toBeNull();
  });
});

describe('parseEventDate', () => {
  it('reads ISO timestamps', () => {
    expect(parseEventDate('1999-05-03T18:30:00')?.toISOString()).toBe('1999-05-03T18:30:00.000Z');
    expect(parseEventYear('2011-04-27 15:00:00')).toBe(2011);
  });

  it('reads US month/day/year timestamps', () => {
    expect(parseEventDate('05/03/1999 18:00')?.toISOString()).toBe('1999-05-03T18:00:00.000Z');
  });

  it('reads 12-hour clock times', () => {
    expect(parseEventDate('5/3/1999 6:00:00 PM')?.toISOString()).toBe('1999-05-03T18:00:00.000Z');
    expect(parseEventDate('5/3/1999 12:30 am')?.toISOString()).toBe('1999-05-03T00:30:00.000Z');
    expect(parseEventDate('5/3/1999 12:15 PM')?.toISOString()).toBe('1999-05-03T12:15:00.000Z');
    expect(parseEventYear('5/3/1999 13:00 PM')).toBeNull();
  });

  it('expands two-digit US years', () => {
    expect(parseEventDate('05/03/99 18:00')?.toISOString()).toBe('1999-05-03T18:00:00.000Z');
    expect(parseEventYear('4/27/11 3:45 PM')).toBe(2011);
  });

  it('reads ISO timestamps with fractions and a zone', () => {
    expect(parseEventYear('1999-05-03T18:00:00.000Z')).toBe(1999);
  });

  it('reads NOAA day-month-year timestamps with two-digit years', () => {
    expect(parseEventDate('03-MAY-99 18:00:00')?.toISOString()).toBe('1999-05-03T18:00:00.000Z');
    expect(parseEventYear('15-jun-05 12:00:00')).toBe(2005);
    expect(parseEventYear('01-JAN-1980 00:05:00')).toBe(1980);
  });

  it('returns null for anything it cannot place', () => {
    expect(parseEventYear('')).toBeNull();
    expect(parseEventYear('garbage')).toBeNull();
    expect(parseEventYear('31-FEB-99 10:00:00')).toBeNull();
    expect(parseEventYear('1999-13-01')).toBeNull();
    expect(parseEventYear('03-XYZ-99')).toBeNull();
    expect(parseEventYear('1999-05-03 25:00:00')).toBeNull();
  });
});

describe('normalizeFScale', () => {
  it('accepts the six Fujita codes in any case', () => {
    expect(normalizeFScale('F0')).toBe('F0');
    expect(normalizeFScale(' f4 ')).toBe('F4');
  });

  it('folds enhanced-scale ratings onto F codes', () => {
    expect(normalizeFScale('EF3')).toBe('F3');
    expect(normalizeFScale('ef5')).toBe('F5');
  });

  it('returns null for blanks and unknown ratings', () => {
    expect(normalizeFScale('')).toBeNull();
    expect(normalizeFScale(undefined)).toBeNull();
    expect(normalizeFScale('EFU')).toBeNull();
    expect(normalizeFScale('F6')).toBeNull();
  });
});

describe('cleanRecord', () => {
  it('keeps a complete tornado row', () => {
    const report = createCleaningReport();
    expect(cleanRecord(row(), OPTIONS, report)).toEqual({
      beginDateTime: '03-MAY-99 18:00:00',
      lat: 35.1,
      lon: -97.5,
      year: 1999,
      fScale: 'F3',
    });
    expect(report.kept).toBe(1);
  });

  it('matches the category exactly', () => {
    const report = createCleaningReport();
    expect(cleanRecord(row({ EVENT_TYPE: 'Hail' }), OPTIONS, report)).toBeNull();
    expect(cleanRecord(row({ EVENT_TYPE: 'tornado' }), OPTIONS, report)).toBeNull();
    expect(report.otherCategory).toBe(2);
  });

  it('drops rows with a missing or non-numeric coordinate', () => {
    const report = createCleaningReport();
    expect(cleanRecord(row({ BEGIN_LAT: '' }), OPTIONS, report)).toBeNull();
    expect(cleanRecord(row({ BEGIN_LON: 'abc' }), OPTIONS, report)).toBeNull();
    expect(cleanRecord(row({ BEGIN_LON: undefined }), OPTIONS, report)).toBeNull();
    expect(report.missingCoordinates).toBe(3);
    expect(report.kept).toBe(0);
  });

  it('keeps rows with unparseable timestamps but without a year', () => {
    const report = createCleaningReport();
    const event = cleanRecord(row({ BEGIN_DATE_TIME: 'sometime' }), OPTIONS, report);
    expect(event?.year).toBeNull();
    expect(event?.beginDateTime).toBe('sometime');
    expect(report.unparseableTimestamps).toBe(1);
  });

  it('defaults a blank severity for that row only', () => {
    const report = createCleaningReport();
    expect(cleanRecord(row({ TOR_F_SCALE: '' }), OPTIONS, report)?.fScale).toBe('F0');
    expect(cleanRecord(row({ TOR_F_SCALE: 'F2' }), OPTIONS, report)?.fScale).toBe('F2');
    expect(report.defaultedSeverity).toBe(1);
  });

  it('defaults every row when the severity column is absent', () => {
    const report = createCleaningReport();
    const options = { targetCategory: 'Tornado', hasFScaleColumn: false };
    expect(cleanRecord(row({ TOR_F_SCALE: undefined }), options, report)?.fScale).toBe('F0');
    expect(report.defaultedSeverity).toBe(1);
  });

  it('returns frozen events', () => {
    const event = cleanRecord(row(), OPTIONS, createCleaningReport());
    expect(Object.isFrozen(event)).toBe(true);
  });
});
