import { FujitaScale, GeoLayout, SeverityStyle } from './types';

// Declared order is render order: weakest first.
export const F_SCALE_STYLES: Record<FujitaScale, SeverityStyle> = {
  F0: { size: 6, color: 'lightgreen' },
  F1: { size: 8, color: 'green' },
  F2: { size: 10, color: 'yellowgreen' },
  F3: { size: 12, color: 'orange' },
  F4: { size: 14, color: 'orangered' },
  F5: { size: 16, color: 'red' },
};

export const F_SCALE_ORDER: readonly FujitaScale[] = ['F0', 'F1', 'F2', 'F3', 'F4', 'F5'];

export const DEFAULT_F_SCALE: FujitaScale = 'F0';

export const isFujitaScale = (value: string): value is FujitaScale =>
  F_SCALE_ORDER.some(code => code === value);

export const MIN_YEAR = 1980;
export const MAX_YEAR = 2024;
export const DEFAULT_YEAR = 1980;

export const YEAR_OPTIONS: number[] = Array.from(
  { length: MAX_YEAR - MIN_YEAR + 1 },
  (_, i) => MIN_YEAR + i
);

export const MARKER_OPACITY = 0.8;

export const BOUNDARY_LINE = { width: 2, color: 'black' };

export const GEO_LAYOUT: GeoLayout = {
  scope: 'usa',
  projection: { type: 'albers usa' },
  showland: true,
  landcolor: 'rgb(217, 217, 217)',
  subunitcolor: 'rgb(255, 255, 255)',
  countrycolor: 'rgb(255, 255, 255)',
  lakecolor: 'rgb(255, 255, 255)',
};

export const FIGURE_MARGIN = { r: 0, t: 40, l: 0, b: 0 };

// Column names in the NOAA storm events export
export const COLUMNS = {
  eventType: 'EVENT_TYPE',
  beginDateTime: 'BEGIN_DATE_TIME',
  lat: 'BEGIN_LAT',
  lon: 'BEGIN_LON',
  fScale: 'TOR_F_SCALE',
} as const;

export const REQUIRED_COLUMNS: readonly string[] = [
  COLUMNS.eventType,
  COLUMNS.beginDateTime,
  COLUMNS.lat,
  COLUMNS.lon,
];
