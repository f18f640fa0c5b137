export type FujitaScale = 'F0' | 'F1' | 'F2' | 'F3' | 'F4' | 'F5';

export interface TornadoEvent {
  beginDateTime: string; // raw BEGIN_DATE_TIME, shown on hover
  lat: number;
  lon: number;
  year: number | null; // null when the timestamp didn't parse
  fScale: FujitaScale;
}

export interface SeverityStyle {
  size: number;
  color: string;
}

// Flattened county line network. `null` separates disjoint pieces.
export interface BoundaryCoords {
  lats: ReadonlyArray<number | null>;
  lons: ReadonlyArray<number | null>;
  pieces: number;
  crs: string;
}

export interface LineLayer {
  type: 'scattergeo';
  mode: 'lines';
  name: string;
  lat: ReadonlyArray<number | null>;
  lon: ReadonlyArray<number | null>;
  line: { width: number; color: string };
}

export interface MarkerLayer {
  type: 'scattergeo';
  mode: 'markers';
  name: string;
  fScale: FujitaScale;
  lat: number[];
  lon: number[];
  marker: SeverityStyle & { opacity: number };
  text: string[];
  hoverinfo: 'text+name';
}

export type FigureLayer = LineLayer | MarkerLayer;

export interface GeoLayout {
  scope: 'usa';
  projection: { type: 'albers usa' };
  showland: boolean;
  landcolor: string;
  subunitcolor: string;
  countrycolor: string;
  lakecolor: string;
}

export interface FigureLayout {
  title: string;
  geo: GeoLayout;
  margin: { r: number; t: number; l: number; b: number };
}

export interface Figure {
  data: FigureLayer[];
  layout: FigureLayout;
}

export interface CleaningReport {
  rowsRead: number;
  otherCategory: number;
  missingCoordinates: number;
  unparseableTimestamps: number;
  defaultedSeverity: number;
  kept: number;
}

export interface YearsResponse {
  years: number[];
  defaultYear: number;
}

export enum LoadingState {
  IDLE,
  LOADING,
  SUCCESS,
  ERROR
}
