import { Figure, YearsResponse } from '../types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export const isFigure = (value: unknown): value is Figure =>
  isRecord(value) &&
  Array.isArray(value.data) &&
  isRecord(value.layout) &&
  typeof value.layout.title === 'string';

export const isYearsResponse = (value: unknown): value is YearsResponse =>
  isRecord(value) &&
  Array.isArray(value.years) &&
  value.years.every(year => Number.isInteger(year)) &&
  Number.isInteger(value.defaultYear);

export const fetchYears = async (signal?: AbortSignal): Promise<YearsResponse> => {
  const res = await fetch('/api/years', { signal });
  if (!res.ok) throw new Error(`Failed to load the year list (HTTP ${res.status})`);

  const body: unknown = await res.json();
  if (!isYearsResponse(body)) throw new Error('Malformed year list');
  return body;
};

export const fetchFigure = async (year: number, signal?: AbortSignal): Promise<Figure> => {
  const res = await fetch(`/api/figure?year=${year}`, { signal });
  if (!res.ok) throw new Error(`Failed to load tornado map for ${year} (HTTP ${res.status})`);

  const body: unknown = await res.json();
  if (!isFigure(body)) throw new Error(`Malformed figure for ${year}`);
  return body;
};
