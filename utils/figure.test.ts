import { describe, it, expect } from 'vitest';
import { buildFigure, BOUNDARY_LAYER_NAME } from './figure';
import type { LineLayer, MarkerLayer } from '../types';
import { makeEvent, TEST_BOUNDARY } from '../__tests__/helpers';

const markerLayers = (layers: ReturnType<typeof buildFigure>['data']) =>
  layers.filter((l): l is MarkerLayer => l.mode === 'markers');

const TABLE = [
  makeEvent({ beginDateTime: 'A', lat: 35.1, lon: -97.5, year: 1999, fScale: 'F1' }),
  makeEvent({ beginDateTime: 'B', lat: 33.3, lon: -96, year: 1999, fScale: 'F3' }),
  makeEvent({ beginDateTime: 'C', lat: 36.2, lon: -98.25, year: 1999, fScale: 'F1' }),
  makeEvent({ beginDateTime: 'D', lat: 40, lon: -100, year: 2000, fScale: 'F1' }),
  makeEvent({ beginDateTime: 'E', lat: 41, lon: -101, year: 2000, fScale: 'F0' }),
];

describe('buildFigure', () => {
  it('draws only the boundary layer for a year without events', () => {
    const figure = buildFigure(TABLE, TEST_BOUNDARY, 1985);

    expect(figure.data).toHaveLength(1);
    const [boundary] = figure.data;
    expect(boundary.mode).toBe('lines');
    expect(boundary.name).toBe(BOUNDARY_LAYER_NAME);
    expect(boundary.lat).toEqual([30, 31, null, 40]);
    expect(boundary.lon).toEqual([-90, -91, null, -100]);
    expect(figure.layout.title).toBe('Tornado Events - 1985');
  });

  it('styles the boundary as a thin black line', () => {
    const lines = buildFigure([], TEST_BOUNDARY, 1999).data.filter((l): l is LineLayer => l.mode === 'lines');
    expect(lines).toHaveLength(1);
    expect(lines[0].line).toEqual({ width: 2, color: 'black' });
  });

  it('adds one marker layer per present Fujita code, weakest first', () => {
    const figure = buildFigure(TABLE, TEST_BOUNDARY, 1999);

    expect(figure.data.map(l => l.name)).toEqual([BOUNDARY_LAYER_NAME, 'Tornado F1', 'Tornado F3']);

    const [f1, f3] = markerLayers(figure.data);
    expect(f1.lat).toEqual([35.1, 36.2]);
    expect(f1.lon).toEqual([-97.5, -98.25]);
    expect(f1.text).toEqual(['A', 'C']);
    expect(f3.lat).toEqual([33.3]);
    expect(f3.text).toEqual(['B']);
  });

  it('applies the fixed severity styles', () => {
    const [f1, f3] = markerLayers(buildFigure(TABLE, TEST_BOUNDARY, 1999).data);

    expect(f1.marker).toEqual({ size: 8, color: 'green', opacity: 0.8 });
    expect(f3.marker).toEqual({ size: 12, color: 'orange', opacity: 0.8 });
    expect(f3.hoverinfo).toBe('text+name');
    expect(f3.fScale).toBe('F3');
  });

  it('returns exactly the rows of the requested year', () => {
    const figure = buildFigure(TABLE, TEST_BOUNDARY, 2000);
    const markers = markerLayers(figure.data);

    expect(markers.map(m => m.name)).toEqual(['Tornado F0', 'Tornado F1']);
    expect(markers.flatMap(m => m.text)).toEqual(['E', 'D']);
    expect(markers.flatMap(m => m.lat)).toEqual([41, 40]);
    expect(markers.flatMap(m => m.lon)).toEqual([-101, -100]);
  });

  it('never places events without a year', () => {
    const table = [makeEvent({ beginDateTime: 'X', year: null })];
    expect(buildFigure(table, TEST_BOUNDARY, 1999).data).toHaveLength(1);
  });

  it('emits an F0 layer alongside an F2 layer in scale order', () => {
    const table = [
      makeEvent({ year: 2011, fScale: 'F2' }),
      makeEvent({ year: 2011, fScale: 'F0' }),
    ];
    const figure = buildFigure(table, TEST_BOUNDARY, 2011);
    expect(figure.data.map(l => l.name)).toEqual([BOUNDARY_LAYER_NAME, 'Tornado F0', 'Tornado F2']);
  });

  it('uses the USA Albers layout with a top margin for the title', () => {
    const { layout } = buildFigure(TABLE, TEST_BOUNDARY, 1999);

    expect(layout.geo.scope).toBe('usa');
    expect(layout.geo.projection).toEqual({ type: 'albers usa' });
    expect(layout.geo.showland).toBe(true);
    expect(layout.geo.landcolor).toBe('rgb(217, 217, 217)');
    expect(layout.margin).toEqual({ r: 0, t: 40, l: 0, b: 0 });
  });

  it('is deterministic', () => {
    expect(buildFigure(TABLE, TEST_BOUNDARY, 1999)).toEqual(buildFigure(TABLE, TEST_BOUNDARY, 1999));
  });
});
