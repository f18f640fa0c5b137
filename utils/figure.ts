import { BoundaryCoords, Figure, FigureLayer, MarkerLayer, TornadoEvent } from '../types';
import {
  BOUNDARY_LINE,
  F_SCALE_ORDER,
  F_SCALE_STYLES,
  FIGURE_MARGIN,
  GEO_LAYOUT,
  MARKER_OPACITY,
} from '../constants';

export const BOUNDARY_LAYER_NAME = 'County Boundaries';

export const figureTitle = (year: number): string => `Tornado Events - ${year}`;

/**
 * Builds the map for one year: the county line layer first, then one
 * marker layer per Fujita code that has events, weakest to strongest.
 * Pure; the same inputs always give an equal figure.
 */
export const buildFigure = (
  table: Iterable<TornadoEvent>,
  boundaryCoords: BoundaryCoords,
  year: number
): Figure => {
  const yearEvents: TornadoEvent[] = [];
  for (const event of table) {
    if (event.year === year) yearEvents.push(event);
  }

  const data: FigureLayer[] = [
    {
      type: 'scattergeo',
      mode: 'lines',
      name: BOUNDARY_LAYER_NAME,
      lat: boundaryCoords.lats,
      lon: boundaryCoords.lons,
      line: { ...BOUNDARY_LINE },
    },
  ];

  for (const fScale of F_SCALE_ORDER) {
    const subset = yearEvents.filter(e => e.fScale === fScale);
    if (subset.length === 0) continue;

    const style = F_SCALE_STYLES[fScale];
    const layer: MarkerLayer = {
      type: 'scattergeo',
      mode: 'markers',
      name: `Tornado ${fScale}`,
      fScale,
      lat: subset.map(e => e.lat),
      lon: subset.map(e => e.lon),
      marker: { size: style.size, color: style.color, opacity: MARKER_OPACITY },
      text: subset.map(e => e.beginDateTime),
      hoverinfo: 'text+name',
    };
    data.push(layer);
  }

  return {
    data,
    layout: {
      title: figureTitle(year),
      geo: { ...GEO_LAYOUT },
      margin: { ...FIGURE_MARGIN },
    },
  };
};
