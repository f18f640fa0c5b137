import React, { useMemo, useState } from 'react';
import { geoAlbersUsa } from 'd3';
import { Figure, LineLayer, MarkerLayer } from '../types';
import { F_SCALE_ORDER, F_SCALE_STYLES } from '../constants';

interface TornadoMapProps {
  figure: Figure | null;
  loading?: boolean;
}

type Project = (point: [number, number]) => [number, number] | null;

interface ProjectedMarker {
  key: string;
  x: number;
  y: number;
  r: number;
  color: string;
  opacity: number;
  label: string;
}

const MAP_WIDTH = 960;
const MAP_HEIGHT = 500;

const round = (n: number) => Math.round(n * 100) / 100;

/**
 * SVG path for a flattened line layer. A `null` entry, or a point the
 * projection cannot place, lifts the pen so pieces never join.
 */
export const boundaryPath = (
  lats: ReadonlyArray<number | null>,
  lons: ReadonlyArray<number | null>,
  project: Project
): string => {
  const parts: string[] = [];
  let penDown = false;

  for (let i = 0; i < lats.length; i++) {
    const lat = lats[i];
    const lon = lons[i];
    if (lat === null || lon === null || lat === undefined || lon === undefined) {
      penDown = false;
      continue;
    }
    const p = project([lon, lat]);
    if (!p) {
      penDown = false;
      continue;
    }
    parts.push(`${penDown ? 'L' : 'M'}${round(p[0])},${round(p[1])}`);
    penDown = true;
  }
  return parts.join('');
};

export const projectMarkers = (layer: MarkerLayer, project: Project): ProjectedMarker[] => {
  const markers: ProjectedMarker[] = [];
  layer.lat.forEach((lat, i) => {
    const p = project([layer.lon[i], lat]);
    if (!p) return;
    markers.push({
      key: `${layer.name}-${i}`,
      x: round(p[0]),
      y: round(p[1]),
      r: layer.marker.size / 2,
      color: layer.marker.color,
      opacity: layer.marker.opacity,
      label: `${layer.text[i] ?? ''}\n${layer.name}`,
    });
  });
  return markers;
};

const TornadoMap: React.FC<TornadoMapProps> = ({ figure, loading = false }) => {
  const [hovered, setHovered] = useState<ProjectedMarker | null>(null);

  const project = useMemo<Project>(() => {
    const projection = geoAlbersUsa().scale(1070).translate([MAP_WIDTH / 2, MAP_HEIGHT / 2]);
    return (point) => projection(point);
  }, []);

  const lineLayers = useMemo(
    () => (figure ? figure.data.filter((l): l is LineLayer => l.mode === 'lines') : []),
    [figure]
  );

  const markers = useMemo(
    () =>
      figure
        ? figure.data
            .filter((l): l is MarkerLayer => l.mode === 'markers')
            .flatMap(layer => projectMarkers(layer, project))
        : [],
    [figure, project]
  );

  const geo = figure?.layout.geo;
  const margin = figure?.layout.margin;

  return (
    <div
      className="w-full bg-white rounded-xl border border-slate-300 shadow-lg relative overflow-hidden select-none"
      style={margin ? { paddingTop: margin.t, paddingRight: margin.r, paddingBottom: margin.b, paddingLeft: margin.l } : undefined}
    >
      {figure && (
        <h2 className="absolute top-2 left-0 right-0 text-center text-slate-800 font-bold text-lg pointer-events-none">
          {figure.layout.title}
        </h2>
      )}

      <svg viewBox={`0 0 ${MAP_WIDTH} ${MAP_HEIGHT}`} className="w-full h-auto" preserveAspectRatio="xMidYMid meet">
        {geo?.showland && <rect x={0} y={0} width={MAP_WIDTH} height={MAP_HEIGHT} fill={geo.landcolor} />}

        {lineLayers.map(layer => (
          <path
            key={layer.name}
            d={boundaryPath(layer.lat, layer.lon, project)}
            fill="none"
            stroke={layer.line.color}
            strokeWidth={layer.line.width / 4}
            strokeLinejoin="round"
          />
        ))}

        <g>
          {markers.map(m => (
            <circle
              key={m.key}
              cx={m.x}
              cy={m.y}
              r={m.r}
              fill={m.color}
              fillOpacity={m.opacity}
              onMouseEnter={() => setHovered(m)}
              onMouseLeave={() => setHovered(null)}
            >
              <title>{m.label}</title>
            </circle>
          ))}
        </g>
      </svg>

      {hovered && (
        <div className="absolute top-10 left-1/2 -translate-x-1/2 bg-slate-800 text-slate-100 text-xs px-2.5 py-1.5 rounded shadow-2xl whitespace-pre pointer-events-none">
          {hovered.label}
        </div>
      )}

      {/* Legend */}
      <div className="absolute bottom-3 right-3 bg-white/90 border border-slate-300 rounded-lg p-2 flex flex-col gap-1 text-[11px] text-slate-700">
        {F_SCALE_ORDER.map(code => (
          <div key={code} className="flex items-center gap-2">
            <span
              className="inline-block rounded-full"
              style={{ width: F_SCALE_STYLES[code].size, height: F_SCALE_STYLES[code].size, background: F_SCALE_STYLES[code].color }}
            ></span>
            Tornado {code}
          </div>
        ))}
      </div>

      {loading && (
        <div className="absolute inset-0 flex items-center justify-center bg-white/40 text-slate-600">
          <span className="animate-pulse">Loading map...</span>
        </div>
      )}
    </div>
  );
};

export default TornadoMap;
