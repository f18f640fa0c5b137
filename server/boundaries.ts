import { readFile } from 'node:fs/promises';
import kinks from '@turf/kinks';
import simplify from '@turf/simplify';
import type { Feature, Geometry, Polygon, Position } from 'geojson';
import { BoundaryCoords } from '../types';
import { BoundaryFileError } from './errors';
import { createLogger, type Logger } from './logger';

export const BOUNDARY_CRS = 'EPSG:4326';
export const SIMPLIFY_TOLERANCE = 0.01;
// Halvings of the tolerance tried before a polygon is kept unsimplified
const SIMPLIFY_ATTEMPTS = 4;
// Distance under which a vertex counts as lying on another segment
const ON_SEGMENT_EPSILON = 1e-9;
const GRID_CELL_DEGREES = 0.5;

type Coord = [number, number]; // [lon, lat]

interface Segment {
  a: string;
  b: string;
}

interface RawSegment {
  a: Coord;
  b: Coord;
}

interface Split {
  t: number;
  p: Coord;
}

const toCoord = (point: Position): Coord | null => {
  if (!Array.isArray(point) || point.length < 2) return null;
  const lon = Number(point[0]);
  const lat = Number(point[1]);
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) return null;
  return [lon, lat];
};

const sameCoord = (p: Coord, q: Coord): boolean => p[0] === q[0] && p[1] === q[1];

// Closed ring with at least three distinct corners, or null
const normalizeRing = (ring: Position[]): Coord[] | null => {
  if (!Array.isArray(ring)) return null;
  const coords = ring.map(toCoord).filter((p): p is Coord => p !== null);
  if (coords.length === 0) return null;
  if (!sameCoord(coords[0], coords[coords.length - 1])) coords.push(coords[0]);

  const distinct = new Set(coords.map(([lon, lat]) => `${lon},${lat}`));
  return distinct.size >= 3 ? coords : null;
};

const normalizePolygon = (rings: Position[][]): Coord[][] | null => {
  if (!Array.isArray(rings)) return null;
  const normalized = rings.map(normalizeRing).filter((r): r is Coord[] => r !== null);
  return normalized.length > 0 ? normalized : null;
};

/** Polygon and MultiPolygon geometries, as a flat list of polygons. */
export const extractPolygons = (geometry: Geometry | null | undefined): Coord[][][] => {
  if (!geometry) return [];
  if (geometry.type === 'Polygon') {
    const polygon = normalizePolygon(geometry.coordinates);
    return polygon ? [polygon] : [];
  }
  if (geometry.type === 'MultiPolygon') {
    return geometry.coordinates
      .map(normalizePolygon)
      .filter((p): p is Coord[][] => p !== null);
  }
  return [];
};

const isFeatureList = (value: unknown): value is Feature[] =>
  Array.isArray(value) &&
  value.every(f => typeof f === 'object' && f !== null && 'geometry' in f);

const readFeatures = async (path: string): Promise<Feature[]> => {
  let raw: Buffer;
  try {
    raw = await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new BoundaryFileError(`County GeoJSON file not found: ${path}`, { cause: error });
    }
    throw new BoundaryFileError(`Cannot read county GeoJSON file ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    // Invalid UTF-8 (Latin-1 county names) decodes to U+FFFD instead of failing
    parsed = JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new BoundaryFileError(`${path} is not valid JSON`, { cause: error });
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('type' in parsed) ||
    parsed.type !== 'FeatureCollection' ||
    !('features' in parsed) ||
    !isFeatureList(parsed.features)
  ) {
    throw new BoundaryFileError(`${path} is not a GeoJSON FeatureCollection`);
  }
  return parsed.features;
};

const isSimple = (rings: Coord[][]): boolean => {
  const geometry: Polygon = { type: 'Polygon', coordinates: rings };
  return kinks(geometry).features.length === 0;
};

// Douglas-Peucker can pull an edge across a narrow notch. A result that
// crosses itself is retried at half the tolerance, and after the last
// attempt the polygon is kept as read.
const simplifyPolygon = (rings: Coord[][], log: Logger): Coord[][] => {
  const geometry: Polygon = { type: 'Polygon', coordinates: rings };
  for (let attempt = 0, tolerance = SIMPLIFY_TOLERANCE; attempt < SIMPLIFY_ATTEMPTS; attempt++, tolerance /= 2) {
    try {
      const simplified = normalizePolygon(simplify(geometry, { tolerance, highQuality: false }).coordinates);
      if (simplified && isSimple(simplified)) return simplified;
    } catch (error) {
      log.warn('Polygon could not be simplified, keeping it as is', error);
      return rings;
    }
  }
  log.warn('Simplified polygon kept crossing itself, keeping it unsimplified');
  return rings;
};

const coordKey = (p: Coord): string => `${p[0]},${p[1]}`;

const cross = (ox: number, oy: number, px: number, py: number): number => ox * py - oy * px;

// Position of `p` strictly inside `seg` as a 0..1 parameter, or null
const splitParam = (p: Coord, seg: RawSegment): number | null => {
  const [ax, ay] = seg.a;
  const dx = seg.b[0] - ax;
  const dy = seg.b[1] - ay;
  const len2 = dx * dx + dy * dy;
  if (len2 === 0 || sameCoord(p, seg.a) || sameCoord(p, seg.b)) return null;

  const t = ((p[0] - ax) * dx + (p[1] - ay) * dy) / len2;
  if (t <= 0 || t >= 1) return null;
  if (Math.abs(cross(dx, dy, p[0] - ax, p[1] - ay)) > ON_SEGMENT_EPSILON * Math.sqrt(len2)) return null;
  return t;
};

// Proper crossing of two segments away from their endpoints
const crossing = (s: RawSegment, o: RawSegment): { t: number; u: number; p: Coord } | null => {
  const rx = s.b[0] - s.a[0];
  const ry = s.b[1] - s.a[1];
  const qx = o.b[0] - o.a[0];
  const qy = o.b[1] - o.a[1];
  const denom = cross(rx, ry, qx, qy);
  if (denom === 0) return null;

  const cx = o.a[0] - s.a[0];
  const cy = o.a[1] - s.a[1];
  const t = cross(cx, cy, qx, qy) / denom;
  const u = cross(cx, cy, rx, ry) / denom;
  if (t <= 0 || t >= 1 || u <= 0 || u >= 1) return null;
  return { t, u, p: [s.a[0] + t * rx, s.a[1] + t * ry] };
};

const gridCells = (seg: RawSegment): string[] => {
  const cell = (v: number) => Math.floor(v / GRID_CELL_DEGREES);
  const cells: string[] = [];
  for (let x = cell(Math.min(seg.a[0], seg.b[0])); x <= cell(Math.max(seg.a[0], seg.b[0])); x++) {
    for (let y = cell(Math.min(seg.a[1], seg.b[1])); y <= cell(Math.max(seg.a[1], seg.b[1])); y++) {
      cells.push(`${x}:${y}`);
    }
  }
  return cells;
};

/**
 * Splits every segment wherever another segment's vertex lies on it or two
 * segments cross, so overlapping edges reduce to identical pieces. Output
 * keeps the input order, each segment followed by its own sub-segments.
 */
const nodeSegments = (segments: RawSegment[]): RawSegment[] => {
  const grid = new Map<string, number[]>();
  segments.forEach((seg, i) => {
    for (const key of gridCells(seg)) {
      const bucket = grid.get(key);
      if (bucket) bucket.push(i);
      else grid.set(key, [i]);
    }
  });

  const splits: Split[][] = segments.map(() => []);
  const addSplit = (i: number, t: number | null, p: Coord) => {
    if (t !== null) splits[i].push({ t, p });
  };

  segments.forEach((seg, i) => {
    const candidates = new Set<number>();
    for (const key of gridCells(seg)) {
      for (const j of grid.get(key) ?? []) if (j > i) candidates.add(j);
    }

    for (const j of candidates) {
      const other = segments[j];
      const before = splits[i].length + splits[j].length;
      addSplit(i, splitParam(other.a, seg), other.a);
      addSplit(i, splitParam(other.b, seg), other.b);
      addSplit(j, splitParam(seg.a, other), seg.a);
      addSplit(j, splitParam(seg.b, other), seg.b);
      if (splits[i].length + splits[j].length > before) continue;

      const hit = crossing(seg, other);
      if (hit) {
        // One shared point object, so both halves meet at the same node
        addSplit(i, hit.t, hit.p);
        addSplit(j, hit.u, hit.p);
      }
    }
  });

  return segments.flatMap((seg, i) => {
    if (splits[i].length === 0) return [seg];
    const points = [...splits[i]].sort((x, y) => x.t - y.t).map(s => s.p);
    const pieces: RawSegment[] = [];
    let from = seg.a;
    for (const p of [...points, seg.b]) {
      if (!sameCoord(from, p)) pieces.push({ a: from, b: p });
      from = p;
    }
    return pieces;
  });
};

/**
 * Merges polygon outlines into a line network. Segments are first split at
 * shared vertices and crossings, so edges shared or overlapped by
 * neighbouring polygons collapse into one. The remaining edges are stitched
 * into maximal pieces that break wherever more than two edges meet.
 */
export const mergeBoundaryLines = (polygons: Coord[][][]): Coord[][] => {
  const nodes = new Map<string, Coord>();
  const adjacency = new Map<string, string[]>();
  const segments = new Map<string, Segment>();

  const addNode = (p: Coord): string => {
    const key = coordKey(p);
    if (!nodes.has(key)) {
      nodes.set(key, p);
      adjacency.set(key, []);
    }
    return key;
  };

  const edgeKey = (a: string, b: string): string => (a < b ? `${a}|${b}` : `${b}|${a}`);

  // Exact duplicates go before noding, which is the expensive step
  const raw = new Map<string, RawSegment>();
  for (const polygon of polygons) {
    for (const ring of polygon) {
      for (let i = 1; i < ring.length; i++) {
        const a = ring[i - 1];
        const b = ring[i];
        if (sameCoord(a, b)) continue;
        const key = edgeKey(coordKey(a), coordKey(b));
        if (!raw.has(key)) raw.set(key, { a, b });
      }
    }
  }

  for (const segment of nodeSegments([...raw.values()])) {
    const a = addNode(segment.a);
    const b = addNode(segment.b);
    if (a === b) continue;

    const key = edgeKey(a, b);
    if (segments.has(key)) continue;
    segments.set(key, { a, b });
    adjacency.get(a)?.push(b);
    adjacency.get(b)?.push(a);
  }

  const visited = new Set<string>();
  const neighbours = (key: string): string[] => adjacency.get(key) ?? [];
  const coord = (key: string): Coord => nodes.get(key) ?? [NaN, NaN];
  const pieces: Coord[][] = [];

  // Follows degree-2 nodes from `start` through `next` until the line ends,
  // branches, or comes back round.
  const walk = (start: string, next: string): Coord[] => {
    const path = [coord(start), coord(next)];
    visited.add(edgeKey(start, next));
    let prev = start;
    let cur = next;

    while (cur !== start && neighbours(cur).length === 2) {
      const [n0, n1] = neighbours(cur);
      const following = n0 === prev ? n1 : n0;
      const key = edgeKey(cur, following);
      if (visited.has(key)) break;

      visited.add(key);
      path.push(coord(following));
      prev = cur;
      cur = following;
    }
    return path;
  };

  for (const key of nodes.keys()) {
    if (neighbours(key).length === 2) continue;
    for (const next of neighbours(key)) {
      if (!visited.has(edgeKey(key, next))) pieces.push(walk(key, next));
    }
  }

  // What is left are closed loops made only of degree-2 nodes
  for (const [key, { a, b }] of segments) {
    if (!visited.has(key)) pieces.push(walk(a, b));
  }

  return pieces;
};

/** Concatenates pieces into parallel sequences, `null` between pieces. */
export const flattenPieces = (pieces: Coord[][]): Pick<BoundaryCoords, 'lats' | 'lons'> => {
  const lats: (number | null)[] = [];
  const lons: (number | null)[] = [];

  pieces.forEach((piece, i) => {
    if (i > 0) {
      lats.push(null);
      lons.push(null);
    }
    for (const [lon, lat] of piece) {
      lats.push(lat);
      lons.push(lon);
    }
  });

  return { lats, lons };
};

/**
 * Loads the county polygons, simplifies them, merges their outlines and
 * flattens the result for a single line-drawing layer.
 */
export const flattenBoundaries = async (
  shapeCollectionPath: string,
  logger: Logger = createLogger('Boundaries')
): Promise<BoundaryCoords> => {
  const features = await readFeatures(shapeCollectionPath);

  const polygons = features
    .flatMap(f => extractPolygons(f.geometry))
    .map(rings => simplifyPolygon(rings, logger));

  const pieces = mergeBoundaryLines(polygons);
  const { lats, lons } = flattenPieces(pieces);

  logger.info(
    `Loaded ${features.length} features (${BOUNDARY_CRS}); ` +
      `${polygons.length} polygons merged into ${pieces.length} line pieces`
  );

  return Object.freeze({
    lats: Object.freeze(lats),
    lons: Object.freeze(lons),
    pieces: pieces.length,
    crs: BOUNDARY_CRS,
  });
};
