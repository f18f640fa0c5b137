import { readFile } from 'node:fs/promises';
import { extname, resolve, sep } from 'node:path';
import { YearsResponse } from '../types';
import { DEFAULT_YEAR, MAX_YEAR, MIN_YEAR, YEAR_OPTIONS } from '../constants';
import { buildFigure } from '../utils/figure';
import { createLogger, type Logger } from './logger';
import type { DashboardContext } from './startup';

export type RequestHandler = (request: Request) => Promise<Response>;

export interface HandlerOptions {
  clientDir: string;
  logger?: Logger;
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.map': 'application/json; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
  '.woff2': 'font/woff2',
};

const json = (body: unknown, status = 200, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8', 'Cache-Control': 'no-store', ...headers },
  });

const text = (body: string, status: number): Response =>
  new Response(body, { status, headers: { 'Content-Type': 'text/plain; charset=utf-8' } });

/** Accepts a four-digit year inside the selectable range, else null. */
export const parseYear = (raw: string | null): number | null => {
  if (raw === null) return null;
  const clean = raw.trim();
  if (!/^\d{4}$/.test(clean)) return null;
  const year = parseInt(clean, 10);
  return year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');

const serveStatic = async (pathname: string, clientDir: string): Promise<Response> => {
  const root = resolve(clientDir);

  let relative: string;
  try {
    relative = pathname === '/' ? 'index.html' : decodeURIComponent(pathname).replace(/^\/+/, '');
  } catch {
    return text('Bad request', 400);
  }

  const filePath = resolve(root, relative);
  if (!filePath.startsWith(root + sep)) return text('Not found', 404);

  try {
    const body = await readFile(filePath);
    const contentType = CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
    return new Response(new Uint8Array(body), { status: 200, headers: { 'Content-Type': contentType } });
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    if (pathname === '/') return text('Client not built. Run `npm run build` first.', 503);
    return text('Not found', 404);
  }
};

/**
 * Routes requests against a started dashboard. Changing the year in the UI
 * is a GET to /api/figure, answered by a plain buildFigure call.
 */
export const createRequestHandler = (context: DashboardContext, options: HandlerOptions): RequestHandler => {
  const log = options.logger ?? createLogger('Http');

  return async (request) => {
    const url = new URL(request.url);

    if (request.method !== 'GET' && request.method !== 'HEAD') {
      return json({ error: 'Method not allowed' }, 405, { Allow: 'GET, HEAD' });
    }

    try {
      if (url.pathname === '/api/years') {
        const body: YearsResponse = { years: YEAR_OPTIONS, defaultYear: DEFAULT_YEAR };
        return json(body);
      }

      if (url.pathname === '/api/figure') {
        const year = parseYear(url.searchParams.get('year'));
        if (year === null) {
          return json({ error: `year must be an integer between ${MIN_YEAR} and ${MAX_YEAR}` }, 400);
        }
        const events = await context.table.eventsForYear(year);
        return json(buildFigure(events, context.boundary, year));
      }

      if (url.pathname.startsWith('/api/')) {
        return json({ error: 'Not found' }, 404);
      }

      return await serveStatic(url.pathname, options.clientDir);
    } catch (error) {
      log.error(`${request.method} ${url.pathname} failed`, error);
      return json({ error: 'Internal server error' }, 500);
    }
  };
};
