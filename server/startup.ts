import { BoundaryCoords } from '../types';
import { flattenBoundaries } from './boundaries';
import type { DashboardConfig } from './config';
import { openEventTable, type EventTable } from './eventTable';
import { ensureLocalCopy, type FetchLike } from './fetcher';
import { createLogger } from './logger';

/** Everything a request needs, built once and never mutated. */
export interface DashboardContext {
  readonly table: EventTable;
  readonly boundary: BoundaryCoords;
}

export interface StartupDeps {
  fetch?: FetchLike;
}

/**
 * Fetch, load and flatten, in that order. Any failure here is fatal to the
 * process; the caller decides how to exit.
 */
export const startDashboard = async (
  config: Readonly<DashboardConfig>,
  deps: StartupDeps = {}
): Promise<DashboardContext> => {
  const log = createLogger('Startup');

  await ensureLocalCopy(config.eventsCsvPath, config.eventsUrl, { fetch: deps.fetch });

  const table = await openEventTable(config.eventsCsvPath, config.eventCategory, {
    inMemoryLimitBytes: config.inMemoryLimitBytes,
  });

  const boundary = await flattenBoundaries(config.countyGeoJsonPath);

  log.info('Dashboard data ready');
  return Object.freeze({ table, boundary });
};
