import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../server/logger';
import type { BoundaryCoords, TornadoEvent } from '../types';

export const createSilentLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export interface TempDir {
  path: string;
  file: (name: string, contents: string) => Promise<string>;
  cleanup: () => Promise<void>;
}

export const createTempDir = async (): Promise<TempDir> => {
  const path = await mkdtemp(join(tmpdir(), 'tornado-dashboard-'));
  return {
    path,
    file: async (name, contents) => {
      const filePath = join(path, name);
      await writeFile(filePath, contents, 'utf8');
      return filePath;
    },
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
};

export const makeEvent = (overrides: Partial<TornadoEvent> = {}): TornadoEvent => ({
  beginDateTime: '03-MAY-99 18:00:00',
  lat: 35.1,
  lon: -97.5,
  year: 1999,
  fScale: 'F0',
  ...overrides,
});

export const TEST_BOUNDARY: BoundaryCoords = {
  lats: [30, 31, null, 40],
  lons: [-90, -91, null, -100],
  pieces: 2,
  crs: 'EPSG:4326',
};
