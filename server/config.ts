import { ConfigError } from './errors';

export interface DashboardConfig {
  port: number;
  host: string;
  eventsCsvPath: string;
  eventsUrl: string;
  countyGeoJsonPath: string;
  eventCategory: string;
  inMemoryLimitBytes: number;
  clientDir: string;
}

type Env = Readonly<Record<string, string | undefined>>;

// Shared-file ID of the 1980-2024 storm events export
export const DEFAULT_EVENTS_FILE_ID = '1WDsm4qBNcGg8MOskRcLvSRGRU41Ef6rX';

export const driveDownloadUrl = (fileId: string): string =>
  `https://drive.google.com/uc?export=download&id=${encodeURIComponent(fileId)}`;

const readInteger = (env: Env, key: string, fallback: number, min: number, max: number): number => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(`${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
};

const readString = (env: Env, key: string, fallback: string): string => {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
};

export const loadConfig = (env: Env = process.env): Readonly<DashboardConfig> => {
  const fileId = readString(env, 'EVENTS_FILE_ID', DEFAULT_EVENTS_FILE_ID);

  return Object.freeze({
    port: readInteger(env, 'PORT', 8080, 1, 65535),
    host: readString(env, 'HOST', '0.0.0.0'),
    eventsCsvPath: readString(env, 'EVENTS_CSV_PATH', 'us-weather-events-1980-2024.csv'),
    eventsUrl: driveDownloadUrl(fileId),
    countyGeoJsonPath: readString(env, 'COUNTY_GEOJSON_PATH', 'gz_2010_us_050_00_20m.json'),
    eventCategory: readString(env, 'EVENT_CATEGORY', 'Tornado'),
    inMemoryLimitBytes: readInteger(env, 'IN_MEMORY_LIMIT_MB', 256, 1, 1024 * 1024) * 1024 * 1024,
    clientDir: readString(env, 'CLIENT_DIR', 'dist'),
  });
};
