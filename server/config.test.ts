import { describe, it, expect } from 'vitest';
import { DEFAULT_EVENTS_FILE_ID, driveDownloadUrl, loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('falls back to the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      host: '0.0.0.0',
      eventsCsvPath: 'us-weather-events-1980-2024.csv',
      eventsUrl: `https://drive.google.com/uc?export=download&id=${DEFAULT_EVENTS_FILE_ID}`,
      countyGeoJsonPath: 'gz_2010_us_050_00_20m.json',
      eventCategory: 'Tornado',
      inMemoryLimitBytes: 256 * 1024 * 1024,
      clientDir: 'dist',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '3000',
      HOST: '127.0.0.1',
      EVENTS_CSV_PATH: '/data/events.csv',
      EVENTS_FILE_ID: 'test-file-id',
      EVENT_CATEGORY: 'Hail',
      IN_MEMORY_LIMIT_MB: '64',
    });

    expect(config.port).toBe(3000);
    expect(config.host).toBe('127.0.0.1');
    expect(config.eventsCsvPath).toBe('/data/events.csv');
    expect(config.eventsUrl).toBe('https://drive.google.com/uc?export=download&id=test-file-id');
    expect(config.eventCategory).toBe('Hail');
    expect(config.inMemoryLimitBytes).toBe(64 * 1024 * 1024);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', HOST: '' }).port).toBe(8080);
    expect(loadConfig({ HOST: '' }).host).toBe('0.0.0.0');
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'http' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'http' })).toThrow('PORT must be an integer, got "http"');
  });

  it('rejects a port out of range', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow('PORT must be between 1 and 65535, got 70000');
    expect(() => loadConfig({ PORT: '0' })).toThrow(ConfigError);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

describe('driveDownloadUrl', () => {
  it('escapes the file id', () => {
    expect(driveDownloadUrl('a b&c')).toBe('https://drive.google.com/uc?export=download&id=a%20b%26c');
  });
});
