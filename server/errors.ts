/**
 * Errors that abort startup. Per-row data defects never raise; they are
 * absorbed by the cleaner and only show up in the cleaning report.
 */
export class DashboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends DashboardError {}

export class DownloadError extends DashboardError {
  constructor(readonly status: number, readonly url: string, message?: string) {
    super(message ?? `Download of ${url} failed with HTTP status ${status}`);
  }
}

export class DatasetReadError extends DashboardError {}

export class BoundaryFileError extends DashboardError {}
