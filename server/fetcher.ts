import { open, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import { DownloadError } from './errors';
import { createLogger, formatBytes, type Logger } from './logger';

export type FetchLike = (url: string) => Promise<Response>;

export interface FetchOptions {
  fetch?: FetchLike;
  chunkSize?: number;
  logger?: Logger;
}

export const DOWNLOAD_CHUNK_BYTES = 1024 * 1024;
const PROGRESS_EVERY_BYTES = 16 * DOWNLOAD_CHUNK_BYTES;

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const fileExists = async (path: string): Promise<boolean> => {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
};

const decodeEntities = (value: string): string =>
  value
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");

const readAttribute = (tag: string, name: string): string | null => {
  const match = new RegExp(`\\b${name}="([^"]*)"`, 'i').exec(tag);
  return match ? decodeEntities(match[1]) : null;
};

/**
 * Large shared files answer the first request with a "can't scan this file
 * for viruses" page. Builds the URL that page would submit, or returns null
 * when the HTML carries no confirmation.
 */
export const resolveConfirmationUrl = (html: string, baseUrl: string): string | null => {
  for (const form of html.matchAll(/<form\b([^>]*)>([\s\S]*?)<\/form>/gi)) {
    if (readAttribute(form[1], 'id') !== 'download-form') continue;

    const action = readAttribute(form[1], 'action');
    if (!action) continue;

    const url = new URL(action, baseUrl);
    for (const input of form[2].matchAll(/<input\b[^>]*>/gi)) {
      if (readAttribute(input[0], 'type') !== 'hidden') continue;
      const name = readAttribute(input[0], 'name');
      if (name) url.searchParams.set(name, readAttribute(input[0], 'value') ?? '');
    }
    return url.toString();
  }

  // Older pages link straight to the confirmed URL
  const link = /href="([^"]*confirm=[^"]*)"/i.exec(html);
  return link ? new URL(decodeEntities(link[1]), baseUrl).toString() : null;
};

const isHtml = (response: Response): boolean =>
  (response.headers.get('content-type') ?? '').toLowerCase().includes('text/html');

const request = async (fetchImpl: FetchLike, url: string): Promise<Response> => {
  const response = await fetchImpl(url);
  if (response.status !== 200) {
    throw new DownloadError(response.status, url);
  }
  return response;
};

// Copies the body through a fixed-size buffer so at most one chunk is held
// in memory.
const copyChunks = async (
  reader: ReadableStreamDefaultReader<Uint8Array>,
  handle: FileHandle,
  chunkSize: number,
  log: Logger
): Promise<number> => {
  const buffer = Buffer.alloc(chunkSize);
  let filled = 0;
  let written = 0;
  let nextReport = PROGRESS_EVERY_BYTES;

  const flush = async () => {
    if (filled === 0) return;
    await handle.write(buffer, 0, filled);
    written += filled;
    filled = 0;
    if (written >= nextReport) {
      log.info(`${formatBytes(written)} written...`);
      nextReport += PROGRESS_EVERY_BYTES;
    }
  };

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    let offset = 0;
    while (offset < value.length) {
      const n = Math.min(chunkSize - filled, value.length - offset);
      buffer.set(value.subarray(offset, offset + n), filled);
      filled += n;
      offset += n;
      if (filled === chunkSize) await flush();
    }
  }
  await flush();
  return written;
};

// The file lands under `.part` and is renamed once complete. On any failure
// the body is cancelled so the connection is released.
const writeBody = async (
  response: Response,
  path: string,
  chunkSize: number,
  log: Logger
): Promise<number> => {
  if (!response.body) {
    throw new DownloadError(response.status, response.url || path, 'Download returned an empty body');
  }

  const partPath = `${path}.part`;
  const reader = response.body.getReader();
  let handle: FileHandle | null = null;
  let written = 0;
  let completed = false;

  try {
    handle = await open(partPath, 'w');
    written = await copyChunks(reader, handle, chunkSize, log);
    completed = true;
  } finally {
    if (handle) await handle.close();
    if (!completed) {
      await reader.cancel().catch((error: unknown) => log.warn('Could not cancel the download body', error));
      if (handle) await rm(partPath, { force: true });
    }
  }

  await rename(partPath, path);
  return written;
};

/**
 * Makes sure `path` exists, downloading it from `remoteLocator` when it does
 * not. An existing file is never touched. Any status other than 200 raises
 * a DownloadError; there is no retry.
 */
export const ensureLocalCopy = async (
  path: string,
  remoteLocator: string,
  options: FetchOptions = {}
): Promise<void> => {
  const log = options.logger ?? createLogger('Fetcher');

  if (await fileExists(path)) {
    log.info(`${path} already present, skipping download`);
    return;
  }

  const fetchImpl: FetchLike = options.fetch ?? ((url) => fetch(url));
  log.info(`Downloading ${path} from ${remoteLocator}...`);

  let response = await request(fetchImpl, remoteLocator);
  if (isHtml(response)) {
    const confirmedUrl = resolveConfirmationUrl(await response.text(), remoteLocator);
    if (!confirmedUrl) {
      throw new DownloadError(response.status, remoteLocator, 'Download returned an HTML page instead of the file');
    }
    log.info('Confirming large-file download...');
    response = await request(fetchImpl, confirmedUrl);
    if (isHtml(response)) {
      throw new DownloadError(response.status, confirmedUrl, 'Confirmed download still returned an HTML page');
    }
  }

  const written = await writeBody(response, path, options.chunkSize ?? DOWNLOAD_CHUNK_BYTES, log);
  log.info(`Download complete: ${path} (${formatBytes(written)})`);
};
