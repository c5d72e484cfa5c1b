/**
 * Retrieves a complete package body over HTTP, with retry on transient failures.
 */
import { setTimeout as delay } from 'node:timers/promises';
import { formatSize } from './utils/format-size.js';
import { silentLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

const ACCEPT = 'application/octet-stream,application/x-chrome-extension,*/*';
const REFERER = 'https://chrome.google.com';

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export interface FetchOptions {
  readonly userAgent: string;
  readonly timeoutMs: number;
  /** Extra attempts after the first. */
  readonly maxRetries: number;
  /** Wait before retry n is n times this value. */
  readonly retryDelayMs: number;
  readonly maxFileSizeMb: number;
  readonly fetchImpl?: typeof fetch;
  readonly logger?: Logger;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function fetchOnce(url: string, options: FetchOptions, fetchImpl: typeof fetch, logger: Logger): Promise<Buffer> {
  const maxBytes: number = options.maxFileSizeMb * 1024 * 1024;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        'User-Agent': options.userAgent,
        Referer: REFERER,
        Accept: ACCEPT
      }
    });
  } catch (error) {
    throw new FetchError(`Request failed: ${error instanceof Error ? error.message : String(error)}`, true, undefined, error);
  }

  if (response.status === 204) {
    throw new FetchError('No package available for this extension (HTTP 204)', false, 204);
  }
  if (!response.ok) {
    const reason: string = response.statusText ? ` ${response.statusText}` : '';
    throw new FetchError(`HTTP ${response.status}${reason}`, isRetryableStatus(response.status), response.status);
  }

  const contentType: string = response.headers.get('content-type')?.toLowerCase() ?? '';
  if (contentType.includes('text/html')) {
    throw new FetchError('Received an HTML page instead of a package', false, response.status);
  }

  const declaredLength: number = Number(response.headers.get('content-length') ?? Number.NaN);
  if (Number.isFinite(declaredLength)) {
    if (declaredLength > maxBytes) {
      throw new FetchError(`Package is ${formatSize(declaredLength)}, limit is ${formatSize(maxBytes)}`, false, response.status);
    }
    logger.debug(`File size: ${formatSize(declaredLength)}`);
  }

  let body: Buffer;
  try {
    body = Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw new FetchError(`Download interrupted: ${error instanceof Error ? error.message : String(error)}`, true, response.status, error);
  }
  if (body.length > maxBytes) {
    throw new FetchError(`Package is ${formatSize(body.length)}, limit is ${formatSize(maxBytes)}`, false, response.status);
  }
  return body;
}

/**
 * Downloads a package and returns the fully received body.
 * Network errors, timeouts, 429 and 5xx are retried; everything else fails at once.
 *
 * @throws {FetchError} With the last attempt's status and retryability
 */
export async function fetchPackage(url: string, options: FetchOptions): Promise<Buffer> {
  const fetchImpl: typeof fetch = options.fetchImpl ?? fetch;
  const logger: Logger = options.logger ?? silentLogger;
  const attempts: number = options.maxRetries + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const body: Buffer = await fetchOnce(url, options, fetchImpl, logger);
      logger.debug(`Download completed: ${formatSize(body.length)}`);
      return body;
    } catch (error) {
      if (!(error instanceof FetchError) || !error.retryable || attempt >= attempts) {
        throw error;
      }
      logger.warn(`${error.message}; retrying (${attempt}/${options.maxRetries})`);
      await delay(options.retryDelayMs * attempt);
    }
  }
}
