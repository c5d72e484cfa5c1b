/**
 * Download Orchestrator - fetches Chrome Web Store packages and writes them as ZIP archives
 *
 * Each id runs fetch -> decode -> persist on its own buffers, so a batch can run
 * several ids at once without coordination.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { AppConfig } from './config.js';
import { CrxBinary, CrxDecodeError } from './crx-binary.js';
import type { CrxDecodeErrorKind } from './crx-binary.js';
import { ExtensionIdError, resolveExtensionId } from './extension-id.js';
import { FetchError, fetchPackage } from './fetcher.js';
import { PackageCache } from './package-cache.js';
import { persistArchive } from './persister.js';
import type { DecodedArchive, DecodeMetadata } from './types/decoded-archive.js';
import { mapWithConcurrency } from './utils/concurrency.js';
import { formatSize } from './utils/format-size.js';
import { isMissingFile } from './utils/fs-errors.js';
import { silentLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';
import { buildDownloadUrl } from './webstore-url.js';

export type DownloadErrorKind = CrxDecodeErrorKind | 'InvalidId' | 'FetchFailed' | 'WriteFailed';

/**
 * Failure of a single download, tagged with the extension id and a specific kind.
 */
export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly id: string,
    public readonly kind: DownloadErrorKind,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

export interface DownloadOptions {
  readonly config: AppConfig;
  /** Target path for a single download; defaults to `<output.directory>/<id>.zip`. */
  readonly outputFile?: string;
  readonly logger?: Logger;
  /** Replaces the global fetch. */
  readonly fetchImpl?: typeof fetch;
}

export interface DownloadResult {
  readonly id: string;
  readonly status: 'downloaded' | 'skipped';
  readonly outputFile: string;
  /** Absent when skipped. */
  readonly metadata?: DecodeMetadata;
  /** Archive size in bytes, 0 when skipped. */
  readonly bytes: number;
  readonly fromCache: boolean;
}

export type BatchOutcome =
  | { readonly id: string; readonly ok: true; readonly result: DownloadResult }
  | { readonly id: string; readonly ok: false; readonly error: DownloadError };

function toDownloadError(id: string, error: unknown): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  const message: string = error instanceof Error ? error.message : String(error);
  if (error instanceof CrxDecodeError) {
    return new DownloadError(`${id}: ${error.kind}: ${message}`, id, error.kind, error);
  }
  if (error instanceof FetchError) {
    return new DownloadError(`${id}: FetchFailed: ${message}`, id, 'FetchFailed', error);
  }
  if (error instanceof ExtensionIdError) {
    return new DownloadError(message, id, 'InvalidId', error);
  }
  return new DownloadError(`${id}: WriteFailed: ${message}`, id, 'WriteFailed', error);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }
    throw error;
  }
}

function resolveId(input: string): string {
  try {
    return resolveExtensionId(input);
  } catch (error) {
    throw toDownloadError(input, error);
  }
}

async function retrieve(id: string, options: DownloadOptions, logger: Logger): Promise<Buffer> {
  const { download, platform } = options.config;
  const url: string = buildDownloadUrl(id, platform);
  logger.debug(`Download URL: ${url}`);
  return fetchPackage(url, { ...download, fetchImpl: options.fetchImpl, logger });
}

async function downloadResolved(id: string, options: DownloadOptions, logger: Logger): Promise<DownloadResult> {
  const { config } = options;
  const outputFile: string = options.outputFile ?? join(config.output.directory, `${id}.zip`);

  if (!config.output.overwrite && (await fileExists(outputFile))) {
    logger.info(`⏭️  ${id}: ${outputFile} exists, skipping`);
    return { id, status: 'skipped', outputFile, bytes: 0, fromCache: false };
  }

  const cache = new PackageCache(config.cache.directory, config.cache.enabled);
  const cached: Buffer | null = await cache.get(id);
  let fromCache: boolean = cached !== null;
  let raw: Buffer = cached ?? (await retrieve(id, options, logger));
  logger.debug(`${id}: package is ${formatSize(raw.length)}${fromCache ? ' (cached)' : ''}`);

  const decodeOptions = { maxNestingDepth: config.performance.maxNestingDepth };
  let decoded: DecodedArchive;
  try {
    decoded = CrxBinary.decode(raw, decodeOptions);
  } catch (error) {
    if (!(error instanceof CrxDecodeError) || !error.retryable) {
      throw error;
    }
    // A truncated body may be a short read; fetch once more before giving up.
    logger.warn(`${id}: ${error.message}; fetching again`);
    raw = await retrieve(id, options, logger);
    fromCache = false;
    decoded = CrxBinary.decode(raw, decodeOptions);
  }

  if (!fromCache) {
    await cache.put(id, raw);
  }

  await persistArchive({ archive: decoded.payload, outputFile, rawPackage: raw, keepRaw: config.output.keepCrx });
  const { metadata } = decoded;
  logger.info(
    `✅ ${id} -> ${outputFile} (CRX${metadata.formatVersion}, ${formatSize(metadata.payloadLength)}` +
      `${metadata.nestingDepth > 0 ? `, ${metadata.nestingDepth} nested` : ''})`
  );
  return { id, status: 'downloaded', outputFile, metadata, bytes: metadata.payloadLength, fromCache };
}

/**
 * Downloads one extension and writes it as a ZIP archive.
 *
 * @param input - Extension id or Web Store detail URL
 * @throws {DownloadError} Tagged with the id and the specific failure kind
 */
export async function downloadExtension(input: string, options: DownloadOptions): Promise<DownloadResult> {
  const logger: Logger = options.logger ?? silentLogger;
  const id: string = resolveId(input);
  logger.info(`Extension ID: ${id}`);
  try {
    return await downloadResolved(id, options, logger);
  } catch (error) {
    throw toDownloadError(id, error);
  }
}

/**
 * Downloads several extensions, at most `performance.maxConcurrentDownloads` at once.
 * Every id is validated before anything is fetched; a failed id does not stop the others.
 *
 * @throws {DownloadError} With kind `InvalidId` if any input is not an id or store URL
 */
export async function downloadBatch(inputs: readonly string[], options: Omit<DownloadOptions, 'outputFile'>): Promise<BatchOutcome[]> {
  const logger: Logger = options.logger ?? silentLogger;

  const invalid: string[] = [];
  const ids: string[] = [];
  for (const input of inputs) {
    try {
      const id: string = resolveExtensionId(input);
      if (!ids.includes(id)) {
        ids.push(id);
      }
    } catch {
      invalid.push(input);
    }
  }
  if (invalid.length > 0) {
    throw new DownloadError(`Invalid extension IDs: ${invalid.join(', ')}`, invalid.join(','), 'InvalidId');
  }
  if (ids.length < inputs.length) {
    logger.debug(`Ignoring ${inputs.length - ids.length} duplicate id(s)`);
  }

  const limit: number = options.config.performance.maxConcurrentDownloads;
  logger.info(`Downloading ${ids.length} extension(s), ${Math.min(limit, ids.length)} at a time`);

  const outcomes: BatchOutcome[] = await mapWithConcurrency(ids, limit, async (id): Promise<BatchOutcome> => {
    try {
      return { id, ok: true, result: await downloadResolved(id, options, logger) };
    } catch (error) {
      const failure: DownloadError = toDownloadError(id, error);
      logger.error(failure.message);
      return { id, ok: false, error: failure };
    }
  });

  const failed: number = outcomes.filter((outcome) => !outcome.ok).length;
  logger.info(`📋 ${outcomes.length - failed} succeeded, ${failed} failed`);
  return outcomes;
}
