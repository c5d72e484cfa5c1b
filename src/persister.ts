/**
 * Writes decoded archives to disk and manages the raw package beside them.
 */
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { ArchiveInspectionError, describeArchive, inspectArchive } from './archive-inspector.js';
import type { ArchiveSummary } from './archive-inspector.js';
import { CrxBinary } from './crx-binary.js';
import type { DecodeMetadata } from './types/decoded-archive.js';
import { formatSize } from './utils/format-size.js';
import { silentLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

export interface PersistArchiveOptions {
  readonly archive: Uint8Array;
  readonly outputFile: string;
  /** Raw package, written beside the archive as `<name>.crx` when kept. */
  readonly rawPackage?: Uint8Array;
  /** Keep the raw package after the archive is written. */
  readonly keepRaw: boolean;
}

export interface PersistedFiles {
  readonly archiveFile: string;
  /** Path of the kept raw package, or null when none was kept. */
  readonly rawFile: string | null;
}

export interface ConvertResult {
  readonly outputFile: string;
  /** Null when the input was already a ZIP archive. */
  readonly metadata: DecodeMetadata | null;
  /** Null when the written file could not be read back as a ZIP archive. */
  readonly summary: ArchiveSummary | null;
}

export class PersistError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'PersistError';
  }
}

/**
 * Path of the raw package that accompanies an archive: same name, `.crx` extension.
 */
export function rawPackagePath(outputFile: string): string {
  return join(dirname(outputFile), `${basename(outputFile, extname(outputFile))}.crx`);
}

/**
 * Writes the archive, then the raw package beside it when `keepRaw` is set.
 * Without `keepRaw` a leftover raw package at that path is removed.
 * An output path that is itself the raw package path is never removed.
 *
 * @throws {PersistError} When `keepRaw` would write the raw package over the archive
 */
export async function persistArchive(options: PersistArchiveOptions): Promise<PersistedFiles> {
  const { archive, outputFile, rawPackage, keepRaw } = options;
  const rawFile: string = rawPackagePath(outputFile);
  const sharesPath: boolean = resolve(rawFile) === resolve(outputFile);
  const writeRaw: boolean = keepRaw && rawPackage !== undefined;

  if (writeRaw && sharesPath) {
    throw new PersistError(`Cannot keep the raw package: ${outputFile} is also the archive path. Use an output name without .crx.`, outputFile);
  }

  await mkdir(dirname(outputFile), { recursive: true });
  await writeFile(outputFile, archive);

  if (writeRaw && rawPackage !== undefined) {
    await writeFile(rawFile, rawPackage);
    return { archiveFile: outputFile, rawFile };
  }
  if (!keepRaw && !sharesPath) {
    await rm(rawFile, { force: true });
  }
  return { archiveFile: outputFile, rawFile: null };
}

export interface ConvertFileOptions {
  readonly maxNestingDepth?: number;
  readonly logger?: Logger;
}

/**
 * Converts a package on disk to a ZIP file next to it (or at `outputFile`).
 * Input that is already a ZIP archive is copied through unchanged.
 *
 * @throws {CrxDecodeError} If the input is neither a ZIP nor a decodable package
 */
export async function convertFile(inputFile: string, outputFile?: string, options: ConvertFileOptions = {}): Promise<ConvertResult> {
  const logger: Logger = options.logger ?? silentLogger;
  const target: string = outputFile ?? join(dirname(inputFile), `${basename(inputFile, extname(inputFile))}.zip`);
  const raw: Buffer = await readFile(inputFile);

  let archive: Buffer;
  let metadata: DecodeMetadata | null = null;
  if (CrxBinary.isZip(raw)) {
    logger.info('Input is already a ZIP archive');
    archive = raw;
  } else {
    const decoded = CrxBinary.decode(raw, { maxNestingDepth: options.maxNestingDepth });
    archive = decoded.payload;
    metadata = decoded.metadata;
    logger.debug(`CRX version: ${metadata.formatVersion}, nesting depth: ${metadata.nestingDepth}`);
  }

  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, archive);

  let summary: ArchiveSummary | null = null;
  try {
    summary = inspectArchive(archive);
    for (const line of describeArchive(summary)) {
      logger.info(line);
    }
  } catch (error) {
    if (!(error instanceof ArchiveInspectionError)) {
      throw error;
    }
    logger.warn(`${target} may be damaged. ${error.message}`);
  }
  logger.debug(`ZIP file size: ${formatSize(archive.length)}`);
  return { outputFile: target, metadata, summary };
}
