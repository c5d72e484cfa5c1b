/**
 * Opens a decoded payload as a ZIP archive to confirm it is readable.
 */
import AdmZip from 'adm-zip';

/** Entries shown by {@link describeArchive} before the rest is summarized. */
export const LISTED_ENTRY_LIMIT = 10;

export interface ArchiveSummary {
  readonly entryCount: number;
  /** Entry names in central directory order. */
  readonly entryNames: readonly string[];
}

export class ArchiveInspectionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ArchiveInspectionError';
  }
}

/**
 * Reads the central directory of a ZIP archive.
 *
 * @throws {ArchiveInspectionError} If the bytes are not a readable ZIP archive
 */
export function inspectArchive(archive: Buffer): ArchiveSummary {
  try {
    const entryNames: string[] = new AdmZip(archive).getEntries().map((entry) => entry.entryName);
    return { entryCount: entryNames.length, entryNames };
  } catch (error) {
    const reason: string = error instanceof Error ? error.message : String(error);
    throw new ArchiveInspectionError(`Not a readable ZIP archive: ${reason}`, error);
  }
}

/**
 * Report lines for a summary: the count, the first entries, then how many were left out.
 */
export function describeArchive(summary: ArchiveSummary, limit: number = LISTED_ENTRY_LIMIT): string[] {
  const lines: string[] = [`Archive holds ${summary.entryCount} entries`];
  for (const name of summary.entryNames.slice(0, limit)) {
    lines.push(`  - ${name}`);
  }
  if (summary.entryCount > limit) {
    lines.push(`  ... and ${summary.entryCount - limit} more`);
  }
  return lines;
}
