/**
 * Result of unwrapping a CRX package down to its ZIP payload.
 */
import type { CrxFormatVersion, CrxHeader } from './crx-header.js';

export interface DecodeMetadata {
  /** Version of the outermost container. */
  readonly formatVersion: CrxFormatVersion;
  /** Containers unwrapped beneath the outermost one. */
  readonly nestingDepth: number;
  readonly payloadLength: number;
  /** Every parsed header, outermost first. */
  readonly layers: readonly CrxHeader[];
}

export interface DecodedArchive {
  /** ZIP bytes, owned by the caller. */
  readonly payload: Buffer;
  readonly metadata: DecodeMetadata;
}
