/**
 * Parsed CRX header, one variant per supported format version.
 */

export interface Crx2Header {
  readonly version: 2;
  readonly publicKeyLength: number;
  readonly signatureLength: number;
  /** Offset at which this container's payload begins. */
  readonly headerSize: number;
}

export interface Crx3Header {
  readonly version: 3;
  /** Length of the protobuf-encoded CrxFileHeader block. */
  readonly headerDataLength: number;
  /** Offset at which this container's payload begins. */
  readonly headerSize: number;
}

export type CrxHeader = Crx2Header | Crx3Header;

export type CrxFormatVersion = CrxHeader['version'];
