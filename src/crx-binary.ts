/**
 * CRX binary helpers for Chrome extension packages.
 */
import { readFile } from 'node:fs/promises';
import {
  CRX_MAGIC_U32BE,
  CRX_PREAMBLE_SIZE,
  CRX2_FIXED_HEADER_SIZE,
  CRX3_FIXED_HEADER_SIZE,
  DEFAULT_MAX_NESTING_DEPTH,
  ZIP_EOCD_SIGNATURE,
  ZIP_LOCAL_FILE_HEADER_SIGNATURE
} from './constants/crx-format.js';
import type { CrxHeader } from './types/crx-header.js';
import type { DecodedArchive } from './types/decoded-archive.js';

export type CrxDecodeErrorKind =
  | 'TooShort'
  | 'BadMagic'
  | 'UnsupportedVersion'
  | 'Truncated'
  | 'NestingTooDeep'
  | 'UnrecognizedPayload';

export interface CrxDecodeErrorContext {
  readonly version?: number;
  readonly depth?: number;
  readonly offset?: number;
  readonly length?: number;
}

export class CrxDecodeError extends Error {
  readonly kind: CrxDecodeErrorKind;
  readonly context: CrxDecodeErrorContext;

  constructor(kind: CrxDecodeErrorKind, message: string, context: CrxDecodeErrorContext = {}) {
    super(message);
    this.name = 'CrxDecodeError';
    this.kind = kind;
    this.context = context;
  }

  /** A truncated package may be a short read, so fetching it again can help. */
  get retryable(): boolean {
    return this.kind === 'Truncated';
  }
}

export interface DecodeOptions {
  /** Containers unwrapped per call, outermost included. Defaults to 5. */
  readonly maxNestingDepth?: number;
}

type PayloadKind = 'zip' | 'crx' | 'unknown';

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function startsWithMagic(buffer: Buffer): boolean {
  return buffer.length >= 4 && buffer.readUInt32BE(0) === CRX_MAGIC_U32BE;
}

function startsWithZipSignature(buffer: Buffer): boolean {
  if (buffer.length < 4) {
    return false;
  }
  const signature: number = buffer.readUInt32LE(0);
  return signature === ZIP_LOCAL_FILE_HEADER_SIGNATURE || signature === ZIP_EOCD_SIGNATURE;
}

function classifyPayload(buffer: Buffer): PayloadKind {
  if (startsWithZipSignature(buffer)) {
    return 'zip';
  }
  return startsWithMagic(buffer) ? 'crx' : 'unknown';
}

function requireLength(buffer: Buffer, needed: number, depth: number, version: number): void {
  if (buffer.length < needed) {
    throw new CrxDecodeError('Truncated', `CRX${version} header needs ${needed} bytes, package has ${buffer.length}`, {
      version,
      depth,
      length: buffer.length
    });
  }
}

/**
 * Parses the header of a single container layer.
 * The v2 key/signature and the v3 header block are consumed for their lengths only.
 *
 * @param buffer - Bytes starting at the container's magic
 * @param depth - Layer index, outermost is 0
 * @throws {CrxDecodeError} For a short, foreign, unknown-version or truncated header
 */
function readHeader(buffer: Buffer, depth: number): CrxHeader {
  if (buffer.length < 4) {
    throw new CrxDecodeError('TooShort', `Package is ${buffer.length} bytes, too small to hold a CRX magic`, {
      depth,
      length: buffer.length
    });
  }
  if (!startsWithMagic(buffer)) {
    throw new CrxDecodeError('BadMagic', 'Invalid CRX magic: package does not start with Cr24', { depth });
  }
  if (buffer.length < CRX_PREAMBLE_SIZE) {
    throw new CrxDecodeError('Truncated', `Package ends inside the CRX preamble (${buffer.length} bytes)`, {
      depth,
      length: buffer.length
    });
  }

  const version: number = buffer.readUInt32LE(4);
  let header: CrxHeader;
  if (version === 2) {
    requireLength(buffer, CRX2_FIXED_HEADER_SIZE, depth, version);
    const publicKeyLength: number = buffer.readUInt32LE(8);
    const signatureLength: number = buffer.readUInt32LE(12);
    header = {
      version,
      publicKeyLength,
      signatureLength,
      headerSize: CRX2_FIXED_HEADER_SIZE + publicKeyLength + signatureLength
    };
  } else if (version === 3) {
    requireLength(buffer, CRX3_FIXED_HEADER_SIZE, depth, version);
    const headerDataLength: number = buffer.readUInt32LE(8);
    header = { version, headerDataLength, headerSize: CRX3_FIXED_HEADER_SIZE + headerDataLength };
  } else {
    throw new CrxDecodeError('UnsupportedVersion', `Unsupported CRX format version: ${version}`, { version, depth });
  }

  if (header.headerSize > buffer.length) {
    throw new CrxDecodeError(
      'Truncated',
      `CRX${header.version} header declares payload at offset ${header.headerSize}, package has ${buffer.length} bytes`,
      { version: header.version, depth, offset: header.headerSize, length: buffer.length }
    );
  }
  return header;
}

/**
 * Unwraps container layers until a ZIP payload is reached.
 * Reads at most `maxNestingDepth` layers.
 */
function decodeLayers(raw: Buffer, maxNestingDepth: number): DecodedArchive {
  const layers: CrxHeader[] = [];
  let current: Buffer = raw;

  for (let depth = 0; depth < maxNestingDepth; depth += 1) {
    const header: CrxHeader = readHeader(current, depth);
    layers.push(header);
    const candidate: Buffer = current.subarray(header.headerSize);

    switch (classifyPayload(candidate)) {
      case 'zip': {
        const [outermost] = layers;
        return {
          payload: Buffer.from(candidate),
          metadata: {
            formatVersion: (outermost ?? header).version,
            nestingDepth: depth,
            payloadLength: candidate.length,
            layers
          }
        };
      }
      case 'crx':
        current = candidate;
        break;
      case 'unknown':
        throw new CrxDecodeError(
          'UnrecognizedPayload',
          `Payload at offset ${header.headerSize} is neither a ZIP archive nor a nested CRX`,
          { version: header.version, depth, offset: header.headerSize, length: candidate.length }
        );
    }
  }

  throw new CrxDecodeError('NestingTooDeep', `Nested CRX containers exceed the limit of ${maxNestingDepth}`, {
    depth: maxNestingDepth
  });
}

/**
 * CRX (Chrome extension package) binary processing utilities.
 * Decoding is pure: no I/O, no shared state, safe to call concurrently.
 */
export class CrxBinary {
  /** Error class for CRX decode failures. */
  static readonly Error: typeof CrxDecodeError = CrxDecodeError;

  /**
   * Unwraps a CRX2/CRX3 package, nested containers included, down to its ZIP payload.
   *
   * @param raw - Complete package bytes
   * @param options - Nesting limit
   * @returns Owned copy of the ZIP bytes plus header metadata
   * @throws {CrxDecodeError} Classified by `kind`
   */
  static decode(raw: Uint8Array, options: DecodeOptions = {}): DecodedArchive {
    const maxNestingDepth: number = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
    if (!Number.isInteger(maxNestingDepth) || maxNestingDepth < 1) {
      throw new RangeError(`maxNestingDepth must be a positive integer, got ${maxNestingDepth}`);
    }
    return decodeLayers(toBuffer(raw), maxNestingDepth);
  }

  /**
   * Reads a package from disk and decodes it.
   *
   * @throws {CrxDecodeError} If the file is not a decodable CRX package
   */
  static async read({ filePath, maxNestingDepth }: { readonly filePath: string; readonly maxNestingDepth?: number }): Promise<DecodedArchive> {
    const buffer: Buffer = await readFile(filePath);
    return CrxBinary.decode(buffer, { maxNestingDepth });
  }

  /** True when the bytes already start with a ZIP local file header or an empty-archive record. */
  static isZip(bytes: Uint8Array): boolean {
    return startsWithZipSignature(toBuffer(bytes));
  }

  /** True when the bytes start with the CRX magic. */
  static isCrx(bytes: Uint8Array): boolean {
    return startsWithMagic(toBuffer(bytes));
  }
}
