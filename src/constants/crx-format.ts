/** ASCII "Cr24", the leading bytes of every CRX package. */
export const CRX_MAGIC = 'Cr24';

/** {@link CRX_MAGIC} read as a big-endian u32. */
export const CRX_MAGIC_U32BE = 0x43723234;

/** Magic (4) + version (4). */
export const CRX_PREAMBLE_SIZE = 8;

/** Magic (4) + version (4) + public key length (4) + signature length (4). */
export const CRX2_FIXED_HEADER_SIZE = 16;

/** Magic (4) + version (4) + header data length (4). */
export const CRX3_FIXED_HEADER_SIZE = 12;

/** Containers unwrapped per decode, outermost included. */
export const DEFAULT_MAX_NESTING_DEPTH = 5;

/** ZIP local file header, "PK\x03\x04". */
export const ZIP_LOCAL_FILE_HEADER_SIGNATURE = 0x04034b50;

/** ZIP end of central directory, "PK\x05\x06". First record of an empty archive. */
export const ZIP_EOCD_SIGNATURE = 0x06054b50;
