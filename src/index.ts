/**
 * crx-unpack - Main entry point
 *
 * Unwraps CRX2/CRX3 extension packages into ZIP archives and downloads them from the Chrome Web Store.
 */

// Re-export the container decoder
export { CrxBinary, CrxDecodeError } from './crx-binary.js';
export type { CrxDecodeErrorKind, CrxDecodeErrorContext, DecodeOptions } from './crx-binary.js';
export type { Crx2Header, Crx3Header, CrxHeader, CrxFormatVersion } from './types/crx-header.js';
export type { DecodedArchive, DecodeMetadata } from './types/decoded-archive.js';
export { CRX_MAGIC, DEFAULT_MAX_NESTING_DEPTH } from './constants/crx-format.js';

// Re-export extension id and store URL helpers
export { ExtensionIdError, assertExtensionId, isValidExtensionId, parseStoreUrl, resolveExtensionId } from './extension-id.js';
export {
  DEFAULT_PROD_VERSION,
  STORE_ARCH_VALUES,
  STORE_OS_VALUES,
  STORE_PRODUCT_VALUES,
  buildDownloadUrl,
  describeUrlRequest,
  detectPlatform,
  resolvePlatform
} from './webstore-url.js';
export type { PlatformInfo, StoreArch, StoreOs, StoreProduct } from './webstore-url.js';

// Re-export configuration
export { AppConfigSchema, ConfigError, DEFAULT_CONFIG_FILE, defaultConfig, loadConfig, parseConfig, saveConfig } from './config.js';
export type { AppConfig, DownloadConfig, PlatformConfig } from './config.js';

// Re-export archive inspection
export { ArchiveInspectionError, LISTED_ENTRY_LIMIT, describeArchive, inspectArchive } from './archive-inspector.js';
export type { ArchiveSummary } from './archive-inspector.js';

// Re-export download pipeline
export { FetchError, fetchPackage } from './fetcher.js';
export type { FetchOptions } from './fetcher.js';
export { PackageCache } from './package-cache.js';
export { PersistError, convertFile, persistArchive, rawPackagePath } from './persister.js';
export type { ConvertFileOptions, ConvertResult, PersistArchiveOptions, PersistedFiles } from './persister.js';
export { DownloadError, downloadBatch, downloadExtension } from './download.js';
export type { BatchOutcome, DownloadErrorKind, DownloadOptions, DownloadResult } from './download.js';
export { parseIdList, readIdList } from './id-list.js';

// Re-export logging
export { createConsoleLogger, silentLogger } from './utils/logger.js';
export type { ConsoleLoggerOptions, Logger } from './utils/logger.js';
