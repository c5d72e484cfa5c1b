/**
 * JSON configuration file, merged over defaults.
 *
 * Every field carries a zod default, so parsing a partial file fills in the
 * rest and parsing `{}` yields the full default configuration.
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z, ZodError } from 'zod';
import { DEFAULT_MAX_NESTING_DEPTH } from './constants/crx-format.js';
import { STORE_ARCH_VALUES, STORE_OS_VALUES, STORE_PRODUCT_VALUES } from './webstore-url.js';
import { isMissingFile } from './utils/fs-errors.js';

export const DEFAULT_CONFIG_FILE = 'crx-unpack.config.json';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const StoreOsSchema = z.enum(STORE_OS_VALUES);
const StoreArchSchema = z.enum(STORE_ARCH_VALUES);
const StoreProductSchema = z.enum(STORE_PRODUCT_VALUES);

export const DownloadConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(30_000),
    maxRetries: z.number().int().nonnegative().default(3),
    retryDelayMs: z.number().int().nonnegative().default(1_000),
    maxFileSizeMb: z.number().positive().default(100),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT)
  })
  .default({});

export const OutputConfigSchema = z
  .object({
    directory: z.string().min(1).default('./downloads'),
    keepCrx: z.boolean().default(false),
    overwrite: z.boolean().default(true)
  })
  .default({});

export const PerformanceConfigSchema = z
  .object({
    maxConcurrentDownloads: z.number().int().min(1).max(32).default(3),
    maxNestingDepth: z.number().int().min(1).default(DEFAULT_MAX_NESTING_DEPTH)
  })
  .default({});

export const CacheConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    directory: z.string().min(1).default('./cache')
  })
  .default({});

/** Overrides for the values detected from the host. */
export const PlatformConfigSchema = z
  .object({
    os: StoreOsSchema.optional(),
    arch: StoreArchSchema.optional(),
    naclArch: StoreArchSchema.optional(),
    prodversion: z.string().min(1).optional(),
    product: StoreProductSchema.optional()
  })
  .default({});

export const AppConfigSchema = z.object({
  download: DownloadConfigSchema,
  output: OutputConfigSchema,
  performance: PerformanceConfigSchema,
  cache: CacheConfigSchema,
  platform: PlatformConfigSchema
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, public readonly filePath: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * The full default configuration.
 */
export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Validates a parsed JSON value and fills in defaults.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function parseConfig(value: unknown, filePath = '<inline>'): AppConfig {
  const result = AppConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${filePath}: ${describeIssues(result.error)}`, filePath, result.error);
  }
  return result.data;
}

/**
 * Loads a configuration file. A missing file yields the defaults.
 *
 * @throws {ConfigError} If the file is not JSON or fails validation
 */
export async function loadConfig(filePath: string = DEFAULT_CONFIG_FILE): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return defaultConfig();
    }
    throw new ConfigError(`Failed to read configuration ${filePath}: ${error instanceof Error ? error.message : String(error)}`, filePath, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration ${filePath} is not valid JSON`, filePath, error);
  }
  return parseConfig(raw, filePath);
}

/**
 * Writes a configuration file as indented JSON, creating its directory.
 */
export async function saveConfig(filePath: string, config: AppConfig): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
}
