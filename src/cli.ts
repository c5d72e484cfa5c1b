#!/usr/bin/env node
/**
 * crx-unpack - CLI Interface
 *
 * Command-line interface for downloading Chrome extensions and unwrapping CRX packages.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { resolve } from 'node:path';
import { stat } from 'node:fs/promises';
import { DEFAULT_CONFIG_FILE, PlatformConfigSchema, defaultConfig, loadConfig, saveConfig } from './config.js';
import type { AppConfig } from './config.js';
import { downloadBatch, downloadExtension } from './download.js';
import { readIdList } from './id-list.js';
import { convertFile } from './persister.js';
import { createConsoleLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';
import { formatSize } from './utils/format-size.js';
import { isMissingFile } from './utils/fs-errors.js';
import { resolveExtensionId } from './extension-id.js';
import { STORE_ARCH_VALUES, STORE_OS_VALUES, STORE_PRODUCT_VALUES, buildDownloadUrl, describeUrlRequest } from './webstore-url.js';

interface DownloadCommandOptions {
  fromFile?: string;
  output?: string;
  outputDir?: string;
  keepCrx?: boolean;
  concurrency?: number;
  cache?: boolean;
  config?: string;
  verbose?: boolean;
}

interface ConvertCommandOptions {
  maxDepth?: number;
  verbose?: boolean;
}

interface UrlCommandOptions {
  os?: string;
  arch?: string;
  naclArch?: string;
  prodversion?: string;
  product?: string;
  decode?: boolean;
  verbose?: boolean;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function parsePositiveInt(value: string): number {
  const parsed: number = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function fail(logger: Logger, error: unknown): never {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

function applyOverrides(base: AppConfig, options: DownloadCommandOptions): AppConfig {
  return {
    ...base,
    output: {
      ...base.output,
      directory: options.outputDir !== undefined ? resolve(options.outputDir) : base.output.directory,
      keepCrx: options.keepCrx ?? base.output.keepCrx
    },
    performance: {
      ...base.performance,
      maxConcurrentDownloads: options.concurrency ?? base.performance.maxConcurrentDownloads
    },
    cache: {
      ...base.cache,
      enabled: options.cache ?? base.cache.enabled
    }
  };
}

program
  .name('crx-unpack')
  .description('Download Chrome Web Store extensions and unwrap CRX packages into ZIP archives')
  .version(version);

program
  .command('download')
  .description('Download one or more extensions and convert them to ZIP archives')
  .argument('[ids...]', 'Extension IDs or Chrome Web Store detail URLs')
  .option('-f, --from-file <file>', 'Read extension IDs from a file, one per line')
  .option('-o, --output <file>', 'Output ZIP path (single extension only)')
  .option('-d, --output-dir <dir>', 'Directory for downloaded archives')
  .option('--keep-crx', 'Keep the CRX file next to the ZIP archive')
  .option('-c, --concurrency <n>', 'Parallel downloads for a batch', parsePositiveInt)
  .option('--cache', 'Reuse and store raw packages in the cache directory')
  .option('--no-cache', 'Ignore the package cache')
  .option('--config <file>', 'Configuration file', DEFAULT_CONFIG_FILE)
  .option('-v, --verbose', 'Show detailed information')
  .action(async (ids: string[], options: DownloadCommandOptions) => {
    const logger: Logger = createConsoleLogger({ verbose: options.verbose });
    try {
      const config: AppConfig = applyOverrides(await loadConfig(options.config), options);
      const inputs: string[] = [...ids, ...(options.fromFile ? await readIdList(resolve(options.fromFile)) : [])];
      if (inputs.length === 0) {
        throw new Error('No extension IDs given. Pass IDs as arguments or use --from-file.');
      }
      if (options.output !== undefined && inputs.length > 1) {
        throw new Error('--output can only be used with a single extension.');
      }

      if (inputs.length === 1 && options.fromFile === undefined) {
        const [input] = inputs;
        const result = await downloadExtension(input, {
          config,
          logger,
          outputFile: options.output !== undefined ? resolve(options.output) : undefined
        });
        logger.info('');
        logger.info(result.status === 'skipped' ? `Already present: ${result.outputFile}` : `🎉 Extension ready: ${result.outputFile}`);
        return;
      }

      const outcomes = await downloadBatch(inputs, { config, logger });
      const failures = outcomes.filter((outcome) => !outcome.ok);
      if (failures.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      fail(logger, error);
    }
  });

program
  .command('convert')
  .description('Convert a CRX file on disk to a ZIP archive')
  .argument('<crx-file>', 'Path to the CRX package')
  .argument('[zip-file]', 'Output path (default: same name with .zip)')
  .option('--max-depth <n>', 'Maximum number of nested containers to unwrap', parsePositiveInt)
  .option('-v, --verbose', 'Show detailed information')
  .action(async (crxFile: string, zipFile: string | undefined, options: ConvertCommandOptions) => {
    const logger: Logger = createConsoleLogger({ verbose: options.verbose });
    try {
      logger.info(`Converting CRX file: ${crxFile}`);
      const result = await convertFile(resolve(crxFile), zipFile !== undefined ? resolve(zipFile) : undefined, {
        maxNestingDepth: options.maxDepth,
        logger
      });
      if (result.metadata !== null) {
        logger.info(`CRX version: ${result.metadata.formatVersion}`);
      }
      const { size } = await stat(result.outputFile);
      logger.info(`✅ Converted to: ${result.outputFile} (${formatSize(size)})`);
    } catch (error) {
      fail(logger, error);
    }
  });

program
  .command('url')
  .description('Print the Web Store download URL for an extension')
  .argument('<id-or-url>', 'Extension ID or Chrome Web Store detail URL')
  .addOption(new Option('--os <os>', 'Operating system (auto-detected)').choices(STORE_OS_VALUES))
  .addOption(new Option('--arch <arch>', 'Architecture (auto-detected)').choices(STORE_ARCH_VALUES))
  .addOption(new Option('--nacl-arch <arch>', 'Native Client architecture (auto-detected)').choices(STORE_ARCH_VALUES))
  .option('--prodversion <version>', 'Chrome product version')
  .addOption(new Option('--product <product>', 'Product type').choices(STORE_PRODUCT_VALUES))
  .option('--decode', 'Also print the URL-decoded form')
  .option('-v, --verbose', 'Show the chosen and detected platform values')
  .action((input: string, options: UrlCommandOptions) => {
    const logger: Logger = createConsoleLogger();
    try {
      const platform = PlatformConfigSchema.parse({
        os: options.os,
        arch: options.arch,
        naclArch: options.naclArch,
        prodversion: options.prodversion,
        product: options.product
      });
      const id: string = resolveExtensionId(input);
      const url: string = buildDownloadUrl(id, platform);
      if (options.verbose) {
        for (const line of describeUrlRequest(id, platform)) {
          logger.info(line);
        }
      }
      if (options.decode) {
        logger.info('Decoded URL:');
        logger.info(decodeURIComponent(url));
        logger.info('');
        logger.info('Encoded URL:');
      }
      logger.info(url);
    } catch (error) {
      fail(logger, error);
    }
  });

program
  .command('init-config')
  .description('Write a configuration file with the default settings')
  .argument('[file]', 'Configuration file path', DEFAULT_CONFIG_FILE)
  .option('--force', 'Overwrite an existing file')
  .action(async (file: string, options: { force?: boolean }) => {
    const logger: Logger = createConsoleLogger();
    try {
      const target: string = resolve(file);
      if (!options.force) {
        try {
          await stat(target);
          throw new Error(`${target} already exists. Use --force to overwrite it.`);
        } catch (error) {
          if (!isMissingFile(error)) {
            throw error;
          }
        }
      }
      await saveConfig(target, defaultConfig());
      logger.info(`✅ Configuration written to: ${target}`);
    } catch (error) {
      fail(logger, error);
    }
  });

await program.parseAsync();
