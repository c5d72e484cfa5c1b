/**
 * Builds Chrome Web Store update-service download URLs.
 */
import { assertExtensionId } from './extension-id.js';

const UPDATE_SERVICE_URL = 'https://clients2.google.com/service/update2/crx';

/** A high version keeps the store from answering 204 for extensions that require a newer browser. */
export const DEFAULT_PROD_VERSION = '9999.0.9999.0';

export const STORE_OS_VALUES = ['win', 'mac', 'linux', 'cros', 'openbsd', 'android'] as const;
export const STORE_ARCH_VALUES = ['arm', 'x86-64', 'x86-32'] as const;
export const STORE_PRODUCT_VALUES = ['chromecrx', 'chromiumcrx'] as const;

export type StoreOs = (typeof STORE_OS_VALUES)[number];
export type StoreArch = (typeof STORE_ARCH_VALUES)[number];
export type StoreProduct = (typeof STORE_PRODUCT_VALUES)[number];

export interface PlatformInfo {
  readonly os: StoreOs;
  readonly arch: StoreArch;
  readonly naclArch: StoreArch;
  readonly prodversion: string;
  readonly product: StoreProduct;
}

function toStoreOs(platform: NodeJS.Platform): StoreOs {
  switch (platform) {
    case 'darwin':
      return 'mac';
    case 'win32':
      return 'win';
    case 'openbsd':
      return 'openbsd';
    case 'android':
      return 'android';
    default:
      return 'linux';
  }
}

function toStoreArch(arch: string): StoreArch {
  if (arch.startsWith('arm')) {
    return 'arm';
  }
  return arch.includes('64') ? 'x86-64' : 'x86-32';
}

/**
 * Maps the host platform to the values the update service expects.
 */
export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): PlatformInfo {
  const storeArch: StoreArch = toStoreArch(arch);
  return {
    os: toStoreOs(platform),
    arch: storeArch,
    naclArch: storeArch,
    prodversion: DEFAULT_PROD_VERSION,
    product: 'chromiumcrx'
  };
}

/**
 * Fills the values `platform` leaves out from `detected`. The NaCl architecture follows `arch` when only that is given.
 */
export function resolvePlatform(platform: Partial<PlatformInfo> = {}, detected: PlatformInfo = detectPlatform()): PlatformInfo {
  return {
    os: platform.os ?? detected.os,
    arch: platform.arch ?? detected.arch,
    naclArch: platform.naclArch ?? platform.arch ?? detected.naclArch,
    prodversion: platform.prodversion ?? detected.prodversion,
    product: platform.product ?? detected.product
  };
}

/**
 * Header printed before a URL in verbose mode: the id, then each platform value beside the detected one.
 */
export function describeUrlRequest(
  extensionId: string,
  platform: Partial<PlatformInfo> = {},
  detected: PlatformInfo = detectPlatform()
): string[] {
  const resolved: PlatformInfo = resolvePlatform(platform, detected);
  return [
    'Chrome Web Store URL Builder',
    '='.repeat(50),
    `Extension ID: ${extensionId}`,
    `OS: ${resolved.os} (auto-detected: ${detected.os})`,
    `Architecture: ${resolved.arch} (auto-detected: ${detected.arch})`,
    `NaCl Architecture: ${resolved.naclArch} (auto-detected: ${detected.naclArch})`,
    `Chrome Version: ${resolved.prodversion}`,
    `Product: ${resolved.product}`,
    '-'.repeat(50)
  ];
}

/**
 * Builds the redirecting download URL for one extension.
 * The parameter order and the pre-encoded `x` value match what the browser sends.
 *
 * @throws {ExtensionIdError} If the id is malformed
 */
export function buildDownloadUrl(extensionId: string, platform: Partial<PlatformInfo> = {}): string {
  const id: string = assertExtensionId(extensionId);
  const resolved: PlatformInfo = resolvePlatform(platform);

  let url = `${UPDATE_SERVICE_URL}?response=redirect`;
  url += `&os=${resolved.os}`;
  url += `&arch=${resolved.arch}`;
  url += `&os_arch=${resolved.arch}`;
  url += `&nacl_arch=${resolved.naclArch}`;
  url += `&prod=${resolved.product}`;
  url += '&prodchannel=unknown';
  url += `&prodversion=${encodeURIComponent(resolved.prodversion)}`;
  url += '&acceptformat=crx2,crx3';
  url += `&x=id%3D${id}%26uc`;
  return url;
}
