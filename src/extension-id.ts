/**
 * Chrome extension id validation and extraction from Web Store links.
 */

const EXTENSION_ID_PATTERN = /^[a-p]{32}$/;

const STORE_HOSTS: ReadonlyMap<string, string> = new Map([
  // /webstore/detail/<slug>/<id>
  ['chrome.google.com', '/webstore/detail/'],
  // /detail/<slug>/<id>
  ['chromewebstore.google.com', '/detail/']
]);

export class ExtensionIdError extends Error {
  constructor(message: string, public readonly input: string) {
    super(message);
    this.name = 'ExtensionIdError';
  }
}

/**
 * Checks the shape of an extension id: exactly 32 characters from a to p.
 */
export function isValidExtensionId(id: unknown): id is string {
  return typeof id === 'string' && EXTENSION_ID_PATTERN.test(id);
}

/**
 * @throws {ExtensionIdError} If the id is not 32 characters from a to p
 */
export function assertExtensionId(id: string): string {
  if (!isValidExtensionId(id)) {
    throw new ExtensionIdError(`Invalid extension ID format: ${id} (expected 32 characters a-p)`, id);
  }
  return id;
}

/**
 * Extracts the extension id from a Chrome Web Store detail page URL.
 *
 * @param storeUrl - e.g. https://chromewebstore.google.com/detail/some-name/<id>
 * @throws {ExtensionIdError} For other hosts, other paths, or a malformed id
 */
export function parseStoreUrl(storeUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(storeUrl);
  } catch {
    throw new ExtensionIdError(`Not a valid URL: ${storeUrl}`, storeUrl);
  }

  const prefix: string | undefined = STORE_HOSTS.get(parsed.hostname);
  if (prefix === undefined) {
    throw new ExtensionIdError(`Not a Chrome Web Store URL: ${storeUrl}`, storeUrl);
  }
  if (!parsed.pathname.startsWith(prefix)) {
    throw new ExtensionIdError(`Not a Chrome Web Store detail page: ${storeUrl}`, storeUrl);
  }

  // Older links omit the slug: /detail/<id>
  const segments: string[] = parsed.pathname.slice(prefix.length).split('/').filter((segment) => segment.length > 0);
  const candidate: string | undefined = segments[segments.length - 1];
  if (segments.length > 2 || candidate === undefined) {
    throw new ExtensionIdError(`Not a Chrome Web Store detail page: ${storeUrl}`, storeUrl);
  }
  return assertExtensionId(candidate);
}

/**
 * Accepts a bare extension id or a Web Store detail URL.
 */
export function resolveExtensionId(input: string): string {
  const trimmed: string = input.trim();
  return /^https?:\/\//i.test(trimmed) ? parseStoreUrl(trimmed) : assertExtensionId(trimmed);
}
