/**
 * On-disk store of raw packages keyed by extension id.
 */
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { assertExtensionId } from './extension-id.js';
import { isMissingFile } from './utils/fs-errors.js';

export class PackageCache {
  constructor(
    public readonly directory: string,
    public readonly enabled: boolean = true
  ) {}

  pathFor(extensionId: string): string {
    return join(this.directory, `${assertExtensionId(extensionId)}.crx`);
  }

  /**
   * @returns Cached bytes, or null when disabled or absent
   */
  async get(extensionId: string): Promise<Buffer | null> {
    if (!this.enabled) {
      return null;
    }
    try {
      return await readFile(this.pathFor(extensionId));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(extensionId: string, bytes: Uint8Array): Promise<void> {
    if (!this.enabled) {
      return;
    }
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(extensionId), bytes);
  }

  async delete(extensionId: string): Promise<void> {
    if (!this.enabled) {
      return;
    }
    await rm(this.pathFor(extensionId), { force: true });
  }
}
