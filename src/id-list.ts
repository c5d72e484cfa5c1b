/**
 * Reads extension ids from a text file: one per line, `#` starts a comment.
 */
import { readFile } from 'node:fs/promises';

export function parseIdList(text: string): string[] {
  const ids: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const content: string = line.split('#', 1)[0]?.trim() ?? '';
    if (content.length > 0) {
      ids.push(content);
    }
  }
  return ids;
}

/**
 * Ids are returned as written; validation happens when the batch starts.
 * A missing file rejects with the underlying ENOENT error.
 */
export async function readIdList(filePath: string): Promise<string[]> {
  return parseIdList(await readFile(filePath, 'utf8'));
}
