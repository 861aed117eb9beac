/**
 * Document discovery: "list documents, read text".
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';

export interface DocumentSource {
  listDocuments(): Promise<string[]>;
  readDocument(path: string): Promise<string>;
}

export class FileSystemDocumentSource implements DocumentSource {
  constructor(
    private readonly root: string,
    private readonly extensions: readonly string[],
  ) {}

  async listDocuments(): Promise<string[]> {
    const found: string[] = [];
    await this.walk(this.root, found);
    return found.sort();
  }

  readDocument(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  private async walk(dir: string, found: string[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name === 'node_modules' || entry.name.startsWith('.')) continue;
        await this.walk(path, found);
      } else if (entry.isFile() && this.extensions.includes(extname(entry.name))) {
        found.push(path);
      }
    }
  }
}
