/**
 * File-system port for `i` and `o` backed by Node's fs.
 */
import { readFileSync, writeFileSync } from 'fs';
import type { FileSystemPort } from '../core/types';

export class NodeFiles implements FileSystemPort {
  /** Null when the file cannot be read; `i` then reflects. */
  readFile(path: string): Uint8Array | null {
    try {
      return new Uint8Array(readFileSync(path));
    } catch {
      return null;
    }
  }

  writeFile(path: string, data: Uint8Array): boolean {
    try {
      writeFileSync(path, data);
      return true;
    } catch {
      return false;
    }
  }
}
