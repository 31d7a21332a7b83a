/**
 * File Storage
 *
 * Temporary storage for files uploaded during a wizard:
 * - MemoryFileStorage - in-process, for tests and single-process hosts
 * - LocalFileStorage - a directory on disk
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import type { IFileStorage, UploadedFile } from '@stepwise/core/ports';

function tmpNameFor(file: UploadedFile): string {
  const safeName = path.basename(file.name).replace(/[^A-Za-z0-9._-]+/g, '_');
  return `${crypto.randomUUID()}-${safeName}`;
}

/**
 * In-process file storage.
 */
export class MemoryFileStorage implements IFileStorage {
  private readonly files = new Map<string, UploadedFile>();

  save(file: UploadedFile): string {
    const name = tmpNameFor(file);
    this.files.set(name, { ...file, content: Buffer.from(file.content) });
    return name;
  }

  open(name: string): UploadedFile | null {
    const file = this.files.get(name);
    return file ? { ...file, content: Buffer.from(file.content) } : null;
  }

  delete(name: string): void {
    this.files.delete(name);
  }

  get size(): number {
    return this.files.size;
  }
}

/**
 * File storage in a local directory. The stored name is the file name within
 * the directory; metadata other than the contents lives in the wizard state.
 */
export class LocalFileStorage implements IFileStorage {
  constructor(private readonly directory: string) {
    fs.mkdirSync(directory, { recursive: true });
  }

  save(file: UploadedFile): string {
    const name = tmpNameFor(file);
    fs.writeFileSync(path.join(this.directory, name), file.content);
    return name;
  }

  open(name: string): UploadedFile | null {
    const filePath = this.resolve(name);
    if (!filePath || !fs.existsSync(filePath)) {
      return null;
    }
    const content = fs.readFileSync(filePath);
    return {
      name,
      contentType: 'application/octet-stream',
      size: content.length,
      content,
    };
  }

  delete(name: string): void {
    const filePath = this.resolve(name);
    if (filePath) {
      fs.rmSync(filePath, { force: true });
    }
  }

  private resolve(name: string): string | null {
    // Stored names never contain path separators
    if (name !== path.basename(name)) {
      return null;
    }
    return path.join(this.directory, name);
  }
}
