/**
 * File Storage Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { UploadedFile } from '@stepwise/core/ports';
import { LocalFileStorage, MemoryFileStorage } from '../file-storage.js';

const createFile = (name: string): UploadedFile => ({
  name,
  contentType: 'text/plain',
  size: 5,
  content: Buffer.from('hello'),
});

describe('MemoryFileStorage', () => {
  it('should save, open and delete files', () => {
    const storage = new MemoryFileStorage();
    const name = storage.save(createFile('notes.txt'));

    expect(name).toMatch(/^[0-9a-f-]{36}-notes\.txt$/);
    expect(storage.open(name)?.content.toString()).toBe('hello');

    storage.delete(name);
    expect(storage.open(name)).toBeNull();
  });

  it('should sanitise stored names', () => {
    const storage = new MemoryFileStorage();

    expect(storage.save(createFile('../my report.txt'))).toMatch(/-my_report\.txt$/);
  });
});

describe('LocalFileStorage', () => {
  const directories: string[] = [];

  const createStorage = () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'wizard-files-'));
    directories.push(directory);
    return new LocalFileStorage(directory);
  };

  afterEach(() => {
    for (const directory of directories.splice(0)) {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });

  it('should write files into its directory', () => {
    const storage = createStorage();
    const name = storage.save(createFile('notes.txt'));
    const file = storage.open(name);

    expect(file?.content.toString()).toBe('hello');
    expect(file?.size).toBe(5);
  });

  it('should remove deleted files', () => {
    const storage = createStorage();
    const name = storage.save(createFile('notes.txt'));
    storage.delete(name);

    expect(storage.open(name)).toBeNull();
  });

  it('should refuse names outside its directory', () => {
    const storage = createStorage();

    expect(storage.open('../etc/passwd')).toBeNull();
  });
});
