/**
 * Dataset source backed by a file on disk.
 */

import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { DatasetError } from '../errors.js';
import type { IDatasetSource } from './IDatasetSource.js';

export class FileDatasetSource implements IDatasetSource {
  private readonly absolutePath: string;

  constructor(path: string, baseDir: string = process.cwd()) {
    this.absolutePath = resolve(baseDir, path);
  }

  get description(): string {
    return `file:${this.absolutePath}`;
  }

  get name(): string {
    return `file:${basename(this.absolutePath)}`;
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.absolutePath, 'utf-8');
    } catch (err) {
      throw new DatasetError(
        'Unreadable',
        `Cannot read dataset at ${this.absolutePath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}
