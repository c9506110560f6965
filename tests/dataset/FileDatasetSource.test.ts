import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileDatasetSource } from '../../src/dataset/FileDatasetSource.js';
import { DatasetError } from '../../src/errors.js';

describe('FileDatasetSource', () => {
  it('should read the file and describe its absolute path', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'dataset-'));
    await writeFile(join(dir, 'qa.csv'), 'q,a\nQ1,A1');
    const source = new FileDatasetSource('qa.csv', dir);

    expect(source.description).toBe(`file:${join(dir, 'qa.csv')}`);
    expect(source.name).toBe('file:qa.csv');
    await expect(source.read()).resolves.toBe('q,a\nQ1,A1');
  });

  it('should fail with an Unreadable DatasetError when the file is missing', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'dataset-'));
    const source = new FileDatasetSource('missing.csv', dir);

    await expect(source.read()).rejects.toBeInstanceOf(DatasetError);
    await expect(source.read()).rejects.toMatchObject({ reason: 'Unreadable' });
  });
});
