/**
 * Optional display metadata for categories (label, description), keyed by
 * category id. Categories themselves always come from the dataset; the
 * catalog only makes them presentable.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DatasetError } from '../errors.js';

const catalogSchema = z.record(
  z.string(),
  z.object({
    label: z.string().min(1),
    description: z.string().min(1).optional(),
  })
);

export type CategoryCatalog = z.infer<typeof catalogSchema>;

/** Parse catalog JSON. Keys are matched case-insensitively. */
export function parseCategoryCatalog(json: string): CategoryCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new DatasetError(
      'Unreadable',
      `Category catalog is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DatasetError(
      'Unreadable',
      `Category catalog is invalid: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }

  const catalog: CategoryCatalog = {};
  for (const [id, meta] of Object.entries(parsed.data)) {
    catalog[id.trim().toLowerCase()] = meta;
  }
  return catalog;
}

/** Load a catalog file; a missing file is an empty catalog. */
export async function loadCategoryCatalog(
  path: string,
  baseDir: string = process.cwd()
): Promise<CategoryCatalog> {
  let json: string;
  try {
    json = await readFile(resolve(baseDir, path), 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw new DatasetError(
      'Unreadable',
      `Cannot read category catalog: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseCategoryCatalog(json);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
