/**
 * Language lookup table
 *
 * Extension, filename and interpreter mappings plus the per-language entry
 * point and manifest conventions, loaded once from data/languages.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const languageTableSchema = z.object({
  extensions: z.record(z.string(), z.string()),
  ambiguousExtensions: z.array(z.string()),
  filenames: z.record(z.string(), z.string()),
  interpreters: z.record(z.string(), z.string()),
  entryPoints: z.record(z.string(), z.array(z.string())),
  manifests: z.array(z.string()),
  manifestExtensions: z.array(z.string()),
});

export type LanguageTable = z.infer<typeof languageTableSchema>;

const TABLE_URL = new URL('../../../data/languages.json', import.meta.url);

let cached: LanguageTable | null = null;

/**
 * Load the language table (cached after the first call)
 */
export function getLanguageTable(): LanguageTable {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf-8'));
    cached = languageTableSchema.parse(raw);
  }
  return cached;
}
