/**
 * Key-File Selector
 *
 * Picks the files that best explain a repository, in three tiers:
 *   1. entry points of the dominant language(s)
 *   2. package/project manifests
 *   3. source modules, breadth-first from the root
 *
 * Within a tier files are ordered by depth, then path. The selection never
 * exceeds the configured count or cumulative byte budget; a file that would
 * overflow the byte budget is skipped and the next candidate tried.
 */

import type {
  FileRecord,
  KeyFile,
  KeyFileSet,
  KeyFileTier,
  LanguageProfile,
} from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { detectLanguage, dominantLanguages } from './language-classifier.js';
import { getLanguageTable } from './language-table.js';

export interface KeyFileSelectorOptions {
  maxKeyFiles: number;
  maxSelectionBytes: number;
}

export const DEFAULT_SELECTOR_OPTIONS: KeyFileSelectorOptions = {
  maxKeyFiles: 12,
  maxSelectionBytes: 1024 * 1024,
};

/**
 * Test file/directory patterns
 */
const TEST_DIR_PATTERNS = [
  /\/test\//,
  /\/tests\//,
  /\/__tests__\//,
  /\/spec\//,
  /\/specs\//,
  /\/fixtures\//,
  /^test\//,
  /^tests\//,
  /^__tests__\//,
  /^spec\//,
  /^specs\//,
  /^fixtures\//,
];

const TEST_FILE_PATTERNS = [
  /\.test\.[^.]+$/,
  /\.spec\.[^.]+$/,
  /_test\.[^.]+$/,
  /_spec\.[^.]+$/,
  /^test_.*\.[^.]+$/,
  /^spec_.*\.[^.]+$/,
  /^conftest\.py$/,
];

/**
 * Check if file path matches test patterns
 */
export function isTestFile(relativePath: string, fileName: string): boolean {
  return TEST_DIR_PATTERNS.some((pattern) => pattern.test(relativePath))
    || TEST_FILE_PATTERNS.some((pattern) => pattern.test(fileName));
}

/**
 * Check if file is likely generated
 */
export function isGeneratedFile(fileName: string, relativePath: string): boolean {
  if (fileName.endsWith('.d.ts')) return true;
  if (/\.generated\.[^.]+$/.test(fileName)) return true;
  if (fileName.endsWith('_pb2.py') || fileName.endsWith('.pb.go')) return true;
  if (relativePath.includes('generated/')) return true;
  return false;
}

function isNoise(file: FileRecord): boolean {
  return isTestFile(file.path, file.name) || isGeneratedFile(file.name, file.path);
}

/**
 * Check if file is a package/project manifest
 */
export function isManifest(file: Pick<FileRecord, 'name' | 'extension'>): boolean {
  const { manifests, manifestExtensions } = getLanguageTable();
  return manifests.includes(file.name) || manifestExtensions.includes(file.extension);
}

/**
 * Check if file follows an entry-point naming convention for one of the languages
 */
export function isEntryPointFor(file: FileRecord, languages: readonly string[]): boolean {
  const { entryPoints } = getLanguageTable();
  const detected = detectLanguage(file);

  return languages.some((language) => {
    const names = entryPoints[language] ?? [];
    return names.includes(file.name) && (detected === null || detected === language);
  });
}

function compareByDepthThenPath(a: FileRecord, b: FileRecord): number {
  if (a.depth !== b.depth) return a.depth - b.depth;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Candidate files per tier, each already in selection order
 */
export function rankCandidates(
  files: readonly FileRecord[],
  profile: LanguageProfile
): Record<KeyFileTier, FileRecord[]> {
  const dominant = dominantLanguages(profile);
  const candidates = files.filter((file) => !isNoise(file));

  const entryPoints = dominant.length > 0
    ? candidates.filter((file) => isEntryPointFor(file, dominant))
    : [];

  const manifests = candidates.filter((file) => isManifest(file));

  const modules = profile.degraded
    ? candidates.filter((file) => file.depth === 0)
    : candidates.filter((file) => {
      const language = detectLanguage(file);
      return language !== null && dominant.includes(language);
    });

  return {
    'entry-point': entryPoints.sort(compareByDepthThenPath),
    manifest: manifests.sort(compareByDepthThenPath),
    module: modules.sort(compareByDepthThenPath),
  };
}

const TIER_ORDER: readonly KeyFileTier[] = ['entry-point', 'manifest', 'module'];

/**
 * Select the key files of a repository.
 *
 * Throws SELECTION_EMPTY when nothing fits, since an empty prompt cannot
 * describe anything.
 */
export function selectKeyFiles(
  files: readonly FileRecord[],
  profile: LanguageProfile,
  options: Partial<KeyFileSelectorOptions> = {}
): KeyFileSet {
  const { maxKeyFiles, maxSelectionBytes } = { ...DEFAULT_SELECTOR_OPTIONS, ...options };
  const ranked = rankCandidates(files, profile);

  const selected: KeyFile[] = [];
  const seen = new Set<string>();
  let totalBytes = 0;

  for (const tier of TIER_ORDER) {
    for (const file of ranked[tier]) {
      if (selected.length >= maxKeyFiles) break;
      if (seen.has(file.path)) continue;
      if (totalBytes + file.size > maxSelectionBytes) continue;

      seen.add(file.path);
      totalBytes += file.size;
      selected.push(Object.freeze({ ...file, tier }));
    }
  }

  if (selected.length === 0) {
    throw errors.selectionEmpty();
  }

  return Object.freeze({ files: Object.freeze(selected), totalBytes });
}
