/**
 * Language Classifier
 *
 * Maps each FileRecord to an implementation language and folds the byte sizes
 * into a LanguageProfile. Detection is a table lookup (marker filename, then
 * extension) with a short list of content heuristics for the ambiguous cases.
 */

import { open } from 'node:fs/promises';
import type { FileRecord, LanguageProfile, LanguageShare } from '../../types/index.js';
import { getLanguageTable } from './language-table.js';
import { errorMessage } from '../../utils/errors.js';
import logger from '../../utils/logger.js';

/**
 * Reads the first bytes of a file for content sniffing
 */
export type HeadReader = (file: FileRecord) => Promise<string | null>;

export interface ClassifierOptions {
  /** Override how file heads are read (tests) */
  readHead?: HeadReader;
}

/** Bytes read from a file for content sniffing */
const HEAD_BYTES = 512;

/** A runner-up language is dominant too when it reaches this share of the leader */
const SECONDARY_LANGUAGE_RATIO = 0.3;

const OBJC_MARKERS = /@interface\b|@implementation\b|@protocol\b|@property\b|^\s*#import\s/m;
const CPP_MARKERS = /\bclass\s+\w+|\bnamespace\s+\w+|\btemplate\s*<|\bpublic:|\bprivate:|\bstd::/;
const MATLAB_MARKERS = /^\s*function\s|^\s*%|^\s*end\s*$/m;

// ============================================================================
// DETECTION
// ============================================================================

/**
 * Resolve an interpreter from a shebang line
 */
export function interpreterFromShebang(head: string): string | null {
  const firstLine = head.split('\n', 1)[0] ?? '';
  if (!firstLine.startsWith('#!')) return null;

  const tokens = firstLine.slice(2).trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;

  let program = tokens[0].split('/').pop() ?? '';
  if (program === 'env') {
    program = tokens.slice(1).find((token) => !token.startsWith('-')) ?? '';
  }

  return program || null;
}

function languageFromInterpreter(program: string): string | null {
  const { interpreters } = getLanguageTable();
  return interpreters[program] ?? interpreters[program.replace(/[\d.]+$/, '')] ?? null;
}

/**
 * True when the file's language can only be decided by looking at its content
 */
export function needsContentSniffing(file: Pick<FileRecord, 'name' | 'extension'>): boolean {
  const table = getLanguageTable();
  if (table.filenames[file.name]) return false;
  if (file.extension === '') return true;
  return table.ambiguousExtensions.includes(file.extension);
}

/**
 * Detect the implementation language of a file.
 *
 * Returns null for files that belong to the "other" bucket (docs, data,
 * unknown extensions).
 */
export function detectLanguage(
  file: Pick<FileRecord, 'name' | 'extension'>,
  head?: string | null
): string | null {
  const table = getLanguageTable();

  const byName = table.filenames[file.name];
  if (byName) return byName;

  const byExtension = table.extensions[file.extension];
  if (byExtension) return byExtension;

  if (file.extension === '.h') {
    if (head && OBJC_MARKERS.test(head)) return 'Objective-C';
    if (head && CPP_MARKERS.test(head)) return 'C++';
    return 'C';
  }

  if (file.extension === '.m') {
    if (head && !OBJC_MARKERS.test(head) && MATLAB_MARKERS.test(head)) return 'MATLAB';
    return 'Objective-C';
  }

  if (file.extension === '' && head) {
    const program = interpreterFromShebang(head);
    return program ? languageFromInterpreter(program) : null;
  }

  return null;
}

/**
 * Read the first bytes of a file as UTF-8
 */
export async function readFileHead(file: FileRecord): Promise<string | null> {
  try {
    const handle = await open(file.absolutePath, 'r');
    try {
      const buffer = Buffer.alloc(HEAD_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, HEAD_BYTES, 0);
      return buffer.subarray(0, bytesRead).toString('utf-8');
    } finally {
      await handle.close();
    }
  } catch (error) {
    logger.debug(`Cannot sniff ${file.path}: ${errorMessage(error)}`);
    return null;
  }
}

// ============================================================================
// AGGREGATION
// ============================================================================

function compareShares(a: LanguageShare, b: LanguageShare): number {
  if (a.bytes !== b.bytes) return b.bytes - a.bytes;
  if (a.fileCount !== b.fileCount) return b.fileCount - a.fileCount;
  return a.language < b.language ? -1 : a.language > b.language ? 1 : 0;
}

/**
 * Build a LanguageProfile from the walker's candidate files.
 *
 * Scores are shares of all scanned bytes, so unclassified files lower every
 * score without appearing in the profile. A tree whose files are all empty is
 * scored by file count instead.
 */
export async function classifyLanguages(
  files: readonly FileRecord[],
  options: ClassifierOptions = {}
): Promise<LanguageProfile> {
  const readHead = options.readHead ?? readFileHead;
  const totals = new Map<string, { bytes: number; fileCount: number }>();
  let totalBytes = 0;
  let classifiedBytes = 0;

  for (const file of files) {
    totalBytes += file.size;

    const head = needsContentSniffing(file) ? await readHead(file) : null;
    const language = detectLanguage(file, head);
    if (!language) continue;

    classifiedBytes += file.size;
    const entry = totals.get(language) ?? { bytes: 0, fileCount: 0 };
    entry.bytes += file.size;
    entry.fileCount += 1;
    totals.set(language, entry);
  }

  const languages: LanguageShare[] = [...totals.entries()].map(([language, entry]) => ({
    language,
    bytes: entry.bytes,
    fileCount: entry.fileCount,
    score: totalBytes > 0 ? entry.bytes / totalBytes : entry.fileCount / files.length,
  }));
  languages.sort(compareShares);

  return Object.freeze({
    languages: Object.freeze(languages.map((share) => Object.freeze(share))),
    totalBytes,
    classifiedBytes,
    otherBytes: totalBytes - classifiedBytes,
    degraded: languages.length === 0,
  });
}

/**
 * The leading language, plus the runner-up when it is a substantial share
 */
export function dominantLanguages(profile: LanguageProfile): string[] {
  const [first, second] = profile.languages;
  if (!first) return [];
  if (second && second.score >= first.score * SECONDARY_LANGUAGE_RATIO) {
    return [first.language, second.language];
  }
  return [first.language];
}

/**
 * Human-readable project type for prompts
 */
export function projectTypeName(profile: LanguageProfile): string {
  return profile.languages[0]?.language ?? 'Unknown';
}
