/**
 * FileWalker Service
 *
 * Traverses a repository lazily, skipping version-control metadata, build output
 * and dependency caches before descending into them. Yields one FileRecord per
 * candidate file in a canonical order so every later stage sees the same input
 * for the same tree.
 */

import { opendir, readFile, realpath, stat } from 'node:fs/promises';
import { join, relative, extname, sep } from 'node:path';
import ignoreModule from 'ignore';
const ignore = ignoreModule.default ?? ignoreModule;
type Ignore = ReturnType<typeof ignore>;
import type {
  FileRecord,
  FileWalkerResult,
  FileWalkerSummary,
  PipelineWarning,
} from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import logger from '../../utils/logger.js';

/**
 * Options for the FileWalker
 */
export interface FileWalkerOptions {
  /** Maximum number of files to yield */
  maxFiles?: number;
  /** Additional gitignore-style patterns to exclude */
  excludePatterns?: string[];
  /** Read .gitignore and .repodocignore from the root */
  useIgnoreFiles?: boolean;
  /** Progress callback for UI updates */
  onProgress?: (progress: FileWalkerProgress) => void;
  /** Cancellation, checked before each directory */
  signal?: AbortSignal;
}

/**
 * Progress information during file walking
 */
export interface FileWalkerProgress {
  filesFound: number;
  directoriesScanned: number;
  currentPath: string;
}

/**
 * Built-in directories to always skip
 */
const SKIP_DIRECTORIES = new Set([
  '.git',
  '.svn',
  '.hg',
  'node_modules',
  'bower_components',
  '.venv',
  'venv',
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.tox',
  '.gradle',
  'dist',
  'build',
  'out',
  'target',
  'bin',
  'obj',
  '.cache',
  '.next',
  '.nuxt',
  'coverage',
  '.nyc_output',
  '.idea',
  '.vscode',
  '.vs',
  '.repodoc',
]);

/**
 * Directories to skip only when not at root level
 */
const SKIP_DIRECTORIES_NOT_ROOT = new Set([
  'vendor',
  'deps',
]);

/**
 * Directory name suffixes that mark build artifacts
 */
const SKIP_DIRECTORY_SUFFIXES = ['.egg-info', '.dist-info'];

/**
 * File extensions to always skip (binary/generated files)
 */
const SKIP_EXTENSIONS = new Set([
  // Lock files
  '.lock',
  '.lockb',
  // Minified/bundled
  '.min.js',
  '.min.css',
  '.bundle.js',
  '.chunk.js',
  // Source maps
  '.map',
  // Images
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.ico',
  '.webp',
  '.bmp',
  // Fonts
  '.woff',
  '.woff2',
  '.ttf',
  '.eot',
  '.otf',
  // Media
  '.mp3',
  '.mp4',
  '.wav',
  '.avi',
  '.mov',
  '.webm',
  // Documents
  '.pdf',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  // Archives
  '.zip',
  '.tar',
  '.gz',
  '.rar',
  '.7z',
  '.jar',
  // Compiled
  '.pyc',
  '.pyo',
  '.class',
  '.o',
  '.a',
  '.so',
  '.dylib',
  '.dll',
  '.exe',
  '.wasm',
]);

/**
 * Specific filenames to always skip
 */
const SKIP_FILENAMES = new Set([
  'package-lock.json',
  'npm-shrinkwrap.json',
  'pnpm-lock.yaml',
  'yarn.lock',
  'poetry.lock',
  'Cargo.lock',
  'Gemfile.lock',
  'composer.lock',
  'go.sum',
  '.DS_Store',
  'Thumbs.db',
]);

const IGNORE_FILES = ['.gitignore', '.repodocignore'];

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * Whether a resolved path lies at or below the resolved root
 */
export function isInside(rootReal: string, candidateReal: string): boolean {
  const prefix = rootReal.endsWith(sep) ? rootReal : rootReal + sep;
  return candidateReal === rootReal || candidateReal.startsWith(prefix);
}

/**
 * Load and combine ignore patterns
 */
async function loadIgnorePatterns(
  rootPath: string,
  excludePatterns: string[],
  useIgnoreFiles: boolean
): Promise<Ignore> {
  // Names made only of dots ("...") are legal entries, not parent references
  const ig = ignore({ allowRelativePaths: true });

  for (const ext of SKIP_EXTENSIONS) {
    ig.add(`*${ext}`);
  }

  for (const filename of SKIP_FILENAMES) {
    ig.add(filename);
  }

  if (useIgnoreFiles) {
    for (const name of IGNORE_FILES) {
      try {
        ig.add(await readFile(join(rootPath, name), 'utf-8'));
      } catch {
        // optional file
      }
    }
  }

  ig.add(excludePatterns);

  return ig;
}

/**
 * FileWalker class for traversing repositories
 */
export class FileWalker {
  private rootPath: string;
  private options: Required<Omit<FileWalkerOptions, 'signal'>> & { signal?: AbortSignal };
  private warnings: PipelineWarning[] = [];
  private summary: FileWalkerSummary = FileWalker.emptySummary();

  constructor(rootPath: string, options: FileWalkerOptions = {}) {
    this.rootPath = rootPath;
    this.options = {
      maxFiles: options.maxFiles ?? 10000,
      excludePatterns: options.excludePatterns ?? [],
      useIgnoreFiles: options.useIgnoreFiles ?? true,
      onProgress: options.onProgress ?? (() => {}),
      signal: options.signal,
    };
  }

  private static emptySummary(): FileWalkerSummary {
    return {
      totalFiles: 0,
      totalDirectories: 0,
      byExtension: {},
      skippedCount: 0,
      skippedReasons: {},
    };
  }

  /**
   * Warnings recorded by the most recent walk
   */
  getWarnings(): readonly PipelineWarning[] {
    return [...this.warnings];
  }

  /**
   * Counters for the most recent walk
   */
  getSummary(): FileWalkerSummary {
    return {
      ...this.summary,
      byExtension: { ...this.summary.byExtension },
      skippedReasons: { ...this.summary.skippedReasons },
    };
  }

  private recordSkip(reason: string): void {
    this.summary.skippedCount++;
    this.summary.skippedReasons[reason] = (this.summary.skippedReasons[reason] ?? 0) + 1;
  }

  private warn(path: string, message: string): void {
    this.warnings.push({ code: 'WALK_WARNING', message, path });
    logger.debug(`Walk: ${path}: ${message}`);
  }

  private shouldSkipDirectory(dirName: string, depth: number): boolean {
    if (SKIP_DIRECTORIES.has(dirName)) return true;
    if (depth > 0 && SKIP_DIRECTORIES_NOT_ROOT.has(dirName)) return true;
    return SKIP_DIRECTORY_SUFFIXES.some((suffix) => dirName.endsWith(suffix));
  }

  /**
   * Resolve the walk root, failing with ACCESS_ERROR when it is unusable
   */
  private async resolveRoot(): Promise<string> {
    let rootReal: string;
    try {
      rootReal = await realpath(this.rootPath);
    } catch (error) {
      throw errors.accessError(this.rootPath, (error as NodeJS.ErrnoException).code ?? 'not found');
    }

    const rootStat = await stat(rootReal).catch(() => null);
    if (!rootStat?.isDirectory()) {
      throw errors.accessError(this.rootPath, 'not a directory');
    }

    try {
      const dir = await opendir(rootReal);
      await dir.close();
    } catch (error) {
      throw errors.accessError(this.rootPath, (error as NodeJS.ErrnoException).code ?? 'unreadable');
    }

    return rootReal;
  }

  /**
   * Walk the repository, yielding FileRecords lazily.
   *
   * Each call starts a fresh walk. Entries are visited in name order,
   * subdirectories before files.
   */
  async *walk(): AsyncGenerator<FileRecord, void, undefined> {
    this.warnings = [];
    this.summary = FileWalker.emptySummary();

    const rootReal = await this.resolveRoot();
    const ig = await loadIgnorePatterns(
      rootReal,
      this.options.excludePatterns,
      this.options.useIgnoreFiles
    );
    const visited = new Set<string>();

    yield* this.walkDirectory(rootReal, rootReal, 0, ig, visited);
  }

  private async *walkDirectory(
    dirReal: string,
    rootReal: string,
    depth: number,
    ig: Ignore,
    visited: Set<string>
  ): AsyncGenerator<FileRecord, void, undefined> {
    if (this.options.signal?.aborted) return;
    if (this.summary.totalFiles >= this.options.maxFiles) return;
    if (visited.has(dirReal)) {
      this.recordSkip('cycle');
      return;
    }
    visited.add(dirReal);

    this.summary.totalDirectories++;
    const relativeDir = toPosix(relative(rootReal, dirReal));
    this.options.onProgress({
      filesFound: this.summary.totalFiles,
      directoriesScanned: this.summary.totalDirectories,
      currentPath: relativeDir || '.',
    });

    const entries: { name: string; kind: 'directory' | 'file' }[] = [];
    try {
      const dir = await opendir(dirReal);
      for await (const entry of dir) {
        if (entry.isDirectory()) {
          entries.push({ name: entry.name, kind: 'directory' });
        } else if (entry.isFile()) {
          entries.push({ name: entry.name, kind: 'file' });
        } else if (entry.isSymbolicLink()) {
          const kind = await this.resolveLinkKind(join(dirReal, entry.name));
          if (kind) entries.push({ name: entry.name, kind });
        }
      }
    } catch (error) {
      this.recordSkip('error');
      this.warn(relativeDir || '.', `directory unreadable (${(error as NodeJS.ErrnoException).code ?? 'error'})`);
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries.filter((e) => e.kind === 'directory')) {
      if (this.options.signal?.aborted) return;
      if (this.summary.totalFiles >= this.options.maxFiles) return;

      const relativeSubPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (this.shouldSkipDirectory(entry.name, depth)) {
        this.recordSkip(`directory:${entry.name}`);
        continue;
      }
      if (ig.ignores(`${relativeSubPath}/`)) {
        this.recordSkip('ignored');
        continue;
      }

      const subReal = await this.resolveInside(join(dirReal, entry.name), rootReal, relativeSubPath);
      if (!subReal) continue;

      yield* this.walkDirectory(subReal, rootReal, depth + 1, ig, visited);
    }

    for (const entry of entries.filter((e) => e.kind === 'file')) {
      if (this.options.signal?.aborted) return;
      if (this.summary.totalFiles >= this.options.maxFiles) {
        this.recordSkip('max-files');
        return;
      }

      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (ig.ignores(relativePath)) {
        this.recordSkip('ignored');
        continue;
      }

      const record = await this.processFile(join(dirReal, entry.name), rootReal, relativePath, entry.name, depth);
      if (record) yield record;
    }
  }

  /**
   * Classify what a symbolic link points at; dangling links are skipped
   */
  private async resolveLinkKind(linkPath: string): Promise<'directory' | 'file' | null> {
    try {
      const target = await stat(linkPath);
      if (target.isDirectory()) return 'directory';
      if (target.isFile()) return 'file';
      return null;
    } catch {
      this.recordSkip('dangling-link');
      return null;
    }
  }

  /**
   * Real path of an entry, or null when it escapes the root
   */
  private async resolveInside(path: string, rootReal: string, relativePath: string): Promise<string | null> {
    try {
      const real = await realpath(path);
      if (!isInside(rootReal, real)) {
        this.recordSkip('outside-root');
        return null;
      }
      return real;
    } catch (error) {
      this.recordSkip('error');
      this.warn(relativePath, `cannot resolve (${(error as NodeJS.ErrnoException).code ?? 'error'})`);
      return null;
    }
  }

  private async processFile(
    filePath: string,
    rootReal: string,
    relativePath: string,
    fileName: string,
    depth: number
  ): Promise<FileRecord | null> {
    const real = await this.resolveInside(filePath, rootReal, relativePath);
    if (!real) return null;

    try {
      const fileStat = await stat(real);
      const extension = extname(fileName).toLowerCase();

      const record: FileRecord = {
        path: relativePath,
        absolutePath: filePath,
        name: fileName,
        extension,
        size: fileStat.size,
        depth,
      };

      this.summary.totalFiles++;
      const ext = extension || '(no extension)';
      this.summary.byExtension[ext] = (this.summary.byExtension[ext] ?? 0) + 1;

      return record;
    } catch (error) {
      this.recordSkip('error');
      this.warn(relativePath, `file unreadable (${(error as NodeJS.ErrnoException).code ?? 'error'})`);
      return null;
    }
  }
}

/**
 * Walk a repository and collect every record
 */
export async function collectFiles(
  rootPath: string,
  options?: FileWalkerOptions
): Promise<FileWalkerResult> {
  const walker = new FileWalker(rootPath, options);
  const files: FileRecord[] = [];

  for await (const file of walker.walk()) {
    files.push(file);
  }

  return {
    files,
    warnings: walker.getWarnings(),
    summary: walker.getSummary(),
    rootPath,
  };
}
