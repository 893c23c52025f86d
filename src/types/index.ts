/**
 * Core type definitions for repodoc
 */

import type { RepodocError } from '../utils/errors.js';

// File records produced by the tree walker
export interface FileRecord {
  /** Path relative to the repository root, always '/'-separated */
  readonly path: string;
  readonly absolutePath: string;
  readonly name: string;
  /** Lower-cased extension including the dot, '' when none */
  readonly extension: string;
  /** Size in bytes */
  readonly size: number;
  /** Number of directories between the root and the file */
  readonly depth: number;
}

export interface FileWalkerSummary {
  totalFiles: number;
  totalDirectories: number;
  byExtension: Record<string, number>;
  skippedCount: number;
  skippedReasons: Record<string, number>;
}

export interface FileWalkerResult {
  files: readonly FileRecord[];
  warnings: readonly PipelineWarning[];
  summary: FileWalkerSummary;
  rootPath: string;
}

// Language classification
export interface LanguageShare {
  readonly language: string;
  /** Share of all scanned bytes, 0..1 */
  readonly score: number;
  readonly bytes: number;
  readonly fileCount: number;
}

export interface LanguageProfile {
  /** Ordered by bytes desc, file count desc, language asc */
  readonly languages: readonly LanguageShare[];
  readonly totalBytes: number;
  readonly classifiedBytes: number;
  readonly otherBytes: number;
  /** True when no file could be classified */
  readonly degraded: boolean;
}

// Key-file selection
export type KeyFileTier = 'entry-point' | 'manifest' | 'module';

export interface KeyFile extends FileRecord {
  readonly tier: KeyFileTier;
}

export interface KeyFileSet {
  readonly files: readonly KeyFile[];
  readonly totalBytes: number;
}

// Content sampling
export interface ContentSnippet {
  readonly file: KeyFile;
  readonly text: string;
  readonly truncated: boolean;
  readonly unreadable: boolean;
  readonly reason?: string;
  /** Length of the decoded text before truncation */
  readonly originalLength: number;
}

// Prompt payload
export type Verbosity = 'concise' | 'detailed';

export interface PromptFileEntry {
  readonly path: string;
  readonly size: number;
  readonly tier: KeyFileTier;
  readonly truncated: boolean;
  readonly unreadable: boolean;
}

export interface PromptPayload {
  readonly model: string;
  readonly verbosity: Verbosity;
  readonly projectType: string;
  readonly systemPrompt: string;
  readonly userPrompt: string;
  readonly maxOutputTokens: number;
  readonly temperature: number;
  readonly languageProfile: LanguageProfile;
  readonly keyFiles: readonly PromptFileEntry[];
  /** Paths whose content made it into the prompt, in priority order */
  readonly snippets: readonly string[];
  /** Paths dropped to stay within the prompt budget */
  readonly omitted: readonly string[];
  /** UTF-8 byte length of systemPrompt + userPrompt */
  readonly size: number;
}

// Warnings accumulated during a run
export type PipelineWarningCode =
  | 'WALK_WARNING'
  | 'CLASSIFICATION_DEGRADED'
  | 'SAMPLING_WARNING'
  | 'PROMPT_REDUCED';

export interface PipelineWarning {
  readonly code: PipelineWarningCode;
  readonly message: string;
  readonly path?: string;
}

// Generation
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GenerationSuccess {
  status: 'success';
  text: string;
  model: string;
  attempts: number;
  usage: TokenUsage;
  warnings: readonly PipelineWarning[];
  payload?: PromptPayload;
}

export interface GenerationFailure {
  status: 'failure';
  error: RepodocError;
  attempts: number;
  warnings: readonly PipelineWarning[];
  payload?: PromptPayload;
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

// Pipeline options
export interface AnalyzeOptions {
  /** Backend model identifier */
  model: string;
  /** Selects the detailed template instead of the concise one */
  verbose: boolean;
  /** Passed through to the output writer; the pipeline never persists anything */
  dryRun: boolean;
  maxKeyFiles: number;
  /** Per-file character cap applied by the content sampler */
  maxBytesPerFile: number;
  maxTotalPromptBytes: number;
  /** Cumulative size budget for the key-file selection */
  maxSelectionBytes?: number;
  excludePatterns?: string[];
}

export type PipelineStage =
  | 'walk'
  | 'classify'
  | 'select'
  | 'sample'
  | 'assemble'
  | 'generate';

// CLI option types
export interface GlobalOptions {
  quiet: boolean;
  debug: boolean;
  /** false when --no-color is given */
  color: boolean;
  config?: string;
}

export interface AnalysisCommandOptions extends GlobalOptions {
  model?: string;
  verbose: boolean;
  maxKeyFiles?: number;
  maxBytesPerFile?: number;
  maxPromptBytes?: number;
  exclude: string[];
}

export interface GenerateCommandOptions extends AnalysisCommandOptions {
  dryRun: boolean;
  output?: string;
  yes: boolean;
}

export interface InspectCommandOptions extends AnalysisCommandOptions {
  json: boolean;
}

export interface InitCommandOptions extends GlobalOptions {
  dir?: string;
  force: boolean;
}
