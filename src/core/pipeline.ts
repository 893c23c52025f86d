/**
 * Analysis pipeline
 *
 * Runs the stages in order: walk, classify, select, sample, assemble, generate.
 * Cancellation is checked between stages, so a cancelled run never reaches the
 * backend. Per-file problems are collected as warnings; fatal conditions stop
 * the run and come back as a failure result.
 */

import { resolve } from 'node:path';
import type {
  AnalyzeOptions,
  ContentSnippet,
  FileWalkerResult,
  GenerationResult,
  KeyFileSet,
  LanguageProfile,
  PipelineStage,
  PipelineWarning,
  PromptPayload,
} from '../types/index.js';
import { collectFiles } from './analyzer/file-walker.js';
import { classifyLanguages } from './analyzer/language-classifier.js';
import { selectKeyFiles, DEFAULT_SELECTOR_OPTIONS } from './analyzer/key-file-selector.js';
import { sampleContent } from './analyzer/content-sampler.js';
import { assemblePrompt } from './generator/prompt-assembler.js';
import { GenerationOrchestrator, type RetryOptions } from './generator/generation-orchestrator.js';
import type { LLMProvider } from './services/llm-service.js';
import { errors, isRepodocError } from '../utils/errors.js';
import logger from '../utils/logger.js';

/**
 * Everything the analysis stages produced, up to the prompt payload
 */
export interface PreparedRun {
  walk: FileWalkerResult;
  profile: LanguageProfile;
  keyFiles: KeyFileSet;
  snippets: readonly ContentSnippet[];
  payload: PromptPayload;
  warnings: readonly PipelineWarning[];
}

export interface PipelineContext {
  provider: LLMProvider;
  retry?: RetryOptions;
  signal?: AbortSignal;
  /** Called as each stage starts */
  onStage?: (stage: PipelineStage) => void;
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw errors.cancelled('analysis');
  }
}

async function runAnalysis(
  repoPath: string,
  options: AnalyzeOptions,
  warnings: PipelineWarning[],
  signal?: AbortSignal,
  onStage?: (stage: PipelineStage) => void
): Promise<PreparedRun> {
  const enter = (stage: PipelineStage): void => {
    checkCancelled(signal);
    logger.debug(`Stage: ${stage}`);
    onStage?.(stage);
  };

  enter('walk');
  const walk = await collectFiles(resolve(repoPath), {
    excludePatterns: options.excludePatterns,
    signal,
  });
  warnings.push(...walk.warnings);

  enter('classify');
  const profile = await classifyLanguages(walk.files);
  if (profile.degraded) {
    warnings.push({
      code: 'CLASSIFICATION_DEGRADED',
      message: 'No source files could be classified; selecting top-level files instead',
    });
  }

  enter('select');
  const keyFiles = selectKeyFiles(walk.files, profile, {
    maxKeyFiles: options.maxKeyFiles,
    maxSelectionBytes: options.maxSelectionBytes ?? DEFAULT_SELECTOR_OPTIONS.maxSelectionBytes,
  });

  enter('sample');
  const sampling = await sampleContent(keyFiles, { maxBytesPerFile: options.maxBytesPerFile });
  warnings.push(...sampling.warnings);

  enter('assemble');
  const assembly = assemblePrompt(profile, keyFiles, sampling.snippets, {
    model: options.model,
    verbosity: options.verbose ? 'detailed' : 'concise',
    maxTotalPromptBytes: options.maxTotalPromptBytes,
  });
  warnings.push(...assembly.warnings);

  return {
    walk,
    profile,
    keyFiles,
    snippets: sampling.snippets,
    payload: assembly.payload,
    warnings: [...warnings],
  };
}

/**
 * Run the analysis stages without contacting a backend.
 *
 * Throws a RepodocError for fatal conditions.
 */
export async function prepare(
  repoPath: string,
  options: AnalyzeOptions,
  signal?: AbortSignal
): Promise<PreparedRun> {
  return runAnalysis(repoPath, options, [], signal);
}

/**
 * Analyze a repository and generate its document.
 *
 * Never throws: every failure comes back as a failure result with the
 * warnings gathered up to that point.
 */
export async function analyze(
  repoPath: string,
  options: AnalyzeOptions,
  context: PipelineContext
): Promise<GenerationResult> {
  const warnings: PipelineWarning[] = [];

  let prepared: PreparedRun;
  try {
    prepared = await runAnalysis(repoPath, options, warnings, context.signal, context.onStage);
  } catch (error) {
    return {
      status: 'failure',
      error: isRepodocError(error) ? error : errors.unknown(error),
      attempts: 0,
      warnings: [...warnings],
    };
  }

  if (context.signal?.aborted) {
    return {
      status: 'failure',
      error: errors.cancelled('analysis'),
      attempts: 0,
      warnings: prepared.warnings,
      payload: prepared.payload,
    };
  }

  context.onStage?.('generate');
  const orchestrator = new GenerationOrchestrator(context.provider, context.retry);
  return orchestrator.generate(prepared.payload, context.signal, prepared.warnings);
}
