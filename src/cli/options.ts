/**
 * Option parsing shared by the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import type {
  AnalysisCommandOptions,
  AnalyzeOptions,
  PipelineStage,
  PipelineWarning,
} from '../types/index.js';
import { resolveModel, type RepodocConfig } from '../core/services/config-manager.js';
import { logger } from '../utils/logger.js';

/**
 * Parse a positive integer option value
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Accumulate a repeatable option
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Pipeline options from configuration, with command-line flags taking precedence
 */
export function buildAnalyzeOptions(
  config: RepodocConfig,
  options: AnalysisCommandOptions,
  dryRun: boolean
): AnalyzeOptions {
  return {
    model: resolveModel(config, options.model),
    verbose: options.verbose,
    dryRun,
    maxKeyFiles: options.maxKeyFiles ?? config.generation.maxKeyFiles,
    maxBytesPerFile: options.maxBytesPerFile ?? config.generation.maxBytesPerFile,
    maxTotalPromptBytes: options.maxPromptBytes ?? config.generation.maxTotalPromptBytes,
    maxSelectionBytes: config.generation.maxSelectionBytes,
    excludePatterns: [...config.exclude, ...options.exclude],
  };
}

export const STAGE_LABELS: Record<PipelineStage, string> = {
  walk: 'Scanning repository...',
  classify: 'Classifying languages...',
  select: 'Selecting key files...',
  sample: 'Reading key files...',
  assemble: 'Assembling prompt...',
  generate: 'Generating document...',
};

/**
 * Print accumulated pipeline warnings
 */
export function reportWarnings(warnings: readonly PipelineWarning[]): void {
  for (const warning of warnings) {
    logger.warning(warning.path ? `${warning.path}: ${warning.message}` : warning.message);
  }
}
