/**
 * repodoc generate command
 *
 * Analyzes a repository, asks the configured backend for a README and writes
 * it next to the code (or prints it with --dry-run).
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { setInteractiveMode } from '../../utils/prompts.js';
import { ShutdownManager } from '../../utils/shutdown.js';
import { loadConfig, resolveProviderConfig } from '../../core/services/config-manager.js';
import { createProvider } from '../../core/services/llm-service.js';
import { analyze } from '../../core/pipeline.js';
import { writeDocument } from '../../core/generator/readme-writer.js';
import type { GenerateCommandOptions } from '../../types/index.js';
import {
  buildAnalyzeOptions,
  collect,
  parsePositiveInt,
  reportWarnings,
  STAGE_LABELS,
} from '../options.js';

export const generateCommand = new Command('generate')
  .description('Generate a README for a repository')
  .argument('[path]', 'Repository to document', '.')
  .option('--model <name>', 'Model to use (default: from config)')
  .option('-v, --verbose', 'Generate detailed documentation', false)
  .option('-d, --dry-run', 'Print the README instead of writing it', false)
  .option('--max-key-files <n>', 'Maximum number of key files to read', parsePositiveInt)
  .option('--max-bytes-per-file <n>', 'Characters kept from each key file', parsePositiveInt)
  .option('--max-prompt-bytes <n>', 'Size budget of the whole prompt', parsePositiveInt)
  .option('--exclude <pattern>', 'Gitignore-style pattern to skip (repeatable)', collect, [])
  .option('-o, --output <file>', 'Output file, relative to the repository (default: README.md)')
  .option('-y, --yes', 'Skip all prompts', false)
  .addHelpText(
    'after',
    `
Examples:
  $ repodoc generate                 Document the current directory
  $ repodoc generate ../my-project   Document another repository
  $ repodoc generate -v --dry-run    Print a detailed README without writing it
  $ repodoc generate --exclude "docs/**" --max-key-files 8
`
  )
  .action(async (path: string, _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<GenerateCommandOptions>();
    const repoPath = resolve(path);
    const shutdown = new ShutdownManager();

    if (options.yes) {
      setInteractiveMode(false);
    }

    try {
      const config = await loadConfig({ configDir: options.config, env: process.env });
      const analyzeOptions = buildAnalyzeOptions(config, options, options.dryRun);
      const provider = createProvider(resolveProviderConfig(config, options.model));

      logger.section('Generating README');
      logger.info('Repository', repoPath);
      logger.info('Model', analyzeOptions.model);
      logger.info('Template', analyzeOptions.verbose ? 'detailed' : 'concise');
      logger.blank();

      const spinner = logger.spinner(STAGE_LABELS.walk);
      const stopSpinner = (): void => spinner.stop();
      shutdown.onCleanup(stopSpinner);
      const result = await analyze(repoPath, analyzeOptions, {
        provider,
        retry: config.retry,
        signal: shutdown.signal,
        onStage: (stage) => spinner.update(STAGE_LABELS[stage]),
      });
      shutdown.removeCleanup(stopSpinner);

      if (result.status === 'failure') {
        spinner.fail('Generation failed');
        reportWarnings(result.warnings);
        if (result.error.code === 'CANCELLED') {
          logger.warning('Cancelled, nothing was written');
          return;
        }
        handleError(result.error);
        return;
      }

      spinner.succeed(
        `Generated with ${result.model} (${result.attempts} attempt${result.attempts === 1 ? '' : 's'}, ${result.usage.totalTokens} tokens)`
      );
      if (result.payload) {
        logger.discovery(
          `${result.payload.keyFiles.length} key files from a ${result.payload.projectType} project`
        );
        logger.inference(
          `Prompt of ${result.payload.size} bytes with ${result.payload.snippets.length} content blocks`
        );
      }
      reportWarnings(result.warnings);

      const outcome = await writeDocument(repoPath, result.text, {
        dryRun: options.dryRun,
        output: options.output ?? config.generation.output,
        yes: options.yes,
      });

      if (outcome.status === 'written') {
        logger.success(`README written to ${outcome.path}`);
      }
    } catch (error) {
      handleError(error);
    } finally {
      shutdown.removeHandlers();
    }
  });
