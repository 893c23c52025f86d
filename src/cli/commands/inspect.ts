/**
 * repodoc inspect command
 *
 * Runs the analysis stages without a backend and shows what would be sent:
 * the language profile, the key files and the size of the prompt.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { ShutdownManager } from '../../utils/shutdown.js';
import { loadConfig } from '../../core/services/config-manager.js';
import { prepare, type PreparedRun } from '../../core/pipeline.js';
import type { InspectCommandOptions } from '../../types/index.js';
import {
  buildAnalyzeOptions,
  collect,
  parsePositiveInt,
  reportWarnings,
} from '../options.js';

/**
 * Print a prepared run in human-readable form
 */
export function printPreparedRun(run: PreparedRun): void {
  const { payload, profile, walk } = run;

  logger.section('Languages');
  if (profile.languages.length === 0) {
    logger.listItem('none recognized');
  }
  for (const share of profile.languages) {
    logger.listItem(`${share.language}: ${(share.score * 100).toFixed(1)}% (${share.fileCount} files, ${share.bytes} bytes)`);
  }
  logger.blank();

  logger.section('Key files');
  for (const entry of payload.keyFiles) {
    const flags: string[] = [entry.tier];
    if (entry.truncated) flags.push('truncated');
    if (entry.unreadable) flags.push('unreadable');
    logger.listItem(`${entry.path} (${flags.join(', ')})`);
  }
  logger.blank();

  logger.section('Prompt');
  logger.info('Files scanned', walk.summary.totalFiles);
  logger.info('Project type', payload.projectType);
  logger.info('Model', payload.model);
  logger.info('Template', payload.verbosity);
  logger.info('Size', `${payload.size} bytes`);
  logger.info('Content blocks', payload.snippets.length);
  if (payload.omitted.length > 0) {
    logger.info('Left out', payload.omitted.join(', '));
  }
}

export const inspectCommand = new Command('inspect')
  .description('Show the analysis and prompt without calling a backend')
  .argument('[path]', 'Repository to inspect', '.')
  .option('--model <name>', 'Model to record in the prompt (default: from config)')
  .option('-v, --verbose', 'Use the detailed template', false)
  .option('--max-key-files <n>', 'Maximum number of key files to read', parsePositiveInt)
  .option('--max-bytes-per-file <n>', 'Characters kept from each key file', parsePositiveInt)
  .option('--max-prompt-bytes <n>', 'Size budget of the whole prompt', parsePositiveInt)
  .option('--exclude <pattern>', 'Gitignore-style pattern to skip (repeatable)', collect, [])
  .option('--json', 'Print the prompt payload as JSON', false)
  .addHelpText(
    'after',
    `
Examples:
  $ repodoc inspect                  Inspect the current directory
  $ repodoc inspect --json > prompt.json
`
  )
  .action(async (path: string, _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<InspectCommandOptions>();
    const shutdown = new ShutdownManager();

    try {
      const config = await loadConfig({ configDir: options.config, env: process.env });
      const run = await prepare(
        resolve(path),
        buildAnalyzeOptions(config, options, true),
        shutdown.signal
      );

      if (options.json) {
        process.stdout.write(`${JSON.stringify(run.payload, null, 2)}\n`);
        return;
      }

      printPreparedRun(run);
      if (run.warnings.length > 0) {
        logger.blank();
        reportWarnings(run.warnings);
      }
    } catch (error) {
      handleError(error);
    } finally {
      shutdown.removeHandlers();
    }
  });
