/**
 * repodoc init command
 *
 * Writes a default config.yaml and a secrets.yaml template.
 */

import { Command } from 'commander';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { confirmConfigOverwrite } from '../../utils/prompts.js';
import {
  configExists,
  SECRETS_FILE,
  writeDefaultConfig,
} from '../../core/services/config-manager.js';
import type { InitCommandOptions } from '../../types/index.js';

/**
 * Default directory for user configuration
 */
export function defaultConfigDir(): string {
  return join(homedir(), '.config', 'repodoc');
}

export const initCommand = new Command('init')
  .description('Create default configuration files')
  .option('--dir <path>', 'Configuration directory (default: ~/.config/repodoc)')
  .option('--force', 'Overwrite existing configuration', false)
  .addHelpText(
    'after',
    `
Examples:
  $ repodoc init                     Write ~/.config/repodoc/config.yaml
  $ repodoc init --dir .repodoc      Project-local configuration
`
  )
  .action(async (_options: unknown, command: Command) => {
    const options = command.optsWithGlobals<InitCommandOptions>();
    const dir = options.dir ? resolve(options.dir) : defaultConfigDir();

    try {
      if (!options.force && (await configExists(dir)) && !(await confirmConfigOverwrite(dir))) {
        logger.info('Aborted', 'Use --force to overwrite without prompting');
        return;
      }

      const written = await writeDefaultConfig(dir);

      logger.success('Configuration created');
      logger.listItem(written.configPath, 1);
      logger.listItem(written.secretsTemplatePath, 1);
      logger.blank();
      logger.info('Next', `copy the template to ${join(dir, SECRETS_FILE)} and add your API key`);
    } catch (error) {
      handleError(error);
    }
  });
