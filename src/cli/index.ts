#!/usr/bin/env node

/**
 * repodoc CLI entry point
 *
 * Reads a repository, picks the files that explain it and asks a language
 * model to write its README.
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { inspectCommand } from './commands/inspect.js';
import { initCommand } from './commands/init.js';
import { configureLogger } from '../utils/logger.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  configureLogger({
    quiet: opts.quiet ?? false,
    verbose: opts.debug ?? false,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('repodoc')
  .description('Generate a README for a repository from its own source code.')
  .version('1.0.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('--debug', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .option('--config <dir>', 'Configuration directory')
  .addHelpText(
    'after',
    `
Quick start:
  $ repodoc init                     Create ~/.config/repodoc/config.yaml
  $ export OPENAI_API_KEY=...        Or add the key to secrets.yaml
  $ repodoc inspect                  See what would be sent
  $ repodoc                          Write README.md for the current directory

Configuration is searched in --config, ./.repodoc/, ~/.config/repodoc/
and /etc/repodoc/.
`
  );

program.addCommand(generateCommand, { isDefault: true });
program.addCommand(inspectCommand);
program.addCommand(initCommand);

await program.parseAsync();
