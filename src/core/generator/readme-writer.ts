/**
 * README writer
 *
 * Finishes a generated document and either prints it (dry run) or writes it
 * into the repository.
 */

import { access, writeFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { errors, errorMessage } from '../../utils/errors.js';
import { confirmOverwrite } from '../../utils/prompts.js';
import logger from '../../utils/logger.js';

export const FOOTER = '---\n*This README was automatically generated by repodoc*';

const DRY_RUN_HEADER = '=== Generated README Content ===';
const DRY_RUN_RULE = '================================';

export interface WriteDocumentOptions {
  dryRun: boolean;
  /** Target file, relative to the repository root unless absolute */
  output: string;
  /** Overwrite without asking */
  yes: boolean;
  /** Where dry-run output goes */
  print?: (text: string) => void;
}

export type WriteOutcome =
  | { status: 'printed' }
  | { status: 'written'; path: string }
  | { status: 'skipped'; path: string };

/**
 * Append the generated-by footer
 */
export function withFooter(text: string): string {
  return `${text.trimEnd()}\n\n${FOOTER}\n`;
}

/**
 * Dry-run rendering of a document
 */
export function renderDryRun(content: string): string {
  return `\n${DRY_RUN_HEADER}\n\n${content.trimEnd()}\n\n${DRY_RUN_RULE}\n`;
}

/**
 * Absolute path of the output file
 */
export function resolveOutputPath(repoPath: string, output: string): string {
  return isAbsolute(output) ? output : join(repoPath, output);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Print or write the generated document
 */
export async function writeDocument(
  repoPath: string,
  text: string,
  options: WriteDocumentOptions
): Promise<WriteOutcome> {
  const content = withFooter(text);

  if (options.dryRun) {
    const print = options.print ?? ((value: string) => process.stdout.write(value));
    print(renderDryRun(content));
    return { status: 'printed' };
  }

  const target = resolveOutputPath(repoPath, options.output);

  if (!options.yes && (await exists(target)) && !(await confirmOverwrite(target))) {
    logger.warning(`Kept existing ${target}`);
    return { status: 'skipped', path: target };
  }

  try {
    await writeFile(target, content, 'utf-8');
  } catch (error) {
    throw errors.fileWriteError(target, (error as NodeJS.ErrnoException).code ?? errorMessage(error));
  }

  logger.debug(`Wrote ${Buffer.byteLength(content, 'utf8')} bytes to ${target}`);
  return { status: 'written', path: target };
}
