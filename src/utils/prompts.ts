/**
 * Interactive prompts for the repodoc CLI
 *
 * Every prompt answers with its default when the session is not interactive
 * (no TTY, CI, or --yes).
 */

import { confirm } from '@inquirer/prompts';

let interactiveMode = process.stdin.isTTY === true && !process.env.CI;

/**
 * Force interactive mode on or off
 */
export function setInteractiveMode(enabled: boolean): void {
  interactiveMode = enabled;
}

/**
 * Ask a yes/no question, falling back to the default when non-interactive
 */
export async function confirmAction(message: string, defaultValue: boolean): Promise<boolean> {
  if (!interactiveMode) {
    return defaultValue;
  }
  return confirm({ message, default: defaultValue });
}

/**
 * Ask before replacing an existing document
 */
export async function confirmOverwrite(filePath: string): Promise<boolean> {
  return confirmAction(`${filePath} already exists. Overwrite it?`, true);
}

/**
 * Ask before replacing existing configuration files
 */
export async function confirmConfigOverwrite(dir: string): Promise<boolean> {
  return confirmAction(`Configuration already exists in ${dir}. Replace it with the defaults?`, false);
}
