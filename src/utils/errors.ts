/**
 * Custom error classes for repodoc with helpful user-facing messages
 */

import logger from './logger.js';

export type ErrorCode =
  | 'ACCESS_ERROR'
  | 'SELECTION_EMPTY'
  | 'PROMPT_BUDGET_EXCEEDED'
  | 'CANCELLED'
  | 'BACKEND_TRANSIENT_FAILURE'
  | 'BACKEND_TERMINAL_FAILURE'
  | 'NO_API_KEY'
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'FILE_WRITE_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Where a failure happened. "analysis" means the repository could not be
 * analyzed, "generation" means the document could not be produced.
 */
export type ErrorStage = 'analysis' | 'generation' | 'config' | 'output' | 'unknown';

/**
 * Base error class for repodoc with code, stage and suggestion
 */
export class RepodocError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public stage: ErrorStage,
    public suggestion?: string,
    public detail?: string
  ) {
    super(message);
    this.name = 'RepodocError';
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * True for failures that happened while reading the repository
   */
  get isAnalysisFailure(): boolean {
    return this.stage === 'analysis';
  }

  /**
   * True for failures reported by (or on the way to) the generation backend
   */
  get isGenerationFailure(): boolean {
    return this.stage === 'generation';
  }

  /**
   * Format error for CLI display with color support
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const reset = useColor ? '\x1b[0m' : '';
    const dim = useColor ? '\x1b[2m' : '';

    const heading = this.stage === 'generation'
      ? 'Could not generate document'
      : this.stage === 'analysis'
        ? 'Could not analyze repository'
        : 'Error';

    let output = `${red}${heading} [${this.code}]:${reset} ${this.message}`;

    if (this.detail) {
      output += `\n${dim}${this.detail}${reset}`;
    }

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    return output;
  }
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  accessError(path: string, reason?: string): RepodocError {
    return new RepodocError(
      `Repository path is not readable: ${path}${reason ? ` (${reason})` : ''}`,
      'ACCESS_ERROR',
      'analysis',
      'Check that the path exists, is a directory and that you have read permission.'
    );
  },

  selectionEmpty(): RepodocError {
    return new RepodocError(
      'No key files could be selected from the repository',
      'SELECTION_EMPTY',
      'analysis',
      `The repository has no recognizable source files or manifests.
Check the path, or relax --exclude patterns and the key-file byte budget.`
    );
  },

  promptBudgetExceeded(size: number, budget: number): RepodocError {
    return new RepodocError(
      `Prompt needs ${size} bytes before any file content, budget is ${budget}`,
      'PROMPT_BUDGET_EXCEEDED',
      'analysis',
      'Raise --max-prompt-bytes or lower --max-key-files.'
    );
  },

  cancelled(stage: 'analysis' | 'generation'): RepodocError {
    return new RepodocError(
      'Run was cancelled',
      'CANCELLED',
      stage
    );
  },

  backendTransient(message: string): RepodocError {
    return new RepodocError(
      `Generation backend is temporarily unavailable: ${message}`,
      'BACKEND_TRANSIENT_FAILURE',
      'generation',
      'Wait a few minutes and try again.'
    );
  },

  backendTerminal(message: string, detail?: string, attempts = 1): RepodocError {
    return new RepodocError(
      `Generation backend request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${message}`,
      'BACKEND_TERMINAL_FAILURE',
      'generation',
      'Check your API key, model name and account quota.',
      detail
    );
  },

  noApiKey(provider: string): RepodocError {
    return new RepodocError(
      `No API key found for provider "${provider}"`,
      'NO_API_KEY',
      'config',
      `Set ${provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'} or add the key to secrets.yaml.
Run 'repodoc init' to create the configuration files.`
    );
  },

  configNotFound(path: string): RepodocError {
    return new RepodocError(
      `Configuration not found in ${path}`,
      'CONFIG_NOT_FOUND',
      'config',
      `Run 'repodoc init' to create a configuration directory.`
    );
  },

  invalidConfig(path: string, details?: string): RepodocError {
    return new RepodocError(
      `Invalid configuration file at ${path}${details ? `: ${details}` : ''}`,
      'INVALID_CONFIG',
      'config',
      `Check the YAML syntax, or delete the file and run 'repodoc init' again.`
    );
  },

  fileWriteError(path: string, reason?: string): RepodocError {
    return new RepodocError(
      `Failed to write file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_WRITE_ERROR',
      'output',
      'Check that you have write permissions for the directory, or use --dry-run.'
    );
  },

  unknown(error: unknown): RepodocError {
    return new RepodocError(
      `An unexpected error occurred: ${errorMessage(error)}`,
      'UNKNOWN_ERROR',
      'unknown',
      'Run again with --debug for more details.'
    );
  },
};

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Type guard to check if an error is a RepodocError
 */
export function isRepodocError(error: unknown): error is RepodocError {
  return error instanceof RepodocError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isRepodocError(error)) {
    return error.format(useColor);
  }

  return errors.unknown(error).format(useColor);
}

/**
 * Handle errors in CLI commands by formatting and logging them
 */
export function handleError(error: unknown): void {
  const useColor = process.stderr.isTTY === true && !logger.getOptions().noColor;
  console.error(formatError(error, useColor));
  process.exitCode = 1;
}
