/**
 * Prompt Assembler
 *
 * Composes the exact request sent to the generation backend from the language
 * profile, the key files and their sampled content. The result is bounded by a
 * byte budget: snippets are dropped from the tail of the key-file order until
 * the prompt fits, and are never cut further than the sampler already did.
 */

import type {
  ContentSnippet,
  KeyFileSet,
  LanguageProfile,
  PipelineWarning,
  PromptFileEntry,
  PromptPayload,
  Verbosity,
} from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { projectTypeName } from '../analyzer/language-classifier.js';

export interface PromptAssemblerOptions {
  model: string;
  verbosity: Verbosity;
  maxTotalPromptBytes: number;
}

export interface AssemblyResult {
  payload: PromptPayload;
  warnings: readonly PipelineWarning[];
}

const MAX_OUTPUT_TOKENS: Record<Verbosity, number> = {
  concise: 1000,
  detailed: 2000,
};

const TEMPERATURE = 0.7;

// ============================================================================
// TEMPLATES
// ============================================================================

/**
 * Instruction block for a verbosity level
 */
export function instructionTemplate(verbosity: Verbosity, projectType: string): string {
  if (verbosity === 'detailed') {
    return [
      `You are analyzing a ${projectType} project's source code to write a comprehensive README.md.`,
      'The files below were selected automatically: entry points first, then manifests, then core modules.',
      '',
      'While reading the code:',
      '1. Find the main entry points and the core functionality',
      '2. Work out the purpose of the project and its primary features',
      '3. Note command-line arguments, API endpoints and configuration options',
      '4. Collect required dependencies from imports and manifest files',
      '',
      'The README must contain:',
      '1. Project title, based on the main functionality',
      '2. A clear description of what the code actually does',
      `3. Installation instructions specific to ${projectType}`,
      '4. Usage examples based on the actual implementation',
      '5. Project structure, focusing on the key files',
      '6. Dependencies, based on actual imports and manifests',
      '7. Contributing guidelines',
      '8. License information, if any was found',
      '',
      'Do not add a footer; one is appended automatically.',
    ].join('\n');
  }

  return [
    `You are analyzing a ${projectType} project's source code to write a concise README.md.`,
    'The files below were selected automatically as the most important ones.',
    '',
    'Write a brief README covering:',
    '1. What the code actually does, based on the implementation',
    '2. How to use it, based on the code patterns found',
    `3. Basic requirements specific to ${projectType}`,
    '',
    'Be direct and accurate. Only describe functionality that exists in the code.',
    'Do not add a footer; one is appended automatically.',
  ].join('\n');
}

/**
 * System prompt naming the project type
 */
export function systemPrompt(projectType: string): string {
  return `You are a technical documentation expert specializing in ${projectType}. `
    + 'Write README.md content based ONLY on the code provided, never on assumptions. '
    + 'Answer with the Markdown document only.';
}

// ============================================================================
// SECTIONS
// ============================================================================

function languageSection(profile: LanguageProfile): string {
  const lines = ['## Languages'];

  if (profile.languages.length === 0) {
    lines.push('- Unknown (no recognized source files)');
  }
  for (const share of profile.languages) {
    const files = `${share.fileCount} file${share.fileCount === 1 ? '' : 's'}`;
    lines.push(`- ${share.language}: ${(share.score * 100).toFixed(1)}% (${files})`);
  }

  return lines.join('\n');
}

function fileEntries(
  keyFiles: KeyFileSet,
  byPath: ReadonlyMap<string, ContentSnippet>
): PromptFileEntry[] {
  return keyFiles.files.map((file) => {
    const snippet = byPath.get(file.path);
    return Object.freeze({
      path: file.path,
      size: file.size,
      tier: file.tier,
      truncated: snippet?.truncated ?? false,
      unreadable: snippet?.unreadable ?? true,
    });
  });
}

function keyFileSection(
  entries: readonly PromptFileEntry[],
  byPath: ReadonlyMap<string, ContentSnippet>
): string {
  const lines = ['## Key files'];

  for (const entry of entries) {
    const notes = [entry.tier, `${entry.size} bytes`];
    if (entry.truncated) notes.push('truncated');
    if (entry.unreadable) notes.push(`unreadable: ${byPath.get(entry.path)?.reason ?? 'not sampled'}`);
    lines.push(`- ${entry.path} (${notes.join(', ')})`);
  }

  return lines.join('\n');
}

/**
 * A backtick fence longer than any run inside the text
 */
function fenceFor(text: string): string {
  const runs = text.match(/`{3,}/g) ?? [];
  const longest = runs.reduce((max, run) => Math.max(max, run.length), 2);
  return '`'.repeat(longest + 1);
}

/**
 * Markdown block holding one file's content
 */
export function snippetBlock(snippet: ContentSnippet): string {
  const fence = fenceFor(snippet.text);
  const info = snippet.file.extension.replace(/^\./, '');
  const lines = [`### File: ${snippet.file.path}`, `${fence}${info}`, snippet.text, fence];

  if (snippet.truncated) {
    lines.push(`(truncated: showing ${snippet.text.length} of ${snippet.originalLength} characters)`);
  }

  return lines.join('\n');
}

function byteLength(...parts: string[]): number {
  return parts.reduce((sum, part) => sum + Buffer.byteLength(part, 'utf8'), 0);
}

// ============================================================================
// ASSEMBLY
// ============================================================================

/**
 * Assemble the prompt payload.
 *
 * Identical inputs give a byte-identical payload. Throws
 * PROMPT_BUDGET_EXCEEDED when not even the content-free prompt fits.
 */
export function assemblePrompt(
  profile: LanguageProfile,
  keyFiles: KeyFileSet,
  snippets: readonly ContentSnippet[],
  options: PromptAssemblerOptions
): AssemblyResult {
  const projectType = projectTypeName(profile);
  const system = systemPrompt(projectType);
  const byPath = new Map(snippets.map((snippet) => [snippet.file.path, snippet]));
  const entries = fileEntries(keyFiles, byPath);

  const header = [
    instructionTemplate(options.verbosity, projectType),
    languageSection(profile),
    keyFileSection(entries, byPath),
  ].join('\n\n');

  const readable = snippets.filter((snippet) => !snippet.unreadable);
  const blocks = readable.map(snippetBlock);

  const buildUserPrompt = (count: number): string => (count === 0
    ? header
    : `${header}\n\n## Source\n\n${blocks.slice(0, count).join('\n\n')}`);

  let kept = blocks.length;
  let userPrompt = buildUserPrompt(kept);
  while (kept > 0 && byteLength(system, userPrompt) > options.maxTotalPromptBytes) {
    kept -= 1;
    userPrompt = buildUserPrompt(kept);
  }

  const size = byteLength(system, userPrompt);
  if (size > options.maxTotalPromptBytes) {
    throw errors.promptBudgetExceeded(size, options.maxTotalPromptBytes);
  }

  const omitted = readable.slice(kept).map((snippet) => snippet.file.path);
  const warnings: PipelineWarning[] = omitted.length > 0
    ? [{
      code: 'PROMPT_REDUCED',
      message: `${omitted.length} file${omitted.length === 1 ? '' : 's'} left out to fit ${options.maxTotalPromptBytes} bytes: ${omitted.join(', ')}`,
    }]
    : [];

  const payload: PromptPayload = Object.freeze({
    model: options.model,
    verbosity: options.verbosity,
    projectType,
    systemPrompt: system,
    userPrompt,
    maxOutputTokens: MAX_OUTPUT_TOKENS[options.verbosity],
    temperature: TEMPERATURE,
    languageProfile: profile,
    keyFiles: Object.freeze(entries),
    snippets: Object.freeze(readable.slice(0, kept).map((snippet) => snippet.file.path)),
    omitted: Object.freeze(omitted),
    size,
  });

  return { payload, warnings };
}
