/**
 * Content Sampler
 *
 * Reads each key file and turns it into a ContentSnippet: decoded text cut to a
 * per-file character cap. A file that cannot be read, or turns out to be
 * binary, becomes an empty snippet marked unreadable instead of failing the run.
 */

import { readFile } from 'node:fs/promises';
import type {
  ContentSnippet,
  KeyFile,
  KeyFileSet,
  PipelineWarning,
} from '../../types/index.js';
import { errorMessage } from '../../utils/errors.js';

export interface ContentSamplerOptions {
  /** Per-file character cap */
  maxBytesPerFile: number;
  /** Maximum concurrent file reads */
  concurrency?: number;
  /** Override how file bytes are read (tests) */
  readBytes?: (file: KeyFile) => Promise<Buffer>;
}

export interface SamplingResult {
  snippets: readonly ContentSnippet[];
  warnings: readonly PipelineWarning[];
}

/** Bytes inspected for NUL characters */
const BINARY_SNIFF_BYTES = 8000;

const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false });
const lossyDecoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });

/**
 * True when the buffer looks like binary content
 */
export function looksBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Decode bytes as UTF-8, replacing invalid sequences when strict decoding fails
 */
export function decodeText(buffer: Buffer): { text: string; lossy: boolean } {
  try {
    return { text: strictDecoder.decode(buffer), lossy: false };
  } catch {
    return { text: lossyDecoder.decode(buffer), lossy: true };
  }
}

/**
 * Cut text to at most `cap` UTF-16 code units without splitting a surrogate pair
 */
export function truncateText(text: string, cap: number): { text: string; truncated: boolean } {
  if (text.length <= cap) {
    return { text, truncated: false };
  }

  let end = Math.max(0, cap);
  const last = text.charCodeAt(end - 1);
  if (end > 0 && last >= 0xd800 && last <= 0xdbff) {
    end -= 1;
  }

  return { text: text.slice(0, end), truncated: true };
}

function unreadableSnippet(file: KeyFile, reason: string): ContentSnippet {
  return Object.freeze({
    file,
    text: '',
    truncated: false,
    unreadable: true,
    reason,
    originalLength: 0,
  });
}

/**
 * Sample a single key file
 */
export async function sampleFile(
  file: KeyFile,
  options: ContentSamplerOptions
): Promise<{ snippet: ContentSnippet; warning?: PipelineWarning }> {
  const readBytes = options.readBytes ?? ((f: KeyFile) => readFile(f.absolutePath));

  let buffer: Buffer;
  try {
    buffer = await readBytes(file);
  } catch (error) {
    const reason = (error as NodeJS.ErrnoException).code ?? errorMessage(error);
    return {
      snippet: unreadableSnippet(file, `read failed (${reason})`),
      warning: { code: 'SAMPLING_WARNING', message: `cannot read file (${reason})`, path: file.path },
    };
  }

  if (looksBinary(buffer)) {
    return {
      snippet: unreadableSnippet(file, 'binary content'),
      warning: { code: 'SAMPLING_WARNING', message: 'binary content skipped', path: file.path },
    };
  }

  const decoded = decodeText(buffer);
  const { text, truncated } = truncateText(decoded.text, options.maxBytesPerFile);

  const snippet: ContentSnippet = Object.freeze({
    file,
    text,
    truncated,
    unreadable: false,
    originalLength: decoded.text.length,
  });

  if (decoded.lossy) {
    return {
      snippet,
      warning: { code: 'SAMPLING_WARNING', message: 'invalid UTF-8 replaced', path: file.path },
    };
  }

  return { snippet };
}

/**
 * Sample every key file. Reads run in parallel batches; snippets keep the
 * key-file order.
 */
export async function sampleContent(
  keyFiles: KeyFileSet,
  options: ContentSamplerOptions
): Promise<SamplingResult> {
  const concurrency = Math.max(1, options.concurrency ?? 8);
  const results: Awaited<ReturnType<typeof sampleFile>>[] = [];

  for (let i = 0; i < keyFiles.files.length; i += concurrency) {
    const batch = keyFiles.files.slice(i, i + concurrency);
    results.push(...(await Promise.all(batch.map((file) => sampleFile(file, options)))));
  }

  const warnings: PipelineWarning[] = [];
  for (const result of results) {
    if (result.warning) warnings.push(result.warning);
  }

  return {
    snippets: Object.freeze(results.map((result) => result.snippet)),
    warnings,
  };
}
