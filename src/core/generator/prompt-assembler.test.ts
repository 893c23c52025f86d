/**
 * Tests for the prompt assembler
 */

import { describe, it, expect } from 'vitest';
import type {
  ContentSnippet,
  KeyFile,
  KeyFileSet,
  KeyFileTier,
  LanguageProfile,
} from '../../types/index.js';
import {
  assemblePrompt,
  instructionTemplate,
  snippetBlock,
  systemPrompt,
} from './prompt-assembler.js';
import { isRepodocError } from '../../utils/errors.js';

function keyFile(path: string, size: number, tier: KeyFileTier): KeyFile {
  const name = path.split('/').pop() ?? path;
  const dot = name.lastIndexOf('.');
  return {
    path,
    absolutePath: `/repo/${path}`,
    name,
    extension: dot > 0 ? name.slice(dot) : '',
    size,
    depth: path.split('/').length - 1,
    tier,
  };
}

function snippet(file: KeyFile, text: string, extra: Partial<ContentSnippet> = {}): ContentSnippet {
  return {
    file,
    text,
    truncated: false,
    unreadable: false,
    originalLength: text.length,
    ...extra,
  };
}

const profile: LanguageProfile = {
  languages: [{ language: 'Python', score: 0.625, bytes: 500, fileCount: 2 }],
  totalBytes: 800,
  classifiedBytes: 500,
  otherBytes: 300,
  degraded: false,
};

const mainPy = keyFile('main.py', 120, 'entry-point');
const pyproject = keyFile('pyproject.toml', 80, 'manifest');
const keyFiles: KeyFileSet = { files: [mainPy, pyproject], totalBytes: 200 };
const snippets = [
  snippet(mainPy, 'import sys\nprint(sys.argv)'),
  snippet(pyproject, '[project]\nname = "demo"'),
];

const baseOptions = { model: 'test-model', verbosity: 'concise', maxTotalPromptBytes: 60000 } as const;

describe('prompt assembler', () => {
  describe('templates', () => {
    it('should produce a short brief for concise output', () => {
      const text = instructionTemplate('concise', 'Go');

      expect(text.split('\n')[0]).toBe("You are analyzing a Go project's source code to write a concise README.md.");
      expect(text).toContain('3. Basic requirements specific to Go');
    });

    it('should list every section for detailed output', () => {
      const text = instructionTemplate('detailed', 'Rust');

      expect(text).toContain('comprehensive README.md');
      expect(text).toContain('3. Installation instructions specific to Rust');
      expect(text).toContain('8. License information, if any was found');
    });

    it('should name the project type in the system prompt', () => {
      expect(systemPrompt('Ruby')).toMatch(/^You are a technical documentation expert specializing in Ruby\. /);
    });
  });

  describe('snippetBlock', () => {
    it('should fence the content with the extension as info string', () => {
      expect(snippetBlock(snippet(mainPy, 'x = 1'))).toBe('### File: main.py\n```py\nx = 1\n```');
    });

    it('should use a longer fence when the content contains one', () => {
      const block = snippetBlock(snippet(keyFile('README.md', 10, 'module'), 'a\n```\nb'));

      expect(block).toBe('### File: README.md\n````md\na\n```\nb\n````');
    });

    it('should note truncation', () => {
      const block = snippetBlock(snippet(mainPy, 'abc', { truncated: true, originalLength: 10 }));

      expect(block.split('\n').pop()).toBe('(truncated: showing 3 of 10 characters)');
    });
  });

  describe('assemblePrompt', () => {
    it('should describe languages, key files and content', () => {
      const { payload, warnings } = assemblePrompt(profile, keyFiles, snippets, baseOptions);

      expect(payload.userPrompt).toContain('## Languages\n- Python: 62.5% (2 files)');
      expect(payload.userPrompt).toContain(
        '## Key files\n- main.py (entry-point, 120 bytes)\n- pyproject.toml (manifest, 80 bytes)'
      );
      expect(payload.userPrompt).toContain('## Source\n\n### File: main.py\n```py\nimport sys\nprint(sys.argv)\n```');
      expect(payload.snippets).toEqual(['main.py', 'pyproject.toml']);
      expect(payload.omitted).toEqual([]);
      expect(payload.projectType).toBe('Python');
      expect(payload.model).toBe('test-model');
      expect(payload.maxOutputTokens).toBe(1000);
      expect(payload.temperature).toBe(0.7);
      expect(warnings).toEqual([]);
    });

    it('should measure size in UTF-8 bytes', () => {
      const unicode = [snippet(mainPy, 'print("héllo wörld")'), snippet(pyproject, '[project]')];

      const { payload } = assemblePrompt(profile, keyFiles, unicode, baseOptions);

      expect(payload.size).toBe(
        Buffer.byteLength(payload.systemPrompt, 'utf8') + Buffer.byteLength(payload.userPrompt, 'utf8')
      );
      expect(payload.size).toBeGreaterThan(payload.systemPrompt.length + payload.userPrompt.length);
    });

    it('should allow more output for detailed documents', () => {
      const { payload } = assemblePrompt(profile, keyFiles, snippets, { ...baseOptions, verbosity: 'detailed' });

      expect(payload.maxOutputTokens).toBe(2000);
      expect(payload.userPrompt).toContain('comprehensive README.md');
    });

    it('should produce identical payloads for identical inputs', () => {
      const first = assemblePrompt(profile, keyFiles, snippets, baseOptions);
      const second = assemblePrompt(profile, keyFiles, snippets, baseOptions);

      expect(second).toEqual(first);
      expect(JSON.stringify(second.payload)).toBe(JSON.stringify(first.payload));
    });

    it('should drop content from the tail to fit the budget', () => {
      const full = assemblePrompt(profile, keyFiles, snippets, baseOptions).payload;
      const budget = full.size - 1;

      const { payload, warnings } = assemblePrompt(profile, keyFiles, snippets, {
        ...baseOptions,
        maxTotalPromptBytes: budget,
      });

      expect(payload.snippets).toEqual(['main.py']);
      expect(payload.omitted).toEqual(['pyproject.toml']);
      expect(payload.size).toBeLessThanOrEqual(budget);
      expect(payload.userPrompt).toContain('- pyproject.toml (manifest, 80 bytes)');
      expect(payload.userPrompt).not.toContain('### File: pyproject.toml');
      expect(warnings).toEqual([
        {
          code: 'PROMPT_REDUCED',
          message: `1 file left out to fit ${budget} bytes: pyproject.toml`,
        },
      ]);
    });

    it('should keep the content-free prompt when no block fits', () => {
      const oneBlock = assemblePrompt(profile, keyFiles, snippets, {
        ...baseOptions,
        maxTotalPromptBytes: assemblePrompt(profile, keyFiles, snippets, baseOptions).payload.size - 1,
      }).payload;
      const budget = oneBlock.size - 1;

      const { payload, warnings } = assemblePrompt(profile, keyFiles, snippets, {
        ...baseOptions,
        maxTotalPromptBytes: budget,
      });

      expect(payload.snippets).toEqual([]);
      expect(payload.omitted).toEqual(['main.py', 'pyproject.toml']);
      expect(payload.userPrompt).not.toContain('## Source');
      expect(warnings[0]?.message).toBe(`2 files left out to fit ${budget} bytes: main.py, pyproject.toml`);
    });

    it('should fail with PROMPT_BUDGET_EXCEEDED when even the header does not fit', () => {
      let caught: unknown;
      try {
        assemblePrompt(profile, keyFiles, snippets, { ...baseOptions, maxTotalPromptBytes: 10 });
      } catch (error) {
        caught = error;
      }

      expect(isRepodocError(caught) && caught.code).toBe('PROMPT_BUDGET_EXCEEDED');
      expect(isRepodocError(caught) && caught.stage).toBe('analysis');
    });

    it('should list unreadable files without a content block', () => {
      const binary = keyFile('assets/logo.bin', 64, 'module');
      const files: KeyFileSet = { files: [mainPy, binary], totalBytes: 184 };
      const sampled = [
        snippet(mainPy, 'print(1)'),
        snippet(binary, '', { unreadable: true, reason: 'binary content', originalLength: 0 }),
      ];

      const { payload } = assemblePrompt(profile, files, sampled, baseOptions);

      expect(payload.userPrompt).toContain('- assets/logo.bin (module, 64 bytes, unreadable: binary content)');
      expect(payload.userPrompt).not.toContain('### File: assets/logo.bin');
      expect(payload.snippets).toEqual(['main.py']);
      expect(payload.keyFiles[1]).toEqual({
        path: 'assets/logo.bin',
        size: 64,
        tier: 'module',
        truncated: false,
        unreadable: true,
      });
    });

    it('should describe a repository without recognized languages', () => {
      const degraded: LanguageProfile = {
        languages: [],
        totalBytes: 10,
        classifiedBytes: 0,
        otherBytes: 10,
        degraded: true,
      };

      const { payload } = assemblePrompt(degraded, keyFiles, snippets, baseOptions);

      expect(payload.projectType).toBe('Unknown');
      expect(payload.userPrompt).toContain('## Languages\n- Unknown (no recognized source files)');
    });
  });
});
