/**
 * Tests for the analysis pipeline
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { AnalyzeOptions, PipelineStage } from '../types/index.js';
import { MockLLMProvider } from './services/llm-service.js';
import { analyze, prepare } from './pipeline.js';
import { isRepodocError } from '../utils/errors.js';

const options: AnalyzeOptions = {
  model: 'test-model',
  verbose: false,
  dryRun: false,
  maxKeyFiles: 12,
  maxBytesPerFile: 8000,
  maxTotalPromptBytes: 60000,
};

const noSleep = async (): Promise<void> => {};

describe('pipeline', () => {
  let testDir: string;
  let provider: MockLLMProvider;

  beforeEach(async () => {
    testDir = join(tmpdir(), `repodoc-pipeline-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    provider = new MockLLMProvider();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function writePythonProject(): Promise<void> {
    await mkdir(join(testDir, 'src', 'demo'), { recursive: true });
    await writeFile(join(testDir, 'main.py'), 'from demo import run\n\nrun()\n');
    await writeFile(join(testDir, 'pyproject.toml'), '[project]\nname = "demo"\n');
    await writeFile(join(testDir, 'src', 'demo', 'core.py'), 'def run():\n    print("demo")\n');
    await writeFile(join(testDir, 'NOTES.md'), '# Notes\n');
  }

  describe('analyze', () => {
    it('should run every stage in order and return the generated text', async () => {
      await writePythonProject();
      provider.setDefaultResponse('# Demo\n\nRuns the demo.');
      const stages: PipelineStage[] = [];

      const result = await analyze(testDir, options, {
        provider,
        onStage: (stage) => stages.push(stage),
      });

      expect(stages).toEqual(['walk', 'classify', 'select', 'sample', 'assemble', 'generate']);
      expect(result.status).toBe('success');
      if (result.status !== 'success') return;
      expect(result.text).toBe('# Demo\n\nRuns the demo.');
      expect(result.model).toBe('test-model');
      expect(result.attempts).toBe(1);
      expect(result.warnings).toEqual([]);
      expect(result.payload?.projectType).toBe('Python');
      expect(result.payload?.snippets).toEqual(['main.py', 'pyproject.toml', 'src/demo/core.py']);
    });

    it('should send the sampled content to the backend', async () => {
      await writePythonProject();

      await analyze(testDir, options, { provider });

      expect(provider.callHistory).toHaveLength(1);
      expect(provider.callHistory[0]?.model).toBe('test-model');
      expect(provider.callHistory[0]?.userPrompt).toContain(
        '### File: main.py\n```py\nfrom demo import run\n\nrun()\n\n```'
      );
    });

    it('should retry transient backend failures', async () => {
      await writePythonProject();
      provider.failNext(2, 'rate-limit');

      const result = await analyze(testDir, options, { provider, retry: { sleep: noSleep } });

      expect(result.status).toBe('success');
      expect(result.attempts).toBe(3);
    });

    it('should fail with SELECTION_EMPTY for an empty repository without calling the backend', async () => {
      const result = await analyze(testDir, options, { provider });

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error.code).toBe('SELECTION_EMPTY');
      expect(result.error.isAnalysisFailure).toBe(true);
      expect(result.attempts).toBe(0);
      expect(result.warnings.map((w) => w.code)).toEqual(['CLASSIFICATION_DEGRADED']);
      expect(provider.callHistory).toHaveLength(0);
    });

    it('should fail with ACCESS_ERROR for a missing path', async () => {
      const result = await analyze(join(testDir, 'missing'), options, { provider });

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error.code).toBe('ACCESS_ERROR');
      expect(result.error.stage).toBe('analysis');
      expect(provider.callHistory).toHaveLength(0);
    });

    it('should stop before any stage when already cancelled', async () => {
      await writePythonProject();
      const controller = new AbortController();
      controller.abort();
      const stages: PipelineStage[] = [];

      const result = await analyze(testDir, options, {
        provider,
        signal: controller.signal,
        onStage: (stage) => stages.push(stage),
      });

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error.code).toBe('CANCELLED');
      expect(result.attempts).toBe(0);
      expect(stages).toEqual([]);
      expect(provider.callHistory).toHaveLength(0);
    });

    it('should not reach the backend when cancelled during analysis', async () => {
      await writePythonProject();
      const controller = new AbortController();

      const result = await analyze(testDir, options, {
        provider,
        signal: controller.signal,
        onStage: (stage) => {
          if (stage === 'sample') controller.abort();
        },
      });

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error.code).toBe('CANCELLED');
      expect(provider.callHistory).toHaveLength(0);
    });

    it('should analyze a repository holding a file named "..."', async () => {
      await writePythonProject();
      await writeFile(join(testDir, '...'), 'dots\n');

      const result = await analyze(testDir, options, { provider });

      expect(result.status).toBe('success');
      expect(result.warnings).toEqual([]);
    });

    it('should fall back to top-level files when nothing is classified', async () => {
      await writeFile(join(testDir, 'README.md'), '# Docs only\n');
      await writeFile(join(testDir, 'notes.txt'), 'todo\n');

      const result = await analyze(testDir, options, { provider });

      expect(result.status).toBe('success');
      expect(result.warnings).toEqual([
        {
          code: 'CLASSIFICATION_DEGRADED',
          message: 'No source files could be classified; selecting top-level files instead',
        },
      ]);
      expect(result.payload?.projectType).toBe('Unknown');
    });
  });

  describe('prepare', () => {
    it('should build the payload without a backend', async () => {
      await writePythonProject();

      const run = await prepare(testDir, { ...options, verbose: true });

      expect(run.walk.files.map((f) => f.path)).toEqual([
        'src/demo/core.py',
        'NOTES.md',
        'main.py',
        'pyproject.toml',
      ]);
      expect(run.profile.languages[0]?.language).toBe('Python');
      expect(run.keyFiles.files.map((f) => f.tier)).toEqual(['entry-point', 'manifest', 'module']);
      expect(run.payload.verbosity).toBe('detailed');
      expect(run.payload.maxOutputTokens).toBe(2000);
    });

    it('should honour exclude patterns', async () => {
      await writePythonProject();

      const run = await prepare(testDir, { ...options, excludePatterns: ['src/'] });

      expect(run.keyFiles.files.map((f) => f.path)).toEqual(['main.py', 'pyproject.toml']);
    });

    it('should throw fatal errors', async () => {
      const error = await prepare(testDir, options).catch((e: unknown) => e);

      expect(isRepodocError(error) && error.code).toBe('SELECTION_EMPTY');
    });
  });
});
