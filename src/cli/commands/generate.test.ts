/**
 * Tests for repodoc generate command
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { Command } from 'commander';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { generateCommand } from './generate.js';
import { FOOTER } from '../../core/generator/readme-writer.js';
import { createProvider } from '../../core/services/llm-service.js';
import { logger } from '../../utils/logger.js';
import { ShutdownManager } from '../../utils/shutdown.js';

vi.mock('../../core/services/llm-service.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../core/services/llm-service.js')>();
  return {
    ...actual,
    createProvider: vi.fn(() => {
      const provider = new actual.MockLLMProvider();
      provider.setDefaultResponse('# Demo\n\nGenerated in a test.');
      return provider;
    }),
  };
});

describe('generate command', () => {
  describe('command configuration', () => {
    it('should have correct name and description', () => {
      expect(generateCommand.name()).toBe('generate');
      expect(generateCommand.description()).toContain('README');
    });

    it('should have --dry-run option', () => {
      const dryRunOption = generateCommand.options.find(o => o.long === '--dry-run');
      expect(dryRunOption?.short).toBe('-d');
      expect(dryRunOption?.defaultValue).toBe(false);
    });

    it('should have -v/--verbose option for the detailed template', () => {
      const verboseOption = generateCommand.options.find(o => o.long === '--verbose');
      expect(verboseOption?.short).toBe('-v');
      expect(verboseOption?.description).toContain('detailed');
    });

    it('should have repeatable --exclude option', () => {
      const excludeOption = generateCommand.options.find(o => o.long === '--exclude');
      expect(excludeOption?.defaultValue).toEqual([]);
    });

    it('should have size limit options', () => {
      const longs = generateCommand.options.map(o => o.long);
      expect(longs).toContain('--max-key-files');
      expect(longs).toContain('--max-bytes-per-file');
      expect(longs).toContain('--max-prompt-bytes');
    });

    it('should have -y/--yes and -o/--output options', () => {
      expect(generateCommand.options.find(o => o.long === '--yes')?.short).toBe('-y');
      expect(generateCommand.options.find(o => o.long === '--output')?.short).toBe('-o');
    });
  });

  describe('running', () => {
    let testDir: string;
    let repoDir: string;
    let configDir: string;
    const program = new Command()
      .exitOverride()
      .option('-q, --quiet', 'Minimal output', false)
      .option('--debug', 'Debug output', false)
      .option('--no-color', 'Disable colors')
      .option('--config <dir>', 'Configuration directory');

    beforeAll(async () => {
      testDir = join(tmpdir(), `repodoc-generate-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      repoDir = join(testDir, 'repo');
      configDir = join(testDir, 'config');
      await mkdir(repoDir, { recursive: true });
      await mkdir(configDir, { recursive: true });
      await writeFile(join(repoDir, 'main.py'), 'print("demo")\n');
      await writeFile(join(configDir, 'config.yaml'), 'provider: openai\n');
      await writeFile(join(configDir, 'secrets.yaml'), 'apiKeys:\n  openai: test-secret\n');

      program.addCommand(generateCommand);
      vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterAll(async () => {
      vi.restoreAllMocks();
      await rm(testDir, { recursive: true, force: true });
    });

    it('should write the generated README into the repository', async () => {
      await program.parseAsync(['--config', configDir, 'generate', repoDir, '--yes'], { from: 'user' });

      expect(createProvider).toHaveBeenCalledTimes(1);
      expect(await readFile(join(repoDir, 'README.md'), 'utf-8')).toBe(
        `# Demo\n\nGenerated in a test.\n\n${FOOTER}\n`
      );
    });

    it('should stop the spinner when interrupted during analysis', async () => {
      const spinner = { update: vi.fn(), succeed: vi.fn(), fail: vi.fn(), stop: vi.fn() };
      vi.spyOn(logger, 'spinner').mockReturnValue(spinner);
      const onCleanup = vi.spyOn(ShutdownManager.prototype, 'onCleanup');
      const removeCleanup = vi.spyOn(ShutdownManager.prototype, 'removeCleanup');

      await program.parseAsync(['--config', configDir, 'generate', repoDir, '--yes'], { from: 'user' });

      expect(onCleanup).toHaveBeenCalledTimes(1);
      const cleanup = onCleanup.mock.calls[0]?.[0];
      expect(removeCleanup).toHaveBeenCalledWith(cleanup);
      expect(spinner.stop).not.toHaveBeenCalled();

      await cleanup?.();
      expect(spinner.stop).toHaveBeenCalledTimes(1);
    });
  });
});
