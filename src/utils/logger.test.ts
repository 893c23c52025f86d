/**
 * Tests for the Logger class
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { Logger, configureLogger, logger as sharedLogger } from './logger.js';

describe('Logger', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe('constructor and configure', () => {
    it('should use default options when none provided', () => {
      const logger = new Logger();

      expect(logger.getOptions()).toEqual({
        quiet: false,
        verbose: false,
        noColor: false,
        timestamps: false,
      });
    });

    it('should merge options passed to configure', () => {
      const logger = new Logger({ verbose: true });
      logger.configure({ quiet: true });

      expect(logger.getOptions().quiet).toBe(true);
      expect(logger.getOptions().verbose).toBe(true);
    });

    it('should configure the shared instance', () => {
      const before = sharedLogger.getOptions();
      configureLogger({ verbose: true });

      expect(sharedLogger.getOptions().verbose).toBe(true);
      sharedLogger.configure(before);
    });
  });

  describe('log levels', () => {
    it.each([
      ['discovery', '🔍 Scanning 42 files'],
      ['inference', '🧠 Scanning 42 files'],
      ['success', '✓ Scanning 42 files'],
      ['warning', '⚠ Scanning 42 files'],
    ] as const)('should prefix %s messages', (level, expected) => {
      const logger = new Logger({ noColor: true });
      logger[level]('Scanning 42 files');

      expect(consoleLogSpy).toHaveBeenCalledWith(expected);
    });

    it('should write errors to stderr', () => {
      const logger = new Logger({ noColor: true });
      logger.error('Backend unreachable');

      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Backend unreachable');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should print debug messages only when verbose', () => {
      new Logger({ noColor: true }).debug('hidden');
      new Logger({ noColor: true, verbose: true }).debug('Stage: walk');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith('→ Stage: walk');
    });
  });

  describe('quiet mode', () => {
    it('should suppress everything except errors', () => {
      const logger = new Logger({ quiet: true, noColor: true, verbose: true });

      logger.discovery('x');
      logger.inference('x');
      logger.success('x');
      logger.warning('x');
      logger.debug('x');
      logger.section('x');
      logger.info('Key', 'value');
      logger.listItem('x');
      logger.blank();
      logger.error('Prompt budget exceeded');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Prompt budget exceeded');
    });
  });

  describe('timestamps', () => {
    it('should prefix lines with an ISO timestamp', () => {
      const logger = new Logger({ noColor: true, timestamps: true });

      logger.success('README written');

      expect(String(consoleLogSpy.mock.calls[0]?.[0])).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] ✓ README written$/
      );
    });
  });

  describe('section and info helpers', () => {
    it('should print section headers', () => {
      new Logger({ noColor: true }).section('Key files');

      expect(consoleLogSpy).toHaveBeenCalledWith('=== Key files ===');
    });

    it('should print info key-value pairs', () => {
      new Logger({ noColor: true }).info('Size', '1024 bytes');

      expect(consoleLogSpy).toHaveBeenCalledWith('  Size: 1024 bytes');
    });

    it('should indent list items two spaces per level', () => {
      const logger = new Logger({ noColor: true });

      logger.listItem('src/main.py');
      logger.listItem('config.yaml', 1);

      expect(consoleLogSpy).toHaveBeenNthCalledWith(1, '• src/main.py');
      expect(consoleLogSpy).toHaveBeenNthCalledWith(2, '  • config.yaml');
    });
  });

  describe('spinner', () => {
    it('should do nothing in quiet mode', () => {
      const spinner = new Logger({ quiet: true }).spinner('Working...');

      spinner.update('Still working...');
      spinner.succeed('Done');
      spinner.fail('Failed');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should log plain lines in timestamps mode', () => {
      const logger = new Logger({ noColor: true, timestamps: true });
      const spinner = logger.spinner('Scanning repository...');

      spinner.update('Reading key files...');
      spinner.succeed('Generated');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleLogSpy.mock.calls[0]?.[0])).toMatch(/✓ Generated$/);
    });

    it('should report the latest text when it finishes without one', () => {
      const logger = new Logger({ noColor: true });
      const spinner = logger.spinner('Scanning repository...');

      spinner.update('Assembling prompt...');
      spinner.fail();

      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Assembling prompt...');
    });
  });
});
