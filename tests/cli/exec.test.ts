/**
 * Lux CLI Tests: lux command
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { createDefaultConfig, type LuxConfig } from '../../src/cli-config.js';
import {
  executeScript,
  executeSource,
  main,
  type ExecuteOptions,
} from '../../src/cli-exec.js';
import { determineExitCode, EXIT_CODES, formatError } from '../../src/cli-shared.js';

function capture(config: Partial<LuxConfig> = {}) {
  const printed: string[] = [];
  const errors: string[] = [];
  const options: ExecuteOptions = {
    config: { ...createDefaultConfig(), ...config },
    print: (line) => printed.push(line),
    error: (line) => errors.push(line),
  };
  return { options, printed, errors };
}

describe('lux', () => {
  describe('executeSource', () => {
    it('exits 0 after a successful run', () => {
      const { options, printed } = capture();
      expect(executeSource('print 1 + 2;', options)).toBe(EXIT_CODES.SUCCESS);
      expect(printed).toEqual(['3']);
    });

    it('exits 65 on diagnostics', () => {
      const { options, errors } = capture();
      expect(executeSource('print ;', options)).toBe(65);
      expect(errors).toEqual([
        "[line 1] Error: Expected expression but found ';'.",
      ]);
    });

    it('exits 70 on a runtime error', () => {
      const { options, errors } = capture();
      expect(executeSource('print nil + 1;', options)).toBe(70);
      expect(errors).toEqual([
        "[line 1] Runtime error: Operator '+' expects two numbers or two strings, got nil and number.",
      ]);
    });

    it('defines configured globals', () => {
      const { options, printed } = capture({ globals: { answer: 42 } });
      executeSource('print answer;', options);
      expect(printed).toEqual(['42']);
    });
  });

  describe('executeScript', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lux-exec-'));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('runs a source file', async () => {
      const file = path.join(tempDir, 'hello.lux');
      await fs.writeFile(file, 'print "from file";\n');
      const { options, printed } = capture();
      await expect(executeScript(file, options)).resolves.toBe(0);
      expect(printed).toEqual(['from file']);
    });

    it('rejects a missing file', async () => {
      const file = path.join(tempDir, 'missing.lux');
      const { options } = capture();
      await expect(executeScript(file, options)).rejects.toThrow(
        `File not found: ${file}`
      );
    });
  });

  describe('main', () => {
    it('prints the package version', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      try {
        expect(await main(['--version'])).toBe(0);
        expect(log).toHaveBeenCalledWith('0.1.0');
      } finally {
        log.mockRestore();
      }
    });

    it('runs inline source', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      try {
        expect(await main(['-e', 'print 6 * 7;'])).toBe(0);
        expect(log).toHaveBeenCalledWith('42');
      } finally {
        log.mockRestore();
      }
    });

    it('exits 1 on a usage error', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      try {
        expect(await main(['--bogus'])).toBe(1);
        expect(error).toHaveBeenCalledWith('Unknown option: --bogus');
      } finally {
        error.mockRestore();
      }
    });

    it('exits 70 when recursion exhausts the stack', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      try {
        expect(await main(['-e', 'fun f() { return f(); } f();'])).toBe(70);
        expect(error).toHaveBeenCalledWith(
          expect.stringMatching(/^Runtime error: /)
        );
      } finally {
        error.mockRestore();
      }
    });
  });

  describe('shared helpers', () => {
    it('maps run results to exit codes', () => {
      expect(determineExitCode({ status: 'ok', value: undefined })).toBe(0);
      expect(determineExitCode({ status: 'diagnostics', diagnostics: [] })).toBe(65);
    });

    it('formats a missing file error with its path', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'gone.lux',
      });
      expect(formatError(err)).toBe('File not found: gone.lux');
      expect(formatError(new Error('plain'))).toBe('plain');
    });
  });
});
