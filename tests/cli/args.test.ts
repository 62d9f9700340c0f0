/**
 * Lux CLI Tests: argument parsing
 */

import { describe, expect, it } from 'vitest';
import { parseArgs } from '../../src/cli-exec.js';

describe('parseArgs', () => {
  it('starts the REPL without arguments', () => {
    expect(parseArgs([])).toEqual({ mode: 'repl' });
    expect(parseArgs(['repl'])).toEqual({ mode: 'repl' });
  });

  it('runs a file given with or without the run command', () => {
    expect(parseArgs(['run', 'main.lux'])).toEqual({
      mode: 'run',
      file: 'main.lux',
    });
    expect(parseArgs(['main.lux'])).toEqual({ mode: 'run', file: 'main.lux' });
  });

  it('evaluates inline source', () => {
    expect(parseArgs(['-e', 'print 1;'])).toEqual({
      mode: 'eval',
      source: 'print 1;',
    });
  });

  it('prefers help and version flags in any position', () => {
    expect(parseArgs(['run', 'main.lux', '--help'])).toEqual({ mode: 'help' });
    expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
    expect(parseArgs(['main.lux', '-v'])).toEqual({ mode: 'version' });
    expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
  });

  it('rejects malformed invocations', () => {
    expect(() => parseArgs(['-e'])).toThrow('Missing source after -e');
    expect(() => parseArgs(['run'])).toThrow('Missing file argument');
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['a.lux', 'b.lux'])).toThrow(
      'Unexpected argument: b.lux'
    );
    expect(() => parseArgs(['repl', 'x'])).toThrow('Unexpected argument: x');
    expect(() => parseArgs(['-e', 'print 1;', 'x'])).toThrow(
      'Unexpected argument: x'
    );
  });
});
