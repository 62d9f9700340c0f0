/**
 * Lux CLI Tests: REPL
 */

import { Readable, Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { createDefaultConfig, type LuxConfig } from '../../src/cli-config.js';
import { ReplSession, startRepl } from '../../src/cli-repl.js';

function session(config: Partial<LuxConfig> = {}) {
  const printed: string[] = [];
  const errors: string[] = [];
  const repl = new ReplSession(
    { ...createDefaultConfig(), ...config },
    {
      print: (line) => printed.push(line),
      error: (line) => errors.push(line),
    }
  );
  return { repl, printed, errors };
}

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('ReplSession', () => {
  it('echoes the value of each line and keeps definitions', () => {
    const { repl, printed } = session();
    repl.evaluate('var a = 1;');
    repl.evaluate('print a + 1;');
    repl.evaluate('"text";');
    expect(printed).toEqual(['1', '2', '"text"']);
  });

  it('skips blank lines', () => {
    const { repl, printed } = session();
    expect(repl.evaluate('   ')).toBeNull();
    expect(printed).toEqual([]);
  });

  it('does not echo with echo turned off', () => {
    const { repl, printed } = session({ echo: false });
    expect(repl.evaluate('1 + 1;')).toEqual({ status: 'ok', value: 2 });
    expect(printed).toEqual([]);
  });

  it('reports errors and keeps the session usable', () => {
    const { repl, printed, errors } = session();
    repl.evaluate('var a = 1;');
    repl.evaluate('print;');
    repl.evaluate('a = a + nil;');
    repl.evaluate('a;');
    expect(errors).toEqual([
      "[line 1] Error: Expected expression but found ';'.",
      "[line 1] Runtime error: Operator '+' expects two numbers or two strings, got number and nil.",
    ]);
    expect(printed).toEqual(['1', '1']);
  });

  it('survives host stack exhaustion and keeps definitions', () => {
    const { repl, printed, errors } = session();
    repl.evaluate('var kept = 1;');
    repl.evaluate('fun f(n) { return f(n + 1); }');
    expect(repl.evaluate('f(0);')).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Runtime error: /);
    expect(repl.interpreter.environment).toBe(repl.interpreter.globals);
    repl.evaluate('print kept + 1;');
    expect(printed).toEqual(['1', '2']);
  });

  it('defines configured globals', () => {
    const { repl, printed } = session({ globals: { greeting: 'hi' } });
    repl.evaluate('greeting;');
    expect(printed).toEqual(['"hi"']);
  });
});

describe('startRepl', () => {
  it('evaluates each input line until the input ends', async () => {
    const output = collector();
    const errorOutput = collector();
    await startRepl({
      input: Readable.from(['var a = 2;\n', 'print a * 3;\n', 'print b;\n']),
      output: output.stream,
      errorOutput: errorOutput.stream,
      config: { ...createDefaultConfig(), prompt: '' },
    });
    expect(output.text()).toBe('2\n6\n');
    expect(errorOutput.text()).toBe(
      "[line 1] Runtime error: Undefined variable 'b'.\n"
    );
  });
});
