/**
 * CLI REPL
 *
 * Line-at-a-time session over one interpreter. Definitions persist
 * between lines; a failed line leaves earlier state intact.
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { LuxConfig } from './cli-config.js';
import { reportRunResult } from './report.js';
import { runSource, type RunResult } from './run.js';
import {
  createInterpreter,
  formatValue,
  inspectValue,
  type Interpreter,
} from './runtime/index.js';

/** Line sinks for program output and errors */
export interface ReplIO {
  print(line: string): void;
  error(line: string): void;
}

export class ReplSession {
  readonly interpreter: Interpreter;

  constructor(
    private readonly config: LuxConfig,
    private readonly io: ReplIO
  ) {
    this.interpreter = createInterpreter({
      variables: config.globals,
      callbacks: {
        onPrint: (value) => io.print(formatValue(value)),
        onError: (message) => io.error(message),
      },
    });
  }

  /**
   * Run one line. With echo on, a value-producing line prints that value
   * in debug form (strings quoted). Blank lines are skipped.
   *
   * Host stack exhaustion is reported as a runtime error and returns
   * null; the session keeps every earlier definition.
   */
  evaluate(line: string): RunResult | null {
    if (line.trim() === '') return null;

    let result: RunResult;
    try {
      result = runSource(line, this.interpreter);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      this.io.error(`Runtime error: ${err.message}`);
      return null;
    }
    reportRunResult(result, line, this.interpreter.callbacks.onError);

    if (
      result.status === 'ok' &&
      this.config.echo &&
      result.value !== undefined
    ) {
      this.io.print(inspectValue(result.value));
    }
    return result;
  }
}

export interface ReplOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly errorOutput: Writable;
  readonly config: LuxConfig;
}

/** Read lines until the input ends */
export async function startRepl(options: ReplOptions): Promise<void> {
  const { input, output, errorOutput, config } = options;
  const session = new ReplSession(config, {
    print: (line) => output.write(`${line}\n`),
    error: (line) => errorOutput.write(`${line}\n`),
  });

  const rl = readline.createInterface({ input, output, prompt: config.prompt });
  rl.prompt();
  for await (const line of rl) {
    session.evaluate(line);
    rl.prompt();
  }
}
