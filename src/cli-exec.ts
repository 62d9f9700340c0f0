#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for the lux binary.
 * Handles file execution, inline source and the REPL.
 */

import * as fs from 'node:fs/promises';
import { loadConfig, type LuxConfig } from './cli-config.js';
import { startRepl } from './cli-repl.js';
import {
  determineExitCode,
  EXIT_CODES,
  formatError,
  readVersion,
} from './cli-shared.js';
import { reportRunResult } from './report.js';
import { runSource } from './run.js';
import { createInterpreter, formatValue } from './runtime/index.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'run'; file: string }
  | { mode: 'eval'; source: string }
  | { mode: 'repl' }
  | { mode: 'help' | 'version' };

/** Output sinks, one call per line */
export interface ExecuteOptions {
  readonly config: LuxConfig;
  readonly print: (line: string) => void;
  readonly error: (line: string) => void;
}

const USAGE = `Usage:
  lux run <file.lux>    Execute a Lux source file
  lux <file.lux>        Same as lux run
  lux repl              Start an interactive session
  lux -e <source>       Execute source given on the command line
  lux --help            Show this help message
  lux --version         Show version information

Configuration:
  .luxrc.yaml in the working directory may set prompt, echo and globals

Exit codes:
  0 success, 1 usage or file error, 65 syntax error, 70 runtime error

Examples:
  lux run fib.lux
  lux -e 'print 1 + 2;'`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const [first, second, ...rest] = argv;

  if (first === '-e') {
    if (second === undefined) {
      throw new Error('Missing source after -e');
    }
    assertNoExtra(rest);
    return { mode: 'eval', source: second };
  }

  // Check for unknown flags
  for (const arg of argv) {
    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (first === undefined || first === 'repl') {
    assertNoExtra(argv.slice(1));
    return { mode: 'repl' };
  }

  if (first === 'run') {
    if (second === undefined) {
      throw new Error('Missing file argument');
    }
    assertNoExtra(rest);
    return { mode: 'run', file: second };
  }

  assertNoExtra(argv.slice(1));
  return { mode: 'run', file: first };
}

function assertNoExtra(args: string[]): void {
  const extra = args[0];
  if (extra !== undefined) {
    throw new Error(`Unexpected argument: ${extra}`);
  }
}

/**
 * Run source in a fresh interpreter seeded with the configured globals.
 *
 * @returns the process exit code for the outcome
 */
export function executeSource(source: string, options: ExecuteOptions): number {
  const interpreter = createInterpreter({
    variables: options.config.globals,
    callbacks: {
      onPrint: (value) => options.print(formatValue(value)),
      onError: options.error,
    },
  });

  const result = runSource(source, interpreter);
  reportRunResult(result, source, options.error);
  return determineExitCode(result);
}

/**
 * Execute a Lux source file
 *
 * @throws Error if the file cannot be read
 */
export async function executeScript(
  file: string,
  options: ExecuteOptions
): Promise<number> {
  let source: string;
  try {
    source = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new Error(`File not found: ${file}`);
    }
    throw err;
  }
  return executeSource(source, options);
}

/**
 * Entry point for the lux binary
 *
 * Parses command-line arguments, executes source, and handles errors.
 * Writes program output to stdout and errors to stderr.
 *
 * @returns the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return EXIT_CODES.SUCCESS;

      case 'version':
        console.log(readVersion());
        return EXIT_CODES.SUCCESS;

      case 'repl':
        await startRepl({
          input: process.stdin,
          output: process.stdout,
          errorOutput: process.stderr,
          config: loadConfig(process.cwd()),
        });
        return EXIT_CODES.SUCCESS;

      case 'eval':
        return executeSource(parsed.source, consoleOptions());

      case 'run':
        return await executeScript(parsed.file, consoleOptions());
    }
  } catch (err) {
    if (err instanceof RangeError) {
      // Unbounded recursion exhausts the host stack
      console.error(`Runtime error: ${err.message}`);
      return EXIT_CODES.RUNTIME_ERROR;
    }
    console.error(formatError(err instanceof Error ? err : new Error(String(err))));
    return EXIT_CODES.USAGE;
  }
}

function consoleOptions(): ExecuteOptions {
  return {
    config: loadConfig(process.cwd()),
    print: (line) => console.log(line),
    error: (line) => console.error(line),
  };
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
