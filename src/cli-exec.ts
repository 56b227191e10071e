#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * `tangle <file>` runs a script, `tangle -e "<source>"` evaluates a
 * snippet and prints its value. Exit codes: 0 success, 1 script error,
 * 2 usage error.
 */

import * as path from 'path';
import {
  formatError,
  loadProjectConfig,
  readVersion,
  UsageError,
} from './cli-shared.js';
import { Executor } from './runtime/core/execute.js';
import { formatValue } from './runtime/core/values.js';

export type ParsedArgs =
  | { mode: 'exec'; file: string }
  | { mode: 'eval'; source: string }
  | { mode: 'help' | 'version' };

/** Where the CLI writes; tests pass their own */
export interface CliIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly cwd: string;
}

export const USAGE = `Usage:
  tangle <script.tgl>     Execute a Tangle script file
  tangle -e "<source>"    Evaluate source and print the result
  tangle --help           Show this help message
  tangle --version        Show version information`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) return { mode: 'help' };
  if (argv.includes('--version') || argv.includes('-v')) return { mode: 'version' };

  const [first, second, ...rest] = argv;
  if (first === undefined) throw new UsageError('Missing file argument');

  if (first === '-e') {
    if (second === undefined) throw new UsageError('Missing source after -e');
    if (rest.length > 0) throw new UsageError(`Unexpected argument: ${rest[0]}`);
    return { mode: 'eval', source: second };
  }
  if (first.startsWith('-')) throw new UsageError(`Unknown option: ${first}`);
  if (second !== undefined) throw new UsageError(`Unexpected argument: ${second}`);
  return { mode: 'exec', file: first };
}

/** Run the CLI and return its exit code */
export function runCli(argv: string[], io: CliIO): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    io.stderr(formatError(error, null));
    io.stderr(USAGE);
    return 2;
  }

  switch (parsed.mode) {
    case 'help':
      io.stdout(USAGE);
      return 0;
    case 'version':
      io.stdout(readVersion());
      return 0;
    case 'exec':
    case 'eval':
      break;
  }

  const file = parsed.mode === 'exec' ? path.resolve(io.cwd, parsed.file) : null;
  try {
    const project = loadProjectConfig(io.cwd);
    const executor = new Executor({
      callbacks: { onLog: io.stdout },
      config: project.config,
      searchPaths: project.searchPaths,
      currentFile: file ?? undefined,
    });
    if (parsed.mode === 'exec') {
      executor.executeFile(path.resolve(io.cwd, parsed.file));
      return 0;
    }
    const value = executor.executeSource(parsed.source);
    if (value !== null) io.stdout(formatValue(value, {
      decimalPlaces: executor.context.config.current.decimalPlaces,
    }));
    return 0;
  } catch (error) {
    io.stderr(formatError(error, file));
    return 1;
  }
}

function main(): void {
  process.exitCode = runCli(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    cwd: process.cwd(),
  });
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
