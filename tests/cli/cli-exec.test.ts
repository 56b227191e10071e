/**
 * CLI Execution Tests
 * Argument parsing, exit codes and output routing for the `tangle` binary
 */

import { afterEach, describe, expect, it } from 'vitest';
import { parseArgs, runCli, USAGE, type CliIO } from '../../src/cli-exec.js';
import { createFixture } from '../helpers/runtime.js';

interface RecordingIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
}

function recordingIO(cwd: string): RecordingIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    cwd,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
}

describe('cli-exec', () => {
  describe('parseArgs', () => {
    it('parses a script file', () => {
      expect(parseArgs(['main.tgl'])).toEqual({ mode: 'exec', file: 'main.tgl' });
    });

    it('parses -e source', () => {
      expect(parseArgs(['-e', '1 + 2'])).toEqual({ mode: 'eval', source: '1 + 2' });
    });

    it('recognizes help and version flags anywhere', () => {
      expect(parseArgs(['main.tgl', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('rejects malformed command lines', () => {
      expect(() => parseArgs([])).toThrow('Missing file argument');
      expect(() => parseArgs(['-e'])).toThrow('Missing source after -e');
      expect(() => parseArgs(['--fast'])).toThrow('Unknown option: --fast');
      expect(() => parseArgs(['a.tgl', 'b.tgl'])).toThrow('Unexpected argument: b.tgl');
    });
  });

  describe('runCli', () => {
    let cleanup: (() => void) | undefined;

    afterEach(() => {
      cleanup?.();
      cleanup = undefined;
    });

    function project(files: Record<string, string>): ReturnType<typeof createFixture> {
      const fx = createFixture(files);
      cleanup = fx.cleanup;
      return fx;
    }

    it('prints usage for --help', () => {
      const io = recordingIO(process.cwd());
      expect(runCli(['--help'], io)).toBe(0);
      expect(io.out).toEqual([USAGE]);
    });

    it('prints the package version', () => {
      const io = recordingIO(process.cwd());
      expect(runCli(['--version'], io)).toBe(0);
      expect(io.out).toEqual(['0.4.0']);
    });

    it('exits with 2 on a usage error', () => {
      const io = recordingIO(process.cwd());
      expect(runCli([], io)).toBe(2);
      expect(io.err).toEqual(['Error: Missing file argument', USAGE]);
    });

    it('prints the value of evaluated source', () => {
      const io = recordingIO(process.cwd());
      expect(runCli(['-e', '[1, 2].map(:double)'], io)).toBe(0);
      expect(io.out).toEqual(['[2, 4]']);
    });

    it('prints nothing for a none result', () => {
      const io = recordingIO(process.cwd());
      expect(runCli(['-e', 'x = 1'], io)).toBe(0);
      expect(io.out).toEqual([]);
    });

    it('routes print to stdout when running a file', () => {
      const fx = project({ 'main.tgl': 'print("hi")\nprint(2)' });
      const io = recordingIO(fx.dir);
      expect(runCli(['main.tgl'], io)).toBe(0);
      expect(io.out).toEqual(['hi', '2']);
      expect(io.err).toEqual([]);
    });

    it('reports a raised error with its position and exits with 1', () => {
      const fx = project({ 'main.tgl': 'raise "boom"' });
      const io = recordingIO(fx.dir);
      expect(runCli(['main.tgl'], io)).toBe(1);
      expect(io.err).toEqual([`RuntimeError: boom (${fx.file('main.tgl')}:1:1)`]);
    });

    it('reports an unreadable file', () => {
      const fx = project({});
      const io = recordingIO(fx.dir);
      expect(runCli(['missing.tgl'], io)).toBe(1);
      expect(io.err).toHaveLength(1);
      expect(io.err[0]?.startsWith(`IOError: Cannot read file '${fx.file('missing.tgl')}'`)).toBe(true);
    });

    it('applies tangle.yaml from the working directory', () => {
      const fx = project({
        'tangle.yaml': 'search_paths:\n  - lib\nconfig:\n  decimal_places: 2\n',
        'lib/util.tgl': 'third = 1 / 3',
      });
      const io = recordingIO(fx.dir);
      expect(runCli(['-e', 'import "util"\nprint(util.third)'], io)).toBe(0);
      expect(io.out).toEqual(['0.33']);
    });

    it('reports a broken tangle.yaml', () => {
      const fx = project({ 'tangle.yaml': 'search_paths: 3\n' });
      const io = recordingIO(fx.dir);
      expect(runCli(['-e', '1'], io)).toBe(1);
      expect(io.err).toEqual(['ConfigError: search_paths must be a list of strings']);
    });
  });
});
