// src/test/unit/cli.test.ts
import * as fs from 'fs';
import * as path from 'path';
import { CliIO, UsageError, parseArgs, runCli } from '../../cli';
import { FENCED_PATCH } from '../fixtures/sample-patches';
import { makeTempDir, removeTempDir } from '../setup/test-utils';

interface FakeIO extends CliIO {
  out: string[];
  err: string[];
}

function createIO(cwd: string, stdin = ''): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    color: false,
    out,
    err,
    readStdin: jest.fn().mockResolvedValue(stdin),
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

const BAR_TO_BAZ = JSON.stringify({
  hunks: [{ search_block: 'bar', replace_block: 'baz' }],
});

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should read positionals, values and flags', () => {
      expect(parseArgs(['a.txt', '-', '--suffix', 'v2', '--dry-run', '--quiet'])).toEqual({
        target: 'a.txt',
        patch: '-',
        output: undefined,
        suffix: 'v2',
        noVersion: false,
        dryRun: true,
        saveLog: false,
        logDir: undefined,
        quiet: true,
      });
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['a', 'b', '--force'])).toThrow(UsageError);
    });

    it('should reject a value flag without a value', () => {
      expect(() => parseArgs(['a', 'b', '--output'])).toThrow('Missing value for --output');
    });

    it('should require exactly two files', () => {
      expect(() => parseArgs(['a'])).toThrow('Expected a target file and a patch file');
    });
  });

  describe('runCli', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir();
      fs.writeFileSync(path.join(dir, 'target.txt'), 'foo\nbar\n');
      fs.writeFileSync(path.join(dir, 'patch.json'), BAR_TO_BAZ);
    });

    afterEach(() => {
      removeTempDir(dir);
    });

    function read(name: string): string {
      return fs.readFileSync(path.join(dir, name), 'utf8');
    }

    it('should save a versioned copy next to the target', async () => {
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json'], io);

      expect(code).toBe(0);
      expect(read('target_v1.0.txt')).toBe('foo\nbaz\n');
      expect(read('target.txt')).toBe('foo\nbar\n');
      expect(io.out).toEqual([
        'Hunk 1: (no description)',
        'Hunk 1: exact match at lines 2–2',
        'Applying 1 hunk(s)',
        `Saved: ${path.join(dir, 'target_v1.0.txt')} (+1 −1)`,
      ]);
      expect(io.err).toEqual([]);
    });

    it('should print only the result line when quiet', async () => {
      const io = createIO(dir);

      await runCli(['target.txt', 'patch.json', '--quiet', '--suffix', 'v7'], io);

      expect(io.out).toEqual([`Saved: ${path.join(dir, 'target_v7.txt')} (+1 −1)`]);
    });

    it('should overwrite the target with --no-version', async () => {
      const code = await runCli(['target.txt', 'patch.json', '--no-version'], createIO(dir));

      expect(code).toBe(0);
      expect(read('target.txt')).toBe('foo\nbaz\n');
    });

    it('should write to an explicit output path', async () => {
      await runCli(['target.txt', 'patch.json', '--output', 'out/result.txt'], createIO(dir));

      expect(read(path.join('out', 'result.txt'))).toBe('foo\nbaz\n');
    });

    it('should report a failed save', async () => {
      fs.writeFileSync(path.join(dir, 'blocker'), 'not a directory');
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json', '--quiet', '--output', 'blocker/out.txt'], io);

      expect(code).toBe(1);
      expect(io.out).toEqual([]);
      expect(io.err).toHaveLength(1);
      expect(io.err[0].startsWith('Save failed: ')).toBe(true);
      expect(read('target.txt')).toBe('foo\nbar\n');
    });

    it('should print a diff and write nothing on a dry run', async () => {
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json', '--dry-run', '--quiet'], io);

      expect(code).toBe(0);
      expect(io.out).toHaveLength(1);
      expect(io.out[0].split('\n')).toContain('+baz');
      expect(fs.existsSync(path.join(dir, 'target_v1.0.txt'))).toBe(false);
    });

    it('should read a fenced patch from stdin', async () => {
      const io = createIO(dir, FENCED_PATCH);

      const code = await runCli(['target.txt', '-', '--quiet'], io);

      expect(code).toBe(0);
      expect(io.readStdin).toHaveBeenCalledTimes(1);
      expect(read('target_v1.0.txt')).toBe('foo\nbaz\n');
    });

    it('should fail without writing when a hunk is ambiguous', async () => {
      fs.writeFileSync(path.join(dir, 'target.txt'), 'bar\nbar\n');
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json', '--quiet'], io);

      expect(code).toBe(1);
      expect(io.err).toEqual(['Patch Error: Ambiguous exact match for hunk 1 (2 locations).']);
      expect(fs.existsSync(path.join(dir, 'target_v1.0.txt'))).toBe(false);
      expect(read('target.txt')).toBe('bar\nbar\n');
    });

    it('should fail on malformed patch JSON', async () => {
      fs.writeFileSync(path.join(dir, 'patch.json'), '{"hunks": {}}');
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json'], io);

      expect(code).toBe(1);
      expect(io.err).toEqual(["Patch Error: Patch JSON must contain a 'hunks' array."]);
      expect(io.out).toEqual([]);
    });

    it('should report a missing target file', async () => {
      const io = createIO(dir);

      const code = await runCli(['missing.txt', 'patch.json'], io);

      expect(code).toBe(1);
      expect(io.err).toHaveLength(1);
      expect(io.err[0].startsWith('Load failed: ')).toBe(true);
    });

    it('should print usage for bad arguments', async () => {
      const io = createIO(dir);

      const code = await runCli([], io);

      expect(code).toBe(2);
      expect(io.err[0]).toBe('Expected a target file and a patch file');
      expect(io.err[1].startsWith('Usage: hunkwright')).toBe(true);
    });

    it('should reject an invalid config file', async () => {
      fs.writeFileSync(path.join(dir, 'hunkwright.config.json'), '{"verbose": true}');
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json'], io);

      expect(code).toBe(2);
      expect(io.err).toHaveLength(1);
    });

    it('should save the transcript with --save-log', async () => {
      const io = createIO(dir);

      await runCli(['target.txt', 'patch.json', '--quiet', '--save-log', '--log-dir', 'logs'], io);

      const logs = fs.readdirSync(path.join(dir, 'logs'));
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatch(/^patch_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.log$/);
      const lines = fs.readFileSync(path.join(dir, 'logs', logs[0]), 'utf8').split('\n');
      expect(lines).toContain('Hunk 1: exact match at lines 2–2');
    });

    it('should keep the exit code when the transcript cannot be saved', async () => {
      fs.writeFileSync(path.join(dir, 'blocker'), 'not a directory');
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json', '--quiet', '--save-log', '--log-dir', 'blocker'], io);

      expect(code).toBe(0);
      expect(read('target_v1.0.txt')).toBe('foo\nbaz\n');
      expect(io.err).toHaveLength(1);
      expect(io.err[0].startsWith('Log save failed: ')).toBe(true);
    });

    it('should save the transcript of a failed run', async () => {
      fs.writeFileSync(path.join(dir, 'patch.json'), JSON.stringify({
        hunks: [{ search_block: 'qux', replace_block: 'x' }],
      }));
      const io = createIO(dir);

      const code = await runCli(['target.txt', 'patch.json', '--quiet', '--save-log'], io);

      expect(code).toBe(1);
      const logs = fs.readdirSync(path.join(dir, 'logs'));
      const lines = fs.readFileSync(path.join(dir, 'logs', logs[0]), 'utf8').split('\n');
      expect(lines).toContain('ERROR: Patch Error: Hunk 1 not found in buffer.');
    });
  });
});
