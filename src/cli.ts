#!/usr/bin/env node
/* --------------------------------------------------------------------------
 *  Hunkwright — command-line front end
 * ----------------------------------------------------------------------- */

import * as path from 'path';
import chalk from 'chalk';
import { applyPatch } from './applyPatch';
import { ConfigOverrides, PatcherConfig, loadConfig } from './config';
import { isPatchError } from './errors';
import { loadTextFile, resolveOutputPath, saveLogFile, saveTextFile } from './fileSystem';
import { getMainOutputChannel, log } from './logger';
import { createPreview, summarizeChanges } from './patch/HunkManager';
import { parsePatchJson } from './patch/PatchParser';
import { PatchFailure, PatchResult } from './types/patchTypes';

export const USAGE = `Usage: hunkwright <target-file> <patch-file|-> [options]

Options:
  --output <path>   Write the result to <path>
  --suffix <s>      Version suffix for the saved file (default: _v1.0)
  --no-version      Overwrite the target file instead of saving a version
  --dry-run         Print a unified diff instead of saving
  --save-log        Save the transcript to the log directory
  --log-dir <dir>   Directory for saved transcripts
  --quiet           Do not echo narration`;

export interface CliOptions {
  target: string;
  patch: string;
  output?: string;
  suffix?: string;
  noVersion: boolean;
  dryRun: boolean;
  saveLog: boolean;
  logDir?: string;
  quiet: boolean;
}

/**
 * Process boundary, replaced in tests
 */
export interface CliIO {
  cwd: string;
  color: boolean;
  readStdin(): Promise<string>;
  stdout(text: string): void;
  stderr(text: string): void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Set(['--output', '--suffix', '--log-dir']);

/**
 * Parses command-line arguments (without the node and script entries)
 * @throws UsageError
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const positional: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      values.set(arg, value);
      i++;
    } else if (arg === '-' || !arg.startsWith('-')) {
      positional.push(arg);
    } else if (['--no-version', '--dry-run', '--save-log', '--quiet'].includes(arg)) {
      flags.add(arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (positional.length !== 2) {
    throw new UsageError('Expected a target file and a patch file');
  }

  return {
    target: positional[0],
    patch: positional[1],
    output: values.get('--output'),
    suffix: values.get('--suffix'),
    noVersion: flags.has('--no-version'),
    dryRun: flags.has('--dry-run'),
    saveLog: flags.has('--save-log'),
    logDir: values.get('--log-dir'),
    quiet: flags.has('--quiet'),
  };
}

function describeFailure(failure: PatchFailure): string {
  return `Patch Error: ${failure.message}`;
}

/**
 * Runs one patch operation and returns the process exit code:
 * 0 on success, 1 on a load or patch failure, 2 on a usage or
 * configuration error.
 */
export async function runCli(args: readonly string[], io: CliIO): Promise<number> {
  const colors = new chalk.Instance({ level: io.color ? 1 : 0 });

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(colors.red(err.message));
      io.stderr(USAGE);
      return 2;
    }
    throw err;
  }

  const overrides: ConfigOverrides = {
    versionSuffix: options.suffix,
    versioned: options.noVersion ? false : undefined,
    logDir: options.logDir,
    saveLog: options.saveLog || undefined,
  };
  let config: PatcherConfig;
  try {
    config = loadConfig(io.cwd, overrides);
  } catch (err) {
    io.stderr(colors.red(err instanceof Error ? err.message : String(err)));
    return 2;
  }

  const channel = getMainOutputChannel();
  channel.clear();

  // Status lines go to the transcript but are printed by `report`, not the echo sink
  let reporting = false;
  const removeSink = options.quiet
    ? () => undefined
    : channel.addSink((line) => {
      if (!reporting) {io.stdout(colors.gray(line));}
    });

  const report = (message: string, isError = false): void => {
    reporting = true;
    channel.appendLine(isError ? `ERROR: ${message}` : message);
    reporting = false;
    if (isError) {
      io.stderr(colors.red(message));
    } else {
      io.stdout(colors.green(message));
    }
  };

  const targetPath = path.resolve(io.cwd, options.target);
  const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

  try {
    let original: string;
    let patchText: string;
    try {
      original = await loadTextFile(targetPath);
      patchText = options.patch === '-'
        ? await io.readStdin()
        : await loadTextFile(path.resolve(io.cwd, options.patch));
    } catch (err) {
      report(`Load failed: ${errorMessage(err)}`, true);
      return 1;
    }

    let result: PatchResult;
    try {
      result = applyPatch(original, parsePatchJson(patchText), log);
    } catch (err) {
      if (!isPatchError(err)) {throw err;}
      result = { success: false, failure: err.toFailure() };
    }

    if (!result.success) {
      report(describeFailure(result.failure), true);
      return 1;
    }

    if (options.dryRun) {
      io.stdout(createPreview(original, result.patched, options.target));
      log('Dry run: nothing written');
      return 0;
    }

    const outputPath = resolveOutputPath(targetPath, config, {
      outputPath: options.output && path.resolve(io.cwd, options.output),
    });
    try {
      await saveTextFile(outputPath, result.patched);
    } catch (err) {
      report(`Save failed: ${errorMessage(err)}`, true);
      return 1;
    }

    const { additions, deletions } = summarizeChanges(original, result.patched);
    report(`Saved: ${outputPath} (+${additions} −${deletions})`);
    return 0;
  } finally {
    removeSink();
    if (config.saveLog) {
      // A failed log write is reported but leaves the exit code as it was
      await saveLogFile(path.resolve(io.cwd, config.logDir), channel.lines()).catch((err: unknown) => {
        io.stderr(colors.red(`Log save failed: ${errorMessage(err)}`));
      });
    }
  }
}

function readProcessStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk: string) => (data += chunk));
    process.stdin.on('end', () => resolve(data));
    process.stdin.on('error', reject);
  });
}

if (require.main === module) {
  const io: CliIO = {
    cwd: process.cwd(),
    color: Boolean(process.stdout.isTTY),
    readStdin: readProcessStdin,
    stdout: (text) => process.stdout.write(text + '\n'),
    stderr: (text) => process.stderr.write(text + '\n'),
  };

  runCli(process.argv.slice(2), io)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
      process.exitCode = 1;
    });
}
