// src/fileSystem.ts

import * as fs from 'fs';
import * as path from 'path';
import { PatcherConfig } from './config';
import { getFileOutputChannel } from './logger';
import { formatTimestamp, sanitizeFileNamePart } from './utilities';

/**
 * Reads a UTF-8 text file
 * @param filePath Path of the file to read
 */
export async function loadTextFile(filePath: string): Promise<string> {
  const text = await fs.promises.readFile(filePath, 'utf8');
  getFileOutputChannel().appendLine(`Loaded: ${filePath}`);
  return text;
}

/**
 * Writes a UTF-8 text file, creating parent directories as needed
 * @param filePath Destination path
 * @param text Contents to write
 */
export async function saveTextFile(filePath: string, text: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, text, 'utf8');
  getFileOutputChannel().appendLine(`Saved: ${filePath}`);
}

/**
 * Normalizes a version suffix: unsafe characters removed, leading `_` added.
 */
export function normalizeVersionSuffix(raw: string): string {
  const suffix = sanitizeFileNamePart(raw);
  if (suffix && !suffix.startsWith('_')) {
    return `_${suffix}`;
  }
  return suffix;
}

export interface OutputOverrides {
  /** Explicit destination; wins over everything in the config */
  outputPath?: string;
}

/**
 * Decides where a patched buffer is written.
 *
 * An explicit `outputPath` override is used as given. Otherwise, with a
 * source path the result goes next to it, as `<base><suffix><ext>` when
 * versioning is on, or over the source itself when it is off. Without one
 * it goes to `<outputDir>/<defaultOutputFilename>`.
 */
export function resolveOutputPath(
  sourcePath: string | undefined,
  config: PatcherConfig,
  overrides: OutputOverrides = {},
): string {
  if (overrides.outputPath) {
    return overrides.outputPath;
  }
  if (!sourcePath) {
    return path.join(config.outputDir, config.defaultOutputFilename);
  }

  const suffix = config.versioned ? normalizeVersionSuffix(config.versionSuffix) : '';
  const { dir, name, ext } = path.parse(sourcePath);
  return path.join(dir, `${name}${suffix}${ext}`);
}

/**
 * Persists a transcript as `<logDir>/patch_<timestamp>.log`
 * @returns Path of the written log file
 */
export async function saveLogFile(
  logDir: string,
  lines: readonly string[],
  now: Date = new Date(),
): Promise<string> {
  const file = path.join(logDir, `patch_${formatTimestamp(now)}.log`);
  await fs.promises.mkdir(logDir, { recursive: true });
  await fs.promises.writeFile(file, lines.join('\n') + '\n', 'utf8');
  getFileOutputChannel().appendLine(`Log saved: ${file}`);
  return file;
}
