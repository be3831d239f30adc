/* --------------------------------------------------------------------------
 *  Hunkwright — Configuration
 * ----------------------------------------------------------------------- */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const CONFIG_FILE_NAME = 'hunkwright.config.json';

const configSchema = z
  .object({
    /** Directory for output when no source file path is known */
    outputDir: z.string().min(1).default('.'),
    /** Directory for saved transcripts */
    logDir: z.string().min(1).default('./logs'),
    defaultOutputFilename: z.string().min(1).default('patched_output.txt'),
    /** Appended to the base name when saving next to the source */
    versionSuffix: z.string().default('_v1.0'),
    versioned: z.boolean().default(true),
    saveLog: z.boolean().default(false),
  })
  .strict();

export type PatcherConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = Partial<PatcherConfig>;

export const DEFAULT_CONFIG: PatcherConfig = configSchema.parse({});

function issueKey(issue: z.ZodIssue): string {
  if (issue.path.length > 0) {return issue.path.join('.');}
  if (issue.code === 'unrecognized_keys') {return issue.keys.join(', ');}
  return '(root)';
}

/**
 * Validates a raw configuration object, filling in defaults.
 * @param raw Parsed configuration value
 * @param source Where the value came from, used in error messages
 */
export function parseConfig(raw: unknown, source = 'configuration'): PatcherConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid ${source}: ${issueKey(issue)}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Loads `hunkwright.config.json` from `cwd` when present and applies
 * overrides on top. Undefined overrides are ignored.
 */
export function loadConfig(cwd: string, overrides: ConfigOverrides = {}): PatcherConfig {
  const file = path.join(cwd, CONFIG_FILE_NAME);

  let base = DEFAULT_CONFIG;
  if (fs.existsSync(file)) {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
      throw new Error(`Invalid ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    base = parseConfig(raw, file);
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return parseConfig({ ...base, ...defined });
}
