/* --------------------------------------------------------------------------
 *  Hunkwright — Patch Parsing Logic
 * ----------------------------------------------------------------------- */

import { z } from 'zod';
import { PatchError } from '../errors';
import { Hunk, HunkSet } from '../types/patchTypes';
import { stripMarkdownFence } from '../utilities';

/**
 * Canonical example payload, handy as a starting point for hand-written patches.
 */
export const PATCH_SCHEMA_TEMPLATE = `{
  "hunks": [
    {
      "description": "Short human description",
      "search_block": "exact text to find\\n(can span multiple lines)",
      "replace_block": "replacement text\\n(same or different length)"
    }
  ]
}`;

const hunkSetSchema = z.object({
  hunks: z.array(z.unknown()),
});

const hunkSchema = z.object({
  description: z.string().nullish().catch(undefined),
  search_block: z.string(),
  replace_block: z.string(),
});

/**
 * Validates an already-parsed value into a typed hunk set.
 * Extra keys are ignored; a non-string description is dropped.
 * @throws PatchError with kind `MalformedPatch`
 */
export function validatePatchSpec(input: unknown): HunkSet {
  const top = hunkSetSchema.safeParse(input);
  if (!top.success) {
    throw new PatchError('MalformedPatch', "Patch JSON must contain a 'hunks' array.");
  }

  const hunks = top.data.hunks.map((raw, hunkIndex): Hunk => {
    const parsed = hunkSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PatchError(
        'MalformedPatch',
        `Hunk ${hunkIndex + 1} is missing search_block or replace_block.`,
        { hunkIndex },
      );
    }

    const { description, search_block, replace_block } = parsed.data;
    return description == null
      ? { search_block, replace_block }
      : { description, search_block, replace_block };
  });

  return { hunks };
}

/**
 * Parses patch text into a typed hunk set. A surrounding markdown code fence
 * is removed first.
 * @throws PatchError with kind `MalformedPatch`
 */
export function parsePatchJson(text: string): HunkSet {
  let value: unknown;
  try {
    value = JSON.parse(stripMarkdownFence(text));
  } catch (err) {
    throw new PatchError('MalformedPatch', `Invalid patch JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return validatePatchSpec(value);
}
