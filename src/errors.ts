/* --------------------------------------------------------------------------
 *  Hunkwright — Patch errors
 * ----------------------------------------------------------------------- */

import { MatchMode, PatchFailure, PatchFailureKind } from './types/patchTypes';

/**
 * Raised by the pipeline stages; `applyPatch` turns it into a failed result.
 */
export class PatchError extends Error {
  readonly kind: PatchFailureKind;
  readonly hunkIndex?: number;
  readonly mode?: MatchMode;

  constructor(
    kind: PatchFailureKind,
    message: string,
    details: { hunkIndex?: number; mode?: MatchMode } = {},
  ) {
    super(message);
    this.name = 'PatchError';
    this.kind = kind;
    this.hunkIndex = details.hunkIndex;
    this.mode = details.mode;
  }

  toFailure(): PatchFailure {
    const failure: PatchFailure = { kind: this.kind, message: this.message };
    if (this.hunkIndex !== undefined) {failure.hunkIndex = this.hunkIndex;}
    if (this.mode !== undefined) {failure.mode = this.mode;}
    return failure;
  }
}

export function isPatchError(err: unknown): err is PatchError {
  return err instanceof PatchError;
}
