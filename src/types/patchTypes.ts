/* --------------------------------------------------------------------------
 *  Hunkwright — Types for patch operations
 * ----------------------------------------------------------------------- */

/**
 * One physical line split into its structural parts.
 * `indent + content + trailing` always reproduces the source line.
 */
export interface Line {
  readonly indent: string;
  readonly content: string;
  readonly trailing: string;
}

/** Line-ending convention detected for a buffer */
export type Newline = '\r\n' | '\n';

/**
 * A tokenized text buffer: the lines plus the line ending used to join them.
 */
export interface TextBuffer {
  lines: Line[];
  newline: Newline;
}

/**
 * A single search/replace instruction
 */
export interface Hunk {
  /** Free text, informational only */
  description?: string;

  /** Block of text expected to exist in the buffer */
  search_block: string;

  /** Text that takes the place of the search block */
  replace_block: string;
}

/**
 * A complete patch: hunks in the order the caller supplied them
 */
export interface HunkSet {
  hunks: Hunk[];
}

/** Matching policy used by the locator */
export type MatchMode = 'exact' | 'tolerant';

/**
 * Resolved position of one hunk inside the original buffer.
 * `end` is exclusive.
 */
export interface Placement {
  hunkIndex: number;
  start: number;
  end: number;
  mode: MatchMode;
  replaceLines: Line[];
}

/** Receives narration of matching decisions */
export type ProgressSink = (message: string) => void;

/**
 * Failure kinds an apply operation can end with
 */
export type PatchFailureKind =
  | 'MalformedPatch'
  | 'AmbiguousMatch'
  | 'NotFound'
  | 'OverlappingHunks';

export interface PatchFailure {
  kind: PatchFailureKind;

  /** 0-based index of the offending hunk, when one is at fault */
  hunkIndex?: number;

  /** Mode under which an ambiguous match was found */
  mode?: MatchMode;

  message: string;
}

/**
 * Result of applying a patch to a text buffer
 */
export type PatchResult =
  | { success: true; patched: string; placements: Placement[] }
  | { success: false; failure: PatchFailure };

/**
 * Changed region between two versions of a buffer. Line numbers are 0-based.
 */
export interface HunkRange {
  originalStart: number;
  originalLength: number;
  modifiedStart: number;
  modifiedLength: number;
}

/**
 * Line statistics for a patched buffer
 */
export interface ChangeSummary {
  additions: number;
  deletions: number;
  hunks: HunkRange[];
}
