export { applyPatch, applyPatchOrThrow, locatePlacements } from './applyPatch';
export { PatchError, isPatchError } from './errors';
export { DEFAULT_CONFIG, loadConfig, parseConfig } from './config';
export type { ConfigOverrides, PatcherConfig } from './config';
export { OutputChannel, getMainOutputChannel, getFileOutputChannel, log } from './logger';
export { loadTextFile, saveTextFile, saveLogFile, resolveOutputPath } from './fileSystem';
export type { OutputOverrides } from './fileSystem';
export { tokenizeLine, reconstructLine } from './patch/LineTokenizer';
export { detectNewline, splitBuffer, splitBlock, joinBuffer } from './patch/BufferSplitter';
export { locateHunk, resolvePlacement } from './patch/HunkLocator';
export { findOverlap, hasOverlaps } from './patch/OverlapValidator';
export { applyPlacements } from './patch/PatchApplier';
export { PATCH_SCHEMA_TEMPLATE, parsePatchJson, validatePatchSpec } from './patch/PatchParser';
export { HunkManager, createPreview, summarizeChanges } from './patch/HunkManager';
export {
  ExactStrategy,
  TolerantStrategy,
  MatchStrategyFactory,
  stripOuterWhitespace,
} from './strategies/matchStrategy';
export type { MatchStrategy } from './strategies/matchStrategy';
export * from './types/patchTypes';
