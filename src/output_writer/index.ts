// src/output_writer/index.ts

export { atomicWriteFileSync } from "./atomic_write";
export type { FsyncMode } from "./atomic_write";
export { applyUnifiedDiff, createUnifiedDiff } from "./unified_patch";
export type { PatchApplyResult, UnifiedDiffOptions } from "./unified_patch";
export { OutputWriterError, outputPathFor, patchPathFor, writeAnnotatedOutput } from "./writer";
export type { OutputWriterErrorCode, WriteAnnotatedParams, WriteAnnotatedResult } from "./writer";
