/**
 * Main entry point - exports all public APIs
 */

export { scanLines, finalBraceDepth } from './lexical_scanner';
export type { LexicalRules, LiteralRule, LineClass, ScannedLine, ScanState } from './lexical_scanner';
export { pythonProfile, javaProfile, getLanguageProfile, detectLanguage, listLanguages } from './language_profile';
export type { LanguageProfile, DefinitionMatch } from './language_profile';
export { findBoundaries, scanBoundaries } from './boundary_detector';
export type { Boundary, BoundaryOptions, BoundaryScan, IgnoredDefinition } from './boundary_detector';
export { split, joinSegments } from './chunker';
export type { Segment, SegmentKind, SplitOptions } from './chunker';
export { diffLines, splitText, DiffTooLargeError, MAX_DIFF_CELLS } from './line_diff';
export type { DiffOp, SplitText } from './line_diff';
export {
    merge,
    splitDocstring,
    composeInlineCandidate,
    composeDocstringCandidate,
} from './safety_merger';
export type {
    AnnotationStyle,
    AnnotatedSegment,
    DocstringSplit,
    MergeOptions,
    Rejection,
    RejectionReason,
} from './safety_merger';
export { PromptBuilder, truncateFront } from './prompt_builder';
export type { ContextMode, Prompt, PromptBuilderConfig } from './prompt_builder';
export { OracleClient, DEFAULT_ENDPOINT, DEFAULT_MODEL, parseRetryAfter, sanitizeErrorSnippet } from './oracle_client';
export type {
    CompletionOracle,
    CompletionParams,
    CompletionResult,
    OracleClientConfig,
    OracleFailureKind,
} from './oracle_client';
export { CachingOracle, CompletionStore, cacheKey } from './completion_cache';
export type { CacheStats, CachingOracleOptions } from './completion_cache';
export { AnnotationDriver, backoffDelay, skipMarker } from './driver';
export type { DriverConfig, RunOptions, RunResult, RunStatus, SegmentReport, SegmentState } from './driver';
export { RunJournal, readJournal } from './run_journal';
export type { JournalEvent, JournalEventType } from './run_journal';
export { loadConfig, resolveApiKey, loadWorkedExample, DEFAULTS, API_KEY_ENV_VAR } from './config';
export type { AutodocConfig, LoadConfigOptions } from './config';
export { AutodocError, ConfigurationError, ErrorFactory } from './structured_error';
export type { ErrorCode, StructuredError } from './structured_error';
export { createLogger, setLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
export * from './output_writer';
