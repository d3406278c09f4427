/**
 * Annotation Driver
 *
 * Threads every segment through prompt -> oracle -> merge -> splice and owns
 * the only mutable pipeline state: the annotated text spliced so far.
 *
 * Segment states:
 *   scanned -> prompted -> completed -> merged -> spliced
 *   prompted -> prompted   (retry after a transient oracle failure)
 *   prompted -> spliced    (pass-through after an oracle failure)
 *   scanned  -> spliced    (preamble, trailer, cancelled runs)
 */

import * as crypto from 'crypto';
import { findBoundaries } from './boundary_detector';
import { Segment, split } from './chunker';
import { ConcurrencyLimiter } from './concurrency_limiter';
import { LanguageProfile } from './language_profile';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { CompletionOracle, CompletionParams } from './oracle_client';
import { ContextMode, PromptBuilder } from './prompt_builder';
import { RunJournal } from './run_journal';
import {
    AnnotationStyle,
    composeDocstringCandidate,
    composeInlineCandidate,
    merge,
} from './safety_merger';
import { ConfigurationError, ErrorFactory, StructuredError } from './structured_error';

const log = createLogger('driver');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type SegmentState = 'scanned' | 'prompted' | 'completed' | 'merged' | 'spliced';

export type RunStatus = 'done' | 'cancelled' | 'aborted';

export interface SegmentReport {
    index: number;
    kind: Segment['kind'];
    identifier?: string;
    state: SegmentState;
    /** True when oracle output was merged into the result. */
    accepted: boolean;
    attempts: number;
    skipReason?: string;
    detail?: string;
}

export interface RunResult {
    runId: string;
    status: RunStatus;
    /** Null when an aborted run discards its output. */
    output: string | null;
    segments: SegmentReport[];
    error?: StructuredError;
}

export interface DriverConfig {
    contextMode: ContextMode;
    style: AnnotationStyle;
    profile: LanguageProfile;
    /** 1 = annotate top-level definitions only. */
    maxDepth?: number;
    splitTrailer: boolean;
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    authFailurePolicy: 'discard' | 'keep_spliced';
    retryExhaustedPolicy: 'skip' | 'abort';
    /** Parallel oracle calls in fixed_example mode; growing mode is always serial. */
    concurrency: number;
    maxContextChars: number;
    example?: string;
    params: Omit<CompletionParams, 'stopSequence'>;
    /** Insert a comment above each function that was passed through. */
    markSkipped: boolean;
    sleep?: (ms: number) => Promise<void>;
    journal?: RunJournal;
}

export interface RunOptions {
    signal?: AbortSignal;
}

type Outcome =
    | { kind: 'spliced'; text: string }
    | { kind: 'abort'; error: StructuredError }
    | { kind: 'thrown'; cause: unknown };

/* -------------------------------------------------------------------------- */
/* State transitions                                                          */
/* -------------------------------------------------------------------------- */

const VALID_TRANSITIONS: Record<SegmentState, SegmentState[]> = {
    scanned: ['prompted', 'spliced'],
    prompted: ['prompted', 'completed', 'spliced'],
    completed: ['merged'],
    merged: ['spliced'],
    spliced: [],
};

function transition(report: SegmentReport, to: SegmentState): void {
    if (!VALID_TRANSITIONS[report.state].includes(to)) {
        throw new Error(`Invalid segment transition ${report.state} -> ${to} (segment ${report.index})`);
    }
    report.state = to;
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before retry `attempt` (1-based): exponential, capped, never below Retry-After. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number, retryAfterMs?: number): number {
    const exp = Math.min(maxMs, baseMs * 2 ** (attempt - 1));
    return Math.max(exp, retryAfterMs ?? 0);
}

/* -------------------------------------------------------------------------- */
/* Driver                                                                     */
/* -------------------------------------------------------------------------- */

export class AnnotationDriver {
    private readonly builder: PromptBuilder;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(private readonly oracle: CompletionOracle, private readonly config: DriverConfig) {
        const ints: Array<[string, number, number]> = [
            ['max_retries', config.maxRetries, 0],
            ['concurrency', config.concurrency, 1],
            ['backoff_base_ms', config.backoffBaseMs, 0],
            ['backoff_max_ms', config.backoffMaxMs, 0],
        ];
        for (const [key, value, min] of ints) {
            if (!Number.isInteger(value) || value < min) {
                throw new ConfigurationError(`${key} must be an integer >= ${min}, got ${value}`, key);
            }
        }
        if (config.contextMode === 'fixed_example' && (config.example === undefined || config.example.trim() === '')) {
            throw ErrorFactory.missingExample(undefined);
        }

        this.builder = new PromptBuilder({
            contextMode: config.contextMode,
            style: config.style,
            profile: config.profile,
            maxContextChars: config.maxContextChars,
        });
        this.sleep = config.sleep ?? defaultSleep;
    }

    async run(source: string, options: RunOptions = {}): Promise<RunResult> {
        const runId = crypto.randomUUID();
        setCorrelation({ runId });
        try {
            return await this.execute(runId, source, options.signal);
        } finally {
            clearCorrelation();
        }
    }

    private async execute(runId: string, source: string, signal: AbortSignal | undefined): Promise<RunResult> {
        const { config } = this;
        const boundaries = findBoundaries(source, config.profile, { maxDepth: config.maxDepth });
        const segments = split(source, boundaries, { splitTrailer: config.splitTrailer });
        const reports = segments.map((s): SegmentReport => ({
            index: s.index,
            kind: s.kind,
            identifier: s.identifier,
            state: 'scanned',
            accepted: false,
            attempts: 0,
        }));

        const functions = segments.filter((s) => s.kind === 'function_body').length;
        log.info(`Run ${runId}: ${functions} function(s) in ${segments.length} segment(s)`, {
            mode: config.contextMode,
            style: config.style,
            language: config.profile.name,
        });
        config.journal?.logRunStarted(runId, {
            context_mode: config.contextMode,
            style: config.style,
            language: config.profile.name,
            temperature: config.params.temperature,
        }, segments.length);

        // Fixed-example prompts do not depend on earlier output, so they may run ahead.
        const concurrent = config.contextMode === 'fixed_example' && config.concurrency > 1;
        let stopped = false;
        const limiter = new ConcurrencyLimiter(concurrent ? config.concurrency : 1);
        const ahead = new Map<number, Promise<Outcome>>();
        if (concurrent) {
            for (const seg of segments) {
                if (seg.kind !== 'function_body') continue;
                ahead.set(seg.index, limiter.run(async (): Promise<Outcome> => {
                    if (stopped || signal?.aborted) return { kind: 'spliced', text: seg.rawText };
                    try {
                        return await this.processSegment(runId, seg, segments[seg.index + 1], '', reports[seg.index]);
                    } catch (cause) {
                        // Rethrown when this segment's turn to splice comes.
                        return { kind: 'thrown', cause };
                    }
                }));
            }
        }

        let accumulated = '';
        let result: RunResult | undefined;

        try {
            for (const seg of segments) {
                const report = reports[seg.index];
                setCorrelation({ segment: seg.identifier ?? seg.kind });

                if (signal?.aborted) {
                    const error = ErrorFactory.cancelled(seg.index, segments.length);
                    log.warn(error.message);
                    result = this.finish(runId, 'cancelled', accumulated + source.slice(seg.startOffset), reports, error);
                    break;
                }

                if (seg.kind !== 'function_body') {
                    transition(report, 'spliced');
                    accumulated += seg.rawText;
                    continue;
                }

                const pending = ahead.get(seg.index);
                const outcome = pending ? await pending : await this.processSegment(runId, seg, segments[seg.index + 1], accumulated, report);

                if (outcome.kind === 'thrown') {
                    throw outcome.cause;
                }
                if (outcome.kind === 'abort') {
                    const keep = outcome.error.code === 'ORACLE_AUTH_ERROR'
                        ? config.authFailurePolicy === 'keep_spliced'
                        : true;
                    log.error(outcome.error.message, { code: outcome.error.code });
                    result = this.finish(runId, 'aborted', keep ? accumulated + source.slice(seg.startOffset) : null, reports, outcome.error);
                    break;
                }

                transition(report, 'spliced');
                accumulated += outcome.text;
            }
        } finally {
            stopped = true;
            await Promise.allSettled(ahead.values());
        }

        return result ?? this.finish(runId, 'done', accumulated, reports);
    }

    private finish(
        runId: string,
        status: RunStatus,
        output: string | null,
        segments: SegmentReport[],
        error?: StructuredError
    ): RunResult {
        const annotated = segments.filter((s) => s.accepted).length;
        const skipped = segments.filter((s) => s.skipReason !== undefined).length;
        log.info(`Run ${status}: ${annotated} annotated, ${skipped} passed through`);
        this.config.journal?.logRunFinished(runId, status, { annotated, skipped, error_code: error?.code });
        return error ? { runId, status, output, segments, error } : { runId, status, output, segments };
    }

    /* ---------------------------------------------------------------------- */
    /* One function segment                                                   */
    /* ---------------------------------------------------------------------- */

    private async processSegment(
        runId: string,
        seg: Segment,
        next: Segment | undefined,
        accumulated: string,
        report: SegmentReport
    ): Promise<Outcome> {
        const { config } = this;
        const journal = config.journal;
        const ref = { index: seg.index, identifier: seg.identifier };
        const prompt = this.builder.build(seg, accumulated, config.example, next);
        const params: CompletionParams = { ...config.params, stopSequence: prompt.stopSequence };

        let text: string | undefined;
        for (let attempt = 1; ; attempt++) {
            transition(report, 'prompted');
            report.attempts = attempt;
            journal?.logPrompted(runId, ref, attempt, prompt.text.length, prompt.truncatedChars);

            const result = await this.oracle.complete(prompt, params);
            if (result.ok) {
                text = result.text;
                break;
            }

            const error = ErrorFactory.oracleFailure(result.kind, result.detail, {
                segment: seg.index,
                identifier: seg.identifier,
                attempt,
                http_status: result.httpStatus,
            });

            if (result.kind === 'auth_error') {
                return { kind: 'abort', error };
            }
            if (result.kind === 'malformed_response') {
                return { kind: 'spliced', text: this.passThrough(runId, seg, report, 'malformed_response', result.detail, error) };
            }

            if (attempt > config.maxRetries) {
                const fatal = config.retryExhaustedPolicy === 'abort';
                const exhausted = ErrorFactory.retryExhausted(attempt, result.kind, fatal);
                if (fatal) return { kind: 'abort', error: exhausted };
                return { kind: 'spliced', text: this.passThrough(runId, seg, report, result.kind, exhausted.message, exhausted) };
            }

            const delay = backoffDelay(attempt, config.backoffBaseMs, config.backoffMaxMs, result.retryAfterMs);
            log.warn(`${error.message}; retry ${attempt}/${config.maxRetries} in ${delay}ms`);
            journal?.logRetrying(runId, ref, attempt, error, delay);
            await this.sleep(delay);
        }

        transition(report, 'completed');
        journal?.logCompleted(runId, ref, report.attempts, text.length);

        const candidate = config.style === 'docstring'
            ? composeDocstringCandidate(seg, text, config.profile)
            : composeInlineCandidate(seg, text);
        const merged = merge(seg, candidate, { style: config.style, profile: config.profile });
        transition(report, 'merged');

        if (!merged.accepted) {
            const rejection = merged.rejection ?? { reason: 'modified_line', detail: 'rejected' };
            journal?.logRejected(runId, ref, rejection);
            const error = ErrorFactory.unsafeEdit(rejection.reason, rejection.detail, { segment: seg.index, line: rejection.line });
            return { kind: 'spliced', text: this.passThrough(runId, seg, report, rejection.reason, rejection.detail, error) };
        }

        report.accepted = true;
        journal?.logMerged(runId, ref, merged.insertedLines);
        log.debug(`Merged ${seg.identifier ?? seg.index}: +${merged.insertedLines} line(s)`);
        return { kind: 'spliced', text: merged.annotatedText };
    }

    private passThrough(
        runId: string,
        seg: Segment,
        report: SegmentReport,
        reason: string,
        detail: string,
        error: StructuredError
    ): string {
        report.accepted = false;
        report.skipReason = reason;
        report.detail = detail;
        log.warn(`Skipping ${seg.identifier ?? `segment ${seg.index}`}: ${reason}`, { code: error.code });
        this.config.journal?.logSkipped(runId, { index: seg.index, identifier: seg.identifier }, reason, error);
        return this.config.markSkipped ? skipMarker(seg, reason, this.config.profile) + seg.rawText : seg.rawText;
    }
}

/** Comment line placed above a function that was passed through. */
export function skipMarker(seg: Segment, reason: string, profile: LanguageProfile): string {
    const header = seg.definitionLine ?? '';
    const indent = header.slice(0, header.length - header.trimStart().length);
    const eol = seg.rawText.includes('\r\n') ? '\r\n' : '\n';
    return `${indent}${profile.lineComment} autodoc: skipped (${reason})${eol}`;
}
