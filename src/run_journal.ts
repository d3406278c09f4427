/**
 * Run Journal - JSONL audit trail of segment state transitions
 *
 * One line per event, appended synchronously so the file is complete even
 * when a run is interrupted.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Rejection } from './safety_merger';
import { StructuredError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type JournalEventType =
    // Run lifecycle
    | 'run_started'
    | 'run_finished'

    // Segment lifecycle
    | 'segment_prompted'
    | 'segment_retrying'
    | 'segment_completed'
    | 'segment_merged'
    | 'segment_rejected'
    | 'segment_skipped';

export interface JournalEvent {
    timestamp: string;
    event_type: JournalEventType;
    run_id: string;
    segment_index?: number;
    identifier?: string;
    attempt_number?: number;
    data: Record<string, unknown>;
}

export interface SegmentRef {
    index: number;
    identifier?: string;
}

/* -------------------------------------------------------------------------- */
/* Run Journal                                                                */
/* -------------------------------------------------------------------------- */

export class RunJournal {
    constructor(private readonly journalPath: string) {
        fs.mkdirSync(path.dirname(journalPath), { recursive: true });
    }

    get path(): string {
        return this.journalPath;
    }

    log(
        eventType: JournalEventType,
        runId: string,
        data: Record<string, unknown>,
        segment?: SegmentRef,
        attemptNumber?: number
    ): void {
        const event: JournalEvent = {
            timestamp: new Date().toISOString(),
            event_type: eventType,
            run_id: runId,
            segment_index: segment?.index,
            identifier: segment?.identifier,
            attempt_number: attemptNumber,
            data,
        };
        fs.appendFileSync(this.journalPath, JSON.stringify(event) + '\n', 'utf8');
    }

    /* ---------------------------------------------------------------------- */
    /* Convenience Methods                                                    */
    /* ---------------------------------------------------------------------- */

    logRunStarted(runId: string, settings: Record<string, unknown>, segmentCount: number): void {
        this.log('run_started', runId, {
            ...settings,
            segments: segmentCount,
            node_version: process.version,
        });
    }

    logPrompted(runId: string, segment: SegmentRef, attempt: number, promptChars: number, truncatedChars: number): void {
        this.log('segment_prompted', runId, { prompt_chars: promptChars, truncated_chars: truncatedChars }, segment, attempt);
    }

    logRetrying(runId: string, segment: SegmentRef, attempt: number, error: StructuredError, delayMs: number): void {
        this.log('segment_retrying', runId, {
            error_code: error.code,
            error_message: error.message,
            delay_ms: delayMs,
        }, segment, attempt);
    }

    logCompleted(runId: string, segment: SegmentRef, attempt: number, completionChars: number): void {
        this.log('segment_completed', runId, { completion_chars: completionChars }, segment, attempt);
    }

    logMerged(runId: string, segment: SegmentRef, insertedLines: number): void {
        this.log('segment_merged', runId, { inserted_lines: insertedLines }, segment);
    }

    logRejected(runId: string, segment: SegmentRef, rejection: Rejection): void {
        this.log('segment_rejected', runId, {
            reason: rejection.reason,
            line: rejection.line,
            detail: rejection.detail,
        }, segment);
    }

    logSkipped(runId: string, segment: SegmentRef, reason: string, error?: StructuredError): void {
        this.log('segment_skipped', runId, {
            reason,
            error_code: error?.code,
            severity: error?.severity,
        }, segment);
    }

    logRunFinished(runId: string, status: string, summary: Record<string, unknown>): void {
        this.log('run_finished', runId, { status, ...summary });
    }
}

/** Reads a journal back, skipping blank lines. */
export function readJournal(journalPath: string): JournalEvent[] {
    return fs
        .readFileSync(journalPath, 'utf8')
        .split('\n')
        .filter((l) => l.trim() !== '')
        .map((l): JournalEvent => JSON.parse(l));
}
