/**
 * Chunker - turns boundaries into ordered, contiguous segments
 *
 * Segments tile the source exactly: joining every segment's rawText gives
 * back the input byte-for-byte.
 */

import { Boundary } from './boundary_detector';

export type SegmentKind = 'preamble' | 'function_body' | 'trailer';

export interface Segment {
    kind: SegmentKind;
    index: number;
    identifier?: string;
    /** Definition header text (possibly several lines, no final line break). */
    definitionLine?: string;
    /** Decorator lines above the header, including their line breaks. */
    lead: string;
    /** Everything after the header, starting with its line break. */
    body: string;
    rawText: string;
    startOffset: number;
    depth?: number;
}

export interface SplitOptions {
    /** Emit text after the last function's body as a separate trailer segment. */
    splitTrailer?: boolean;
}

export function split(source: string, boundaries: Boundary[], options: SplitOptions = {}): Segment[] {
    let prev = 0;
    for (const b of boundaries) {
        if (b.startOffset < prev || b.endOffset < b.startOffset || b.endOffset > source.length) {
            throw new RangeError(`Boundaries out of order or overlapping at ${b.identifier} (offset ${b.startOffset})`);
        }
        prev = b.endOffset;
    }

    const segments: Segment[] = [];
    const firstStart = boundaries.length > 0 ? boundaries[0].startOffset : source.length;
    const preamble = source.slice(0, firstStart);
    segments.push({ kind: 'preamble', index: 0, lead: '', body: preamble, rawText: preamble, startOffset: 0 });

    boundaries.forEach((b, k) => {
        const isLast = k === boundaries.length - 1;
        let end = b.endOffset;
        if (isLast && options.splitTrailer && b.bodyEndOffset < end && source.slice(b.bodyEndOffset, end).trim() !== '') {
            end = b.bodyEndOffset;
        }
        segments.push({
            kind: 'function_body',
            index: segments.length,
            identifier: b.identifier,
            definitionLine: source.slice(b.headerStartOffset, b.headerEndOffset),
            lead: source.slice(b.startOffset, b.headerStartOffset),
            body: source.slice(b.headerEndOffset, end),
            rawText: source.slice(b.startOffset, end),
            startOffset: b.startOffset,
            depth: b.depth,
        });
        if (end < b.endOffset) {
            const trailer = source.slice(end, b.endOffset);
            segments.push({ kind: 'trailer', index: segments.length, lead: '', body: trailer, rawText: trailer, startOffset: end });
        }
    });

    return segments;
}

export function joinSegments(segments: Array<Pick<Segment, 'rawText'>>): string {
    return segments.map((s) => s.rawText).join('');
}
