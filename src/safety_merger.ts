/**
 * Safety Merger - accept oracle output only when it is a pure documentation edit
 *
 * Inline style: every original line must survive, in order, and every line the
 * oracle added must be blank or comment-only. Docstring style: the oracle may
 * add exactly one docstring literal right under the definition header and
 * nothing else.
 *
 * A rejected segment always comes back byte-identical to the original.
 */

import { Segment } from './chunker';
import { LanguageProfile } from './language_profile';
import { ScannedLine, ScanState, scanLines } from './lexical_scanner';
import { DiffOp, DiffTooLargeError, diffLines, splitText } from './line_diff';

export type AnnotationStyle = 'inline' | 'docstring';

export type RejectionReason =
    | 'empty_completion'
    | 'deleted_line'
    | 'modified_line'
    | 'inserted_code'
    | 'definition_mismatch'
    | 'no_docstring'
    | 'docstring_not_contiguous'
    | 'docstring_indent'
    | 'body_mismatch'
    | 'diff_too_large';

export interface Rejection {
    reason: RejectionReason;
    /** 0-based line within the segment (original for deletions, candidate otherwise). */
    line?: number;
    detail: string;
}

export interface AnnotatedSegment {
    original: Segment;
    annotatedText: string;
    accepted: boolean;
    rejection?: Rejection;
    insertedLines: number;
}

export interface MergeOptions {
    style: AnnotationStyle;
    profile: LanguageProfile;
}

export function merge(original: Segment, oracleText: string, options: MergeOptions): AnnotatedSegment {
    if (oracleText === original.rawText) {
        return { original, annotatedText: original.rawText, accepted: true, insertedLines: 0 };
    }
    if (oracleText.trim() === '') {
        return reject(original, { reason: 'empty_completion', detail: 'oracle returned no text' });
    }
    return options.style === 'docstring'
        ? mergeDocstring(original, oracleText, options.profile)
        : mergeInline(original, oracleText, options.profile);
}

function reject(original: Segment, rejection: Rejection): AnnotatedSegment {
    return { original, annotatedText: original.rawText, accepted: false, rejection, insertedLines: 0 };
}

function sameState(a: ScanState, b: ScanState): boolean {
    if (a.state === 'code' || b.state === 'code') return a.state === b.state;
    return a.delimiter === b.delimiter;
}

function trailingBlankCount(lines: string[]): number {
    let n = 0;
    while (n < lines.length && lines[lines.length - 1 - n].trim() === '') n++;
    return n;
}

/* -------------------------------------------------------------------------- */
/* Inline comments                                                            */
/* -------------------------------------------------------------------------- */

function mergeInline(original: Segment, oracleText: string, profile: LanguageProfile): AnnotatedSegment {
    const orig = splitText(original.rawText);
    const cand = splitText(oracleText);
    const scanned = scanLines(oracleText, profile);

    const origCore = orig.lines.slice(0, orig.lines.length - trailingBlankCount(orig.lines));
    const candCore = cand.lines.slice(0, cand.lines.length - trailingBlankCount(cand.lines));

    let ops: DiffOp[];
    try {
        ops = diffLines(origCore, candCore);
    } catch (e) {
        if (e instanceof DiffTooLargeError) {
            return reject(original, { reason: 'diff_too_large', detail: e.message });
        }
        throw e;
    }

    const problem = findUnsafeChange(ops, origCore, scanned);
    if (problem) return reject(original, problem);

    const inserted = ops.filter((op) => op.type === 'insert').length;
    if (inserted === 0) {
        return { original, annotatedText: original.rawText, accepted: true, insertedLines: 0 };
    }

    const out: Array<{ text: string; eol: string }> = [];
    for (const op of ops) {
        if (op.type === 'equal') out.push({ text: orig.lines[op.oldIndex], eol: orig.eols[op.oldIndex] });
        else if (op.type === 'insert') out.push({ text: cand.lines[op.newIndex], eol: orig.eol });
    }
    for (let k = origCore.length; k < orig.lines.length; k++) {
        out.push({ text: orig.lines[k], eol: orig.eols[k] });
    }

    const finalEol = orig.eols.length > 0 ? orig.eols[orig.eols.length - 1] : '';
    const annotatedText = out
        .map((l, k) => l.text + (k === out.length - 1 ? finalEol : l.eol || orig.eol))
        .join('');

    return { original, annotatedText, accepted: true, insertedLines: inserted };
}

function findUnsafeChange(ops: DiffOp[], origCore: string[], scanned: ScannedLine[]): Rejection | null {
    for (let k = 0; k < ops.length; k++) {
        const op = ops[k];
        if (op.type === 'delete') {
            let end = k;
            while (end < ops.length && ops[end].type !== 'equal') end++;
            const modified = ops.slice(k, end).some((o) => o.type === 'insert');
            return {
                reason: modified ? 'modified_line' : 'deleted_line',
                line: op.oldIndex,
                detail: `${modified ? 'changed' : 'removed'} original line: ${origCore[op.oldIndex].trim()}`,
            };
        }
        if (op.type !== 'insert') continue;

        const ln = scanned[op.newIndex];
        const prev = op.newIndex > 0 ? scanned[op.newIndex - 1] : undefined;
        if (ln.classification === 'code' || !sameState(ln.startState, ln.endState)) {
            return { reason: 'inserted_code', line: op.newIndex, detail: `inserted line is not a comment: ${ln.text.trim()}` };
        }
        if (prev && prev.continues) {
            return { reason: 'inserted_code', line: op.newIndex, detail: 'inserted line splits a backslash continuation' };
        }
    }
    return null;
}

/* -------------------------------------------------------------------------- */
/* Docstrings                                                                 */
/* -------------------------------------------------------------------------- */

export interface DocstringSplit {
    /** Lead and definition header, including the header's line break. */
    header: string;
    headerLines: number;
    /** Existing docstring text, if any. */
    docstring?: string;
    /** Body with any existing docstring removed. */
    body: string;
    eol: string;
}

function isDocstringOpener(ln: ScannedLine, profile: LanguageProfile): boolean {
    if (ln.startState.state !== 'code') return false;
    const t = ln.text.trimStart();
    return profile.docstringQuotes.some((q) => t.startsWith(q));
}

/** Index of the line that closes a literal opened on `start`, or -1. */
function literalEnd(lines: ScannedLine[], start: number): number {
    for (let j = start; j < lines.length; j++) {
        if (lines[j].endState.state === 'code') return j;
    }
    return -1;
}

export function splitDocstring(segment: Segment, profile: LanguageProfile): DocstringSplit {
    const raw = segment.rawText;
    const lines = scanLines(raw, profile);
    const eol = splitText(raw).eol;
    const headerLines = segment.definitionLine === undefined
        ? 0
        : splitText(segment.lead + segment.definitionLine).lines.length;

    if (headerLines === 0 || headerLines > lines.length) {
        return { header: '', headerLines: 0, body: raw, eol };
    }

    const lastHeader = lines[headerLines - 1];
    const header = raw.slice(0, lastHeader.next) + (lastHeader.eol === '' ? eol : '');

    let k = headerLines;
    while (k < lines.length && lines[k].classification === 'blank') k++;
    if (k < lines.length && isDocstringOpener(lines[k], profile)) {
        const e = literalEnd(lines, k);
        if (e !== -1 && lines.slice(k, e + 1).every((l) => l.codeText.trim() === '')) {
            return {
                header,
                headerLines,
                docstring: raw.slice(lines[k].start, lines[e].next),
                body: raw.slice(lastHeader.next, lines[k].start) + raw.slice(lines[e].next),
                eol,
            };
        }
    }
    return { header, headerLines, body: raw.slice(lastHeader.next), eol };
}

function mergeDocstring(original: Segment, oracleText: string, profile: LanguageProfile): AnnotatedSegment {
    if (original.definitionLine === undefined) {
        return reject(original, { reason: 'definition_mismatch', detail: 'segment has no definition header' });
    }
    const parts = splitDocstring(original, profile);
    const origLines = splitText(original.rawText).lines;
    const headerCode = scanLines(original.definitionLine, profile);
    const lastHeaderCode = headerCode.length > 0 ? headerCode[headerCode.length - 1].codeText.trimEnd() : '';
    if (!lastHeaderCode.endsWith(':') && profile.depthModel === 'indent') {
        return reject(original, { reason: 'no_docstring', detail: 'single-line definition has no room for a docstring' });
    }

    const cand = splitText(oracleText);
    const scanned = scanLines(oracleText, profile);

    for (let h = 0; h < parts.headerLines; h++) {
        if (cand.lines[h] !== origLines[h]) {
            return reject(original, { reason: 'definition_mismatch', line: h, detail: 'oracle text does not start with the definition header' });
        }
    }

    let d = parts.headerLines;
    while (d < scanned.length && scanned[d].classification === 'blank') d++;
    if (d >= scanned.length || !isDocstringOpener(scanned[d], profile)) {
        return reject(original, { reason: 'no_docstring', line: d, detail: 'no docstring literal after the header' });
    }

    const e = literalEnd(scanned, d);
    if (e === -1) {
        return reject(original, { reason: 'docstring_not_contiguous', line: d, detail: 'docstring literal is never closed' });
    }
    for (let j = d; j <= e; j++) {
        if (scanned[j].codeText.trim() !== '') {
            return reject(original, { reason: 'docstring_not_contiguous', line: j, detail: 'code mixed into the docstring lines' });
        }
    }
    const expected = bodyIndent(original, parts, profile);
    const opener = cand.lines[d];
    if (opener.slice(0, opener.length - opener.trimStart().length) !== expected) {
        return reject(original, {
            reason: 'docstring_indent',
            line: d,
            detail: `docstring must be indented like the body (${JSON.stringify(expected)})`,
        });
    }

    const rest = cand.lines.slice(e + 1);
    const restCore = rest.slice(0, rest.length - trailingBlankCount(rest));
    if (restCore.length > 0) {
        const bodyLines = splitText(parts.body).lines;
        const bodyCore = bodyLines.slice(0, bodyLines.length - trailingBlankCount(bodyLines));
        const same = restCore.length === bodyCore.length && restCore.every((l, k) => l === bodyCore[k]);
        if (!same) {
            return reject(original, { reason: 'body_mismatch', line: e + 1, detail: 'oracle changed the function body' });
        }
    }

    const docstring = cand.lines.slice(d, e + 1).map((l) => l + parts.eol).join('');
    const annotatedText = parts.header + docstring + parts.body;
    return { original, annotatedText, accepted: true, insertedLines: e - d + 1 };
}

/* -------------------------------------------------------------------------- */
/* Candidate composition                                                      */
/* -------------------------------------------------------------------------- */

/**
 * Turns a raw completion into a full-segment candidate. Completions that echo
 * the definition header are used from the header on; otherwise the completion
 * is taken as the continuation of the primer.
 */
export function composeInlineCandidate(segment: Segment, completion: string): string {
    const header = segment.definitionLine;
    if (header === undefined) return completion;

    const firstHeaderLineText = header.split(/\r?\n/)[0];
    const lines = completion.split('\n');
    const echo = lines.findIndex((l) => l.trim() !== '');
    if (echo !== -1 && lines[echo].replace(/\r$/, '').trimEnd() === firstHeaderLineText.trimEnd()) {
        return segment.lead + lines.slice(echo).join('\n');
    }

    const eol = splitText(segment.rawText).eol;
    return segment.lead + header + eol + completion;
}

/**
 * Wraps a bare docstring completion in triple quotes at the body's indentation
 * and places it between the header and the body (existing docstring removed).
 */
export function composeDocstringCandidate(segment: Segment, completion: string, profile: LanguageProfile): string {
    const parts = splitDocstring(segment, profile);
    const quote = profile.docstringQuotes[0] ?? '"""';
    const indent = bodyIndent(segment, parts, profile);

    const text = completion.replace(/\r\n/g, '\n');
    const trimmed = text.trim();
    if (profile.docstringQuotes.some((q) => trimmed.startsWith(q))) {
        const reindented = dedent(text.replace(/^\s*\n/, '').trimEnd()).map((l) => (l === '' ? '' : indent + l));
        return parts.header + reindented.join(parts.eol) + parts.eol + parts.body;
    }

    const docLines = dedent(text.replace(/^\s*\n/, '').trimEnd());
    let block: string;
    if (docLines.length <= 1) {
        block = `${indent}${quote}${trimmed}${quote}`;
    } else {
        block = [
            `${indent}${quote}${docLines[0]}`,
            ...docLines.slice(1).map((l) => (l === '' ? '' : indent + l)),
            `${indent}${quote}`,
        ].join(parts.eol);
    }
    return parts.header + block + parts.eol + parts.body;
}

/** Indentation of the first code line of the body, or one level under the header. */
function bodyIndent(segment: Segment, parts: DocstringSplit, profile: LanguageProfile): string {
    const first = scanLines(parts.body, profile).find((l) => l.classification === 'code');
    if (first !== undefined) {
        return first.text.slice(0, first.indent);
    }
    const headerLine = (segment.definitionLine ?? '').split(/\r?\n/)[0];
    return headerLine.slice(0, headerLine.length - headerLine.trimStart().length) + '    ';
}

/** Docstring-style dedent: the first line is stripped, the rest share one cut. */
function dedent(text: string): string[] {
    const lines = text.split('\n').map((l) => l.trimEnd());
    const widths = lines
        .slice(1)
        .filter((l) => l !== '')
        .map((l) => l.length - l.trimStart().length);
    const cut = widths.length > 0 ? Math.min(...widths) : 0;
    return lines.map((l, k) => (k === 0 ? l.trimStart() : l.slice(cut)));
}
