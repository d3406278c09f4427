/**
 * Boundary Detector - function-definition spans in raw source text
 *
 * Only lines that start in code (per the lexical scanner) may open a
 * definition, so `def ` inside a docstring never produces a boundary.
 */

import { LanguageProfile } from './language_profile';
import { ScannedLine, scanLines, finalBraceDepth } from './lexical_scanner';
import { createLogger } from './logger';
import { ErrorFactory } from './structured_error';

const log = createLogger('boundary');

const MAX_HEADER_LINES = 64;

export interface Boundary {
    identifier: string;
    /** First character of the span, including decorator lines. */
    startOffset: number;
    /** Next boundary's start, or end of source. */
    endOffset: number;
    /** First character of the definition line. */
    headerStartOffset: number;
    /** End of the (possibly multi-line) definition header, before its line break. */
    headerEndOffset: number;
    /** Just past the line break of the last line belonging to the body. */
    bodyEndOffset: number;
    /** 1 = top level. */
    depth: number;
    /** 0-based line index of the definition line. */
    line: number;
}

export interface IgnoredDefinition {
    line: number;
    identifier: string;
    delimiter: string;
}

export interface BoundaryScan {
    boundaries: Boundary[];
    ignored: IgnoredDefinition[];
}

export interface BoundaryOptions {
    /** Keep only definitions at this depth or shallower (1 = top level only). */
    maxDepth?: number;
}

interface FoundDefinition {
    identifier: string;
    leadLine: number;
    headerLine: number;
    headerEndLine: number;
    depth: number;
}

export function findBoundaries(source: string, profile: LanguageProfile, options: BoundaryOptions = {}): Boundary[] {
    return scanBoundaries(source, profile, options).boundaries;
}

export function scanBoundaries(source: string, profile: LanguageProfile, options: BoundaryOptions = {}): BoundaryScan {
    const lines = scanLines(source, profile);
    const found: FoundDefinition[] = [];
    const ignored: IgnoredDefinition[] = [];
    const scopes: number[] = [];

    let openBrackets = 0;
    let decoratorStart: number | null = null;

    for (let i = 0; i < lines.length; i++) {
        const ln = lines[i];
        const continuation = openBrackets > 0;
        openBrackets = Math.max(0, openBrackets + ln.bracketDelta);

        if (ln.startState.state !== 'code') {
            const m = profile.matchDefinition(ln.text);
            if (m) {
                ignored.push({ line: i, identifier: m.identifier, delimiter: ln.startState.delimiter });
                log.debug(ErrorFactory.ambiguousBoundary(i, m.identifier).message);
            }
            continue;
        }
        if (continuation || ln.classification !== 'code') continue;

        let depth: number;
        if (profile.depthModel === 'indent') {
            while (scopes.length > 0 && scopes[scopes.length - 1] >= ln.indent) scopes.pop();
            depth = scopes.length + 1;
            if (profile.opensScope(ln.text)) scopes.push(ln.indent);
        } else {
            depth = Math.max(1, ln.braceDepth);
        }

        const m = profile.matchDefinition(ln.text);
        if (!m) {
            if (profile.isDecorator(ln.text)) {
                if (decoratorStart === null) decoratorStart = i;
            } else {
                decoratorStart = null;
            }
            continue;
        }

        const leadLine = decoratorStart !== null && lines[decoratorStart].indent === ln.indent ? decoratorStart : i;
        decoratorStart = null;

        const headerEndLine = findHeaderEnd(lines, i, profile);
        if (headerEndLine > i) {
            // Resume after the header; its brackets are balanced by construction.
            openBrackets = 0;
        }

        if (options.maxDepth === undefined || depth <= options.maxDepth) {
            found.push({ identifier: m.identifier, leadLine, headerLine: i, headerEndLine, depth });
        }
        i = headerEndLine;
    }

    const boundaries = found.map((f, k): Boundary => {
        const startOffset = lines[f.leadLine].start;
        const endOffset = k + 1 < found.length ? lines[found[k + 1].leadLine].start : source.length;
        const headerEndOffset = lines[f.headerEndLine].end;
        const bodyEnd = findBodyEnd(lines, f, profile);
        return {
            identifier: f.identifier,
            startOffset,
            endOffset,
            headerStartOffset: lines[f.headerLine].start,
            headerEndOffset,
            bodyEndOffset: Math.min(endOffset, Math.max(lines[f.headerEndLine].next, bodyEnd)),
            depth: f.depth,
            line: f.headerLine,
        };
    });

    if (ignored.length > 0) {
        log.debug(`Ignored ${ignored.length} definition-like line(s) inside literals`);
    }

    return { boundaries, ignored };
}

function findHeaderEnd(lines: ScannedLine[], start: number, profile: LanguageProfile): number {
    let brackets = 0;
    const limit = Math.min(lines.length, start + MAX_HEADER_LINES);
    for (let h = start; h < limit; h++) {
        brackets += lines[h].bracketDelta;
        if (brackets <= 0 && profile.isHeaderComplete(lines[h].codeText)) {
            return h;
        }
    }
    return start;
}

function findBodyEnd(lines: ScannedLine[], def: FoundDefinition, profile: LanguageProfile): number {
    if (profile.depthModel === 'indent') {
        return indentBodyEnd(lines, def);
    }
    return braceBodyEnd(lines, def, profile);
}

function indentBodyEnd(lines: ScannedLine[], def: FoundDefinition): number {
    const defIndent = lines[def.headerLine].indent;
    let last = def.headerEndLine;
    let openBrackets = 0;

    for (let j = def.headerEndLine + 1; j < lines.length; j++) {
        const ln = lines[j];
        const continuation = openBrackets > 0;
        openBrackets = Math.max(0, openBrackets + ln.bracketDelta);

        if (continuation || ln.startState.state !== 'code') {
            last = j;
            continue;
        }
        if (ln.classification !== 'code') continue;
        if (ln.indent <= defIndent) break;
        last = j;
    }
    return lines[last].next;
}

function braceBodyEnd(lines: ScannedLine[], def: FoundDefinition, profile: LanguageProfile): number {
    const base = lines[def.headerLine].braceDepth;
    const headerCode = lines[def.headerEndLine].codeText;
    if (!headerCode.includes('{') && headerCode.trimEnd().endsWith(';')) {
        return lines[def.headerEndLine].next;
    }

    let opened = false;
    for (let j = def.headerLine; j < lines.length; j++) {
        const depthAfter = j + 1 < lines.length ? lines[j + 1].braceDepth : finalBraceDepth(lines, profile);
        if (depthAfter > base) opened = true;
        if (depthAfter <= base && (opened || lines[j].codeText.includes('}'))) {
            return lines[j].next;
        }
    }
    return lines[lines.length - 1].next;
}
