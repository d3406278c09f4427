/**
 * Lexical Scanner - line-oriented literal tracker
 *
 * A two-state machine (`code` / `in_literal(delimiter)`) walked over the whole
 * source so that every line knows whether it starts inside a string or
 * comment. Boundary detection only trusts definition-like lines that start in
 * code; the safety merger uses the per-line classification to tell comment
 * insertions from code insertions.
 */

export interface LiteralRule {
    open: string;
    /** Empty string: the literal runs to end of line (line comments). */
    close: string;
    kind: 'string' | 'comment';
    multiline: boolean;
    escape?: string;
}

export interface LexicalRules {
    literals: LiteralRule[];
    /** Bracket pairs counted for implicit line continuation, e.g. "()[]". */
    brackets: string;
    /** Count `{` / `}` as block nesting (brace depth model). */
    blockBraces: boolean;
}

export type ScanState =
    | { state: 'code' }
    | { state: 'in_literal'; delimiter: string; rule: LiteralRule };

export type LineClass = 'blank' | 'comment' | 'code';

export interface ScannedLine {
    index: number;
    /** Offset of the first character of the line. */
    start: number;
    /** Offset just past the line text, before `\r\n` or `\n`. */
    end: number;
    /** Offset of the next line (past the line break). */
    next: number;
    text: string;
    eol: '' | '\n' | '\r\n';
    indent: number;
    startState: ScanState;
    endState: ScanState;
    /** Block brace depth at line start. */
    braceDepth: number;
    /** Net opened brackets on this line, code characters only. */
    bracketDelta: number;
    /** Line text with every literal and comment character blanked to a space. */
    codeText: string;
    classification: LineClass;
    /** Ends with a backslash continuation in code. */
    continues: boolean;
}

const CODE: ScanState = { state: 'code' };

function isSpace(ch: string): boolean {
    return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f';
}

function leadingWhitespace(text: string): number {
    let i = 0;
    while (i < text.length && (text[i] === ' ' || text[i] === '\t')) i++;
    return i;
}

export function scanLines(source: string, rules: LexicalRules): ScannedLine[] {
    const literals = [...rules.literals].sort((a, b) => b.open.length - a.open.length);
    const openers = new Map<string, number>();
    const closers = new Map<string, number>();
    for (let i = 0; i < rules.brackets.length; i += 2) {
        openers.set(rules.brackets[i], 1);
        closers.set(rules.brackets[i + 1], 1);
    }

    const lines: ScannedLine[] = [];
    let state: ScanState = CODE;
    let braceDepth = 0;
    let offset = 0;

    while (offset < source.length) {
        const nl = source.indexOf('\n', offset);
        const rawEnd = nl === -1 ? source.length : nl;
        const crlf = rawEnd > offset && source[rawEnd - 1] === '\r' && nl !== -1;
        const end = crlf ? rawEnd - 1 : rawEnd;
        const text = source.slice(offset, end);
        const eol: ScannedLine['eol'] = nl === -1 ? '' : crlf ? '\r\n' : '\n';

        const startState = state;
        const braceAtStart = braceDepth;
        let code = '';
        let hasCode = false;
        let hasComment = false;
        let bracketDelta = 0;
        let i = 0;

        while (i < text.length) {
            if (state.state === 'code') {
                const rule = literals.find((r) => text.startsWith(r.open, i));
                if (rule) {
                    if (rule.kind === 'comment') hasComment = true;
                    else hasCode = true;
                    code += ' '.repeat(rule.open.length);
                    i += rule.open.length;
                    if (rule.close === '') {
                        code += ' '.repeat(text.length - i);
                        i = text.length;
                    } else {
                        state = { state: 'in_literal', delimiter: rule.open, rule };
                    }
                    continue;
                }

                const ch = text[i];
                if (!isSpace(ch)) hasCode = true;
                if (rules.blockBraces) {
                    if (ch === '{') braceDepth++;
                    else if (ch === '}') braceDepth = Math.max(0, braceDepth - 1);
                }
                if (openers.has(ch)) bracketDelta++;
                else if (closers.has(ch)) bracketDelta--;
                code += ch;
                i++;
                continue;
            }

            const rule: LiteralRule = state.rule;
            if (!isSpace(text[i])) {
                if (rule.kind === 'comment') hasComment = true;
                else hasCode = true;
            }
            if (rule.escape && text.startsWith(rule.escape, i)) {
                const step = Math.min(rule.escape.length + 1, text.length - i);
                code += ' '.repeat(step);
                i += step;
                continue;
            }
            if (text.startsWith(rule.close, i)) {
                code += ' '.repeat(rule.close.length);
                i += rule.close.length;
                state = CODE;
                continue;
            }
            code += ' ';
            i++;
        }

        if (state.state === 'in_literal' && !state.rule.multiline) {
            state = CODE;
        }

        let classification: LineClass;
        if (startState.state === 'in_literal' && startState.rule.kind === 'string') {
            classification = 'code';
        } else if (text.trim() === '') {
            classification = 'blank';
        } else if (!hasCode && hasComment) {
            classification = 'comment';
        } else {
            classification = 'code';
        }

        lines.push({
            index: lines.length,
            start: offset,
            end,
            next: nl === -1 ? source.length : nl + 1,
            text,
            eol,
            indent: leadingWhitespace(text),
            startState,
            endState: state,
            braceDepth: braceAtStart,
            bracketDelta,
            codeText: code,
            classification,
            continues: state.state === 'code' && code.trimEnd().endsWith('\\'),
        });

        if (nl === -1) break;
        offset = nl + 1;
    }

    return lines;
}

/** Brace depth after the last line, i.e. at end of source. */
export function finalBraceDepth(lines: ScannedLine[], rules: LexicalRules): number {
    if (!rules.blockBraces || lines.length === 0) return 0;
    const last = lines[lines.length - 1];
    let depth = last.braceDepth;
    for (const ch of last.codeText) {
        if (ch === '{') depth++;
        else if (ch === '}') depth = Math.max(0, depth - 1);
    }
    return depth;
}
