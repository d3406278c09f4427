/**
 * Line Diff - longest-common-subsequence diff over lines
 */

export type DiffOp =
    | { type: 'equal'; oldIndex: number; newIndex: number }
    | { type: 'insert'; newIndex: number }
    | { type: 'delete'; oldIndex: number };

export interface SplitText {
    /** Lines without their terminators (`\r` stripped). */
    lines: string[];
    /** Terminator of each line; the last may be ''. */
    eols: string[];
    /** Most frequent terminator, `\n` when there is none. */
    eol: string;
    finalNewline: boolean;
}

/** Table cells above which the quadratic middle section is refused. */
export const MAX_DIFF_CELLS = 4_000_000;

export class DiffTooLargeError extends Error {
    constructor(public readonly cells: number) {
        super(`Diff too large: ${cells} cells exceeds ${MAX_DIFF_CELLS}`);
        this.name = 'DiffTooLargeError';
    }
}

export function splitText(text: string): SplitText {
    const lines: string[] = [];
    const eols: string[] = [];
    let crlf = 0;
    let lf = 0;
    let offset = 0;

    while (offset < text.length) {
        const nl = text.indexOf('\n', offset);
        if (nl === -1) {
            lines.push(text.slice(offset));
            eols.push('');
            break;
        }
        if (nl > offset && text[nl - 1] === '\r') {
            lines.push(text.slice(offset, nl - 1));
            eols.push('\r\n');
            crlf++;
        } else {
            lines.push(text.slice(offset, nl));
            eols.push('\n');
            lf++;
        }
        offset = nl + 1;
    }

    return {
        lines,
        eols,
        eol: crlf > lf ? '\r\n' : '\n',
        finalNewline: eols.length > 0 && eols[eols.length - 1] !== '',
    };
}

export function diffLines(a: string[], b: string[]): DiffOp[] {
    let prefix = 0;
    while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;

    let suffix = 0;
    while (
        suffix < a.length - prefix &&
        suffix < b.length - prefix &&
        a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
    ) {
        suffix++;
    }

    const n = a.length - prefix - suffix;
    const m = b.length - prefix - suffix;
    const cells = (n + 1) * (m + 1);
    const ops: DiffOp[] = [];
    for (let k = 0; k < prefix; k++) ops.push({ type: 'equal', oldIndex: k, newIndex: k });

    if (n > 0 && m > 0 && cells > MAX_DIFF_CELLS) {
        // Annotation only ever adds lines; that case needs no table.
        const middle = alignInsertions(a, b, prefix, n, m);
        if (middle === null) throw new DiffTooLargeError(cells);
        ops.push(...middle);
        for (let k = 0; k < suffix; k++) {
            ops.push({ type: 'equal', oldIndex: a.length - suffix + k, newIndex: b.length - suffix + k });
        }
        return ops;
    }

    // lcs[i][j] = LCS length of a[prefix+i..] and b[prefix+j..], stored row-major
    const width = m + 1;
    const lcs = new Uint32Array((n + 1) * width);
    for (let i = n - 1; i >= 0; i--) {
        for (let j = m - 1; j >= 0; j--) {
            lcs[i * width + j] = a[prefix + i] === b[prefix + j]
                ? lcs[(i + 1) * width + j + 1] + 1
                : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
        }
    }

    let i = 0;
    let j = 0;
    while (i < n && j < m) {
        if (a[prefix + i] === b[prefix + j]) {
            ops.push({ type: 'equal', oldIndex: prefix + i, newIndex: prefix + j });
            i++;
            j++;
        } else if (lcs[(i + 1) * width + j] >= lcs[i * width + j + 1]) {
            ops.push({ type: 'delete', oldIndex: prefix + i });
            i++;
        } else {
            ops.push({ type: 'insert', newIndex: prefix + j });
            j++;
        }
    }
    for (; i < n; i++) ops.push({ type: 'delete', oldIndex: prefix + i });
    for (; j < m; j++) ops.push({ type: 'insert', newIndex: prefix + j });

    for (let k = 0; k < suffix; k++) {
        ops.push({ type: 'equal', oldIndex: a.length - suffix + k, newIndex: b.length - suffix + k });
    }
    return ops;
}

/**
 * Greedy embedding of `a[from..from+n)` into `b[from..from+m)`. Returns null
 * when some old line has no match, i.e. the change is not insertion-only.
 */
function alignInsertions(a: string[], b: string[], from: number, n: number, m: number): DiffOp[] | null {
    if (n > m) return null;
    const ops: DiffOp[] = [];
    let j = 0;
    for (let i = 0; i < n; i++) {
        while (j < m && b[from + j] !== a[from + i]) {
            ops.push({ type: 'insert', newIndex: from + j });
            j++;
        }
        if (j === m) return null;
        ops.push({ type: 'equal', oldIndex: from + i, newIndex: from + j });
        j++;
    }
    for (; j < m; j++) ops.push({ type: 'insert', newIndex: from + j });
    return ops;
}
