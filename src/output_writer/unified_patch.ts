// src/output_writer/unified_patch.ts

import { diffLines } from "../line_diff";

export interface PatchApplyResult {
    ok: boolean;
    text?: string;
    error?: string;
}

export interface UnifiedDiffOptions {
    path: string;
    context?: number;
}

interface HunkLine {
    op: " " | "-" | "+";
    /** Line content including its terminator, if any. */
    text: string;
}

interface Hunk {
    oldStart: number;
    oldCount: number;
    newStart: number;
    newCount: number;
    lines: HunkLine[];
}

const NO_NEWLINE = "\\ No newline at end of file";

/** Splits text into lines that keep their terminators. */
function rawLines(text: string): string[] {
    return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function renderLine(op: string, text: string): string {
    return text.endsWith("\n") ? `${op}${text}` : `${op}${text}\n${NO_NEWLINE}\n`;
}

// Unified diff writer:
// - compares whole lines including their terminators, so a missing final
//   newline shows up as a change
// - zero-length ranges use the number of the line before them
export function createUnifiedDiff(original: string, updated: string, options: UnifiedDiffOptions): string {
    const context = options.context ?? 3;
    const a = rawLines(original);
    const b = rawLines(updated);
    const ops = diffLines(a, b);

    const oldPos: number[] = [];
    const newPos: number[] = [];
    let o = 0;
    let n = 0;
    for (const op of ops) {
        oldPos.push(o);
        newPos.push(n);
        if (op.type !== "insert") o++;
        if (op.type !== "delete") n++;
    }

    const changes = ops.flatMap((op, k) => (op.type === "equal" ? [] : [k]));
    if (changes.length === 0) return "";

    const ranges: Array<[number, number]> = [];
    for (const k of changes) {
        const last = ranges[ranges.length - 1];
        if (last && k - last[1] <= 2 * context + 1) {
            last[1] = k;
        } else {
            ranges.push([k, k]);
        }
    }

    let out = `--- a/${options.path}\n+++ b/${options.path}\n`;
    for (const [first, lastChange] of ranges) {
        const s = Math.max(0, first - context);
        const e = Math.min(ops.length, lastChange + context + 1);
        let oldCount = 0;
        let newCount = 0;
        let body = "";
        for (let k = s; k < e; k++) {
            const op = ops[k];
            if (op.type === "equal") {
                oldCount++;
                newCount++;
                body += renderLine(" ", a[op.oldIndex]);
            } else if (op.type === "delete") {
                oldCount++;
                body += renderLine("-", a[op.oldIndex]);
            } else {
                newCount++;
                body += renderLine("+", b[op.newIndex]);
            }
        }
        const oldStart = oldCount > 0 ? oldPos[s] + 1 : oldPos[s];
        const newStart = newCount > 0 ? newPos[s] + 1 : newPos[s];
        out += `@@ -${oldStart},${oldCount} +${newStart},${newCount} @@\n${body}`;
    }
    return out;
}

function parseHunks(diffText: string): { hunks: Hunk[] } | { error: string } {
    const lines = diffText.split("\n");
    const hunks: Hunk[] = [];
    let i = 0;

    while (i < lines.length) {
        const header = lines[i++];
        if (!header.startsWith("@@")) continue;

        const m = header.match(/^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/);
        if (!m) return { error: `Invalid hunk header: ${header}` };

        const hunk: Hunk = {
            oldStart: parseInt(m[1], 10),
            oldCount: m[2] === undefined ? 1 : parseInt(m[2], 10),
            newStart: parseInt(m[3], 10),
            newCount: m[4] === undefined ? 1 : parseInt(m[4], 10),
            lines: [],
        };

        let seenOld = 0;
        let seenNew = 0;
        while (seenOld < hunk.oldCount || seenNew < hunk.newCount) {
            if (i >= lines.length) return { error: `Truncated hunk: ${header}` };
            const dl = lines[i++];
            const op = dl === "" ? " " : dl[0];
            let text = dl.slice(1);
            if (i < lines.length && lines[i].startsWith("\\")) {
                i++;
            } else {
                text += "\n";
            }

            if (op === " ") {
                seenOld++;
                seenNew++;
            } else if (op === "-") {
                seenOld++;
            } else if (op === "+") {
                seenNew++;
            } else {
                return { error: `Invalid diff line: ${dl}` };
            }
            hunk.lines.push({ op, text });
        }
        hunks.push(hunk);
    }

    return { hunks };
}

// Unified diff applier:
// - hunk positions are read against the original text, so earlier hunks
//   never shift later ones
// - no fuzz matching
// - strict apply or fail
export function applyUnifiedDiff(text: string, diffText: string): PatchApplyResult {
    const parsed = parseHunks(diffText);
    if ("error" in parsed) return { ok: false, error: parsed.error };
    if (parsed.hunks.length === 0) {
        return { ok: false, error: "No hunks found in diff" };
    }

    const original = rawLines(text);
    const out: string[] = [];
    let cursor = 0;

    for (const hunk of parsed.hunks) {
        const start = hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1;
        if (start < cursor || start > original.length) {
            return { ok: false, error: `Hunk out of order at line ${hunk.oldStart}` };
        }
        out.push(...original.slice(cursor, start));
        cursor = start;

        for (const hl of hunk.lines) {
            if (hl.op === "+") {
                out.push(hl.text);
                continue;
            }
            const actual = original[cursor] ?? "";
            if (actual !== hl.text) {
                const kind = hl.op === " " ? "Context" : "Delete";
                return {
                    ok: false,
                    error: `${kind} mismatch at line ${cursor + 1}. expected=${JSON.stringify(hl.text)} actual=${JSON.stringify(actual)}`,
                };
            }
            if (hl.op === " ") out.push(actual);
            cursor++;
        }
    }

    out.push(...original.slice(cursor));
    return { ok: true, text: out.join("") };
}
