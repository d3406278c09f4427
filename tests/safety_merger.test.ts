import test from 'node:test';
import assert from 'node:assert/strict';
import { findBoundaries } from '../src/boundary_detector';
import { Segment, split } from '../src/chunker';
import { pythonProfile } from '../src/language_profile';
import {
    composeDocstringCandidate,
    composeInlineCandidate,
    merge,
    splitDocstring,
} from '../src/safety_merger';

const inline = { style: 'inline' as const, profile: pythonProfile };
const docstring = { style: 'docstring' as const, profile: pythonProfile };

function firstFunction(source: string): Segment {
    const seg = split(source, findBoundaries(source, pythonProfile)).find((s) => s.kind === 'function_body');
    if (!seg) throw new Error('no function in fixture');
    return seg;
}

const ADD = firstFunction('def add(a, b):\n    return a + b\n');

/* -------------------------------------------------------------------------- */
/* Inline                                                                     */
/* -------------------------------------------------------------------------- */

test('comment-only insertion is accepted', () => {
    const result = merge(ADD, 'def add(a, b):\n    # Sum the inputs\n    return a + b\n', inline);
    assert.equal(result.accepted, true);
    assert.equal(result.insertedLines, 1);
    assert.equal(result.annotatedText, 'def add(a, b):\n    # Sum the inputs\n    return a + b\n');
});

test('identical text is accepted unchanged', () => {
    const result = merge(ADD, ADD.rawText, inline);
    assert.equal(result.accepted, true);
    assert.equal(result.insertedLines, 0);
    assert.equal(result.annotatedText, ADD.rawText);
});

test('a changed code line is rejected and the original kept', () => {
    const result = merge(ADD, 'def add(a, b):\n    return a - b\n', inline);
    assert.equal(result.accepted, false);
    assert.equal(result.rejection?.reason, 'modified_line');
    assert.equal(result.rejection?.line, 1);
    assert.equal(result.annotatedText, ADD.rawText);
});

test('a trailing comment on an existing line counts as a modification', () => {
    const result = merge(ADD, 'def add(a, b):\n    return a + b  # sum\n', inline);
    assert.equal(result.rejection?.reason, 'modified_line');
});

test('a removed line is rejected', () => {
    const seg = firstFunction('def add(a, b):\n    x = a\n    return x + b\n');
    const result = merge(seg, 'def add(a, b):\n    return x + b\n', inline);
    assert.equal(result.rejection?.reason, 'deleted_line');
    assert.equal(result.rejection?.line, 1);
});

test('an inserted code line is rejected', () => {
    const result = merge(ADD, 'def add(a, b):\n    print(a)\n    return a + b\n', inline);
    assert.equal(result.rejection?.reason, 'inserted_code');
    assert.equal(result.rejection?.line, 1);
});

test('a hash line inside a string literal is code, not a comment', () => {
    const seg = firstFunction('def f():\n    s = """\n    text\n    """\n    return s\n');
    const candidate = 'def f():\n    s = """\n    text\n    # note\n    """\n    return s\n';
    assert.equal(merge(seg, candidate, inline).rejection?.reason, 'inserted_code');
});

test('whitespace-only completion is rejected as empty', () => {
    assert.equal(merge(ADD, '  \n', inline).rejection?.reason, 'empty_completion');
});

test('CRLF sources keep their line endings', () => {
    const seg = firstFunction('def add(a, b):\r\n    return a + b\r\n');
    const result = merge(seg, 'def add(a, b):\n    # Sum\n    return a + b\n', inline);
    assert.equal(result.annotatedText, 'def add(a, b):\r\n    # Sum\r\n    return a + b\r\n');
});

test('trailing blank lines of the original survive', () => {
    const seg = firstFunction('def add(a, b):\n    return a + b\n\n\n');
    const result = merge(seg, 'def add(a, b):\n    # Sum\n    return a + b\n', inline);
    assert.equal(result.annotatedText, 'def add(a, b):\n    # Sum\n    return a + b\n\n\n');
});

test('inline candidates are built from the primer or the echoed header', () => {
    assert.equal(
        composeInlineCandidate(ADD, '    # Sum\n    return a + b\n'),
        'def add(a, b):\n    # Sum\n    return a + b\n'
    );
    assert.equal(
        composeInlineCandidate(ADD, 'def add(a, b):\n    # Sum\n    return a + b\n'),
        'def add(a, b):\n    # Sum\n    return a + b\n'
    );
});

const AREA_LINES = [
    'def area(w, h):',
    '    if w < 0:',
    '        raise ValueError(w)',
    '    result = w * h',
    '    return result',
];
const AREA = firstFunction(AREA_LINES.map((l) => l + '\n').join(''));

function joinLines(lines: string[]): string {
    return lines.map((l) => l + '\n').join('');
}

test('a comment line inserted at any position is accepted as is', () => {
    for (let at = 0; at <= AREA_LINES.length; at++) {
        const candidate = joinLines([...AREA_LINES.slice(0, at), '    # note', ...AREA_LINES.slice(at)]);
        const result = merge(AREA, candidate, inline);
        assert.equal(result.accepted, true, `insertion at ${at}`);
        assert.equal(result.insertedLines, 1);
        assert.equal(result.annotatedText, candidate);
    }
});

test('changing any original line is rejected at that line', () => {
    for (let k = 0; k < AREA_LINES.length; k++) {
        const lines = [...AREA_LINES];
        lines[k] += 'x';
        const result = merge(AREA, joinLines(lines), inline);
        assert.equal(result.accepted, false, `mutation of line ${k}`);
        assert.equal(result.rejection?.reason, 'modified_line');
        assert.equal(result.rejection?.line, k);
        assert.equal(result.annotatedText, AREA.rawText);
    }
});

test('dropping any original line is rejected at that line', () => {
    for (let k = 0; k < AREA_LINES.length; k++) {
        const lines = AREA_LINES.filter((_, i) => i !== k);
        const result = merge(AREA, joinLines(lines), inline);
        assert.equal(result.accepted, false, `deletion of line ${k}`);
        assert.equal(result.rejection?.reason, 'deleted_line');
        assert.equal(result.rejection?.line, k);
    }
});

/* -------------------------------------------------------------------------- */
/* Docstring                                                                  */
/* -------------------------------------------------------------------------- */

test('a one-line docstring is wrapped, indented and accepted', () => {
    const candidate = composeDocstringCandidate(ADD, 'Add two numbers.', pythonProfile);
    assert.equal(candidate, 'def add(a, b):\n    """Add two numbers."""\n    return a + b\n');

    const result = merge(ADD, candidate, docstring);
    assert.equal(result.accepted, true);
    assert.equal(result.insertedLines, 1);
    assert.equal(result.annotatedText, candidate);
});

test('a multi-line docstring is dedented under the header', () => {
    const candidate = composeDocstringCandidate(ADD, '\n    Add two numbers.\n\n    Args:\n        a: first\n', pythonProfile);
    assert.equal(
        candidate,
        'def add(a, b):\n    """Add two numbers.\n\n    Args:\n        a: first\n    """\n    return a + b\n'
    );
    const result = merge(ADD, candidate, docstring);
    assert.equal(result.accepted, true);
    assert.equal(result.insertedLines, 5);
});

test('an existing docstring is replaced', () => {
    const seg = firstFunction('def add(a, b):\n    """Old."""\n    return a + b\n');
    const parts = splitDocstring(seg, pythonProfile);
    assert.equal(parts.header, 'def add(a, b):\n');
    assert.equal(parts.docstring, '    """Old."""\n');
    assert.equal(parts.body, '    return a + b\n');

    const candidate = composeDocstringCandidate(seg, 'New summary.', pythonProfile);
    const result = merge(seg, candidate, docstring);
    assert.equal(result.accepted, true);
    assert.equal(result.annotatedText, 'def add(a, b):\n    """New summary."""\n    return a + b\n');
});

test('docstring edits that touch the body are rejected', () => {
    const result = merge(ADD, 'def add(a, b):\n    """Add."""\n    return a - b\n', docstring);
    assert.equal(result.rejection?.reason, 'body_mismatch');
    assert.equal(result.annotatedText, ADD.rawText);
});

test('a docstring indented deeper than the body is rejected', () => {
    const result = merge(ADD, 'def add(a, b):\n        """Add."""\n    return a + b\n', docstring);
    assert.equal(result.accepted, false);
    assert.equal(result.rejection?.reason, 'docstring_indent');
    assert.equal(result.rejection?.line, 1);
    assert.equal(result.annotatedText, ADD.rawText);
});

test('the docstring takes the indentation of the first code line, not of a comment', () => {
    const seg = firstFunction('def f(x):\n        # note\n    return x\n');
    const candidate = composeDocstringCandidate(seg, 'Return x.', pythonProfile);
    assert.equal(candidate, 'def f(x):\n    """Return x."""\n        # note\n    return x\n');

    const result = merge(seg, candidate, docstring);
    assert.equal(result.accepted, true);
    assert.equal(result.annotatedText, candidate);
});

test('a header-only segment gets its docstring one level under the header', () => {
    const seg = firstFunction('def outer():\n    def inner():\n        return 1\n    return inner()\n');
    assert.equal(seg.rawText, 'def outer():\n');
    const candidate = composeDocstringCandidate(seg, 'Outer.', pythonProfile);
    assert.equal(candidate, 'def outer():\n    """Outer."""\n');
    assert.equal(merge(seg, candidate, docstring).accepted, true);
});

test('a comment is not a docstring', () => {
    const result = merge(ADD, 'def add(a, b):\n    # Add\n    return a + b\n', docstring);
    assert.equal(result.rejection?.reason, 'no_docstring');
});

test('a changed header is rejected', () => {
    const result = merge(ADD, 'def add(a, b, c):\n    """Add."""\n    return a + b\n', docstring);
    assert.equal(result.rejection?.reason, 'definition_mismatch');
});

test('single-line definitions have no room for a docstring', () => {
    const seg = firstFunction('def one(): return 1\n');
    const result = merge(seg, 'def one(): return 1\n    """One."""\n', docstring);
    assert.equal(result.rejection?.reason, 'no_docstring');
});
