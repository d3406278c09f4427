import test from 'node:test';
import assert from 'node:assert/strict';
import { finalBraceDepth, scanLines } from '../src/lexical_scanner';
import { javaProfile, pythonProfile } from '../src/language_profile';

test('python lines inside a triple-quoted string start in a literal', () => {
    const src = 'x = 1  # note\ns = """\ndef fake():\n"""\n# comment only\n\n';
    const lines = scanLines(src, pythonProfile);

    assert.equal(lines.length, 6);
    assert.deepEqual(
        lines.map((l) => l.classification),
        ['code', 'code', 'code', 'code', 'comment', 'blank']
    );
    assert.equal(lines[1].startState.state, 'code');
    assert.equal(lines[1].endState.state, 'in_literal');
    const inside = lines[2].startState;
    assert.equal(inside.state, 'in_literal');
    if (inside.state === 'in_literal') assert.equal(inside.delimiter, '"""');
    assert.equal(lines[3].endState.state, 'code');
});

test('code text blanks comments and string contents', () => {
    const [line] = scanLines('x = 1  # note', pythonProfile);
    assert.equal(line.codeText.trimEnd(), 'x = 1');
    assert.equal(line.codeText.length, line.text.length);

    const [quoted] = scanLines('s = "a\\"b"  # c', pythonProfile);
    assert.equal(quoted.codeText.trimEnd(), 's =');
    assert.equal(quoted.endState.state, 'code');
});

test('offsets and line terminators follow the raw text', () => {
    const lines = scanLines('a\r\nbc', pythonProfile);
    assert.equal(lines.length, 2);
    assert.deepEqual(
        lines.map((l) => [l.start, l.end, l.next, l.eol]),
        [[0, 1, 3, '\r\n'], [3, 5, 5, '']]
    );
});

test('brackets are counted only in code', () => {
    const lines = scanLines('foo(a,\n    b)\nf("(")\n', pythonProfile);
    assert.deepEqual(lines.map((l) => l.bracketDelta), [1, -1, 0]);
});

test('backslash continuation is flagged', () => {
    const lines = scanLines('x = 1 + \\\n    2\n', pythonProfile);
    assert.equal(lines[0].continues, true);
    assert.equal(lines[1].continues, false);
});

test('java brace depth ignores braces in comments', () => {
    const src = 'class A {\n  /* { */\n  void f() {\n  }\n}\n';
    const lines = scanLines(src, javaProfile);
    assert.deepEqual(lines.map((l) => l.braceDepth), [0, 1, 1, 2, 1]);
    assert.equal(lines[1].classification, 'comment');
    assert.equal(finalBraceDepth(lines, javaProfile), 0);
});

test('empty source has no lines', () => {
    assert.deepEqual(scanLines('', pythonProfile), []);
});
