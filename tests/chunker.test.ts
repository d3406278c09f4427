import test from 'node:test';
import assert from 'node:assert/strict';
import { Boundary, findBoundaries } from '../src/boundary_detector';
import { joinSegments, split } from '../src/chunker';
import { pythonProfile } from '../src/language_profile';

function segmentsOf(source: string, maxDepth?: number, splitTrailer = false) {
    return split(source, findBoundaries(source, pythonProfile, { maxDepth }), { splitTrailer });
}

const SOURCES: Record<string, string> = {
    empty: '',
    'no functions': 'x = 1\nprint(x)\n',
    'two functions': 'import os\n\ndef a():\n    return 1\n\ndef b():\n    return 2\n',
    nested: 'def outer():\n    def inner():\n        return 1\n    return inner()\n',
    'docstring mentioning def': 'def f():\n    """Call def g() first.\n\n    def g():\n    """\n    return 0\n',
    crlf: 'def a():\r\n    return 1\r\n\r\nmain()',
    decorated: '@cache\ndef a():\n    return 1\n',
};

for (const [name, source] of Object.entries(SOURCES)) {
    test(`joining segments reproduces the source (${name})`, () => {
        assert.equal(joinSegments(segmentsOf(source)), source);
        assert.equal(joinSegments(segmentsOf(source, 1, true)), source);
    });
}

test('segments carry kind, identifier, header and body', () => {
    const segs = segmentsOf(SOURCES['two functions']);
    assert.deepEqual(segs.map((s) => [s.kind, s.index, s.identifier]), [
        ['preamble', 0, undefined],
        ['function_body', 1, 'a'],
        ['function_body', 2, 'b'],
    ]);
    assert.equal(segs[0].rawText, 'import os\n\n');
    assert.equal(segs[1].rawText, 'def a():\n    return 1\n\n');
    assert.equal(segs[1].definitionLine, 'def a():');
    assert.equal(segs[1].body, '\n    return 1\n\n');
    assert.equal(segs[1].lead, '');
    assert.equal(segs[2].startOffset, SOURCES['two functions'].indexOf('def b'));
});

test('a source without functions is a single preamble', () => {
    const segs = segmentsOf(SOURCES['no functions']);
    assert.equal(segs.length, 1);
    assert.equal(segs[0].kind, 'preamble');
    assert.equal(segs[0].rawText, SOURCES['no functions']);
});

test('nested definitions become their own segments unless depth is limited', () => {
    assert.deepEqual(segmentsOf(SOURCES.nested).map((s) => s.rawText), [
        '',
        'def outer():\n',
        '    def inner():\n        return 1\n    return inner()\n',
    ]);
    assert.deepEqual(segmentsOf(SOURCES.nested, 1).map((s) => s.identifier), [undefined, 'outer']);
});

test('decorator lines go to the segment lead', () => {
    const [, seg] = segmentsOf(SOURCES.decorated);
    assert.equal(seg.lead, '@cache\n');
    assert.equal(seg.definitionLine, 'def a():');
});

test('trailing top-level code is split off only on request', () => {
    const source = 'def a():\n    return 1\n\nmain()\n';
    assert.equal(segmentsOf(source).length, 2);

    const segs = segmentsOf(source, undefined, true);
    assert.deepEqual(segs.map((s) => [s.kind, s.rawText]), [
        ['preamble', ''],
        ['function_body', 'def a():\n    return 1\n'],
        ['trailer', '\nmain()\n'],
    ]);
    assert.equal(segs[2].index, 2);
});

test('overlapping boundaries are refused', () => {
    const boundary = (start: number, end: number): Boundary => ({
        identifier: `f${start}`,
        startOffset: start,
        endOffset: end,
        headerStartOffset: start,
        headerEndOffset: start,
        bodyEndOffset: end,
        depth: 1,
        line: 0,
    });
    assert.throws(() => split('abcdef', [boundary(2, 4), boundary(1, 3)]), RangeError);
});
