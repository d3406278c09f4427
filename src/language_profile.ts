/**
 * Language Profiles - pluggable boundary-detection strategy
 *
 * A profile answers "is this line a definition start" and "what is its
 * name", and supplies the lexical rules the scanner needs to keep those
 * answers away from string and comment contents.
 */

import * as path from 'path';
import { LexicalRules } from './lexical_scanner';
import { ConfigurationError } from './structured_error';

export interface DefinitionMatch {
    identifier: string;
}

export interface LanguageProfile extends LexicalRules {
    name: string;
    extensions: string[];
    lineComment: string;
    /** `indent`: scopes open by indentation; `brace`: depth = block brace depth. */
    depthModel: 'indent' | 'brace';
    matchDefinition(line: string): DefinitionMatch | null;
    /** Lines that open an indentation scope (definitions, classes). */
    opensScope(line: string): boolean;
    isDecorator(line: string): boolean;
    /** Called on the code text of a header line once brackets are balanced. */
    isHeaderComplete(codeText: string): boolean;
    /**
     * Stop sequence matching the start of the next unit, given that unit's
     * first line (a decorator or the header). `''` means no next unit.
     */
    unitStop(nextHead: string): string | undefined;
    /** Quote sequences that may open a docstring; empty when unsupported. */
    docstringQuotes: string[];
}

const PY_DEF = /^[ \t]*(?:async[ \t]+)?def[ \t]+([A-Za-z_][A-Za-z0-9_]*)[ \t]*\(/;
const PY_SCOPE = /^[ \t]*(?:(?:async[ \t]+)?def|class)[ \t]/;

export const pythonProfile: LanguageProfile = {
    name: 'python',
    extensions: ['.py', '.pyw', '.pyi'],
    literals: [
        { open: '"""', close: '"""', kind: 'string', multiline: true, escape: '\\' },
        { open: "'''", close: "'''", kind: 'string', multiline: true, escape: '\\' },
        { open: '"', close: '"', kind: 'string', multiline: false, escape: '\\' },
        { open: "'", close: "'", kind: 'string', multiline: false, escape: '\\' },
        { open: '#', close: '', kind: 'comment', multiline: false },
    ],
    brackets: '()[]{}',
    blockBraces: false,
    lineComment: '#',
    depthModel: 'indent',
    matchDefinition(line) {
        const m = PY_DEF.exec(line);
        return m ? { identifier: m[1] } : null;
    },
    opensScope: (line) => PY_SCOPE.test(line),
    isDecorator: (line) => /^[ \t]*@/.test(line),
    isHeaderComplete(codeText) {
        const t = codeText.trimEnd();
        return t.indexOf(':', t.lastIndexOf(')') + 1) !== -1;
    },
    unitStop(nextHead) {
        const indent = nextHead.slice(0, nextHead.length - nextHead.trimStart().length);
        const opener = /^(?:@|async[ \t]|def[ \t])/.exec(nextHead.slice(indent.length));
        return `\n${indent}${opener ? opener[0] : 'def '}`;
    },
    docstringQuotes: ['"""', "'''"],
};

const JAVA_MODIFIERS = '(?:public|private|protected|static|final|abstract|synchronized|native|default|override|internal|async)';
const JAVA_DEF = new RegExp(
    `^[ \\t]*(?:${JAVA_MODIFIERS}[ \\t]+)+(?:[\\w<>\\[\\],.?]+[ \\t]+)*?([A-Za-z_$][\\w$]*)[ \\t]*\\(`
);

export const javaProfile: LanguageProfile = {
    name: 'java',
    extensions: ['.java', '.cs'],
    literals: [
        { open: '"""', close: '"""', kind: 'string', multiline: true, escape: '\\' },
        { open: '/*', close: '*/', kind: 'comment', multiline: true },
        { open: '//', close: '', kind: 'comment', multiline: false },
        { open: '"', close: '"', kind: 'string', multiline: false, escape: '\\' },
        { open: "'", close: "'", kind: 'string', multiline: false, escape: '\\' },
    ],
    brackets: '()[]',
    blockBraces: true,
    lineComment: '//',
    depthModel: 'brace',
    matchDefinition(line) {
        const m = JAVA_DEF.exec(line);
        return m ? { identifier: m[1] } : null;
    },
    opensScope: () => false,
    isDecorator: (line) => /^[ \t]*@[A-Za-z]/.test(line),
    isHeaderComplete(codeText) {
        return codeText.includes('{') || codeText.trimEnd().endsWith(';');
    },
    unitStop: () => undefined,
    docstringQuotes: [],
};

const PROFILES: Record<string, LanguageProfile> = {
    python: pythonProfile,
    java: javaProfile,
};

export function listLanguages(): string[] {
    return Object.keys(PROFILES);
}

export function getLanguageProfile(name: string): LanguageProfile {
    const profile = PROFILES[name.toLowerCase()];
    if (!profile) {
        throw new ConfigurationError(
            `Unknown language: ${name} (expected one of: ${listLanguages().join(', ')})`,
            'language'
        );
    }
    return profile;
}

/** Picks a profile from a file extension; undefined when nothing matches. */
export function detectLanguage(filePath: string): LanguageProfile | undefined {
    const ext = path.extname(filePath).toLowerCase();
    return Object.values(PROFILES).find((p) => p.extensions.includes(ext));
}
