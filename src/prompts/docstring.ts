/**
 * Docstring prompt pieces
 */

export function getDocstringSentinel(lineComment: string): string {
    return `${lineComment}autodoc: A comprehensive PEP 257 Google style docstring, including a brief one-line summary of the function.`;
}

export function getDocstringStop(lineComment: string): string {
    return `${lineComment}autodoc`;
}
