/**
 * Inline-comment prompt pieces
 */

/** Separates the worked example from the code to annotate; also the stop sequence. */
export const END_MARKER = 'Original code:';

export function getInlineSentinel(lineComment: string): string {
    return `${lineComment} Same function with verbose inline comments:`;
}
