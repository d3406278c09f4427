/**
 * Prompt text for each annotation style.
 *
 * Sentinels are parameterized by the profile's line-comment token so the
 * same wording works for every language.
 */

import { END_MARKER, getInlineSentinel } from './inline_comments';
import { getDocstringSentinel, getDocstringStop } from './docstring';

export { END_MARKER, getInlineSentinel, getDocstringSentinel, getDocstringStop };

export function getSentinel(style: 'inline' | 'docstring', lineComment: string): string {
    switch (style) {
        case 'docstring':
            return getDocstringSentinel(lineComment);
        case 'inline':
            return getInlineSentinel(lineComment);
    }
}
