/**
 * Prompt Builder
 *
 * Produces the single text payload sent to the oracle for one segment. Two
 * context modes share one code path:
 *   growing        - everything annotated so far, then the raw segment
 *   fixed_example  - a worked example, then the raw segment only
 *
 * The prompt always ends with the sentinel followed by the primer (the
 * definition header), so the oracle continues from inside the function.
 */

import { Segment } from './chunker';
import { LanguageProfile } from './language_profile';
import { createLogger } from './logger';
import { END_MARKER, getDocstringStop, getSentinel } from './prompts';
import { AnnotationStyle } from './safety_merger';
import { ConfigurationError, ErrorFactory } from './structured_error';

const log = createLogger('prompt');

export type ContextMode = 'growing' | 'fixed_example';

export interface PromptBuilderConfig {
    contextMode: ContextMode;
    style: AnnotationStyle;
    profile: LanguageProfile;
    /** Character budget for the context section (growing mode). */
    maxContextChars: number;
}

export interface Prompt {
    context: string;
    example?: string;
    sentinel: string;
    stopSequence: string;
    primer: string;
    text: string;
    /** Characters dropped from the front of the accumulated context. */
    truncatedChars: number;
}

export class PromptBuilder {
    private readonly sentinel: string;

    constructor(private readonly config: PromptBuilderConfig) {
        if (config.style === 'docstring' && config.profile.docstringQuotes.length === 0) {
            throw new ConfigurationError(
                `Language ${config.profile.name} has no docstring style; use --style inline`,
                'style'
            );
        }
        if (!Number.isInteger(config.maxContextChars) || config.maxContextChars <= 0) {
            throw new ConfigurationError(`maxContextChars must be a positive integer, got ${config.maxContextChars}`, 'max_context_chars');
        }
        this.sentinel = getSentinel(config.style, config.profile.lineComment);
    }

    /** `next` is the segment after this one, if any; growing prompts stop where it starts. */
    build(segment: Segment, accumulated: string, workedExample?: string, next?: Segment): Prompt {
        if (segment.definitionLine === undefined) {
            throw new RangeError(`Segment ${segment.index} (${segment.kind}) has no definition to annotate`);
        }

        const { contextMode, style } = this.config;
        const raw = segment.rawText;
        const stopSequence = this.stopSequenceFor(next);
        const primer = style === 'docstring'
            ? segment.definitionLine
            : segment.lead + segment.definitionLine + '\n';

        let context: string;
        let example: string | undefined;
        let truncatedChars = 0;

        if (contextMode === 'fixed_example') {
            if (workedExample === undefined || workedExample.trim() === '') {
                throw ErrorFactory.missingExample(undefined);
            }
            example = workedExample;
            context = raw;
        } else {
            const budget = Math.max(0, this.config.maxContextChars - raw.length);
            const kept = truncateFront(accumulated, budget);
            truncatedChars = accumulated.length - kept.length;
            if (truncatedChars > 0) {
                log.debug(`Dropped ${truncatedChars} chars of context for ${segment.identifier ?? segment.index}`);
            }
            context = kept + raw;
        }

        if (raw.includes(stopSequence)) {
            log.warn(`Stop sequence ${JSON.stringify(stopSequence)} occurs inside segment ${segment.identifier ?? segment.index}; completion may end early`);
        }

        let text: string;
        if (style === 'docstring') {
            const parts = example !== undefined ? [example.trimEnd(), context.trimEnd()] : [context.trimEnd()];
            text = [...parts, this.sentinel, primer].join('\n\n');
        } else if (example !== undefined) {
            text = `${example.trimEnd()}\n\n${END_MARKER}\n${context.trimEnd()}\n\n${this.sentinel}\n${primer}`;
        } else {
            text = `${context.trimEnd()}\n\n${this.sentinel}\n${primer}`;
        }

        return { context, example, sentinel: this.sentinel, stopSequence, primer, text, truncatedChars };
    }

    stopSequenceFor(next?: Segment): string {
        const { style, contextMode, profile } = this.config;
        if (style === 'docstring') return getDocstringStop(profile.lineComment);
        if (contextMode !== 'growing') return END_MARKER;
        // The oracle rewrites this segment and then runs on into the next unit.
        const head = next?.kind === 'function_body' ? firstLine(next.lead || (next.definitionLine ?? '')) : '';
        return profile.unitStop(head) ?? END_MARKER;
    }
}

function firstLine(text: string): string {
    const nl = text.indexOf('\n');
    return nl === -1 ? text : text.slice(0, nl);
}

/** Keeps at most `budget` trailing characters, cutting only at line starts. */
export function truncateFront(text: string, budget: number): string {
    if (text.length <= budget) return text;
    const cut = text.length - budget;
    if (text[cut - 1] === '\n') return text.slice(cut);
    const nl = text.indexOf('\n', cut);
    return nl === -1 ? '' : text.slice(nl + 1);
}
