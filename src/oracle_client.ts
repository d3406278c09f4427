/**
 * Oracle Client - one completion call per request, typed failures
 *
 * Talks to an OpenAI-compatible `/v1/completions` endpoint. There are no
 * retries here; the driver owns retry policy. Every failure comes back as a
 * value, never as a thrown error.
 */

import { createLogger } from './logger';
import { Prompt } from './prompt_builder';
import { SchemaValidator, formatErrors } from './schema_validator';
import { ConfigurationError } from './structured_error';

const log = createLogger('oracle');

// ============================================================================
// Types
// ============================================================================

export type OracleFailureKind = 'transport_error' | 'auth_error' | 'malformed_response' | 'rate_limited';

export interface CompletionParams {
    temperature: number;
    maxTokens: number;
    stopSequence: string;
}

export type CompletionResult =
    | { ok: true; text: string }
    | {
          ok: false;
          kind: OracleFailureKind;
          detail: string;
          httpStatus: number | null;
          retryAfterMs?: number;
      };

export interface CompletionOracle {
    complete(prompt: Prompt, params: CompletionParams): Promise<CompletionResult>;
}

export interface OracleClientConfig {
    apiKey: string;
    endpoint?: string;
    model?: string;
    timeoutMs: number;
    /** Injected for tests; defaults to the global fetch. */
    fetch?: typeof fetch;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ENDPOINT = 'https://api.openai.com/v1/completions';
export const DEFAULT_MODEL = 'gpt-3.5-turbo-instruct';

const SANITIZE = {
    ERROR_SNIPPET_MAX_CHARS: 500,
    STRIP_PATTERNS: [
        /[a-fA-F0-9]{32,}/g,
        /sk-[A-Za-z0-9_-]{10,}/g,
        /Bearer\s+[A-Za-z0-9._-]+/gi,
    ],
};

const RESPONSE_SCHEMA_ID = 'completion_response';

const validator = new SchemaValidator();
validator.registerSchema(RESPONSE_SCHEMA_ID, {
    type: 'object',
    required: ['choices'],
    properties: {
        choices: {
            type: 'array',
            minItems: 1,
            items: {
                type: 'object',
                required: ['text'],
                properties: { text: { type: 'string' } },
            },
        },
    },
});

// ============================================================================
// Helpers
// ============================================================================

export function sanitizeErrorSnippet(input: string, secrets: string[] = []): string {
    let out = input || '';
    for (const secret of secrets) {
        if (secret) out = out.split(secret).join('[REDACTED]');
    }
    for (const re of SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    out = out.replace(/[^\x20-\x7E]+/g, ' ');
    return out;
}

/** Parses a Retry-After header (delta seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(header: string | null, nowMs: number = Date.now()): number | undefined {
    if (header === null || header.trim() === '') return undefined;
    const value = header.trim();
    if (/^\d+(\.\d+)?$/.test(value)) {
        return Math.round(Number(value) * 1000);
    }
    const at = Date.parse(value);
    if (Number.isNaN(at)) return undefined;
    return Math.max(0, at - nowMs);
}

function firstChoiceText(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null || !('choices' in data)) return undefined;
    const choices: unknown = data.choices;
    if (!Array.isArray(choices) || choices.length === 0) return undefined;
    const first: unknown = choices[0];
    if (typeof first !== 'object' || first === null || !('text' in first)) return undefined;
    return typeof first.text === 'string' ? first.text : undefined;
}

function clampTemperature(t: number): number {
    if (!Number.isFinite(t)) return 0;
    return Math.max(0, Math.min(1, t));
}

// ============================================================================
// OracleClient
// ============================================================================

export class OracleClient implements CompletionOracle {
    private readonly endpoint: string;
    private readonly model: string;
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly config: OracleClientConfig) {
        if (!config.apiKey) {
            throw new ConfigurationError('Oracle client requires an API key', 'api_key');
        }
        if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
            throw new ConfigurationError(`timeoutMs must be positive, got ${config.timeoutMs}`, 'timeout_ms');
        }
        this.endpoint = config.endpoint ?? DEFAULT_ENDPOINT;
        this.model = config.model ?? DEFAULT_MODEL;
        this.fetchImpl = config.fetch ?? fetch;
    }

    async complete(prompt: Prompt, params: CompletionParams): Promise<CompletionResult> {
        const timeoutMs = this.config.timeoutMs;
        const body = {
            model: this.model,
            prompt: prompt.text,
            max_tokens: params.maxTokens,
            temperature: clampTemperature(params.temperature),
            stop: params.stopSequence,
        };

        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), timeoutMs);
        const started = Date.now();

        try {
            const resp = await this.fetchImpl(this.endpoint, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.config.apiKey}`,
                },
                body: JSON.stringify(body),
                signal: ac.signal,
            });

            const bodyText = await resp.text();
            log.debug(`HTTP ${resp.status} in ${Date.now() - started}ms`, { chars: bodyText.length });

            if (resp.status === 401 || resp.status === 403) {
                return this.fail('auth_error', `HTTP ${resp.status}: ${bodyText}`, resp.status);
            }
            if (resp.status === 429) {
                const retryAfterMs = parseRetryAfter(resp.headers.get('retry-after'));
                return this.fail('rate_limited', `HTTP 429: ${bodyText}`, 429, retryAfterMs);
            }
            if (!resp.ok) {
                return this.fail('malformed_response', `HTTP ${resp.status}: ${bodyText}`, resp.status);
            }

            let data: unknown;
            try {
                data = JSON.parse(bodyText);
            } catch {
                return this.fail('malformed_response', `provider_response_not_json: ${bodyText}`, resp.status);
            }

            const check = validator.validate(data, RESPONSE_SCHEMA_ID);
            const text = firstChoiceText(data);
            if (!check.valid || text === undefined) {
                return this.fail('malformed_response', `unexpected response shape: ${formatErrors(check)}`, resp.status);
            }

            return { ok: true, text };
        } catch (e) {
            const msg = ac.signal.aborted
                ? `timeout after ${timeoutMs}ms`
                : `network_error: ${e instanceof Error ? e.message : String(e)}`;
            return this.fail('transport_error', msg, null);
        } finally {
            clearTimeout(tid);
        }
    }

    private fail(kind: OracleFailureKind, detail: string, httpStatus: number | null, retryAfterMs?: number): CompletionResult {
        const safe = sanitizeErrorSnippet(detail, [this.config.apiKey]);
        log.debug(`Completion failed (${kind})`, { httpStatus, detail: safe });
        return retryAfterMs === undefined
            ? { ok: false, kind, detail: safe, httpStatus }
            : { ok: false, kind, detail: safe, httpStatus, retryAfterMs };
    }
}
