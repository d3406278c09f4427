import test from 'node:test';
import assert from 'node:assert/strict';
import { OracleClient, parseRetryAfter, sanitizeErrorSnippet } from '../src/oracle_client';
import { Prompt } from '../src/prompt_builder';
import { ConfigurationError } from '../src/structured_error';

const PROMPT: Prompt = {
    context: '',
    sentinel: '',
    stopSequence: '\ndef ',
    primer: 'def add(a, b):\n',
    text: 'PROMPT TEXT',
    truncatedChars: 0,
};

const PARAMS = { temperature: 0, maxTokens: 256, stopSequence: '\ndef ' };

interface Captured {
    url?: string;
    init?: RequestInit;
}

function respondWith(status: number, body: string, headers: Record<string, string> = {}, captured: Captured = {}): typeof fetch {
    return async (input, init) => {
        captured.url = String(input);
        captured.init = init;
        return new Response(body, { status, headers });
    };
}

function client(fetchImpl: typeof fetch, timeoutMs = 1_000): OracleClient {
    return new OracleClient({ apiKey: 'test-secret', endpoint: 'http://oracle.test/v1/completions', timeoutMs, fetch: fetchImpl });
}

test('successful completion returns the first choice text', async () => {
    const captured: Captured = {};
    const oracle = client(respondWith(200, JSON.stringify({ choices: [{ text: '    # hi\n' }] }), {}, captured));

    const result = await oracle.complete(PROMPT, PARAMS);
    assert.deepEqual(result, { ok: true, text: '    # hi\n' });

    assert.equal(captured.url, 'http://oracle.test/v1/completions');
    assert.equal(captured.init?.method, 'POST');
    assert.equal(new Headers(captured.init?.headers).get('authorization'), 'Bearer test-secret');
    assert.deepEqual(JSON.parse(String(captured.init?.body)), {
        model: 'gpt-3.5-turbo-instruct',
        prompt: 'PROMPT TEXT',
        max_tokens: 256,
        temperature: 0,
        stop: '\ndef ',
    });
});

test('temperature is clamped into [0, 1]', async () => {
    const captured: Captured = {};
    const oracle = client(respondWith(200, JSON.stringify({ choices: [{ text: '' }] }), {}, captured));
    await oracle.complete(PROMPT, { ...PARAMS, temperature: 1.7 });
    assert.equal(JSON.parse(String(captured.init?.body)).temperature, 1);
});

test('401 is an auth error and the key is redacted', async () => {
    const result = await client(respondWith(401, 'bad key test-secret')).complete(PROMPT, PARAMS);
    assert.deepEqual(result, {
        ok: false,
        kind: 'auth_error',
        detail: 'HTTP 401: bad key [REDACTED]',
        httpStatus: 401,
    });
});

test('429 is rate limited with Retry-After', async () => {
    const result = await client(respondWith(429, 'slow down', { 'retry-after': '2' })).complete(PROMPT, PARAMS);
    assert.equal(result.ok, false);
    if (!result.ok) {
        assert.equal(result.kind, 'rate_limited');
        assert.equal(result.retryAfterMs, 2000);
        assert.equal(result.httpStatus, 429);
    }
});

test('server errors and bad bodies are malformed responses', async () => {
    const cases: Array<[number, string]> = [
        [500, 'boom'],
        [200, 'not json'],
        [200, JSON.stringify({ choices: [] })],
        [200, JSON.stringify({ choices: [{ text: 3 }] })],
    ];
    for (const [status, body] of cases) {
        const result = await client(respondWith(status, body)).complete(PROMPT, PARAMS);
        assert.equal(result.ok ? 'ok' : result.kind, 'malformed_response', body);
    }
});

test('thrown fetch is a transport error', async () => {
    const failing: typeof fetch = async () => {
        throw new Error('boom');
    };
    const result = await client(failing).complete(PROMPT, PARAMS);
    assert.deepEqual(result, { ok: false, kind: 'transport_error', detail: 'network_error: boom', httpStatus: null });
});

test('slow calls time out as transport errors', async () => {
    const hanging: typeof fetch = (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
    const result = await client(hanging, 10).complete(PROMPT, PARAMS);
    assert.equal(result.ok ? '' : result.detail, 'timeout after 10ms');
});

test('missing key is refused at construction', () => {
    assert.throws(() => new OracleClient({ apiKey: '', timeoutMs: 1000 }), ConfigurationError);
});

test('parseRetryAfter reads seconds and HTTP dates', () => {
    assert.equal(parseRetryAfter('3', 0), 3000);
    assert.equal(parseRetryAfter('1.5', 0), 1500);
    assert.equal(parseRetryAfter(new Date(10_000).toUTCString(), 4_000), 6000);
    assert.equal(parseRetryAfter('soon', 0), undefined);
    assert.equal(parseRetryAfter(null), undefined);
});

test('sanitizeErrorSnippet strips bearer tokens', () => {
    assert.equal(sanitizeErrorSnippet('Authorization: Bearer abc.def'), 'Authorization: [REDACTED]');
});
