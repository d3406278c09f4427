import test from 'node:test';
import assert from 'node:assert/strict';
import { SchemaValidator, formatErrors } from '../src/schema_validator';

function completionValidator(): SchemaValidator {
    const validator = new SchemaValidator();
    validator.registerSchema('completion', {
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
    return validator;
}

test('completion response schema', async (t) => {
    const validator = completionValidator();

    await t.test('accepts a well-formed body', () => {
        const result = validator.validate({ choices: [{ text: '# hi\n' }], id: 'x' }, 'completion');
        assert.equal(result.valid, true);
        assert.deepEqual(result.errors, []);
    });

    await t.test('reports a missing field by path', () => {
        const result = validator.validate({}, 'completion');
        assert.equal(result.valid, false);
        assert.deepEqual(result.errors, [{ path: '.choices', message: 'Required field missing' }]);
    });

    await t.test('reports an empty choices array', () => {
        const result = validator.validate({ choices: [] }, 'completion');
        assert.deepEqual(result.errors, [{ path: '.choices', message: 'Expected at least 1 item(s), got 0' }]);
    });

    await t.test('reports nested type errors', () => {
        const result = validator.validate({ choices: [{ text: 3 }] }, 'completion');
        assert.deepEqual(result.errors, [
            { path: '.choices[0].text', message: 'Expected type string, got number' },
        ]);
    });

    await t.test('null is not an object', () => {
        const result = validator.validate(null, 'completion');
        assert.deepEqual(result.errors, [{ path: '', message: 'Expected type object, got null' }]);
    });
});

test('config field constraints', async (t) => {
    const validator = new SchemaValidator();
    validator.registerSchema('file', {
        type: 'object',
        properties: { model: { type: 'string' } },
        additionalProperties: false,
    });
    validator.registerSchema('concurrency', { type: 'integer', minimum: 1, maximum: 64 });
    validator.registerSchema('mode', { enum: ['growing', 'fixed'] });
    validator.registerSchema('endpoint', { type: 'string', pattern: '^https?://' });

    await t.test('rejects unknown keys', () => {
        const result = validator.validate({ model: 'm', tmperature: 0 }, 'file');
        assert.deepEqual(result.errors, [{ path: '.tmperature', message: 'Unknown field' }]);
    });

    await t.test('integer bounds', () => {
        assert.equal(validator.validate(64, 'concurrency').valid, true);
        assert.deepEqual(validator.validate(0, 'concurrency').errors, [
            { path: '', message: 'Value 0 < minimum 1' },
        ]);
        assert.deepEqual(validator.validate(1.5, 'concurrency').errors, [
            { path: '', message: 'Expected type integer, got number' },
        ]);
    });

    await t.test('enum and pattern', () => {
        assert.equal(formatErrors(validator.validate('both', 'mode')), '(root): Value must be one of: growing, fixed');
        assert.deepEqual(validator.validate('ftp://x', 'endpoint').errors, [
            { path: '', message: 'Value does not match pattern: ^https?://' },
        ]);
    });

    await t.test('unknown schema id', () => {
        const result = validator.validate({}, 'nope');
        assert.equal(result.valid, false);
        assert.equal(result.errors[0]?.message, 'Schema not found: nope');
    });
});
