/**
 * Shared Configuration
 *
 * Resolution order, lowest first:
 *   defaults < config file < environment (AUTODOC_*) < command-line flags
 *
 * The config file is JSON with snake_case keys (`--config <path>`, or
 * `autodoc.config.json` in the working directory). Environment variables are
 * the same names upper-cased with an `AUTODOC_` prefix.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_ENDPOINT, DEFAULT_MODEL } from './oracle_client';
import { ContextMode } from './prompt_builder';
import { AnnotationStyle } from './safety_merger';
import { JsonSchema, JsonType, SchemaValidator, formatErrors } from './schema_validator';
import { ConfigurationError, ErrorFactory } from './structured_error';

// Default credential variable; override with AUTODOC_API_KEY_VAR
export const API_KEY_ENV_VAR = 'GPT_API_KEY';

export const CONFIG_FILE_NAME = 'autodoc.config.json';

export const CONTEXT_MODES = ['growing', 'fixed_example'] as const;
export const STYLES = ['inline', 'docstring'] as const;
export const AUTH_FAILURE_POLICIES = ['discard', 'keep_spliced'] as const;
export const RETRY_EXHAUSTED_POLICIES = ['skip', 'abort'] as const;

export interface AutodocConfig {
    /** Unset: detected from the file extension, python otherwise. */
    language?: string;
    contextMode: ContextMode;
    style: AnnotationStyle;
    topLevelOnly: boolean;
    splitTrailer: boolean;
    endpoint: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxContextChars: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    concurrency: number;
    authFailurePolicy: (typeof AUTH_FAILURE_POLICIES)[number];
    retryExhaustedPolicy: (typeof RETRY_EXHAUSTED_POLICIES)[number];
    markSkipped: boolean;
    patch: boolean;
    examplePath?: string;
    cachePath?: string;
    journalPath?: string;
    apiKeyVar: string;
}

export const DEFAULTS: AutodocConfig = {
    contextMode: 'growing',
    style: 'inline',
    topLevelOnly: false,
    splitTrailer: false,
    endpoint: DEFAULT_ENDPOINT,
    model: DEFAULT_MODEL,
    temperature: 0,
    maxTokens: 1500,
    timeoutMs: 60_000,
    maxContextChars: 12_000,
    maxRetries: 3,
    backoffBaseMs: 1_000,
    backoffMaxMs: 30_000,
    concurrency: 1,
    authFailurePolicy: 'discard',
    retryExhaustedPolicy: 'skip',
    markSkipped: false,
    patch: false,
    apiKeyVar: API_KEY_ENV_VAR,
};

/* -------------------------------------------------------------------------- */
/* Field table                                                                */
/* -------------------------------------------------------------------------- */

type FieldKind = 'string' | 'int' | 'number' | 'bool';

interface FieldSpec {
    key: keyof AutodocConfig;
    /** snake_case name used in the config file and in error messages. */
    name: string;
    kind: FieldKind;
    enum?: readonly string[];
    min?: number;
    max?: number;
}

const FIELDS: FieldSpec[] = [
    { key: 'language', name: 'language', kind: 'string' },
    { key: 'contextMode', name: 'context_mode', kind: 'string', enum: CONTEXT_MODES },
    { key: 'style', name: 'style', kind: 'string', enum: STYLES },
    { key: 'topLevelOnly', name: 'top_level_only', kind: 'bool' },
    { key: 'splitTrailer', name: 'split_trailer', kind: 'bool' },
    { key: 'endpoint', name: 'endpoint', kind: 'string' },
    { key: 'model', name: 'model', kind: 'string' },
    { key: 'temperature', name: 'temperature', kind: 'number', min: 0, max: 1 },
    { key: 'maxTokens', name: 'max_tokens', kind: 'int', min: 1 },
    { key: 'timeoutMs', name: 'timeout_ms', kind: 'int', min: 1 },
    { key: 'maxContextChars', name: 'max_context_chars', kind: 'int', min: 1 },
    { key: 'maxRetries', name: 'max_retries', kind: 'int', min: 0 },
    { key: 'backoffBaseMs', name: 'backoff_base_ms', kind: 'int', min: 0 },
    { key: 'backoffMaxMs', name: 'backoff_max_ms', kind: 'int', min: 0 },
    { key: 'concurrency', name: 'concurrency', kind: 'int', min: 1, max: 32 },
    { key: 'authFailurePolicy', name: 'auth_failure_policy', kind: 'string', enum: AUTH_FAILURE_POLICIES },
    { key: 'retryExhaustedPolicy', name: 'retry_exhausted_policy', kind: 'string', enum: RETRY_EXHAUSTED_POLICIES },
    { key: 'markSkipped', name: 'mark_skipped', kind: 'bool' },
    { key: 'patch', name: 'patch', kind: 'bool' },
    { key: 'examplePath', name: 'example_path', kind: 'string' },
    { key: 'cachePath', name: 'cache_path', kind: 'string' },
    { key: 'journalPath', name: 'journal_path', kind: 'string' },
    { key: 'apiKeyVar', name: 'api_key_var', kind: 'string' },
];

function envName(field: FieldSpec): string {
    return `AUTODOC_${field.name.toUpperCase()}`;
}

const JSON_TYPES: Record<FieldKind, JsonType> = { string: 'string', int: 'integer', number: 'number', bool: 'boolean' };

const CONFIG_SCHEMA_ID = 'autodoc_config';
const validator = new SchemaValidator();
validator.registerSchema(CONFIG_SCHEMA_ID, {
    type: 'object',
    additionalProperties: false,
    properties: Object.fromEntries(
        FIELDS.map((f): [string, JsonSchema] => [
            f.name,
            { type: JSON_TYPES[f.kind], enum: f.enum, minimum: f.min, maximum: f.max },
        ])
    ),
});

/* -------------------------------------------------------------------------- */
/* Layers                                                                     */
/* -------------------------------------------------------------------------- */

type Layer = Partial<Record<keyof AutodocConfig, unknown>>;

function readConfigFile(filePath: string): Layer {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (e) {
        throw new ConfigurationError(
            `Cannot read config file ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
            'config_file'
        );
    }

    const result = validator.validate(parsed, CONFIG_SCHEMA_ID);
    if (!result.valid || typeof parsed !== 'object' || parsed === null) {
        const first = result.errors[0];
        const key = first ? first.path.replace(/^\./, '') : 'config_file';
        throw new ConfigurationError(`Invalid config file ${filePath}: ${formatErrors(result)}`, key || 'config_file');
    }

    const entries = new Map<string, unknown>(Object.entries(parsed));
    const layer: Layer = {};
    for (const field of FIELDS) {
        if (entries.has(field.name)) layer[field.key] = entries.get(field.name);
    }
    return layer;
}

function parseEnvValue(field: FieldSpec, raw: string): unknown {
    switch (field.kind) {
        case 'string':
            return raw;
        case 'bool': {
            const v = raw.trim().toLowerCase();
            if (v === '1' || v === 'true' || v === 'yes') return true;
            if (v === '0' || v === 'false' || v === 'no') return false;
            throw new ConfigurationError(`${envName(field)} must be a boolean, got "${raw}"`, field.name);
        }
        case 'int':
        case 'number': {
            const n = Number(raw.trim());
            if (raw.trim() === '' || Number.isNaN(n)) {
                throw new ConfigurationError(`${envName(field)} must be a number, got "${raw}"`, field.name);
            }
            return n;
        }
    }
}

function readEnv(env: NodeJS.ProcessEnv): Layer {
    const layer: Layer = {};
    for (const field of FIELDS) {
        const raw = env[envName(field)];
        if (raw !== undefined && raw !== '') {
            layer[field.key] = parseEnvValue(field, raw);
        }
    }
    return layer;
}

/* -------------------------------------------------------------------------- */
/* Typed extraction                                                           */
/* -------------------------------------------------------------------------- */

function fieldSpec(key: keyof AutodocConfig): FieldSpec {
    const field = FIELDS.find((f) => f.key === key);
    if (!field) throw new Error(`No field spec for ${key}`);
    return field;
}

function optString(m: Layer, key: keyof AutodocConfig): string | undefined {
    const v = m[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'string' || v.trim() === '') {
        throw new ConfigurationError(`${fieldSpec(key).name} must be a non-empty string`, fieldSpec(key).name);
    }
    return v;
}

function str(m: Layer, key: keyof AutodocConfig): string {
    const v = optString(m, key);
    if (v === undefined) throw new ConfigurationError(`${fieldSpec(key).name} is required`, fieldSpec(key).name);
    return v;
}

function oneOf<T extends string>(m: Layer, key: keyof AutodocConfig, allowed: readonly T[]): T {
    const v = m[key];
    const match = allowed.find((a) => a === v);
    if (match === undefined) {
        throw new ConfigurationError(
            `${fieldSpec(key).name} must be one of ${allowed.join(', ')}, got ${JSON.stringify(v)}`,
            fieldSpec(key).name
        );
    }
    return match;
}

function bool(m: Layer, key: keyof AutodocConfig): boolean {
    const v = m[key];
    if (typeof v !== 'boolean') throw new ConfigurationError(`${fieldSpec(key).name} must be a boolean`, fieldSpec(key).name);
    return v;
}

function num(m: Layer, key: keyof AutodocConfig): number {
    const field = fieldSpec(key);
    const v = m[key];
    if (typeof v !== 'number' || !Number.isFinite(v) || (field.kind === 'int' && !Number.isInteger(v))) {
        throw new ConfigurationError(
            `${field.name} must be ${field.kind === 'int' ? 'an integer' : 'a number'}, got ${JSON.stringify(v)}`,
            field.name
        );
    }
    if ((field.min !== undefined && v < field.min) || (field.max !== undefined && v > field.max)) {
        throw new ConfigurationError(
            `${field.name} must be within [${field.min ?? '-inf'}, ${field.max ?? 'inf'}], got ${v}`,
            field.name
        );
    }
    return v;
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

export interface LoadConfigOptions {
    flags?: Partial<AutodocConfig>;
    env?: NodeJS.ProcessEnv;
    /** Explicit config file; must exist. */
    configFile?: string;
    /** Directory searched for autodoc.config.json when no file is given. */
    cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): AutodocConfig {
    const env = options.env ?? process.env;

    let fileLayer: Layer = {};
    if (options.configFile !== undefined) {
        if (!fs.existsSync(options.configFile)) {
            throw new ConfigurationError(`Config file not found: ${options.configFile}`, 'config_file');
        }
        fileLayer = readConfigFile(options.configFile);
    } else {
        const implicit = path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
        if (fs.existsSync(implicit)) fileLayer = readConfigFile(implicit);
    }

    const flags: Layer = {};
    for (const [k, v] of Object.entries(options.flags ?? {})) {
        const field = FIELDS.find((f) => f.key === k);
        if (field && v !== undefined) flags[field.key] = v;
    }

    const m: Layer = { ...DEFAULTS, ...fileLayer, ...readEnv(env), ...flags };

    const config: AutodocConfig = {
        language: optString(m, 'language'),
        contextMode: oneOf(m, 'contextMode', CONTEXT_MODES),
        style: oneOf(m, 'style', STYLES),
        topLevelOnly: bool(m, 'topLevelOnly'),
        splitTrailer: bool(m, 'splitTrailer'),
        endpoint: str(m, 'endpoint'),
        model: str(m, 'model'),
        temperature: num(m, 'temperature'),
        maxTokens: num(m, 'maxTokens'),
        timeoutMs: num(m, 'timeoutMs'),
        maxContextChars: num(m, 'maxContextChars'),
        maxRetries: num(m, 'maxRetries'),
        backoffBaseMs: num(m, 'backoffBaseMs'),
        backoffMaxMs: num(m, 'backoffMaxMs'),
        concurrency: num(m, 'concurrency'),
        authFailurePolicy: oneOf(m, 'authFailurePolicy', AUTH_FAILURE_POLICIES),
        retryExhaustedPolicy: oneOf(m, 'retryExhaustedPolicy', RETRY_EXHAUSTED_POLICIES),
        markSkipped: bool(m, 'markSkipped'),
        patch: bool(m, 'patch'),
        examplePath: optString(m, 'examplePath'),
        cachePath: optString(m, 'cachePath'),
        journalPath: optString(m, 'journalPath'),
        apiKeyVar: str(m, 'apiKeyVar'),
    };

    if (config.backoffMaxMs < config.backoffBaseMs) {
        throw new ConfigurationError(
            `backoff_max_ms (${config.backoffMaxMs}) must not be below backoff_base_ms (${config.backoffBaseMs})`,
            'backoff_max_ms'
        );
    }
    return config;
}

/** Reads the credential named by `apiKeyVar`; a missing key is a configuration error. */
export function resolveApiKey(config: AutodocConfig, env: NodeJS.ProcessEnv = process.env): string {
    const key = env[config.apiKeyVar];
    if (key === undefined || key.trim() === '') {
        throw ErrorFactory.missingCredential(config.apiKeyVar);
    }
    return key.trim();
}

/** Bundled worked examples, looked up beside the sources and beside the build output. */
export function bundledExamplePath(style: AnnotationStyle): string {
    const name = `${style}-example.txt`;
    const candidates = [
        path.join(__dirname, '..', 'assets', name),
        path.join(__dirname, '..', '..', 'assets', name),
    ];
    return candidates.find((p) => fs.existsSync(p)) ?? candidates[0];
}

/**
 * Loads the worked example for fixed-example mode. Growing mode needs none
 * and gets undefined.
 */
export function loadWorkedExample(config: AutodocConfig): string | undefined {
    if (config.contextMode !== 'fixed_example') return undefined;
    const examplePath = config.examplePath ?? bundledExamplePath(config.style);
    if (!fs.existsSync(examplePath)) {
        throw ErrorFactory.missingExample(examplePath);
    }
    const text = fs.readFileSync(examplePath, 'utf8');
    if (text.trim() === '') {
        throw ErrorFactory.missingExample(examplePath);
    }
    return text;
}
