#!/usr/bin/env node
/**
 * CLI Entry Point for autodoc
 *
 *   autodoc [options] [file]
 *
 * With a file, the annotated source goes to `<file>.new` (and `<file>.patch`
 * with --patch). Without one, source is read from stdin and written to stdout.
 */

import * as fs from 'fs';
import { CachingOracle, CompletionStore } from './completion_cache';
import {
    AutodocConfig,
    loadConfig,
    loadWorkedExample,
    resolveApiKey,
} from './config';
import { AnnotationDriver, RunResult } from './driver';
import { LanguageProfile, detectLanguage, getLanguageProfile, pythonProfile } from './language_profile';
import { createLogger, setLogLevel } from './logger';
import { CompletionOracle, OracleClient } from './oracle_client';
import { writeAnnotatedOutput } from './output_writer';
import { RunJournal } from './run_journal';
import { AutodocError } from './structured_error';

const log = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface CliDeps {
    env: NodeJS.ProcessEnv;
    cwd: string;
    readStdin: () => Promise<string>;
    writeStdout: (text: string) => void;
    writeStderr: (text: string) => void;
    createOracle: (config: AutodocConfig, apiKey: string) => CompletionOracle;
    /** External cancellation in addition to SIGINT. */
    signal?: AbortSignal;
    sleep?: (ms: number) => Promise<void>;
}

async function readProcessStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

export function defaultDeps(): CliDeps {
    return {
        env: process.env,
        cwd: process.cwd(),
        readStdin: readProcessStdin,
        writeStdout: (text) => process.stdout.write(text),
        writeStderr: (text) => process.stderr.write(text),
        createOracle: (config, apiKey) =>
            new OracleClient({ apiKey, endpoint: config.endpoint, model: config.model, timeoutMs: config.timeoutMs }),
    };
}

const USAGE = `Usage: autodoc [options] [file]

Annotates each function with oracle-written comments. Only pure comment
insertions are kept; anything else leaves the function untouched.

Options:
  --mode <growing|fixed_example>   Context for each prompt (default: growing)
  --style <inline|docstring>       Inline comments or a docstring (default: inline)
  --language <name>                python or java (default: from file extension)
  --example <path>                 Worked example for fixed_example mode
  --top-level-only                 Leave nested definitions inside their parent
  --split-trailer                  Keep code after the last function out of it
  --concurrency <n>                Parallel oracle calls (fixed_example only)
  --max-retries <n>                Retries on rate limits and transport errors
  --temperature <t>                Sampling temperature in [0, 1] (default: 0)
  --max-tokens <n>                 Completion length limit (default: 1500)
  --timeout <ms>                   Per-call timeout (default: 60000)
  --model <name>                   Completion model
  --endpoint <url>                 Completions endpoint
  --patch                          Also write <file>.patch
  --journal <path>                 Append JSONL run events to <path>
  --cache <path>                   SQLite completion cache
  --config <path>                  JSON config file (default: ./autodoc.config.json)
  --keep-partial                   Keep finished work when the credential is rejected
  --abort-on-exhausted             Abort instead of skipping when retries run out
  --mark-skipped                   Comment above each function left unannotated
  --quiet | --verbose              Log level warn | debug
  -h, --help                       Show this help

Environment:
  GPT_API_KEY                      Completion API key (name set by AUTODOC_API_KEY_VAR)
  AUTODOC_*                        Any config key, e.g. AUTODOC_MAX_RETRIES=5
`;

const VALUE_FLAGS = [
    '--mode', '--style', '--language', '--example', '--concurrency', '--max-retries', '--temperature',
    '--max-tokens', '--timeout', '--model', '--endpoint', '--journal', '--cache', '--config',
];

const SWITCH_FLAGS = [
    '--top-level-only', '--split-trailer', '--patch', '--keep-partial', '--abort-on-exhausted',
    '--mark-skipped', '--quiet', '--verbose', '--help', '-h',
];

class UsageError extends Error {}

export interface ParsedArgs {
    inputPath?: string;
    configFile?: string;
    flags: Partial<AutodocConfig>;
    help: boolean;
    logLevel?: 'warn' | 'debug';
}

function parseArgs(args: string[]): ParsedArgs {
    const value = (name: string): string | undefined => {
        const index = args.indexOf(name);
        if (index === -1) return undefined;
        const v = args[index + 1];
        if (v === undefined || v.startsWith('--')) {
            throw new UsageError(`${name} requires a value`);
        }
        return v;
    };
    const numeric = (name: string): number | undefined => {
        const raw = value(name);
        if (raw === undefined) return undefined;
        const n = Number(raw);
        if (Number.isNaN(n)) throw new UsageError(`${name} requires a number, got "${raw}"`);
        return n;
    };
    const has = (name: string): boolean => args.includes(name);

    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (VALUE_FLAGS.includes(a)) {
            i++;
        } else if (a.startsWith('-') && a !== '-') {
            if (!SWITCH_FLAGS.includes(a)) throw new UsageError(`Unknown option: ${a}`);
        } else {
            positionals.push(a);
        }
    }
    if (positionals.length > 1) {
        throw new UsageError(`Expected at most one input file, got ${positionals.length}`);
    }

    const mode = value('--mode');
    const style = value('--style');
    const flags: Partial<AutodocConfig> = {
        language: value('--language'),
        examplePath: value('--example'),
        concurrency: numeric('--concurrency'),
        maxRetries: numeric('--max-retries'),
        temperature: numeric('--temperature'),
        maxTokens: numeric('--max-tokens'),
        timeoutMs: numeric('--timeout'),
        model: value('--model'),
        endpoint: value('--endpoint'),
        journalPath: value('--journal'),
        cachePath: value('--cache'),
    };
    if (mode !== undefined) {
        if (mode !== 'growing' && mode !== 'fixed_example') throw new UsageError(`Invalid --mode: ${mode}`);
        flags.contextMode = mode;
    }
    if (style !== undefined) {
        if (style !== 'inline' && style !== 'docstring') throw new UsageError(`Invalid --style: ${style}`);
        flags.style = style;
    }
    if (has('--top-level-only')) flags.topLevelOnly = true;
    if (has('--split-trailer')) flags.splitTrailer = true;
    if (has('--patch')) flags.patch = true;
    if (has('--mark-skipped')) flags.markSkipped = true;
    if (has('--keep-partial')) flags.authFailurePolicy = 'keep_spliced';
    if (has('--abort-on-exhausted')) flags.retryExhaustedPolicy = 'abort';

    const input = positionals[0];
    return {
        inputPath: input === undefined || input === '-' ? undefined : input,
        configFile: value('--config'),
        flags,
        help: has('--help') || has('-h'),
        logLevel: has('--verbose') ? 'debug' : has('--quiet') ? 'warn' : undefined,
    };
}

class AutodocCLI {
    constructor(private readonly deps: CliDeps = defaultDeps()) { }

    /** Runs one invocation; `args` excludes the node binary and script path. */
    async run(args: string[]): Promise<number> {
        let parsed: ParsedArgs;
        try {
            parsed = parseArgs(args);
        } catch (e) {
            if (e instanceof UsageError) {
                this.deps.writeStderr(`Error: ${e.message}\n${USAGE}`);
                return EXIT_FAILURE;
            }
            throw e;
        }

        if (parsed.help) {
            this.deps.writeStdout(USAGE);
            return EXIT_OK;
        }
        if (parsed.logLevel) setLogLevel(parsed.logLevel);

        try {
            return await this.annotate(parsed);
        } catch (e) {
            if (e instanceof AutodocError) {
                this.deps.writeStderr(`Error: ${e.message}\n`);
                for (const option of e.structured.recovery_options) {
                    this.deps.writeStderr(`  - ${option.description}\n`);
                }
                return EXIT_FAILURE;
            }
            this.deps.writeStderr(`Error: ${e instanceof Error ? e.message : String(e)}\n`);
            return EXIT_FAILURE;
        }
    }

    private async annotate(parsed: ParsedArgs): Promise<number> {
        const { deps } = this;
        const config = loadConfig({ flags: parsed.flags, env: deps.env, configFile: parsed.configFile, cwd: deps.cwd });
        const apiKey = resolveApiKey(config, deps.env);
        const profile = this.pickProfile(config, parsed.inputPath);
        const example = loadWorkedExample(config);

        let source: string;
        if (parsed.inputPath !== undefined) {
            if (!fs.existsSync(parsed.inputPath)) {
                deps.writeStderr(`Error: File not found: ${parsed.inputPath}\n`);
                return EXIT_FAILURE;
            }
            source = fs.readFileSync(parsed.inputPath, 'utf8');
        } else {
            source = await deps.readStdin();
        }

        const store = config.cachePath ? new CompletionStore(config.cachePath) : undefined;
        const oracle = new CachingOracle(deps.createOracle(config, apiKey), {
            store,
            namespace: `${config.endpoint}|${config.model}`,
        });
        const journal = config.journalPath ? new RunJournal(config.journalPath) : undefined;

        const driver = new AnnotationDriver(oracle, {
            contextMode: config.contextMode,
            style: config.style,
            profile,
            maxDepth: config.topLevelOnly ? 1 : undefined,
            splitTrailer: config.splitTrailer,
            maxRetries: config.maxRetries,
            backoffBaseMs: config.backoffBaseMs,
            backoffMaxMs: config.backoffMaxMs,
            authFailurePolicy: config.authFailurePolicy,
            retryExhaustedPolicy: config.retryExhaustedPolicy,
            concurrency: config.concurrency,
            maxContextChars: config.maxContextChars,
            example,
            params: { temperature: config.temperature, maxTokens: config.maxTokens },
            markSkipped: config.markSkipped,
            sleep: deps.sleep,
            journal,
        });

        const ac = new AbortController();
        const onSigint = (): void => {
            log.warn('Interrupted; finishing the current segment');
            ac.abort();
        };
        const onExternalAbort = (): void => ac.abort();
        process.once('SIGINT', onSigint);
        deps.signal?.addEventListener('abort', onExternalAbort, { once: true });
        if (deps.signal?.aborted) ac.abort();

        let result: RunResult;
        try {
            result = await driver.run(source, { signal: ac.signal });
        } finally {
            process.removeListener('SIGINT', onSigint);
            deps.signal?.removeEventListener('abort', onExternalAbort);
            store?.close();
        }

        return this.emit(result, source, parsed.inputPath, config);
    }

    private pickProfile(config: AutodocConfig, inputPath: string | undefined): LanguageProfile {
        if (config.language !== undefined) return getLanguageProfile(config.language);
        const detected = inputPath !== undefined ? detectLanguage(inputPath) : undefined;
        return detected ?? pythonProfile;
    }

    private emit(result: RunResult, source: string, inputPath: string | undefined, config: AutodocConfig): number {
        const { deps } = this;
        if (result.output === null) {
            deps.writeStderr(`Error: ${result.error?.message ?? 'run aborted'}; no output written\n`);
            return EXIT_FAILURE;
        }

        if (inputPath !== undefined) {
            const written = writeAnnotatedOutput({
                inputPath,
                original: source,
                annotated: result.output,
                patch: config.patch,
            });
            for (const w of written.warnings) log.warn(w);
            log.info(`Wrote ${written.outputPath}${written.patchPath ? ` and ${written.patchPath}` : ''}`);
        } else {
            deps.writeStdout(result.output);
        }

        const skipped = result.segments.filter((s) => s.skipReason !== undefined);
        for (const s of skipped) {
            log.info(`Left ${s.identifier ?? `segment ${s.index}`} unannotated: ${s.skipReason}`);
        }

        switch (result.status) {
            case 'done':
                return EXIT_OK;
            case 'cancelled':
                deps.writeStderr(`Cancelled: ${result.error?.message ?? 'run cancelled'}\n`);
                return EXIT_CANCELLED;
            case 'aborted':
                deps.writeStderr(`Error: ${result.error?.message ?? 'run aborted'}\n`);
                return EXIT_FAILURE;
        }
    }
}

// Run CLI
if (require.main === module) {
    const cli = new AutodocCLI();
    cli.run(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exitCode = 1;
        }
    );
}

export { AutodocCLI, parseArgs, USAGE };
