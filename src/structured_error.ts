/**
 * Structured Error Schema
 *
 * Machine-readable errors with recovery options. Segment-local failures are
 * recorded on the segment report; run-level failures are thrown as
 * AutodocError and surface through the CLI.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Pre-flight
    | 'CONFIGURATION_ERROR'

    // Segmentation
    | 'BOUNDARY_DETECTION_AMBIGUITY'

    // Oracle
    | 'ORACLE_TRANSPORT_ERROR'
    | 'ORACLE_RATE_LIMITED'
    | 'ORACLE_AUTH_ERROR'
    | 'ORACLE_MALFORMED_RESPONSE'

    // Merge
    | 'UNSAFE_EDIT_REJECTED'

    // Run control
    | 'RETRY_EXHAUSTED'
    | 'RUN_CANCELLED';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RecoveryAction =
    | 'set_credential'
    | 'provide_example'
    | 'fix_configuration'
    | 'retry_later'
    | 'pass_through'
    | 'abort_run';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    env_vars?: Record<string, string>;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code, context),
        context,
        recovery_options: recoveryOptions,
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode, context: Record<string, unknown>): Severity {
    const fatalCodes: ErrorCode[] = [
        'CONFIGURATION_ERROR',
        'ORACLE_AUTH_ERROR'
    ];

    const warningCodes: ErrorCode[] = [
        'BOUNDARY_DETECTION_AMBIGUITY',
        'ORACLE_RATE_LIMITED',
        'UNSAFE_EDIT_REJECTED',
        'RUN_CANCELLED'
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (code === 'RETRY_EXHAUSTED' && context.fatal === true) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/** True for errors that end the whole run rather than a single segment. */
export function isRunLevel(err: StructuredError): boolean {
    return err.severity === 'FATAL' || err.code === 'RUN_CANCELLED';
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    setCredential: (envVar: string): RecoveryOption => ({
        action: 'set_credential',
        description: `Export the completion API key in ${envVar}`,
        env_vars: { [envVar]: '<api key>' }
    }),

    provideExample: (): RecoveryOption => ({
        action: 'provide_example',
        description: 'Pass --example <path> or set AUTODOC_EXAMPLE_PATH, or switch to --mode growing'
    }),

    fixConfiguration: (key: string): RecoveryOption => ({
        action: 'fix_configuration',
        description: `Correct the value of ${key}`
    }),

    retryLater: (): RecoveryOption => ({
        action: 'retry_later',
        description: 'Re-run once the completion service recovers'
    }),

    passThrough: (): RecoveryOption => ({
        action: 'pass_through',
        description: 'Segment kept verbatim'
    }),

    abortRun: (reason: string): RecoveryOption => ({
        action: 'abort_run',
        description: `Abort run: ${reason}`
    })
};

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class AutodocError extends Error {
    constructor(public readonly structured: StructuredError) {
        super(structured.message);
        this.name = 'AutodocError';
    }

    get code(): ErrorCode {
        return this.structured.code;
    }
}

export class ConfigurationError extends AutodocError {
    constructor(message: string, key: string, recovery: RecoveryOption[] = [CommonRecoveryOptions.fixConfiguration(key)]) {
        super(createStructuredError('CONFIGURATION_ERROR', message, { key }, recovery));
        this.name = 'ConfigurationError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static missingCredential(envVar: string): ConfigurationError {
        return new ConfigurationError(
            `${envVar} environment variable not set`,
            envVar,
            [CommonRecoveryOptions.setCredential(envVar)]
        );
    }

    static missingExample(examplePath: string | undefined): ConfigurationError {
        return new ConfigurationError(
            examplePath
                ? `Worked example not found: ${examplePath}`
                : 'Fixed-example mode requires a worked example',
            'example_path',
            [CommonRecoveryOptions.provideExample()]
        );
    }

    static ambiguousBoundary(line: number, identifier: string): StructuredError {
        return createStructuredError(
            'BOUNDARY_DETECTION_AMBIGUITY',
            `Definition-like line ${line + 1} (${identifier}) is inside a literal and was ignored`,
            { line, identifier }
        );
    }

    static oracleFailure(
        kind: 'transport_error' | 'auth_error' | 'malformed_response' | 'rate_limited',
        detail: string,
        context: Record<string, unknown>
    ): StructuredError {
        switch (kind) {
            case 'auth_error':
                return createStructuredError('ORACLE_AUTH_ERROR', `Completion service rejected the credential: ${detail}`, context, [
                    CommonRecoveryOptions.abortRun('credential rejected')
                ]);
            case 'rate_limited':
                return createStructuredError('ORACLE_RATE_LIMITED', `Rate limited: ${detail}`, context, [
                    CommonRecoveryOptions.retryLater()
                ]);
            case 'malformed_response':
                return createStructuredError('ORACLE_MALFORMED_RESPONSE', `Malformed completion response: ${detail}`, context, [
                    CommonRecoveryOptions.passThrough()
                ]);
            case 'transport_error':
                return createStructuredError('ORACLE_TRANSPORT_ERROR', `Transport failure: ${detail}`, context, [
                    CommonRecoveryOptions.retryLater()
                ]);
        }
    }

    static unsafeEdit(reason: string, detail: string, context: Record<string, unknown>): StructuredError {
        return createStructuredError(
            'UNSAFE_EDIT_REJECTED',
            `Oracle edit rejected (${reason}): ${detail}`,
            { reason, ...context },
            [CommonRecoveryOptions.passThrough()]
        );
    }

    static retryExhausted(attempts: number, lastKind: string, fatal: boolean): StructuredError {
        return createStructuredError(
            'RETRY_EXHAUSTED',
            `Gave up after ${attempts} attempts (last failure: ${lastKind})`,
            { attempts, last_failure: lastKind, fatal },
            fatal ? [CommonRecoveryOptions.abortRun('retry budget exhausted')] : [CommonRecoveryOptions.passThrough()]
        );
    }

    static cancelled(processed: number, total: number): StructuredError {
        return createStructuredError(
            'RUN_CANCELLED',
            `Run cancelled after ${processed} of ${total} segments`,
            { processed, total }
        );
    }
}
