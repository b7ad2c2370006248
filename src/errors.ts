/**
 * Error taxonomy shared by the resolver, binder, orchestrator and CLI.
 *
 * Every failure carries the offending name/path/argument in `context`
 * so callers can report it without re-deriving state.
 */

export type RunnerErrorCode =
    | 'ConfigurationInvalid'
    | 'CommandNotFound'
    | 'CommandDisabled'
    | 'EmptyCommandTemplate'
    | 'ArgumentValidationFailed'
    | 'ExecutableNotFound'
    | 'ExecutableNotPermitted'
    | 'WorkingDirectoryMissing'
    | 'PreHookFailed'
    | 'PostHookFailed'
    | 'ProcessExecutionFailed';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class RunnerError extends Error {
    readonly code: RunnerErrorCode;
    readonly severe: boolean;
    readonly context: ErrorContext;

    constructor(code: RunnerErrorCode, message: string, options: {
        severe?: boolean;
        context?: ErrorContext;
        cause?: unknown;
    } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'RunnerError';
        this.code = code;
        this.severe = options.severe ?? code !== 'PostHookFailed';
        this.context = options.context ?? {};
    }
}

export function isRunnerError(err: unknown, code?: RunnerErrorCode): err is RunnerError {
    return err instanceof RunnerError && (code === undefined || err.code === code);
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
