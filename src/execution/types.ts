/**
 * Invocation — Types
 */
import type { ArgumentValue } from '../config/types.js';
import type { ArgumentInput, CommandReference } from '../commands/types.js';
import type { RunnerError } from '../errors.js';
import type { HookResult } from '../hooks/types.js';

export type InvocationState =
    | 'resolved'
    | 'validated'
    | 'pre-hooks'
    | 'main-executing'
    | 'post-hooks'
    | 'done';

export type InvocationOutcome =
    /** Main process exited 0 */
    | 'succeeded'
    /** Main process exited non-zero or could not be spawned */
    | 'main-failed'
    /** A pre-hook failed; the main process never ran */
    | 'aborted'
    /** Configuration, resolution or argument checks failed; nothing was spawned */
    | 'rejected';

export interface InvocationRequest {
    nameOrAlias: string;
    input: ArgumentInput;
    /** Working directory for global commands; ignored for project-bound ones */
    projectPath?: string;
    timeoutMs?: number;
    /** Collect output instead of sharing the terminal (tool calls) */
    capture?: boolean;
}

export interface Invocation {
    reference: CommandReference;
    arguments: Record<string, ArgumentValue>;
    /** Rendered command line */
    commandLine: string;
    cwd: string;
    /** Resolved binary for executable commands */
    executablePath?: string;
    file: string;
    args: string[];
    env: Record<string, string>;
}

export interface InvocationResult {
    outcome: InvocationOutcome;
    success: boolean;
    /** The main command's error, never a post-hook's */
    error?: RunnerError;
    states: InvocationState[];
    reference?: CommandReference;
    invocation?: Invocation;
    hooks: HookResult[];
    /** Non-fatal problems: post-hook failures and ignored inputs */
    diagnostics: RunnerError[];
    exitCode?: number | null;
    stdout?: string;
    stderr?: string;
    durationMs: number;
}
