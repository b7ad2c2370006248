/**
 * Hook System — Types
 *
 * Hooks are command strings a command declares in `pre_exec` / `post_exec`.
 * They run in the main command's working directory and environment.
 */

export type HookPhase = 'pre' | 'post';

/** How to re-enter the running program for hooks such as `cmdstack run db-migrate` */
export interface SelfInvocation {
    file: string;
    args: string[];
}

export interface HookContext {
    cwd: string;
    env: Readonly<Record<string, string>>;
    /** Collect output instead of sharing the terminal */
    capture?: boolean;
    selfInvocation?: SelfInvocation;
}

export interface HookResult {
    phase: HookPhase;
    /** Zero-based position within its phase */
    index: number;
    command: string;
    success: boolean;
    exitCode: number | null;
    stdout?: string;
    stderr?: string;
    error?: string;
    durationMs: number;
}
