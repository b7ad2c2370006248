import { spawn } from 'node:child_process';

/**
 * Invoker — the only place that starts operating-system processes.
 *
 * The orchestrator talks to this interface so tests can substitute a
 * deterministic fake without touching the real process table.
 */

export interface SpawnRequest {
    file: string;
    args: readonly string[];
    cwd: string;
    env: Readonly<Record<string, string>>;
    /** Kill the process after this many milliseconds */
    timeoutMs?: number;
    /** Collect stdout/stderr instead of sharing the terminal */
    capture?: boolean;
}

export interface SpawnResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    /** Set when the process could not be started at all */
    error?: Error;
}

export interface Invoker {
    spawn(request: SpawnRequest): Promise<SpawnResult>;
}

const ANSI_COLOR = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
    return text.replace(ANSI_COLOR, '');
}

export function spawnSucceeded(result: SpawnResult): boolean {
    return !result.error && !result.timedOut && result.exitCode === 0;
}

/**
 * Describe why a spawn did not succeed
 */
export function describeSpawnFailure(result: SpawnResult, timeoutMs?: number): string {
    if (result.error) return `failed to start: ${result.error.message}`;
    if (result.timedOut) return `timed out after ${timeoutMs ?? 0}ms`;
    if (result.signal) return `terminated by ${result.signal}`;
    return `exited with code ${result.exitCode ?? 'unknown'}`;
}

/**
 * Process Invoker — spawns real child processes with node:child_process
 */
export class ProcessInvoker implements Invoker {
    spawn(request: SpawnRequest): Promise<SpawnResult> {
        return new Promise((resolve) => {
            let stdout = '';
            let stderr = '';
            let timedOut = false;
            let settled = false;
            let timer: ReturnType<typeof setTimeout> | null = null;

            const finish = (result: Omit<SpawnResult, 'stdout' | 'stderr' | 'timedOut'>) => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                resolve({ ...result, stdout, stderr, timedOut });
            };

            const child = spawn(request.file, [...request.args], {
                cwd: request.cwd,
                env: { ...request.env },
                stdio: request.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
            });

            child.stdout?.setEncoding('utf-8');
            child.stderr?.setEncoding('utf-8');
            child.stdout?.on('data', (chunk: string) => { stdout += chunk; });
            child.stderr?.on('data', (chunk: string) => { stderr += chunk; });

            if (request.timeoutMs !== undefined && request.timeoutMs > 0) {
                timer = setTimeout(() => {
                    timedOut = true;
                    child.kill('SIGTERM');
                }, request.timeoutMs);
            }

            child.on('error', (error) => finish({ exitCode: null, signal: null, error }));
            child.on('close', (exitCode, signal) => finish({ exitCode, signal }));
        });
    }
}
