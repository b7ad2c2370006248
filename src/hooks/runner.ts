import type { Invoker, SpawnRequest } from '../execution/invoker.js';
import { describeSpawnFailure, spawnSucceeded, stripAnsi } from '../execution/invoker.js';
import { shellCommand } from '../execution/shell.js';
import { APP_NAME } from '../utils/paths.js';
import type { HookContext, HookPhase, HookResult } from './types.js';

/**
 * Hook Runner — executes hook commands as child processes
 *
 * A hook starting with `cmdstack ` re-invokes the running program when a
 * self invocation is configured; everything else goes through the shell.
 */
export class HookRunner {
    constructor(private invoker: Invoker) { }

    /**
     * Execute a single hook command
     */
    async execute(phase: HookPhase, index: number, command: string, ctx: HookContext): Promise<HookResult> {
        const start = Date.now();
        const request: SpawnRequest = {
            ...this.target(command, ctx),
            cwd: ctx.cwd,
            env: ctx.env,
            capture: ctx.capture,
        };

        const result = await this.invoker.spawn(request);
        const success = spawnSucceeded(result);

        return {
            phase,
            index,
            command,
            success,
            exitCode: result.exitCode,
            ...(ctx.capture ? { stdout: stripAnsi(result.stdout), stderr: stripAnsi(result.stderr) } : {}),
            ...(success ? {} : { error: describeSpawnFailure(result) }),
            durationMs: Date.now() - start,
        };
    }

    private target(command: string, ctx: HookContext): { file: string; args: string[] } {
        const self = ctx.selfInvocation;
        if (self && command.startsWith(`${APP_NAME} `)) {
            const rest = command.slice(APP_NAME.length).trim().split(/\s+/);
            return { file: self.file, args: [...self.args, ...rest] };
        }
        return shellCommand(command, ctx.env);
    }
}
