import { stat } from 'node:fs/promises';
import { bindArguments } from '../commands/binder.js';
import { buildCommandEnvironment } from '../commands/environment.js';
import { renderCommand } from '../commands/renderer.js';
import { resolveCommand } from '../commands/resolver.js';
import type { BoundArguments, CommandReference, ValidationIssue } from '../commands/types.js';
import { severeIssues, validateConfiguration } from '../commands/validator.js';
import type { ArgumentValue, Configuration } from '../config/types.js';
import { RunnerError, errorMessage } from '../errors.js';
import { HookRunner } from '../hooks/runner.js';
import type { HookContext, HookResult, SelfInvocation } from '../hooks/types.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { expandPath } from '../utils/paths.js';
import { findExecutable } from './executables.js';
import { describeSpawnFailure, spawnSucceeded, stripAnsi, type Invoker } from './invoker.js';
import { shellCommand } from './shell.js';
import type { Invocation, InvocationRequest, InvocationResult, InvocationState } from './types.js';

export interface OrchestratorOptions {
    invoker: Invoker;
    logger?: Logger;
    /** Environment inherited by every process; defaults to process.env */
    inheritedEnv?: Readonly<Record<string, string | undefined>>;
    /** Working directory for global commands without a project path */
    cwd?: string;
    selfInvocation?: SelfInvocation;
}

/**
 * Invocation Orchestrator — turns a name plus loose arguments into one run
 *
 *   resolved → validated → pre-hooks → main-executing → post-hooks → done
 *
 * Nothing is spawned before `validated`. The first failing pre-hook aborts
 * the run. Post-hooks always run after the main process; their failures are
 * reported in `hooks` and `diagnostics` but never change the outcome.
 *
 * The working directory goes to each spawn; process.cwd() never changes.
 */
export class InvocationOrchestrator {
    private invoker: Invoker;
    private hooks: HookRunner;
    private logger: Logger;
    private issues: ValidationIssue[] | null = null;

    constructor(private config: Configuration, private options: OrchestratorOptions) {
        this.invoker = options.invoker;
        this.hooks = new HookRunner(options.invoker);
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Validation issues of the configuration, computed once
     */
    validation(): ValidationIssue[] {
        if (!this.issues) {
            this.issues = validateConfiguration(this.config);
        }
        return this.issues;
    }

    /**
     * Run one invocation. Never throws: every failure is in the result.
     */
    async invoke(request: InvocationRequest): Promise<InvocationResult> {
        const start = Date.now();
        const states: InvocationState[] = [];
        const hooks: HookResult[] = [];
        const diagnostics: RunnerError[] = [];
        let reference: CommandReference | undefined;

        const finish = (partial: Omit<InvocationResult, 'states' | 'hooks' | 'diagnostics' | 'durationMs'>): InvocationResult => ({
            ...partial,
            states,
            hooks,
            diagnostics,
            durationMs: Date.now() - start,
        });

        // ─── Resolve & validate (no side effects) ───

        let invocation: Invocation;
        try {
            this.ensureConfigurationValid();
            reference = resolveCommand(this.config, request.nameOrAlias);
            states.push('resolved');
            invocation = await this.prepare(reference, request, diagnostics);
            states.push('validated');
        } catch (err) {
            const error = toRunnerError(err);
            this.logger.error(error.message);
            return finish({ outcome: 'rejected', success: false, error, reference });
        }

        this.logger.verbose(`Running '${reference.definition.name}' in ${invocation.cwd}`, { command: invocation.commandLine });

        const hookCtx: HookContext = {
            cwd: invocation.cwd,
            env: invocation.env,
            capture: request.capture,
            selfInvocation: this.options.selfInvocation,
        };

        // ─── Pre-hooks: first failure aborts ───

        const { preExec, postExec } = reference.definition;
        if (preExec.length > 0) {
            states.push('pre-hooks');
            for (const [index, command] of preExec.entries()) {
                this.logger.verbose(`Running pre-exec hook ${index + 1}: ${command}`);
                const result = await this.hooks.execute('pre', index, command, hookCtx);
                hooks.push(result);
                if (!result.success) {
                    const error = new RunnerError('PreHookFailed',
                        `Pre-execution hook ${index + 1} ('${command}') of command '${reference.definition.name}' failed: ${result.error ?? 'unknown error'}`, {
                            context: { command: reference.definition.name, hook: command, index, exitCode: result.exitCode ?? undefined },
                        });
                    this.logger.error(error.message);
                    return finish({ outcome: 'aborted', success: false, error, reference, invocation });
                }
            }
        }

        // ─── Main process ───

        states.push('main-executing');
        const main = await this.invoker.spawn({
            file: invocation.file,
            args: invocation.args,
            cwd: invocation.cwd,
            env: invocation.env,
            timeoutMs: request.timeoutMs,
            capture: request.capture,
        });

        let mainError: RunnerError | undefined;
        if (!spawnSucceeded(main)) {
            mainError = new RunnerError('ProcessExecutionFailed',
                `Command '${reference.definition.name}' ${describeSpawnFailure(main, request.timeoutMs)}`, {
                    context: {
                        command: reference.definition.name,
                        commandLine: invocation.commandLine,
                        exitCode: main.exitCode ?? undefined,
                        signal: main.signal ?? undefined,
                    },
                    cause: main.error,
                });
            this.logger.error(mainError.message);
        }

        // ─── Post-hooks: always run, never fatal ───

        if (postExec.length > 0) {
            states.push('post-hooks');
            for (const [index, command] of postExec.entries()) {
                this.logger.verbose(`Running post-exec hook ${index + 1}: ${command}`);
                const result = await this.hooks.execute('post', index, command, hookCtx);
                hooks.push(result);
                if (!result.success) {
                    const warning = new RunnerError('PostHookFailed',
                        `Post-execution hook ${index + 1} ('${command}') of command '${reference.definition.name}' failed: ${result.error ?? 'unknown error'}`, {
                            severe: false,
                            context: { command: reference.definition.name, hook: command, index, exitCode: result.exitCode ?? undefined },
                        });
                    diagnostics.push(warning);
                    this.logger.warn(warning.message);
                }
            }
        }

        states.push('done');

        return finish({
            outcome: mainError ? 'main-failed' : 'succeeded',
            success: mainError === undefined,
            error: mainError,
            reference,
            invocation,
            exitCode: main.exitCode,
            ...(request.capture ? { stdout: stripAnsi(main.stdout), stderr: stripAnsi(main.stderr) } : {}),
        });
    }

    private ensureConfigurationValid(): void {
        const severe = severeIssues(this.validation());
        const first = severe[0];
        if (first) {
            throw new RunnerError('ConfigurationInvalid', `Configuration error: ${first.message}`, {
                context: { issues: severe.length, project: first.project, command: first.command, alias: first.alias },
            });
        }
    }

    /**
     * Everything that can fail before a process starts
     */
    private async prepare(reference: CommandReference, request: InvocationRequest, diagnostics: RunnerError[]): Promise<Invocation> {
        const { definition } = reference;

        if (!definition.enabled) {
            throw new RunnerError('CommandDisabled', `Command '${definition.name}' is disabled`, {
                context: { command: definition.name, invokedAs: reference.invokedAs },
            });
        }
        if (definition.template.trim() === '') {
            throw new RunnerError('EmptyCommandTemplate', `Command '${definition.name}' has an empty command line`, {
                context: { command: definition.name },
            });
        }

        const bound = bindArguments(definition, request.input);
        const cwd = await this.resolveWorkingDirectory(reference, request.projectPath, diagnostics);
        const env = buildCommandEnvironment(
            this.config,
            definition,
            reference.project,
            this.options.inheritedEnv ?? process.env,
        );
        const rendered = renderCommand(definition, bound, { appendUnmatched: request.input.kind === 'cli' });

        const base = {
            reference,
            arguments: argumentValues(bound),
            commandLine: rendered.line,
            cwd,
            env,
        };

        if (!definition.isExecutable) {
            return { ...base, ...shellCommand(rendered.line, env) };
        }

        const [name, ...args] = rendered.line.trim().split(/\s+/);
        if (!name) {
            throw new RunnerError('EmptyCommandTemplate', `Command '${definition.name}' renders to an empty command line`, {
                context: { command: definition.name },
            });
        }
        const executablePath = await findExecutable(name, this.config, { envPath: env['PATH'], cwd });
        return { ...base, executablePath, file: executablePath, args };
    }

    private async resolveWorkingDirectory(
        reference: CommandReference,
        projectPath: string | undefined,
        diagnostics: RunnerError[],
    ): Promise<string> {
        let dir: string;
        if (reference.project) {
            if (projectPath) {
                const ignored = new RunnerError('ArgumentValidationFailed',
                    `project_path is only accepted for global commands; '${reference.invokedAs}' runs in project '${reference.project.name}'`, {
                        severe: false,
                        context: { name: reference.invokedAs, project: reference.project.name, path: projectPath },
                    });
                diagnostics.push(ignored);
                this.logger.warn(ignored.message);
            }
            dir = expandPath(reference.project.path, this.config.homeDir);
        } else if (projectPath) {
            dir = expandPath(projectPath, this.config.homeDir);
        } else {
            return this.options.cwd ?? process.cwd();
        }

        let isDir = false;
        try {
            isDir = (await stat(dir)).isDirectory();
        } catch {
            isDir = false;
        }
        if (!isDir) {
            throw new RunnerError('WorkingDirectoryMissing', `Working directory does not exist: ${dir}`, {
                context: { path: dir, project: reference.project?.name },
            });
        }
        return dir;
    }
}

function argumentValues(bound: BoundArguments): Record<string, ArgumentValue> {
    const out: Record<string, ArgumentValue> = {};
    for (const [name, arg] of bound.values) {
        out[name] = arg.value;
    }
    return out;
}

function toRunnerError(err: unknown): RunnerError {
    if (err instanceof RunnerError) return err;
    return new RunnerError('ProcessExecutionFailed', errorMessage(err), { cause: err });
}
