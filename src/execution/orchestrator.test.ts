import { chmodSync, mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { Configuration } from '../config/types.js';
import { FakeInvoker, configFrom, makeHome } from '../testing/fixtures.js';
import { getExecutablesDir } from '../utils/paths.js';
import type { SpawnRequest, SpawnResult } from './invoker.js';
import { InvocationOrchestrator } from './orchestrator.js';

const SETTINGS = `
commands:
  greet:
    cmd: echo hello \${name}
    arguments:
      - name: name
        default: world
    pre_exec: [echo pre]
    post_exec: [echo post]
  needs:
    cmd: echo \${who}
    arguments:
      - name: who
        required: true
  off:
    cmd: echo never
    is_enabled: false
  blank:
    cmd: "   "
  serve:
    cmd: ./serve
    env:
      PORT: 8080
  tool:
    cmd: mytool \${mode}
    is_executable: true
    arguments:
      - name: mode
        default: fast
  chained:
    cmd: echo main
    pre_exec: [cmdstack run greet]
projects:
  api:
    path: ~/api
    env:
      STAGE: dev
    commands:
      - serve
      - command_name: greet
        alias: g
`;

const lineOf = (request: SpawnRequest) => request.args[request.args.length - 1] ?? '';

describe('InvocationOrchestrator', () => {
    let home: string;
    let cleanup: () => void;
    let config: Configuration;

    beforeEach(() => {
        ({ home, cleanup } = makeHome('api'));
        config = configFrom(SETTINGS, home);
    });

    afterEach(() => cleanup());

    function setup(respond?: (request: SpawnRequest) => Partial<SpawnResult>) {
        const invoker = new FakeInvoker(respond);
        const orchestrator = new InvocationOrchestrator(config, {
            invoker,
            inheritedEnv: { PATH: '/usr/bin:/bin' },
            cwd: home,
            selfInvocation: { file: '/usr/bin/node', args: ['/opt/cmdstack/bin/cmdstack.js'] },
        });
        return { invoker, orchestrator };
    }

    const failOn = (line: string, exitCode: number) =>
        (request: SpawnRequest): Partial<SpawnResult> => (lineOf(request) === line ? { exitCode } : {});

    // ─── Happy path ───

    it('runs pre-hooks, the main command and post-hooks in order', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: [] } });

        expect(result.outcome).toBe('succeeded');
        expect(result.success).toBe(true);
        expect(result.states).toEqual(['resolved', 'validated', 'pre-hooks', 'main-executing', 'post-hooks', 'done']);
        expect(invoker.lines()).toEqual(['echo pre', 'echo hello world', 'echo post']);
        expect(invoker.requests.every((r) => r.file === '/bin/sh' && r.args[0] === '-c' && r.cwd === home)).toBe(true);
        expect(result.hooks.map((h) => [h.phase, h.success])).toEqual([['pre', true], ['post', true]]);
        expect(result.invocation?.arguments).toEqual({ name: 'world' });
    });

    it('passes the timeout to the main process only', async () => {
        const { invoker, orchestrator } = setup();
        await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: ['you'] }, timeoutMs: 500 });
        expect(invoker.requests.map((r) => r.timeoutMs)).toEqual([undefined, 500, undefined]);
        expect(invoker.lines()[1]).toBe('echo hello you');
    });

    // ─── Rejections: nothing is spawned ───

    it('rejects a disabled command without spawning', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'off', input: { kind: 'cli', tokens: [] } });
        expect(result.outcome).toBe('rejected');
        expect(result.error?.code).toBe('CommandDisabled');
        expect(result.error?.message).toBe("Command 'off' is disabled");
        expect(result.states).toEqual(['resolved']);
        expect(invoker.requests).toHaveLength(0);
    });

    it('rejects an empty command line', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'blank', input: { kind: 'cli', tokens: [] } });
        expect(result.error?.code).toBe('EmptyCommandTemplate');
        expect(invoker.requests).toHaveLength(0);
    });

    it('rejects unknown names', async () => {
        const { orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'missing', input: { kind: 'cli', tokens: [] } });
        expect(result.error?.code).toBe('CommandNotFound');
        expect(result.states).toEqual([]);
    });

    it('rejects missing required arguments', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'needs', input: { kind: 'cli', tokens: [] } });
        expect(result.error?.code).toBe('ArgumentValidationFailed');
        expect(result.error?.message).toBe("Missing required argument 'who' for command 'needs'");
        expect(invoker.requests).toHaveLength(0);
    });

    it('refuses to run anything while the configuration has severe issues', async () => {
        config = configFrom(`${SETTINGS}
  web:
    path: ~/api
    commands: [serve]
`, home);
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: [] } });
        expect(result.outcome).toBe('rejected');
        expect(result.error?.code).toBe('ConfigurationInvalid');
        expect(result.error?.message).toBe(
            "Configuration error: Command 'serve' is bound to multiple projects ('api' and 'web') without alias",
        );
        expect(invoker.requests).toHaveLength(0);
        expect(orchestrator.validation()).toBe(orchestrator.validation());
    });

    // ─── Hooks ───

    it('aborts on the first failing pre-hook', async () => {
        const { invoker, orchestrator } = setup(failOn('echo pre', 2));
        const result = await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: [] } });

        expect(result.outcome).toBe('aborted');
        expect(result.error?.code).toBe('PreHookFailed');
        expect(result.error?.message).toBe("Pre-execution hook 1 ('echo pre') of command 'greet' failed: exited with code 2");
        expect(invoker.lines()).toEqual(['echo pre']);
        expect(result.states).toEqual(['resolved', 'validated', 'pre-hooks']);
    });

    it('keeps success when a post-hook fails', async () => {
        const { invoker, orchestrator } = setup(failOn('echo post', 1));
        const result = await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: [] } });

        expect(result.outcome).toBe('succeeded');
        expect(result.success).toBe(true);
        expect(result.error).toBeUndefined();
        expect(result.hooks[1]?.success).toBe(false);
        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0]?.code).toBe('PostHookFailed');
        expect(result.diagnostics[0]?.severe).toBe(false);
        expect(invoker.requests).toHaveLength(3);
    });

    it('runs post-hooks after a failing main command', async () => {
        const { invoker, orchestrator } = setup(failOn('echo hello world', 4));
        const result = await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: [] } });

        expect(result.outcome).toBe('main-failed');
        expect(result.exitCode).toBe(4);
        expect(result.error?.code).toBe('ProcessExecutionFailed');
        expect(result.error?.message).toBe("Command 'greet' exited with code 4");
        expect(result.error?.context['exitCode']).toBe(4);
        expect(invoker.lines()).toEqual(['echo pre', 'echo hello world', 'echo post']);
    });

    it('re-invokes the program for cmdstack hooks', async () => {
        const { invoker, orchestrator } = setup();
        await orchestrator.invoke({ nameOrAlias: 'chained', input: { kind: 'cli', tokens: [] } });
        expect(invoker.requests[0]).toMatchObject({
            file: '/usr/bin/node',
            args: ['/opt/cmdstack/bin/cmdstack.js', 'run', 'greet'],
        });
    });

    // ─── Working directory & environment ───

    it('runs project-bound commands in the project with merged env', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'serve', input: { kind: 'cli', tokens: [] } });

        expect(result.reference?.kind).toBe('project');
        expect(invoker.requests[0]?.cwd).toBe(path.join(home, 'api'));
        expect(invoker.requests[0]?.env).toEqual({ PATH: '/usr/bin:/bin', STAGE: 'dev', PORT: '8080' });
    });

    it('runs aliases in their project', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'g', input: { kind: 'cli', tokens: ['team'] } });
        expect(result.reference?.kind).toBe('alias');
        expect(invoker.requests.map((r) => r.cwd)).toEqual([1, 2, 3].map(() => path.join(home, 'api')));
        expect(invoker.lines()[1]).toBe('echo hello team');
    });

    it('uses project_path for global commands', async () => {
        const { invoker, orchestrator } = setup();
        await orchestrator.invoke({ nameOrAlias: 'greet', input: { kind: 'cli', tokens: [] }, projectPath: '~/api' });
        expect(invoker.requests[1]?.cwd).toBe(path.join(home, 'api'));
    });

    it('rejects a project_path that does not exist', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({
            nameOrAlias: 'greet',
            input: { kind: 'cli', tokens: [] },
            projectPath: '~/missing',
        });
        expect(result.error?.code).toBe('WorkingDirectoryMissing');
        expect(result.error?.message).toBe(`Working directory does not exist: ${path.join(home, 'missing')}`);
        expect(invoker.requests).toHaveLength(0);
    });

    it('ignores project_path for project-bound commands', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({
            nameOrAlias: 'serve',
            input: { kind: 'cli', tokens: [] },
            projectPath: '/',
        });
        expect(result.success).toBe(true);
        expect(result.diagnostics).toHaveLength(1);
        expect(invoker.requests[0]?.cwd).toBe(path.join(home, 'api'));
    });

    // ─── Executables & capture ───

    it('spawns executables directly with the rendered arguments', async () => {
        const execDir = getExecutablesDir(home);
        mkdirSync(execDir, { recursive: true });
        const binary = path.join(execDir, 'mytool');
        writeFileSync(binary, '#!/bin/sh\n');
        chmodSync(binary, 0o755);

        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'tool', input: { kind: 'cli', tokens: [] } });

        expect(result.invocation?.executablePath).toBe(binary);
        expect(invoker.requests[0]).toMatchObject({ file: binary, args: ['fast'] });
    });

    it('rejects executables that cannot be found', async () => {
        const { invoker, orchestrator } = setup();
        const result = await orchestrator.invoke({ nameOrAlias: 'tool', input: { kind: 'cli', tokens: [] } });
        expect(result.error?.code).toBe('ExecutableNotFound');
        expect(invoker.requests).toHaveLength(0);
    });

    it('returns captured output without colour codes', async () => {
        const { orchestrator } = setup((request) =>
            lineOf(request) === 'echo hello world' ? { stdout: '\x1b[32mhello world\x1b[0m\n' } : {});
        const result = await orchestrator.invoke({
            nameOrAlias: 'greet',
            input: { kind: 'map', values: {} },
            capture: true,
        });
        expect(result.stdout).toBe('hello world\n');
        expect(result.stderr).toBe('');
    });
});
