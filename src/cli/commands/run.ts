import { Command, InvalidArgumentError } from 'commander';
import { errorMessage } from '../../errors.js';
import { loadContext } from '../context.js';
import { exitCodeFor, renderError, renderInvocationFailure } from '../ui/render.js';

export function parseTimeout(value: string): number {
    const ms = Number(value);
    if (!Number.isInteger(ms) || ms <= 0) {
        throw new InvalidArgumentError('Timeout must be a positive integer (milliseconds).');
    }
    return ms;
}

export function createRunCommand(): Command {
    return new Command('run')
        .description('Run a command by name or alias')
        .argument('<name>', 'Command name or alias')
        .argument('[args...]', 'Arguments: name=value pairs or positional values')
        .option('-p, --project-path <path>', 'Working directory for a global command')
        .option('-t, --timeout <ms>', 'Stop the main process after this many milliseconds', parseTimeout)
        .passThroughOptions()
        .action(async (name: string, tokens: string[], options: { projectPath?: string; timeout?: number }, cmd: Command) => {
            try {
                const { orchestrator } = await loadContext(cmd);
                const result = await orchestrator.invoke({
                    nameOrAlias: name,
                    input: { kind: 'cli', tokens },
                    projectPath: options.projectPath,
                    timeoutMs: options.timeout,
                });

                if (!result.success) renderInvocationFailure(result);
                process.exitCode = exitCodeFor(result);
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });
}
