import { Command } from 'commander';
import chalk from 'chalk';
import { RunnerError, errorMessage } from '../../errors.js';
import { createToolRegistry, loadContext } from '../context.js';
import { renderError, renderHeading } from '../ui/render.js';
import { ToolCallProgress } from '../ui/spinner.js';
import { parseTimeout } from './run.js';

export function parseToolArgs(json: string | undefined): Record<string, unknown> {
    if (json === undefined || json.trim() === '') return {};
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (err) {
        throw new RunnerError('ArgumentValidationFailed', `--args is not valid JSON: ${errorMessage(err)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new RunnerError('ArgumentValidationFailed', '--args must be a JSON object');
    }
    return { ...parsed };
}

export function createToolsCommand(): Command {
    const cmd = new Command('tools')
        .description('Commands exposed as callable tools');

    cmd.command('list')
        .description('List every tool with its parameters')
        .action(async (_options: unknown, sub: Command) => {
            try {
                const registry = createToolRegistry(await loadContext(sub));
                renderHeading('Tools', registry.size);
                for (const tool of registry.list()) {
                    const params = tool.parameters.length > 0 ? chalk.dim(`(${tool.parameters.join(', ')})`) : chalk.dim('()');
                    console.log(`  ${chalk.cyan.bold(tool.name)}${params} ${chalk.dim(`[${tool.category}]`)}`);
                    if (tool.description) console.log(`    ${tool.description}`);
                }
                console.log();
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });

    cmd.command('call')
        .description('Call a tool with captured output')
        .argument('<name>', 'Tool name')
        .option('-a, --args <json>', 'Tool input as a JSON object')
        .option('-t, --timeout <ms>', 'Stop the main process after this many milliseconds', parseTimeout)
        .option('--json', 'Print the raw result envelope')
        .action(async (name: string, options: { args?: string; timeout?: number; json?: boolean }, sub: Command) => {
            try {
                const input = parseToolArgs(options.args);
                const registry = createToolRegistry(await loadContext(sub, { plainLogs: true }));

                const progress = options.json ? undefined : new ToolCallProgress(name);
                progress?.begin();
                const result = await registry.execute(name, input, { timeoutMs: options.timeout });

                if (options.json) {
                    console.log(JSON.stringify(result, null, 2));
                } else {
                    progress?.end(result);
                    if (result.data?.stdout) process.stdout.write(result.data.stdout);
                    if (result.data?.stderr) process.stderr.write(result.data.stderr);
                }

                if (!result.success) process.exitCode = 1;
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });

    return cmd;
}
