import { Command } from 'commander';
import chalk from 'chalk';
import { sortedKeys } from '../../config/types.js';
import { RunnerError, errorMessage } from '../../errors.js';
import { inspectPath, type PathInfo } from '../../utils/paths.js';
import { loadContext } from '../context.js';
import { renderError, renderHeading } from '../ui/render.js';

export function pathStatus(info: PathInfo): string {
    if (!info.exists) return chalk.red('missing');
    if (!info.inHomeDir) return chalk.yellow('outside $HOME');
    return chalk.green('valid');
}

export function createProjectsCommand(): Command {
    const cmd = new Command('projects')
        .description('Inspect configured projects');

    cmd.command('list')
        .description('List projects with their path status')
        .action(async (_options: unknown, sub: Command) => {
            try {
                const { config } = await loadContext(sub);
                if (config.projects.size === 0) {
                    console.log(chalk.dim('No projects configured.'));
                    return;
                }

                renderHeading('Projects', config.projects.size);
                for (const name of sortedKeys(config.projects)) {
                    const project = config.projects.get(name);
                    if (!project) continue;
                    const info = inspectPath(project.path, config.homeDir);
                    console.log(`  ${chalk.cyan.bold(name)} ${chalk.dim(info.absolute)} ${pathStatus(info)}`);
                    if (project.description) console.log(`    ${project.description}`);
                    console.log(chalk.dim(`    ${project.commandBindings.length} command(s)`));
                    console.log();
                }
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });

    cmd.command('commands')
        .description('List the commands bound to a project')
        .argument('<project>', 'Project name')
        .action(async (projectName: string, _options: unknown, sub: Command) => {
            try {
                const { config } = await loadContext(sub);
                const project = config.projects.get(projectName);
                if (!project) {
                    throw new RunnerError('CommandNotFound', `Project '${projectName}' not found`, {
                        context: { project: projectName },
                    });
                }

                renderHeading(`Commands of ${project.name}`, project.commandBindings.length);
                for (const binding of project.commandBindings) {
                    const def = config.commands.get(binding.commandName);
                    const alias = binding.alias ? chalk.dim(` (alias: ${binding.alias})`) : '';
                    const missing = def ? '' : chalk.red(' [unknown command]');
                    console.log(`  ${chalk.cyan(binding.commandName)}${alias}${missing}`);
                    if (def?.description) console.log(`    ${def.description}`);
                }
                console.log();
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });

    return cmd;
}
