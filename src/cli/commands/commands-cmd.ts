import { Command } from 'commander';
import chalk from 'chalk';
import { resolveCommand } from '../../commands/resolver.js';
import type { CommandDefinition, Configuration } from '../../config/types.js';
import { sortedKeys } from '../../config/types.js';
import { errorMessage } from '../../errors.js';
import { loadContext } from '../context.js';
import { renderError, renderHeading } from '../ui/render.js';

/**
 * Every project binding of a command, as "project" or "project (alias)"
 */
export function describeBindings(config: Configuration, commandName: string): string[] {
    const out: string[] = [];
    for (const projectName of sortedKeys(config.projects)) {
        const project = config.projects.get(projectName);
        if (!project) continue;
        for (const binding of project.commandBindings) {
            if (binding.commandName !== commandName) continue;
            out.push(binding.alias ? `${projectName} (alias: ${binding.alias})` : projectName);
        }
    }
    return out;
}

function renderDefinition(config: Configuration, def: CommandDefinition): void {
    const status = def.enabled ? '' : chalk.yellow(' [disabled]');
    const kind = def.isExecutable ? chalk.magenta(' [executable]') : '';
    console.log(`  ${chalk.cyan.bold(def.name)}${status}${kind}`);
    if (def.description) console.log(`    ${def.description}`);
    console.log(chalk.dim(`    $ ${def.template}`));

    const bindings = describeBindings(config, def.name);
    if (bindings.length > 0) {
        console.log(chalk.dim(`    projects: ${bindings.join(', ')}`));
    }
}

export function createCommandsCommand(): Command {
    const cmd = new Command('commands')
        .description('Inspect configured commands');

    cmd.command('list')
        .description('List all configured commands')
        .action(async (_options: unknown, sub: Command) => {
            try {
                const { config } = await loadContext(sub);
                if (config.commands.size === 0) {
                    console.log(chalk.dim('No commands configured.'));
                    console.log(chalk.dim(`\nAdd commands to ${chalk.white(config.settingsPath)}\n`));
                    console.log(chalk.dim('Example:\n'));
                    console.log(chalk.dim('  commands:'));
                    console.log(chalk.dim('    greet: echo "hello ${name}"'));
                    return;
                }

                renderHeading('Commands', config.commands.size);
                for (const name of sortedKeys(config.commands)) {
                    const def = config.commands.get(name);
                    if (def) {
                        renderDefinition(config, def);
                        console.log();
                    }
                }
                console.log(chalk.dim(`  Run with: ${chalk.white('cmdstack run <name-or-alias> [args...]')}\n`));
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });

    cmd.command('show')
        .description('Show one command (by name or alias) in detail')
        .argument('<name>', 'Command name or alias')
        .action(async (name: string, _options: unknown, sub: Command) => {
            try {
                const { config } = await loadContext(sub);
                const reference = resolveCommand(config, name);
                const def = reference.definition;

                console.log();
                renderDefinition(config, def);
                if (reference.project) {
                    console.log(chalk.dim(`    runs in: ${reference.project.name} (${reference.project.path})`));
                }

                if (def.arguments.length > 0) {
                    console.log(chalk.bold('\n    Arguments'));
                    for (const arg of def.arguments) {
                        const flags = [
                            arg.type,
                            arg.required ? 'required' : 'optional',
                            arg.prefix ? `prefix ${arg.prefix}` : '',
                            arg.default !== undefined ? `default ${String(arg.default)}` : '',
                        ].filter((part) => part !== '').join(', ');
                        console.log(`      ${chalk.white(arg.name)} ${chalk.dim(`(${flags})`)}${arg.description ? ` ${arg.description}` : ''}`);
                    }
                }

                const envKeys = Object.keys(def.env).sort();
                if (envKeys.length > 0) {
                    console.log(chalk.bold('\n    Environment'));
                    for (const key of envKeys) console.log(chalk.dim(`      ${key}=${def.env[key] ?? ''}`));
                }

                for (const [title, hooks] of [['Pre-exec hooks', def.preExec], ['Post-exec hooks', def.postExec]] as const) {
                    if (hooks.length === 0) continue;
                    console.log(chalk.bold(`\n    ${title}`));
                    hooks.forEach((hook, i) => console.log(chalk.dim(`      ${i + 1}. ${hook}`)));
                }
                console.log();
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });

    return cmd;
}
