import { Command } from 'commander';
import { createCommandsCommand } from './commands/commands-cmd.js';
import { createEditCommand } from './commands/edit.js';
import { createInitCommand } from './commands/init.js';
import { createProjectsCommand } from './commands/projects.js';
import { createRunCommand } from './commands/run.js';
import { createToolsCommand } from './commands/tools.js';
import { createValidateCommand } from './commands/validate.js';

export const VERSION = '0.1.0';

/**
 * Build the cmdstack command tree
 */
export function createCLI(): Command {
    const program = new Command('cmdstack')
        .description('Run named shell commands across projects, from the terminal or as tools')
        .version(VERSION)
        .option('-c, --config <path>', 'Settings file (default: ~/.config/cmdstack/settings.yaml)')
        .enablePositionalOptions();

    program.addCommand(createRunCommand());
    program.addCommand(createCommandsCommand());
    program.addCommand(createProjectsCommand());
    program.addCommand(createValidateCommand());
    program.addCommand(createToolsCommand());
    program.addCommand(createInitCommand());
    program.addCommand(createEditCommand());

    return program;
}
