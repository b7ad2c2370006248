import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { getExecutablesDir } from '../../utils/paths.js';
import { createLoader } from '../context.js';
import { renderError } from '../ui/render.js';

/**
 * Ask before replacing an existing settings file; non-interactive runs keep it
 */
async function confirmOverwrite(settingsPath: string): Promise<boolean> {
    if (!process.stdin.isTTY) return false;

    const { default: inquirer } = await import('inquirer');
    const answers = await inquirer.prompt<{ overwrite: boolean }>([
        {
            type: 'confirm',
            name: 'overwrite',
            message: `${settingsPath} already exists. Replace it with the default template?`,
            default: false,
        },
    ]);
    return answers.overwrite;
}

export function createInitCommand(): Command {
    return new Command('init')
        .description('Create the settings file and executables directory')
        .option('-f, --force', 'Replace an existing settings file without asking')
        .action(async (options: { force?: boolean }, cmd: Command) => {
            try {
                const loader = createLoader(cmd);
                console.log(chalk.bold.cyan('\n▶ Initializing cmdstack\n'));

                if (!(await loader.exists())) {
                    await loader.writeDefaults();
                    console.log(chalk.green('  ✓ Created ') + chalk.dim(loader.settingsPath));
                } else if (options.force || await confirmOverwrite(loader.settingsPath)) {
                    await loader.writeDefaults();
                    console.log(chalk.green('  ✓ Replaced ') + chalk.dim(loader.settingsPath));
                } else {
                    await loader.ensure();
                    console.log(chalk.yellow('  ! Kept existing ') + chalk.dim(loader.settingsPath));
                }

                console.log(chalk.green('  ✓ Executables in ') + chalk.dim(getExecutablesDir(loader.homeDir)));
                console.log(chalk.dim(`\n  Next: edit the settings file, then run ${chalk.white('cmdstack commands list')}\n`));
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });
}
