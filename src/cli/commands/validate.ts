import { Command } from 'commander';
import chalk from 'chalk';
import { severeIssues, validateConfiguration } from '../../commands/validator.js';
import { errorMessage } from '../../errors.js';
import { createLoader } from '../context.js';
import { renderError, renderIssue } from '../ui/render.js';

export function createValidateCommand(): Command {
    return new Command('validate')
        .description('Check the settings file for conflicts and invalid project paths')
        .action(async (_options: unknown, cmd: Command) => {
            try {
                const config = await createLoader(cmd).load();
                const issues = validateConfiguration(config);

                if (issues.length === 0) {
                    console.log(chalk.green(`✓ ${config.settingsPath} is valid`));
                    return;
                }

                const severe = severeIssues(issues);
                console.log(chalk.bold(`\n${config.settingsPath}\n`));
                for (const issue of issues) renderIssue(issue);
                console.log(chalk.dim(`\n  ${severe.length} error(s), ${issues.length - severe.length} warning(s)\n`));

                if (severe.length > 0) process.exitCode = 1;
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });
}
