import chalk from 'chalk';
import type { ValidationIssue } from '../../commands/types.js';
import type { InvocationResult } from '../../execution/types.js';

/**
 * Render a section heading
 */
export function renderHeading(title: string, count?: number): void {
    const suffix = count === undefined ? '' : chalk.dim(` (${count})`);
    console.log(chalk.bold(`\n${title}`) + suffix + '\n');
}

/**
 * Render an error result on stderr
 */
export function renderError(message: string): void {
    console.error(chalk.red.bold(`✗ ${message}`));
}

export function renderWarning(message: string): void {
    console.error(chalk.yellow(`! ${message}`));
}

export function renderIssue(issue: ValidationIssue): void {
    if (issue.severe) {
        console.log(chalk.red(`  ✗ ${issue.message}`));
    } else {
        console.log(chalk.yellow(`  ! ${issue.message}`));
    }
}

/**
 * Render the failure of an invocation: the main error, then every
 * post-hook diagnostic
 */
export function renderInvocationFailure(result: InvocationResult): void {
    if (result.error) renderError(result.error.message);
    for (const diagnostic of result.diagnostics) {
        renderWarning(diagnostic.message);
    }
}

/**
 * Process exit code for a finished invocation
 */
export function exitCodeFor(result: InvocationResult): number {
    if (result.success) return 0;
    if (typeof result.exitCode === 'number' && result.exitCode !== 0) return result.exitCode;
    return 1;
}
