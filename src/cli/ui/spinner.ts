import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { ToolResult } from '../../tools/types.js';

/**
 * Progress line for one tool call. Drawn on stderr so captured stdout
 * can be printed untouched afterwards.
 */
export class ToolCallProgress {
    private line: Ora;

    constructor(private toolName: string) {
        this.line = ora({ stream: process.stderr, color: 'cyan' });
    }

    begin(): void {
        this.line.start(chalk.dim(`calling ${this.toolName}`));
    }

    end(result: ToolResult): void {
        if (result.success) {
            this.line.succeed(`${this.toolName} ${chalk.dim(`${result.durationMs}ms`)}`);
        } else {
            this.line.fail(chalk.red(result.error ?? `${this.toolName} failed`));
        }
    }
}
