import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { createLoader } from '../context.js';
import { renderError } from '../ui/render.js';

const FALLBACK_EDITOR = 'vi';

/**
 * Editor command line: --editor, then $VISUAL, then $EDITOR, then vi.
 * May carry its own arguments ("code -w").
 */
export function resolveEditor(env: Readonly<Record<string, string | undefined>>, explicit?: string): string[] {
    const chosen = [explicit, env['VISUAL'], env['EDITOR']].find((value) => value !== undefined && value.trim() !== '');
    return (chosen ?? FALLBACK_EDITOR).trim().split(/\s+/);
}

/**
 * Open `file` in the editor on the current terminal; resolves with its exit code
 */
export async function openInEditor(editor: readonly string[], file: string): Promise<number> {
    const [bin = FALLBACK_EDITOR, ...args] = editor;
    const { spawn } = await import('node:child_process');

    return new Promise((resolve, reject) => {
        const child = spawn(bin, [...args, file], { stdio: 'inherit' });
        child.on('error', reject);
        child.on('close', (code) => resolve(code ?? 1));
    });
}

export function createEditCommand(): Command {
    return new Command('edit')
        .description('Edit the settings file with your default editor')
        .option('-e, --editor <command>', 'Editor to use instead of $VISUAL / $EDITOR')
        .action(async (options: { editor?: string }, cmd: Command) => {
            try {
                const loader = createLoader(cmd);
                await loader.ensure();

                const editor = resolveEditor(process.env, options.editor);
                console.log(chalk.dim(`  Opening ${loader.settingsPath} with ${editor.join(' ')}`));

                const code = await openInEditor(editor, loader.settingsPath);
                if (code !== 0) {
                    renderError(`Editor exited with code ${code}`);
                    process.exitCode = code;
                }
            } catch (err) {
                renderError(errorMessage(err));
                process.exitCode = 1;
            }
        });
}
