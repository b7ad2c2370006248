/**
 * How command lines reach the user's shell.
 */

export interface ShellCommand {
    file: string;
    args: string[];
}

export const ALIAS_PREFIX = 'alias:';

/**
 * The user's shell from the environment, /bin/sh when unset
 */
export function resolveShell(env: Readonly<Record<string, string | undefined>>): string {
    const shell = env['SHELL']?.trim();
    return shell ? shell : '/bin/sh';
}

export function isShellAlias(line: string): boolean {
    return line.startsWith(ALIAS_PREFIX);
}

/**
 * Wrap a command line for the shell. `alias:<name> ...` lines run in an
 * interactive shell so the user's aliases are defined.
 */
export function shellCommand(line: string, env: Readonly<Record<string, string | undefined>>): ShellCommand {
    const file = resolveShell(env);
    if (isShellAlias(line)) {
        return { file, args: ['-ic', line.slice(ALIAS_PREFIX.length).trim()] };
    }
    return { file, args: ['-c', line] };
}
