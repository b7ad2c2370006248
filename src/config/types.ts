/**
 * Configuration — canonical in-memory types
 *
 * The settings file is parsed once, normalized into these shapes and then
 * treated as an immutable snapshot for the lifetime of the process.
 */
import type { LogLevel } from '../logging/logger.js';

export type ArgumentType = 'string' | 'number' | 'bool';

export type ArgumentValue = string | number | boolean;

export interface ArgumentDefinition {
    /** Unique within the owning command */
    name: string;
    type: ArgumentType;
    /** Flag token such as `--force`; empty means positional */
    prefix: string;
    required: boolean;
    default?: ArgumentValue;
    description: string;
}

export interface CommandDefinition {
    /** Map key in `commands` */
    name: string;
    /** Command line, may contain `${argument}` placeholders */
    template: string;
    description: string;
    enabled: boolean;
    /** Run a binary found on the executable search path instead of a shell line */
    isExecutable: boolean;
    /** Order matters: positional fallback order and render order */
    arguments: readonly ArgumentDefinition[];
    env: Readonly<Record<string, string>>;
    preExec: readonly string[];
    postExec: readonly string[];
}

export interface CommandBinding {
    commandName: string;
    alias?: string;
}

export interface Project {
    name: string;
    /** As written: `~/x`, home-relative, or absolute */
    path: string;
    description: string;
    env: Readonly<Record<string, string>>;
    commandBindings: readonly CommandBinding[];
}

export interface Configuration {
    homeDir: string;
    /** Directory holding settings.yaml and executables/ */
    configDir: string;
    settingsPath: string;
    executablesDir: string;
    /** Additional executable directories, as written */
    executableSearchPaths: readonly string[];
    logLevel: LogLevel;
    env: Readonly<Record<string, string>>;
    commands: ReadonlyMap<string, CommandDefinition>;
    projects: ReadonlyMap<string, Project>;
}

/**
 * Keys of a map in a stable order, for anything whose output order matters
 */
export function sortedKeys<V>(map: ReadonlyMap<string, V>): string[] {
    return Array.from(map.keys()).sort();
}
