import { existsSync, statSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'cmdstack';

/**
 * Settings directory: ~/.config/cmdstack
 */
export function getConfigDir(homeDir: string = os.homedir()): string {
    return path.join(homeDir, '.config', APP_NAME);
}

export function getSettingsPath(homeDir: string = os.homedir()): string {
    return path.join(getConfigDir(homeDir), 'settings.yaml');
}

export function getExecutablesDir(homeDir: string = os.homedir()): string {
    return path.join(getConfigDir(homeDir), 'executables');
}

/**
 * Expand a user-written path:
 *   ~ and ~/x → under home
 *   relative  → under home
 *   absolute  → unchanged
 */
export function expandPath(input: string, homeDir: string): string {
    if (input === '~') return homeDir;
    if (input.startsWith('~/')) return path.join(homeDir, input.slice(2));
    if (!path.isAbsolute(input)) return path.join(homeDir, input);
    return path.normalize(input);
}

export function isInside(child: string, parent: string): boolean {
    const rel = path.relative(parent, child);
    return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

export interface PathInfo {
    original: string;
    absolute: string;
    exists: boolean;
    isDirectory: boolean;
    inHomeDir: boolean;
}

export function inspectPath(input: string, homeDir: string): PathInfo {
    const absolute = expandPath(input, homeDir);
    const exists = existsSync(absolute);
    return {
        original: input,
        absolute,
        exists,
        isDirectory: exists && statSync(absolute).isDirectory(),
        inHomeDir: isInside(absolute, homeDir),
    };
}
