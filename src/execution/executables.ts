import { stat } from 'node:fs/promises';
import path from 'node:path';
import { RunnerError } from '../errors.js';
import type { Configuration } from '../config/types.js';
import { expandPath } from '../utils/paths.js';

type Probe = 'executable' | 'not-executable' | 'missing';

async function probe(candidate: string): Promise<Probe> {
    try {
        const info = await stat(candidate);
        if (!info.isFile()) return 'missing';
        return (info.mode & 0o100) !== 0 ? 'executable' : 'not-executable';
    } catch {
        return 'missing';
    }
}

async function isDirectory(dir: string): Promise<boolean> {
    try {
        return (await stat(dir)).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Directories probed for executables, in order: the executables
 * directory, the configured extra directories that exist, then PATH.
 */
export async function executableSearchDirs(config: Configuration, envPath: string | undefined): Promise<string[]> {
    const dirs: string[] = [];

    for (const dir of [config.executablesDir, ...config.executableSearchPaths]) {
        const expanded = expandPath(dir, config.homeDir);
        if (await isDirectory(expanded)) dirs.push(expanded);
    }

    for (const dir of (envPath ?? '').split(path.delimiter)) {
        if (dir !== '') dirs.push(dir);
    }

    return dirs;
}

/**
 * Locate an executable. A name with a path separator is taken relative to
 * the working directory (or home, for ~). The first candidate with the owner-execute bit
 * wins; a candidate lacking it only matters when nothing else is found.
 */
export async function findExecutable(
    name: string,
    config: Configuration,
    where: { envPath: string | undefined; cwd: string },
): Promise<string> {
    let candidates: string[];
    if (name.startsWith('~')) {
        candidates = [expandPath(name, config.homeDir)];
    } else if (name.includes('/')) {
        candidates = [path.resolve(where.cwd, name)];
    } else {
        candidates = (await executableSearchDirs(config, where.envPath)).map((dir) => path.join(dir, name));
    }

    let notPermitted: string | undefined;
    for (const candidate of candidates) {
        const result = await probe(candidate);
        if (result === 'executable') return candidate;
        if (result === 'not-executable' && notPermitted === undefined) notPermitted = candidate;
    }

    if (notPermitted !== undefined) {
        throw new RunnerError('ExecutableNotPermitted',
            `File '${notPermitted}' exists but doesn't have executable permissions. Run 'chmod +x ${notPermitted}' to fix this issue`, {
                context: { executable: name, path: notPermitted },
            });
    }

    throw new RunnerError('ExecutableNotFound', `Executable '${name}' not found in any search path or system PATH`, {
        context: { executable: name },
    });
}
