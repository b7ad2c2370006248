import { chmodSync, mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { Configuration } from '../config/types.js';
import { configFrom, makeHome } from '../testing/fixtures.js';
import { getExecutablesDir } from '../utils/paths.js';
import { executableSearchDirs, findExecutable } from './executables.js';

function writeScript(file: string, mode: number): string {
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, '#!/bin/sh\necho ok\n');
    chmodSync(file, mode);
    return file;
}

describe('executable search', () => {
    let home: string;
    let cleanup: () => void;
    let config: Configuration;
    let execDir: string;

    beforeEach(() => {
        ({ home, cleanup } = makeHome('bin', 'pathdir'));
        execDir = getExecutablesDir(home);
        mkdirSync(execDir, { recursive: true });
        config = configFrom('executable_search_paths: [~/bin, ~/nope]', home);
    });

    afterEach(() => cleanup());

    it('orders the executables directory, extra directories, then PATH', async () => {
        const dirs = await executableSearchDirs(config, `/usr/local/bin${path.delimiter}/usr/bin`);
        expect(dirs).toEqual([execDir, path.join(home, 'bin'), '/usr/local/bin', '/usr/bin']);
    });

    it('finds an executable in the executables directory', async () => {
        const tool = writeScript(path.join(execDir, 'tool'), 0o755);
        expect(await findExecutable('tool', config, { envPath: '', cwd: home })).toBe(tool);
    });

    it('finds an executable through PATH', async () => {
        const tool = writeScript(path.join(home, 'pathdir', 'tool2'), 0o755);
        expect(await findExecutable('tool2', config, { envPath: path.join(home, 'pathdir'), cwd: home })).toBe(tool);
    });

    it('keeps searching past a file without the execute bit', async () => {
        writeScript(path.join(execDir, 'plain'), 0o644);
        const later = writeScript(path.join(home, 'bin', 'plain'), 0o755);
        expect(await findExecutable('plain', config, { envPath: '', cwd: home })).toBe(later);
    });

    it('reports a file that is never executable', async () => {
        const plain = writeScript(path.join(execDir, 'plain'), 0o644);
        await expect(findExecutable('plain', config, { envPath: '', cwd: home })).rejects.toMatchObject({
            code: 'ExecutableNotPermitted',
            message: `File '${plain}' exists but doesn't have executable permissions. Run 'chmod +x ${plain}' to fix this issue`,
        });
    });

    it('reports a missing executable', async () => {
        await expect(findExecutable('nope', config, { envPath: '', cwd: home })).rejects.toMatchObject({
            code: 'ExecutableNotFound',
            message: "Executable 'nope' not found in any search path or system PATH",
        });
    });

    it('resolves names with a path separator against the working directory', async () => {
        const script = writeScript(path.join(home, 'scripts', 'run.sh'), 0o755);
        expect(await findExecutable('./scripts/run.sh', config, { envPath: '', cwd: home })).toBe(script);
        expect(await findExecutable('~/scripts/run.sh', config, { envPath: '', cwd: '/' })).toBe(script);
    });
});
