import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseSettings } from '../config/loader.js';
import type { Configuration } from '../config/types.js';
import type { Invoker, SpawnRequest, SpawnResult } from '../execution/invoker.js';

/**
 * Build a configuration from settings YAML, rooted at `homeDir`
 */
export function configFrom(yaml: string, homeDir = '/home/tester'): Configuration {
    return parseSettings(yaml, { homeDir });
}

/**
 * A throwaway home directory with optional sub-directories
 */
export function makeHome(...dirs: string[]): { home: string; cleanup: () => void } {
    const home = mkdtempSync(path.join(os.tmpdir(), 'cmdstack-test-'));
    for (const dir of dirs) {
        mkdirSync(path.join(home, dir), { recursive: true });
    }
    return { home, cleanup: () => rmSync(home, { recursive: true, force: true }) };
}

/**
 * Records every spawn and answers from `respond` (exit 0 by default)
 */
export class FakeInvoker implements Invoker {
    readonly requests: SpawnRequest[] = [];

    constructor(private respond: (request: SpawnRequest) => Partial<SpawnResult> = () => ({})) { }

    async spawn(request: SpawnRequest): Promise<SpawnResult> {
        this.requests.push(request);
        return {
            exitCode: 0,
            signal: null,
            stdout: '',
            stderr: '',
            timedOut: false,
            ...this.respond(request),
        };
    }

    /** The shell line of each spawn (last argument) */
    lines(): string[] {
        return this.requests.map((r) => r.args[r.args.length - 1] ?? '');
    }
}
