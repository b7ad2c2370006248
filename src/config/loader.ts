import { readFile, writeFile, mkdir, access } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { RunnerError, errorMessage } from '../errors.js';
import { getConfigDir, getExecutablesDir, getSettingsPath } from '../utils/paths.js';
import { getDefaultSettingsYaml } from './defaults.js';
import { normalizeCommand, normalizeEnv, normalizeProject, settingsFileSchema, type SettingsFile } from './schema.js';
import type { CommandDefinition, Configuration, Project } from './types.js';

export interface ConfigLoaderOptions {
    /** Home directory used for ~ expansion and the default config location */
    homeDir?: string;
    /** Explicit settings file; defaults to ~/.config/cmdstack/settings.yaml */
    settingsPath?: string;
}

/**
 * Config Loader — reads settings.yaml into an immutable Configuration
 *
 * `load()` parses the file at most once per loader; concurrent callers
 * share the same promise. `reload()` re-reads explicitly and only replaces
 * the snapshot when the new file parses.
 */
export class ConfigLoader {
    readonly homeDir: string;
    readonly settingsPath: string;
    private pending: Promise<Configuration> | null = null;

    constructor(options: ConfigLoaderOptions = {}) {
        this.homeDir = options.homeDir ?? os.homedir();
        this.settingsPath = options.settingsPath
            ?? process.env['CMDSTACK_CONFIG']
            ?? getSettingsPath(this.homeDir);
    }

    /**
     * Load the configuration snapshot (once)
     */
    load(): Promise<Configuration> {
        if (!this.pending) {
            this.pending = this.read();
        }
        return this.pending;
    }

    /**
     * Re-read the settings file; the previous snapshot stays current on failure
     */
    async reload(): Promise<Configuration> {
        const next = await this.read();
        this.pending = Promise.resolve(next);
        return next;
    }

    /**
     * Make sure the settings file and the executables directory exist.
     * Returns true when a new settings file was written.
     */
    async ensure(): Promise<boolean> {
        if (await this.exists()) {
            await mkdir(getExecutablesDir(this.homeDir), { recursive: true });
            return false;
        }
        await this.writeDefaults();
        return true;
    }

    /**
     * Write the default template, replacing any existing settings file
     */
    async writeDefaults(): Promise<void> {
        await mkdir(path.dirname(this.settingsPath), { recursive: true });
        await mkdir(getExecutablesDir(this.homeDir), { recursive: true });
        await writeFile(this.settingsPath, getDefaultSettingsYaml(), 'utf-8');
    }

    async exists(): Promise<boolean> {
        try {
            await access(this.settingsPath);
            return true;
        } catch {
            return false;
        }
    }

    private async read(): Promise<Configuration> {
        let content: string;
        try {
            content = await readFile(this.settingsPath, 'utf-8');
        } catch (err) {
            throw new RunnerError('ConfigurationInvalid', `Cannot read settings file ${this.settingsPath}: ${errorMessage(err)}`, {
                context: { path: this.settingsPath },
                cause: err,
            });
        }
        return parseSettings(content, { homeDir: this.homeDir, settingsPath: this.settingsPath });
    }
}

function formatIssue(issue: ZodIssue): string {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
}

/**
 * Parse settings YAML text into a Configuration
 */
export function parseSettings(content: string, meta: { homeDir: string; settingsPath?: string }): Configuration {
    let raw: unknown;
    try {
        raw = parseYaml(content);
    } catch (err) {
        throw new RunnerError('ConfigurationInvalid', `Settings file is not valid YAML: ${errorMessage(err)}`, {
            context: { path: meta.settingsPath },
            cause: err,
        });
    }

    const parsed = settingsFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const details = parsed.error.issues.map(formatIssue).join('; ');
        throw new RunnerError('ConfigurationInvalid', `Invalid settings: ${details}`, {
            context: { path: meta.settingsPath },
        });
    }

    return buildConfiguration(parsed.data, meta);
}

/**
 * Normalize a validated settings file into the canonical snapshot
 */
export function buildConfiguration(file: SettingsFile, meta: { homeDir: string; settingsPath?: string }): Configuration {
    const commands = new Map<string, CommandDefinition>();
    for (const name of Object.keys(file.commands).sort()) {
        const raw = file.commands[name];
        if (raw !== undefined) commands.set(name, normalizeCommand(name, raw));
    }

    const projects = new Map<string, Project>();
    for (const name of Object.keys(file.projects).sort()) {
        const raw = file.projects[name];
        if (raw !== undefined) projects.set(name, normalizeProject(name, raw));
    }

    const configDir = meta.settingsPath ? path.dirname(meta.settingsPath) : getConfigDir(meta.homeDir);

    return Object.freeze({
        homeDir: meta.homeDir,
        configDir,
        settingsPath: meta.settingsPath ?? getSettingsPath(meta.homeDir),
        executablesDir: getExecutablesDir(meta.homeDir),
        executableSearchPaths: file.executable_search_paths,
        logLevel: file.log_level,
        env: normalizeEnv(file.env),
        commands,
        projects,
    });
}
