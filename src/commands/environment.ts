import type { CommandDefinition, Configuration, Project } from '../config/types.js';

export type Environment = Record<string, string>;

/**
 * Merge environment tiers, lowest precedence first; later tiers replace
 * earlier values key by key and every key of every tier is kept.
 */
export function mergeEnvironment(...tiers: ReadonlyArray<Readonly<Record<string, string | undefined>> | undefined>): Environment {
    const merged: Environment = {};
    for (const tier of tiers) {
        if (!tier) continue;
        for (const [key, value] of Object.entries(tier)) {
            if (value !== undefined) merged[key] = value;
        }
    }
    return merged;
}

/**
 * Final process environment for a command:
 * command > project > global > inherited shell
 */
export function buildCommandEnvironment(
    config: Configuration,
    definition: CommandDefinition,
    project: Project | undefined,
    inherited: Readonly<Record<string, string | undefined>> = process.env,
): Environment {
    return mergeEnvironment(inherited, config.env, project?.env, definition.env);
}

/**
 * Flat `KEY=value` list, sorted by key
 */
export function toEnvironmentList(env: Environment): string[] {
    return Object.keys(env).sort().map((key) => `${key}=${env[key] ?? ''}`);
}
