import { sortedKeys, type Configuration } from '../config/types.js';
import { inspectPath } from '../utils/paths.js';
import type { ValidationIssue } from './types.js';

/**
 * Validate the whole configuration.
 *
 * Severe issues:
 *   - a binding references a command that does not exist
 *   - a command is bound without alias in more than one project
 *   - an alias is bound to more than one (project, command) pair
 *   - a command declares the same argument name twice
 *   - a project path does not exist
 * Warnings:
 *   - a project path outside the home directory
 *   - an alias equal to a command name (the command always wins)
 *
 * Projects and commands are visited in sorted order so the report is stable.
 */
export function validateConfiguration(config: Configuration): ValidationIssue[] {
    return [
        ...validateBindings(config),
        ...validateArguments(config),
        ...validateProjectPaths(config),
    ];
}

export function validateBindings(config: Configuration): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const boundWithoutAlias = new Map<string, string>(); // command → project
    const usedAliases = new Map<string, { project: string; command: string }>();

    for (const projectName of sortedKeys(config.projects)) {
        const project = config.projects.get(projectName);
        if (!project) continue;

        for (const binding of project.commandBindings) {
            if (!config.commands.has(binding.commandName)) {
                issues.push({
                    kind: 'unknown-command',
                    severe: true,
                    project: projectName,
                    command: binding.commandName,
                    message: `Project '${projectName}' references non-existent command '${binding.commandName}'`,
                });
                continue;
            }

            if (!binding.alias) {
                const previous = boundWithoutAlias.get(binding.commandName);
                if (previous !== undefined && previous !== projectName) {
                    issues.push({
                        kind: 'duplicate-binding',
                        severe: true,
                        project: projectName,
                        command: binding.commandName,
                        message: `Command '${binding.commandName}' is bound to multiple projects ('${previous}' and '${projectName}') without alias`,
                    });
                } else {
                    boundWithoutAlias.set(binding.commandName, projectName);
                }
                continue;
            }

            const previous = usedAliases.get(binding.alias);
            if (previous === undefined) {
                usedAliases.set(binding.alias, { project: projectName, command: binding.commandName });
            } else if (previous.project !== projectName || previous.command !== binding.commandName) {
                issues.push({
                    kind: 'duplicate-alias',
                    severe: true,
                    project: projectName,
                    command: binding.commandName,
                    alias: binding.alias,
                    message: previous.project === projectName
                        ? `Alias '${binding.alias}' is bound to multiple commands in project '${projectName}' ('${previous.command}' and '${binding.commandName}')`
                        : `Alias '${binding.alias}' is used in multiple projects ('${previous.project}' and '${projectName}')`,
                });
            }

            if (config.commands.has(binding.alias)) {
                issues.push({
                    kind: 'shadowed-alias',
                    severe: false,
                    project: projectName,
                    command: binding.commandName,
                    alias: binding.alias,
                    message: `Alias '${binding.alias}' in project '${projectName}' is also a command name; the command takes precedence`,
                });
            }
        }
    }

    return issues;
}

export function validateArguments(config: Configuration): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const commandName of sortedKeys(config.commands)) {
        const definition = config.commands.get(commandName);
        if (!definition) continue;

        const seen = new Set<string>();
        for (const arg of definition.arguments) {
            if (seen.has(arg.name)) {
                issues.push({
                    kind: 'duplicate-argument',
                    severe: true,
                    command: commandName,
                    message: `Command '${commandName}' declares argument '${arg.name}' more than once`,
                });
            }
            seen.add(arg.name);
        }
    }

    return issues;
}

export function validateProjectPaths(config: Configuration): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const projectName of sortedKeys(config.projects)) {
        const project = config.projects.get(projectName);
        if (!project) continue;

        const info = inspectPath(project.path, config.homeDir);
        if (!info.inHomeDir) {
            issues.push({
                kind: 'project-path-outside-home',
                severe: false,
                project: projectName,
                message: `Project '${projectName}' path must be inside $HOME: ${project.path}`,
            });
        }
        if (!info.exists) {
            issues.push({
                kind: 'project-path-missing',
                severe: true,
                project: projectName,
                message: `Project '${projectName}' path does not exist: ${info.absolute}`,
            });
        }
    }

    return issues;
}

export function severeIssues(issues: readonly ValidationIssue[]): ValidationIssue[] {
    return issues.filter((issue) => issue.severe);
}
