import { RunnerError } from '../errors.js';
import { sortedKeys, type Configuration, type Project } from '../config/types.js';
import type { CommandReference } from './types.js';

/**
 * Find the project that binds `commandName` without an alias, if any
 */
export function findOwningProject(config: Configuration, commandName: string): Project | undefined {
    for (const projectName of sortedKeys(config.projects)) {
        const project = config.projects.get(projectName);
        if (project?.commandBindings.some((b) => b.commandName === commandName && !b.alias)) {
            return project;
        }
    }
    return undefined;
}

/**
 * Resolve a name or alias to one command reference.
 *
 * Command names win over aliases. Ambiguity is not handled here: the
 * validator rejects configurations where a binding or alias occurs in more
 * than one project, and execution refuses to start while such an issue
 * exists.
 */
export function resolveCommand(config: Configuration, nameOrAlias: string): CommandReference {
    const direct = config.commands.get(nameOrAlias);
    if (direct) {
        const project = findOwningProject(config, nameOrAlias);
        return project
            ? { kind: 'project', definition: direct, project, invokedAs: nameOrAlias }
            : { kind: 'global', definition: direct, invokedAs: nameOrAlias };
    }

    for (const projectName of sortedKeys(config.projects)) {
        const project = config.projects.get(projectName);
        const binding = project?.commandBindings.find((b) => b.alias === nameOrAlias);
        if (!project || !binding) continue;

        const definition = config.commands.get(binding.commandName);
        if (!definition) {
            throw new RunnerError('CommandNotFound',
                `Alias '${nameOrAlias}' in project '${project.name}' references non-existent command '${binding.commandName}'`, {
                    context: { alias: nameOrAlias, project: project.name, command: binding.commandName },
                });
        }
        return { kind: 'alias', definition, project, invokedAs: nameOrAlias };
    }

    throw new RunnerError('CommandNotFound', `Command or alias '${nameOrAlias}' not found`, {
        context: { name: nameOrAlias },
    });
}
