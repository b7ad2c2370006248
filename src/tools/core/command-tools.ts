import { z } from 'zod';
import { findOwningProject } from '../../commands/resolver.js';
import type { CommandDefinition, Configuration } from '../../config/types.js';
import { sortedKeys } from '../../config/types.js';
import type { InvocationOrchestrator } from '../../execution/orchestrator.js';
import type { InvocationResult } from '../../execution/types.js';
import type { ToolCategory, ToolDefinition, ToolInput, ToolResult } from '../types.js';

// ─── Shared Command Tool Factory ───

const PROJECT_PATH = 'project_path';
const LEGACY_ARGS = 'args';

const scalar = z.union([z.string(), z.number(), z.boolean()]);

interface CommandToolConfig {
    /** Tool name: the command name or an alias */
    name: string;
    category: ToolCategory;
    definition: CommandDefinition;
    /** Global commands accept a working directory */
    acceptsProjectPath: boolean;
    description: string;
}

/**
 * Declared arguments are listed; other keys pass through so they can fill
 * placeholders of the same name.
 */
function inputSchemaFor(config: CommandToolConfig): z.ZodObject<z.ZodRawShape, 'passthrough'> {
    const shape: z.ZodRawShape = {};

    if (config.definition.arguments.length > 0) {
        for (const arg of config.definition.arguments) {
            const description = arg.type === 'string'
                ? arg.description
                : `${arg.description} (type: ${arg.type})`;
            shape[arg.name] = scalar.optional().describe(description);
        }
    } else {
        shape[LEGACY_ARGS] = z.record(z.unknown()).optional().describe('Optional arguments for the command');
    }

    if (config.acceptsProjectPath) {
        shape[PROJECT_PATH] = z.string().optional()
            .describe('Directory to run the command in (absolute, ~/ or relative to $HOME)');
    }

    return z.object(shape).passthrough();
}

/**
 * Split tool input into argument values and the optional working directory.
 * Undeclared keys are kept when their value is a scalar.
 */
export function splitToolInput(definition: CommandDefinition, input: ToolInput): {
    values: Record<string, unknown>;
    projectPath?: string;
} {
    const rawPath = input[PROJECT_PATH];
    const projectPath = typeof rawPath === 'string' && rawPath !== '' ? rawPath : undefined;

    if (definition.arguments.length === 0) {
        const legacy = input[LEGACY_ARGS];
        const values = isRecord(legacy) ? { ...legacy } : {};
        return { values, projectPath };
    }

    const declared = new Set(definition.arguments.map((a) => a.name));
    const values: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (key === PROJECT_PATH) continue;
        if (declared.has(key) || scalar.safeParse(value).success) values[key] = value;
    }
    return { values, projectPath };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toToolResult(result: InvocationResult): ToolResult {
    const stdout = result.stdout ?? '';
    const stderr = result.stderr ?? '';
    const exitCode = typeof result.exitCode === 'number' ? result.exitCode : (result.success ? 0 : 1);

    return {
        success: result.success,
        data: { stdout, stderr, exitCode },
        ...(result.error ? { error: `Command execution failed: ${result.error.message}` } : {}),
        durationMs: result.durationMs,
    };
}

function createCommandTool(config: CommandToolConfig, orchestrator: InvocationOrchestrator): ToolDefinition {
    const schema = inputSchemaFor(config);
    return {
        name: config.name,
        category: config.category,
        description: config.description,
        command: config.definition.name,
        inputSchema: schema,
        parameters: Object.keys(schema.shape),
        async execute(input, ctx) {
            const { values, projectPath } = splitToolInput(config.definition, input);
            const result = await orchestrator.invoke({
                nameOrAlias: config.name,
                input: { kind: 'map', values },
                projectPath,
                timeoutMs: ctx.timeoutMs,
                capture: true,
            });
            return toToolResult(result);
        },
    };
}

// ─── Commands listing tool ───

function createListTool(config: Configuration): ToolDefinition {
    return {
        name: 'commands',
        category: 'meta',
        description: 'List all available commands',
        inputSchema: z.object({}),
        parameters: [],
        async execute() {
            const listing: Record<string, { description: string; cmd: string }> = {};
            for (const name of sortedKeys(config.commands)) {
                const definition = config.commands.get(name);
                if (!definition?.enabled) continue;
                listing[name] = { description: definition.description, cmd: definition.template };
            }
            return {
                success: true,
                data: { stdout: JSON.stringify(listing, null, 2), stderr: '', exitCode: 0 },
                durationMs: 0,
            };
        },
    };
}

/**
 * One tool per enabled command, one per alias binding of an enabled
 * command, then the `commands` listing tool. Names already taken by a
 * command are not reused for aliases.
 */
export function buildCommandTools(config: Configuration, orchestrator: InvocationOrchestrator): ToolDefinition[] {
    const tools: ToolDefinition[] = [];
    const taken = new Set<string>();

    for (const name of sortedKeys(config.commands)) {
        const definition = config.commands.get(name);
        if (!definition?.enabled) continue;
        tools.push(createCommandTool({
            name,
            category: 'command',
            definition,
            acceptsProjectPath: findOwningProject(config, name) === undefined,
            description: definition.description,
        }, orchestrator));
        taken.add(name);
    }

    for (const projectName of sortedKeys(config.projects)) {
        const project = config.projects.get(projectName);
        if (!project) continue;
        for (const binding of project.commandBindings) {
            const definition = config.commands.get(binding.commandName);
            if (!binding.alias || !definition?.enabled || taken.has(binding.alias)) continue;
            tools.push(createCommandTool({
                name: binding.alias,
                category: 'alias',
                definition,
                acceptsProjectPath: false,
                description: `${definition.description} (alias of '${definition.name}' in project '${project.name}')`,
            }, orchestrator));
            taken.add(binding.alias);
        }
    }

    tools.push(createListTool(config));
    return tools;
}
