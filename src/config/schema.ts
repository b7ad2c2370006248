import { z } from 'zod';
import type { ArgumentDefinition, CommandBinding, CommandDefinition, Project } from './types.js';

// ─── Raw file shapes (snake_case, as written in settings.yaml) ───

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const envSchema = z.record(z.string(), scalar).default({});

const argumentSchema = z.object({
    name: z.string().min(1),
    type: z.enum(['string', 'number', 'bool']).default('string'),
    prefix: z.string().default(''),
    required: z.boolean().default(false),
    default: scalar.optional(),
    description: z.string().default(''),
});

const fullCommandSchema = z.object({
    cmd: z.string().default(''),
    description: z.string().default(''),
    is_enabled: z.boolean().default(true),
    is_executable: z.boolean().default(false),
    arguments: z.array(argumentSchema).default([]),
    env: envSchema,
    pre_exec: z.array(z.string()).default([]),
    post_exec: z.array(z.string()).default([]),
});

/** A command is either `name: "shell line"` or a full table */
const commandSchema = z.union([z.string(), fullCommandSchema]);

const bindingSchema = z.union([
    z.string().min(1),
    z.object({
        command_name: z.string().min(1),
        alias: z.string().optional(),
    }),
]);

const projectSchema = z.object({
    path: z.string().min(1),
    description: z.string().default(''),
    env: envSchema,
    commands: z.array(bindingSchema).default([]),
});

export const settingsFileSchema = z.object({
    log_level: z.enum(['error', 'warning', 'verbose']).default('warning'),
    executable_search_paths: z.array(z.string()).default([]),
    env: envSchema,
    projects: z.record(z.string(), projectSchema).default({}),
    commands: z.record(z.string(), commandSchema).default({}),
}).passthrough();

export type SettingsFile = z.infer<typeof settingsFileSchema>;
type RawCommand = z.infer<typeof commandSchema>;
type RawBinding = z.infer<typeof bindingSchema>;
type RawProject = z.infer<typeof projectSchema>;
type RawArgument = z.infer<typeof argumentSchema>;

// ─── Normalization into canonical definitions ───

export function normalizeEnv(env: Record<string, string | number | boolean>): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        out[key] = String(value);
    }
    return out;
}

function normalizeArgument(raw: RawArgument): ArgumentDefinition {
    const def: ArgumentDefinition = {
        name: raw.name,
        type: raw.type,
        prefix: raw.prefix.trim(),
        required: raw.required,
        description: raw.description,
    };
    if (raw.default !== undefined) def.default = raw.default;
    return def;
}

export function normalizeCommand(name: string, raw: RawCommand): CommandDefinition {
    if (typeof raw === 'string') {
        return {
            name,
            template: raw,
            description: '',
            enabled: true,
            isExecutable: false,
            arguments: [],
            env: {},
            preExec: [],
            postExec: [],
        };
    }

    return {
        name,
        template: raw.cmd,
        description: raw.description,
        enabled: raw.is_enabled,
        isExecutable: raw.is_executable,
        arguments: raw.arguments.map(normalizeArgument),
        env: normalizeEnv(raw.env),
        preExec: raw.pre_exec,
        postExec: raw.post_exec,
    };
}

function normalizeBinding(raw: RawBinding): CommandBinding {
    if (typeof raw === 'string') {
        return { commandName: raw };
    }
    const alias = raw.alias?.trim();
    return alias ? { commandName: raw.command_name, alias } : { commandName: raw.command_name };
}

export function normalizeProject(name: string, raw: RawProject): Project {
    return {
        name,
        path: raw.path,
        description: raw.description,
        env: normalizeEnv(raw.env),
        commandBindings: raw.commands.map(normalizeBinding),
    };
}
