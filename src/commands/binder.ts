import { RunnerError } from '../errors.js';
import type { ArgumentDefinition, ArgumentValue, CommandDefinition } from '../config/types.js';
import type { ArgumentInput, Assignment, BoundArgument, BoundArguments, ValueSource } from './types.js';

const TRUE_LITERALS = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);
const FLOAT_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce a raw value to the declared type.
 *
 * Lenient: a string that does not parse as the declared type is kept as
 * the original string. Only non-scalar values (objects, arrays) are
 * rejected.
 */
export function coerceValue(def: ArgumentDefinition, raw: unknown, commandName: string): ArgumentValue {
    if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'boolean') {
        throw new RunnerError('ArgumentValidationFailed',
            `Argument '${def.name}' of command '${commandName}' expects a ${def.type}, got ${Array.isArray(raw) ? 'array' : typeof raw}`, {
                context: { command: commandName, argument: def.name },
            });
    }

    switch (def.type) {
        case 'bool': {
            if (typeof raw === 'boolean') return raw;
            const text = String(raw);
            if (TRUE_LITERALS.has(text)) return true;
            if (FALSE_LITERALS.has(text)) return false;
            return text;
        }
        case 'number': {
            if (typeof raw === 'number') return raw;
            const text = String(raw).trim();
            return FLOAT_LITERAL.test(text) ? Number(text) : String(raw);
        }
        default:
            return String(raw);
    }
}

/**
 * Render a value the way it appears on a command line
 */
export function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value) ?? '';
}

/**
 * Split CLI tokens into `name=value` assignments and bare tokens, both in
 * input order. A name may repeat.
 */
export function partitionTokens(tokens: readonly string[]): { assignments: Assignment[]; bare: string[] } {
    const assignments: Assignment[] = [];
    const bare: string[] = [];

    for (const token of tokens) {
        const eq = token.indexOf('=');
        if (eq > 0) {
            assignments.push({ name: token.slice(0, eq), value: token.slice(eq + 1) });
        } else {
            bare.push(token);
        }
    }

    return { assignments, bare };
}

/**
 * Bind raw invocation input onto a command's declared arguments.
 *
 * Per argument: explicit value, else the next positional token (only for
 * arguments without a prefix), else the default, else fail when required,
 * else leave it unbound.
 */
export function bindArguments(definition: CommandDefinition, input: ArgumentInput): BoundArguments {
    const declared = new Set(definition.arguments.map((a) => a.name));
    const explicit = new Map<string, unknown>();
    const undeclared: Assignment[] = [];
    let bare: string[] = [];

    if (input.kind === 'cli') {
        const parts = partitionTokens(input.tokens);
        bare = parts.bare;
        for (const { name, value } of parts.assignments) {
            if (declared.has(name)) explicit.set(name, value);
            else undeclared.push({ name, value });
        }
    } else {
        for (const [name, value] of Object.entries(input.values)) {
            if (value === undefined || value === null) continue;
            if (declared.has(name)) explicit.set(name, value);
            else undeclared.push({ name, value: formatValue(value) });
        }
    }

    // Bare tokens fill the positional candidates that have no explicit value yet
    const positional = new Map<string, string>();
    const queue = [...bare];
    for (const def of definition.arguments) {
        if (queue.length === 0) break;
        if (def.prefix !== '' || explicit.has(def.name)) continue;
        const token = queue.shift();
        if (token !== undefined) positional.set(def.name, token);
    }

    const values = new Map<string, BoundArgument>();
    for (const def of definition.arguments) {
        let raw: unknown;
        let source: ValueSource;

        if (explicit.has(def.name)) {
            raw = explicit.get(def.name);
            source = 'explicit';
        } else if (positional.has(def.name)) {
            raw = positional.get(def.name);
            source = 'positional';
        } else if (def.default !== undefined) {
            raw = def.default;
            source = 'default';
        } else if (def.required) {
            throw new RunnerError('ArgumentValidationFailed',
                `Missing required argument '${def.name}' for command '${definition.name}'`, {
                    context: { command: definition.name, argument: def.name },
                });
        } else {
            continue;
        }

        values.set(def.name, { value: coerceValue(def, raw, definition.name), source });
    }

    return { values, undeclared, extras: queue };
}
