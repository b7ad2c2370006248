import type { CommandDefinition } from '../config/types.js';
import { formatValue } from './binder.js';
import type { BoundArguments } from './types.js';

const PLACEHOLDER = /\$\{([^}]+)\}/g;

export interface RenderOptions {
    /**
     * Append undeclared `name=value` pairs that match no placeholder
     * (command-line input). Tool calls drop them.
     */
    appendUnmatched?: boolean;
}

export interface RenderedCommand {
    /** Final command line */
    line: string;
    positional: string[];
    extras: string[];
    prefixed: string[];
    unmatched: string[];
}

export function placeholderFor(name: string): string {
    return '${' + name + '}';
}

/**
 * Build the final command line.
 *
 * Rules, in argument definition order:
 *   - prefixed argument: bool → bare prefix when true; others → "<prefix> <value>".
 *     A prefix always wins over a `${name}` placeholder, which is then left as is.
 *   - positional argument: substitutes its `${name}` placeholder; without a
 *     placeholder, a caller-supplied value is appended as a trailing token
 *     (defaults only ever fill placeholders).
 * Undeclared values substitute their own placeholders. Substitution is one
 * flat pass over the template; substituted text is never re-scanned.
 *
 * Output: template, positional tokens, extra tokens, prefixed tokens,
 * unmatched undeclared pairs (input order), joined by single spaces.
 */
export function renderCommand(definition: CommandDefinition, bound: BoundArguments, options: RenderOptions = {}): RenderedCommand {
    const template = definition.template;
    const substitutions = new Map<string, string>();
    const positional: string[] = [];
    const prefixed: string[] = [];

    for (const def of definition.arguments) {
        const entry = bound.values.get(def.name);
        if (!entry) continue;

        if (def.prefix !== '') {
            if (def.type === 'bool') {
                if (entry.value === true) prefixed.push(def.prefix);
            } else {
                prefixed.push(`${def.prefix} ${formatValue(entry.value)}`);
            }
            continue;
        }

        const text = formatValue(entry.value);
        if (template.includes(placeholderFor(def.name))) {
            substitutions.set(def.name, text);
        } else if (entry.source !== 'default') {
            positional.push(text);
        }
    }

    // Repeated undeclared names: the last value fills the placeholder
    const declared = new Set(definition.arguments.map((a) => a.name));
    const unmatched: string[] = [];
    for (const { name, value } of bound.undeclared) {
        if (declared.has(name)) continue;
        if (template.includes(placeholderFor(name))) {
            substitutions.set(name, value);
        } else if (options.appendUnmatched) {
            unmatched.push(`${name}=${value}`);
        }
    }

    const substituted = template.replace(PLACEHOLDER, (whole: string, name: string) => substitutions.get(name) ?? whole);
    const extras = [...bound.extras];
    const line = [substituted, ...positional, ...extras, ...prefixed, ...unmatched]
        .filter((part) => part !== '')
        .join(' ');

    return { line, positional, extras, prefixed, unmatched };
}
