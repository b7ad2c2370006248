/**
 * Command Engine — Types
 *
 * Values derived per invocation from the configuration snapshot. None of
 * these are stored; each resolution or binding produces fresh ones.
 */
import type { ArgumentValue, CommandDefinition, Project } from '../config/types.js';

// ─── Resolution ───

export type ReferenceKind = 'global' | 'project' | 'alias';

export interface CommandReference {
    kind: ReferenceKind;
    definition: CommandDefinition;
    /** Set for project-bound and alias references */
    project?: Project;
    /** The literal string the caller used */
    invokedAs: string;
}

// ─── Argument input ───

/** Raw tokens from a command line: `name=value` or bare positional values */
export interface CliArgumentInput {
    kind: 'cli';
    tokens: readonly string[];
}

/** Structured name → value map from a tool call */
export interface MapArgumentInput {
    kind: 'map';
    values: Readonly<Record<string, unknown>>;
}

export type ArgumentInput = CliArgumentInput | MapArgumentInput;

// ─── Binding ───

export type ValueSource = 'explicit' | 'positional' | 'default';

export interface BoundArgument {
    value: ArgumentValue;
    source: ValueSource;
}

export interface Assignment {
    name: string;
    value: string;
}

export interface BoundArguments {
    /** Declared arguments that received a value, keyed by name */
    values: ReadonlyMap<string, BoundArgument>;
    /** `name=value` pairs whose name matches no declared argument, in input order */
    undeclared: readonly Assignment[];
    /** Bare tokens left over after every positional slot was filled */
    extras: readonly string[];
}

// ─── Validation ───

export type ValidationIssueKind =
    | 'unknown-command'
    | 'duplicate-binding'
    | 'duplicate-alias'
    | 'shadowed-alias'
    | 'duplicate-argument'
    | 'project-path-missing'
    | 'project-path-outside-home';

export interface ValidationIssue {
    kind: ValidationIssueKind;
    message: string;
    /** Severe issues block every execution */
    severe: boolean;
    project?: string;
    command?: string;
    alias?: string;
}
