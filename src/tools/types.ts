/**
 * Tool Host — Types
 *
 * Every enabled command (and every alias binding) is exposed as a tool:
 * a name, a zod input schema and an async handler returning a
 * success/error envelope. Transport framing is left to the caller.
 */
import type { z } from 'zod';

export type ToolCategory = 'command' | 'alias' | 'meta';

export interface ToolOutput {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface ToolResult<T = ToolOutput> {
    success: boolean;
    data?: T;
    error?: string;
    durationMs: number;
}

export interface ToolContext {
    /** Upper bound for the main process, in ms */
    timeoutMs?: number;
}

export type ToolInput = Record<string, unknown>;

export interface ToolDefinition {
    name: string;
    category: ToolCategory;
    description: string;
    inputSchema: z.ZodType<ToolInput, z.ZodTypeDef, unknown>;
    /** Input field names, in schema order */
    parameters: readonly string[];
    /** Command this tool runs; absent for meta tools */
    command?: string;
    execute(input: ToolInput, ctx: ToolContext): Promise<ToolResult>;
}
