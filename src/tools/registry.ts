import type { ZodIssue } from 'zod';
import { errorMessage } from '../errors.js';
import type { ToolContext, ToolDefinition, ToolResult } from './types.js';

function formatIssues(issues: readonly ZodIssue[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Tool Registry — name → tool, with input validation on every call
 */
export class ToolRegistry {
    private tools = new Map<string, ToolDefinition>();

    /**
     * Register a tool. The first registration of a name wins.
     * @returns false when the name was already taken
     */
    register(tool: ToolDefinition): boolean {
        if (this.tools.has(tool.name)) return false;
        this.tools.set(tool.name, tool);
        return true;
    }

    registerAll(tools: readonly ToolDefinition[]): number {
        let count = 0;
        for (const tool of tools) {
            if (this.register(tool)) count++;
        }
        return count;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name);
    }

    /**
     * All tools, sorted by name
     */
    list(): ToolDefinition[] {
        return Array.from(this.tools.values()).sort((a, b) => a.name.localeCompare(b.name));
    }

    get size(): number {
        return this.tools.size;
    }

    /**
     * Validate input against the tool's schema and run it.
     * Never throws; failures come back as `success: false`.
     */
    async execute(name: string, input: unknown, ctx: ToolContext = {}): Promise<ToolResult> {
        const start = Date.now();
        const tool = this.tools.get(name);
        if (!tool) {
            return { success: false, error: `Unknown tool: ${name}`, durationMs: 0 };
        }

        const parsed = tool.inputSchema.safeParse(input ?? {});
        if (!parsed.success) {
            return {
                success: false,
                error: `Invalid input for tool '${name}': ${formatIssues(parsed.error.issues)}`,
                durationMs: Date.now() - start,
            };
        }

        try {
            const result = await tool.execute(parsed.data, ctx);
            return { ...result, durationMs: Date.now() - start };
        } catch (err) {
            return { success: false, error: errorMessage(err), durationMs: Date.now() - start };
        }
    }
}
