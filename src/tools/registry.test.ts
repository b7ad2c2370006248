import { z } from 'zod';
import { describe, it, expect } from 'vitest';
import { ToolRegistry } from './registry.js';
import type { ToolDefinition } from './types.js';

function echoTool(name: string): ToolDefinition {
    return {
        name,
        category: 'meta',
        description: 'Echo a message',
        inputSchema: z.object({ message: z.string() }),
        parameters: ['message'],
        async execute(input) {
            const message = typeof input['message'] === 'string' ? input['message'] : '';
            if (message === 'boom') throw new Error('exploded');
            return { success: true, data: { stdout: message, stderr: '', exitCode: 0 }, durationMs: 0 };
        },
    };
}

describe('ToolRegistry', () => {
    it('keeps the first registration of a name', () => {
        const registry = new ToolRegistry();
        expect(registry.register(echoTool('echo'))).toBe(true);
        expect(registry.register(echoTool('echo'))).toBe(false);
        expect(registry.size).toBe(1);
    });

    it('lists tools sorted by name', () => {
        const registry = new ToolRegistry();
        registry.registerAll([echoTool('b'), echoTool('a'), echoTool('c')]);
        expect(registry.list().map((t) => t.name)).toEqual(['a', 'b', 'c']);
    });

    it('executes with validated input', async () => {
        const registry = new ToolRegistry();
        registry.register(echoTool('echo'));
        const result = await registry.execute('echo', { message: 'hi' });
        expect(result.success).toBe(true);
        expect(result.data?.stdout).toBe('hi');
    });

    it('rejects input that fails the schema', async () => {
        const registry = new ToolRegistry();
        registry.register(echoTool('echo'));
        const result = await registry.execute('echo', { message: 42 });
        expect(result.success).toBe(false);
        expect(result.error).toMatch(/^Invalid input for tool 'echo': message: /);
    });

    it('reports unknown tools and thrown errors as failures', async () => {
        const registry = new ToolRegistry();
        registry.register(echoTool('echo'));
        expect((await registry.execute('nope', {})).error).toBe('Unknown tool: nope');
        expect((await registry.execute('echo', { message: 'boom' })).error).toBe('exploded');
    });
});
