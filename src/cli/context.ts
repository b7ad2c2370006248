import type { Command } from 'commander';
import { ConfigLoader } from '../config/loader.js';
import type { Configuration } from '../config/types.js';
import { ProcessInvoker } from '../execution/invoker.js';
import { InvocationOrchestrator } from '../execution/orchestrator.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { ToolRegistry } from '../tools/registry.js';
import { buildCommandTools } from '../tools/core/command-tools.js';

export type GlobalOptions = {
    config?: string;
};

export interface CliContext {
    config: Configuration;
    logger: Logger;
    orchestrator: InvocationOrchestrator;
}

export function createLoader(cmd: Command): ConfigLoader {
    const { config } = cmd.optsWithGlobals<GlobalOptions>();
    return new ConfigLoader({ settingsPath: config });
}

/**
 * Load settings and wire the engine for one CLI run
 */
export async function loadContext(cmd: Command, options: { plainLogs?: boolean } = {}): Promise<CliContext> {
    const config = await createLoader(cmd).load();
    const logger = createLogger('cmdstack', config.logLevel, { plain: options.plainLogs });
    const orchestrator = new InvocationOrchestrator(config, {
        invoker: new ProcessInvoker(),
        logger: logger.child('run'),
        selfInvocation: selfInvocation(),
    });
    return { config, logger, orchestrator };
}

export function createToolRegistry(ctx: CliContext): ToolRegistry {
    const registry = new ToolRegistry();
    registry.registerAll(buildCommandTools(ctx.config, ctx.orchestrator));
    return registry;
}

/**
 * How hooks starting with `cmdstack ` re-run this program
 */
function selfInvocation(): { file: string; args: string[] } | undefined {
    const script = process.argv[1];
    return script ? { file: process.execPath, args: [script] } : undefined;
}
