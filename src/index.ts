// cmdstack — Public API Surface
export { createCLI } from './cli/index.js';
export { ConfigLoader, parseSettings, buildConfiguration } from './config/loader.js';
export { resolveCommand, findOwningProject } from './commands/resolver.js';
export { validateConfiguration, severeIssues } from './commands/validator.js';
export { bindArguments, coerceValue } from './commands/binder.js';
export { renderCommand } from './commands/renderer.js';
export { mergeEnvironment, buildCommandEnvironment } from './commands/environment.js';
export { InvocationOrchestrator } from './execution/orchestrator.js';
export { ProcessInvoker } from './execution/invoker.js';
export { findExecutable } from './execution/executables.js';
export { HookRunner } from './hooks/runner.js';
export { ToolRegistry } from './tools/registry.js';
export { buildCommandTools } from './tools/core/command-tools.js';
export { createLogger } from './logging/logger.js';
export { RunnerError, isRunnerError } from './errors.js';

// Types
export type { Configuration, CommandDefinition, ArgumentDefinition, Project, CommandBinding } from './config/types.js';
export type { CommandReference, ArgumentInput, BoundArguments, ValidationIssue } from './commands/types.js';
export type { Invoker, SpawnRequest, SpawnResult } from './execution/invoker.js';
export type { InvocationRequest, InvocationResult, InvocationOutcome, InvocationState } from './execution/types.js';
export type { HookResult, HookContext } from './hooks/types.js';
export type { ToolDefinition, ToolResult } from './tools/types.js';
export type { Logger, LogLevel } from './logging/logger.js';
export type { RunnerErrorCode } from './errors.js';
