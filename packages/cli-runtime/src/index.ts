/**
 * @module @argkit/cli-runtime
 * CLI runtime - command execution, middleware, help
 */

// Commands and context
export { defaultCommandFactory, isCommand } from "./command";
export type { Command, CommandFactory } from "./command";
export { CommandContext } from "./context/command-context";
export type { CommandContextOptions } from "./context/command-context";

// Middleware
export { MiddlewarePipeline } from "./middleware/middleware-pipeline";
export type { CommandHandler, CommandMiddleware, MiddlewareConfig } from "./middleware/middleware-pipeline";
export { createValidationMiddleware } from "./middleware/validation";
export { createTimingMiddleware, formatTiming } from "./middleware/timing";

// Help
export { HelpGenerator } from "./help/help-generator";
export type { HelpGeneratorOptions } from "./help/help-generator";

// Application
export { CliConfigSchema, resolveCliConfig } from "./config";
export type { CliConfig, CliConfigInput } from "./config";
export { CliApplication } from "./application";
export type { CliApplicationOptions } from "./application";
export { CliBuilder, CommandBuilder, createCli } from "./builder";
export type { ArgumentOptions, CommandOptions, ConfigureCommand, OptionOptions } from "./builder";
