/**
 * @module @argkit/cli-runtime/application
 * Routes, binds and executes one invocation
 */

import {
  ArgumentParser,
  CommandRouter,
  EXIT_CODES,
  bindArguments,
  createColors,
  createConsoleLogger,
  createTextPresenter,
  serializeCliError,
} from "@argkit/cli-core";
import type { CommandRegistry, Logger, OutputSink } from "@argkit/cli-core";

import { defaultCommandFactory } from "./command";
import type { CommandFactory } from "./command";
import { resolveCliConfig } from "./config";
import type { CliConfig } from "./config";
import { CommandContext } from "./context/command-context";
import { HelpGenerator } from "./help/help-generator";
import { MiddlewarePipeline } from "./middleware/middleware-pipeline";
import type { CommandHandler } from "./middleware/middleware-pipeline";

const NO_COMMAND_MESSAGE = "No command specified. Use --help for available commands.";

export interface CliApplicationOptions {
  registry: CommandRegistry;
  config?: CliConfig;
  router?: CommandRouter;
  pipeline?: MiddlewarePipeline;
  commandFactory?: CommandFactory;
  output?: OutputSink;
  logger?: Logger;
  help?: HelpGenerator;
}

function isHelpToken(token: string | undefined): boolean {
  return token === "--help" || token === "-h";
}

export class CliApplication {
  readonly registry: CommandRegistry;
  readonly config: CliConfig;
  readonly output: OutputSink;
  readonly logger: Logger;
  private readonly router: CommandRouter;
  private readonly pipeline: MiddlewarePipeline;
  private readonly commandFactory: CommandFactory;
  private readonly help: HelpGenerator;
  private handler?: CommandHandler;

  constructor(options: CliApplicationOptions) {
    this.registry = options.registry;
    this.config = options.config ?? resolveCliConfig();
    const colors = createColors(this.config.color);

    this.router =
      options.router ??
      new CommandRouter(
        this.registry,
        new ArgumentParser({
          allowWindowsStyle: this.config.allowWindowsStyle,
          allowCombinedShortOptions: this.config.allowCombinedShortOptions,
        }),
      );
    this.pipeline = options.pipeline ?? new MiddlewarePipeline();
    this.commandFactory = options.commandFactory ?? defaultCommandFactory;
    this.output = options.output ?? createTextPresenter({ colors });
    this.logger = (options.logger ?? createConsoleLogger(this.config.logLevel)).child({ category: "cli" });
    this.help =
      options.help ?? new HelpGenerator(this.registry, { programName: this.config.programName, colors });
  }

  /** Resolves to the process exit code; never rejects. */
  async run(args: readonly string[], signal?: AbortSignal): Promise<number> {
    try {
      this.registry.seal();

      if (isHelpToken(args[0])) {
        this.help.showGlobalHelp(this.output);
        return EXIT_CODES.SUCCESS;
      }

      const route = this.router.route(args);
      if (!route.command) {
        this.logger.debug("no command matched", { args: args.length });
        this.output.writeError(NO_COMMAND_MESSAGE);
        return EXIT_CODES.GENERIC;
      }
      const command = route.command;
      this.logger.debug("routed", { command: route.commandPath.join(" ") });

      const parsed = bindArguments(this.router.parseArguments(route.remainingArgs), command);
      if (!command.disableHelp && (parsed.hasOption("help") || parsed.hasOption("h"))) {
        this.help.showCommandHelp(this.output, command, route.commandPath);
        return EXIT_CODES.SUCCESS;
      }

      const ctx = new CommandContext({
        arguments: parsed,
        rawArgs: [...args],
        commandPath: route.commandPath,
        definition: command,
        output: this.output,
        logger: this.logger.child({ meta: { command: route.commandPath.join(" ") } }),
        signal,
      });
      return await this.getHandler()(ctx);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.output.writeError(`Error: ${message}`);
      this.logger.error("command failed", { error: serializeCliError(error) });
      return EXIT_CODES.GENERIC;
    }
  }

  private getHandler(): CommandHandler {
    if (!this.handler) {
      this.handler = this.pipeline.build(async (ctx) => {
        const command = this.commandFactory(ctx.definition.commandType);
        return await command.execute(ctx);
      });
    }
    return this.handler;
  }
}
