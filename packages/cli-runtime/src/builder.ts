import { CommandRegistry, defineArgument, defineCommand, defineOption } from "@argkit/cli-core";
import type {
  ArgumentDefinition,
  ArgumentValidator,
  CommandDefinition,
  CommandType,
  Logger,
  OptionDefinition,
  OutputSink,
  ValueType,
} from "@argkit/cli-core";

import { CliApplication } from "./application";
import type { CommandFactory } from "./command";
import { resolveCliConfig } from "./config";
import type { CliConfig, CliConfigInput } from "./config";
import { MiddlewarePipeline } from "./middleware/middleware-pipeline";
import type { MiddlewareConfig } from "./middleware/middleware-pipeline";
import { createTimingMiddleware } from "./middleware/timing";
import { createValidationMiddleware } from "./middleware/validation";

export interface CommandOptions {
  description?: string;
  aliases?: readonly string[];
  disableHelp?: boolean;
  hidden?: boolean;
}

export interface ArgumentOptions<T> {
  description?: string;
  required?: boolean;
  defaultValue?: T;
}

export interface OptionOptions<T> {
  shortName?: string;
  description?: string;
  required?: boolean;
  defaultValue?: T;
  hasValue?: boolean;
  allowMultiple?: boolean;
}

export type ConfigureCommand = (command: CommandBuilder) => void;

/**
 * Collects one command's declarations; argument positions follow
 * declaration order.
 */
export class CommandBuilder {
  private readonly aliases: string[];
  private readonly options: OptionDefinition[] = [];
  private readonly args: ArgumentDefinition[] = [];
  private readonly children: CommandBuilder[] = [];
  private readonly description?: string;
  private disableHelp: boolean;
  private isHidden: boolean;

  constructor(
    readonly name: string,
    private readonly commandType: CommandType,
    private readonly parent?: string,
    opts: CommandOptions = {},
  ) {
    this.description = opts.description;
    this.aliases = [...(opts.aliases ?? [])];
    this.disableHelp = opts.disableHelp ?? false;
    this.isHidden = opts.hidden ?? false;
  }

  /** Dotted path children register under. */
  get path(): string {
    return this.parent ? `${this.parent}.${this.name}` : this.name;
  }

  argument<T = string>(name: string, valueType?: ValueType<T>, opts: ArgumentOptions<T> = {}): this {
    this.args.push(defineArgument<T>({ ...opts, name, valueType, position: this.args.length }));
    return this;
  }

  option<T = string>(name: string, valueType?: ValueType<T>, opts: OptionOptions<T> = {}): this {
    this.options.push(defineOption<T>({ ...opts, name, valueType }));
    return this;
  }

  command(name: string, commandType: CommandType, opts?: CommandOptions, configure?: ConfigureCommand): this {
    const child = new CommandBuilder(name, commandType, this.path, opts);
    configure?.(child);
    this.children.push(child);
    return this;
  }

  alias(...aliases: string[]): this {
    this.aliases.push(...aliases);
    return this;
  }

  withoutHelp(): this {
    this.disableHelp = true;
    return this;
  }

  hidden(): this {
    this.isHidden = true;
    return this;
  }

  /** This command followed by its descendants, depth-first. */
  toDefinitions(): CommandDefinition[] {
    const own = defineCommand({
      name: this.name,
      commandType: this.commandType,
      description: this.description,
      aliases: this.aliases,
      parent: this.parent,
      options: this.options,
      arguments: this.args,
      disableHelp: this.disableHelp,
      hidden: this.isHidden,
    });
    return [own, ...this.children.flatMap((child) => child.toDefinitions())];
  }
}

export class CliBuilder {
  private readonly roots: CommandBuilder[] = [];
  private readonly middlewares: MiddlewareConfig[] = [];
  private factory?: CommandFactory;
  private sink?: OutputSink;
  private log?: Logger;

  constructor(readonly config: CliConfig) {}

  command(name: string, commandType: CommandType, opts?: CommandOptions, configure?: ConfigureCommand): this {
    const root = new CommandBuilder(name, commandType, undefined, opts);
    configure?.(root);
    this.roots.push(root);
    return this;
  }

  /** Middlewares wrap in registration order: the first is outermost. */
  use(middleware: MiddlewareConfig): this {
    this.middlewares.push(middleware);
    return this;
  }

  useValidation(validator?: ArgumentValidator): this {
    return this.use(createValidationMiddleware(validator));
  }

  useTiming(now?: () => number): this {
    return this.use(createTimingMiddleware(now));
  }

  commandFactory(factory: CommandFactory): this {
    this.factory = factory;
    return this;
  }

  output(sink: OutputSink): this {
    this.sink = sink;
    return this;
  }

  logger(logger: Logger): this {
    this.log = logger;
    return this;
  }

  build(): CliApplication {
    const registry = new CommandRegistry();
    for (const root of this.roots) {
      for (const definition of root.toDefinitions()) {
        registry.register(definition);
      }
    }

    const pipeline = new MiddlewarePipeline();
    for (const middleware of this.middlewares) {
      pipeline.use(middleware);
    }

    return new CliApplication({
      registry,
      config: this.config,
      pipeline,
      commandFactory: this.factory,
      output: this.sink,
      logger: this.log,
    });
  }
}

export function createCli(config: CliConfigInput = {}): CliBuilder {
  return new CliBuilder(resolveCliConfig(config));
}
