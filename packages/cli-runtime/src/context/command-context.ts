import {
  convertDefault,
  createNoOpLogger,
  findArgumentDefinition,
  findOptionDefinition,
  isBooleanType,
  tryConvert,
} from "@argkit/cli-core";
import type {
  CommandDefinition,
  Logger,
  OutputSink,
  ParsedArguments,
  TryGetResult,
  ValueType,
} from "@argkit/cli-core";

export interface CommandContextOptions {
  arguments: ParsedArguments;
  rawArgs: readonly string[];
  commandPath: readonly string[];
  definition: CommandDefinition;
  output: OutputSink;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Everything a command and the middleware around it see for one run.
 *
 * Typed getters fall back to the value declared on the command's
 * definition, then to the type's zero value.
 */
export class CommandContext {
  readonly arguments: ParsedArguments;
  readonly rawArgs: readonly string[];
  readonly commandPath: readonly string[];
  readonly definition: CommandDefinition;
  readonly output: OutputSink;
  readonly logger: Logger;
  /** Cancellation token; honouring it is up to commands and middleware. */
  readonly signal: AbortSignal;
  /** Free-form data shared between middlewares and the command. */
  readonly data = new Map<string, unknown>();
  readonly diagnostics: string[] = [];

  constructor(options: CommandContextOptions) {
    this.arguments = options.arguments;
    this.rawArgs = options.rawArgs;
    this.commandPath = options.commandPath;
    this.definition = options.definition;
    this.output = options.output;
    this.logger = options.logger ?? createNoOpLogger();
    this.signal = options.signal ?? new AbortController().signal;
  }

  /** Command path joined by spaces, e.g. `git remote add`. */
  get commandName(): string {
    return this.commandPath.join(" ");
  }

  hasOption(name: string): boolean {
    return this.arguments.hasOption(name);
  }

  getOption<T>(name: string, type: ValueType<T>): T {
    const raw = this.arguments.getOptionValue(name);
    if (raw !== undefined) {
      const converted = tryConvert(raw, type);
      if (converted.ok) {
        return converted.value;
      }
    } else if (isBooleanType(type) && this.arguments.hasOption(name)) {
      return type.parse("");
    }
    return this.declaredOptionDefault(name, type);
  }

  tryGetOption<T>(name: string, type: ValueType<T>): TryGetResult<T> {
    return this.arguments.tryGetValue(name, type);
  }

  getOptionValues<T>(name: string, type: ValueType<T>): T[] {
    const values = this.arguments.getOptionValuesAs(name, type);
    if (values.length > 0 || this.arguments.hasOption(name)) {
      return values;
    }
    const declared = findOptionDefinition(this.definition, name);
    const fallback = declared ? convertDefault(declared.defaultValue, type) : undefined;
    return fallback?.ok ? [fallback.value] : [];
  }

  getArgument<T>(name: string, type: ValueType<T>): T {
    const raw = this.arguments.getNamedArgument(name);
    if (raw !== undefined) {
      const converted = tryConvert(raw, type);
      if (converted.ok) {
        return converted.value;
      }
    }
    const declared = findArgumentDefinition(this.definition, name);
    const fallback = declared ? convertDefault(declared.defaultValue, type) : undefined;
    return fallback?.ok ? fallback.value : type.zero;
  }

  private declaredOptionDefault<T>(name: string, type: ValueType<T>): T {
    const declared = findOptionDefinition(this.definition, name);
    const fallback = declared ? convertDefault(declared.defaultValue, type) : undefined;
    return fallback?.ok ? fallback.value : type.zero;
  }
}
