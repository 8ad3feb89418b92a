import type { ValueType } from "../convert/value-types";
import { Types, isBooleanType } from "../convert/value-types";

/**
 * Opaque handle the host turns into an executable command.
 * Usually the command class itself.
 */
export type CommandType = new (...args: never[]) => unknown;

export interface OptionDefinition {
  /** Long name, without `--`. */
  readonly name: string;
  /** Single character, without `-`. */
  readonly shortName?: string;
  readonly description?: string;
  readonly required: boolean;
  readonly valueType: ValueType<unknown>;
  readonly defaultValue?: unknown;
  /** `false` for flag-only options (booleans by default). */
  readonly hasValue: boolean;
  readonly allowMultiple: boolean;
}

export interface ArgumentDefinition {
  readonly name: string;
  readonly description?: string;
  readonly valueType: ValueType<unknown>;
  readonly required: boolean;
  readonly defaultValue?: unknown;
  /** Zero-based; ascending order defines positional binding. */
  readonly position: number;
}

export interface CommandDefinition {
  readonly name: string;
  readonly description?: string;
  readonly aliases: readonly string[];
  /** Dotted path of the parent command, e.g. `git.remote`. */
  readonly parent?: string;
  readonly commandType: CommandType;
  readonly options: readonly OptionDefinition[];
  readonly arguments: readonly ArgumentDefinition[];
  /** The command renders its own help and receives `--help` itself. */
  readonly disableHelp: boolean;
  /** Routable, but left out of help listings. */
  readonly hidden: boolean;
}

export interface OptionInput<T> {
  name: string;
  valueType?: ValueType<T>;
  shortName?: string;
  description?: string;
  required?: boolean;
  defaultValue?: T;
  hasValue?: boolean;
  allowMultiple?: boolean;
}

export interface ArgumentInput<T> {
  name: string;
  position: number;
  valueType?: ValueType<T>;
  description?: string;
  required?: boolean;
  defaultValue?: T;
}

export interface CommandInput {
  name: string;
  commandType: CommandType;
  description?: string;
  aliases?: readonly string[];
  parent?: string;
  options?: readonly OptionDefinition[];
  arguments?: readonly ArgumentDefinition[];
  disableHelp?: boolean;
  hidden?: boolean;
}

export function defineOption<T = string>(input: OptionInput<T>): OptionDefinition {
  const valueType: ValueType<unknown> = input.valueType ?? Types.string;
  return {
    name: input.name,
    shortName: input.shortName,
    description: input.description,
    required: input.required ?? false,
    valueType,
    defaultValue: input.defaultValue,
    hasValue: input.hasValue ?? !isBooleanType(valueType),
    allowMultiple: input.allowMultiple ?? false,
  };
}

export function defineArgument<T = string>(input: ArgumentInput<T>): ArgumentDefinition {
  return {
    name: input.name,
    description: input.description,
    valueType: input.valueType ?? Types.string,
    required: input.required ?? false,
    defaultValue: input.defaultValue,
    position: input.position,
  };
}

export function defineCommand(input: CommandInput): CommandDefinition {
  return {
    name: input.name,
    description: input.description,
    aliases: [...(input.aliases ?? [])],
    parent: input.parent || undefined,
    commandType: input.commandType,
    options: [...(input.options ?? [])],
    arguments: [...(input.arguments ?? [])],
    disableHelp: input.disableHelp ?? false,
    hidden: input.hidden ?? false,
  };
}

export function equalsIgnoreCase(a: string | undefined, b: string | undefined): boolean {
  return (a ?? "").toLowerCase() === (b ?? "").toLowerCase();
}

/** True when `token` is the command's name or one of its aliases. */
export function commandMatches(definition: CommandDefinition, token: string): boolean {
  return (
    equalsIgnoreCase(definition.name, token) ||
    definition.aliases.some((alias) => equalsIgnoreCase(alias, token))
  );
}

/** Dotted path children of this command use as their `parent`. */
export function commandPathOf(definition: CommandDefinition): string {
  return definition.parent ? `${definition.parent}.${definition.name}` : definition.name;
}

export function findOptionDefinition(
  definition: CommandDefinition,
  name: string,
): OptionDefinition | undefined {
  return (
    definition.options.find((option) => equalsIgnoreCase(option.name, name)) ??
    definition.options.find((option) => option.shortName !== undefined && equalsIgnoreCase(option.shortName, name))
  );
}

export function findArgumentDefinition(
  definition: CommandDefinition,
  name: string,
): ArgumentDefinition | undefined {
  return definition.arguments.find((argument) => equalsIgnoreCase(argument.name, name));
}

export function orderedArguments(definition: CommandDefinition): ArgumentDefinition[] {
  return [...definition.arguments].sort((a, b) => a.position - b.position);
}
