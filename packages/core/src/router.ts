import type { CommandDefinition } from "./definitions/types";
import { commandMatches, equalsIgnoreCase, orderedArguments } from "./definitions/types";
import { ArgumentParser } from "./parser/argument-parser";
import type { ParsedArguments } from "./parser/parsed-arguments";
import type { CommandRegistry } from "./registry";

export interface CommandRoute {
  /** Deepest matched command; `null` when nothing matched. */
  command: CommandDefinition | null;
  /** Canonical names consumed, root first, e.g. `["git", "remote", "add"]`. */
  commandPath: string[];
  remainingArgs: string[];
}

/**
 * Walks the argument vector against the registry and hands the rest to the parser.
 */
export class CommandRouter {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly parser: ArgumentParser = new ArgumentParser(),
  ) {}

  route(args: readonly string[]): CommandRoute {
    const commandPath: string[] = [];
    let current: CommandDefinition | null = null;
    let index = 0;

    while (index < args.length) {
      const token = args[index] ?? "";
      if (this.parser.isOptionLike(token)) {
        break;
      }

      const parentPath = commandPath.join(".");
      // registration order; the first match wins
      const match = this.registry.commands.find(
        (definition) => commandMatches(definition, token) && equalsIgnoreCase(definition.parent, parentPath),
      );
      if (!match) {
        break;
      }

      current = match;
      commandPath.push(match.name);
      index++;
    }

    return {
      command: current,
      commandPath,
      remainingArgs: args.slice(index),
    };
  }

  parseArguments(args: readonly string[]): ParsedArguments {
    return this.parser.parse(args);
  }
}

/**
 * Bind a routed command's parsed arguments to its declarations:
 * positionals take argument names by ascending position, and values given
 * under an option's short name are copied onto its long name.
 */
export function bindArguments(parsed: ParsedArguments, definition: CommandDefinition): ParsedArguments {
  const ordered = orderedArguments(definition);
  const count = Math.min(ordered.length, parsed.positional.length);
  for (let i = 0; i < count; i++) {
    const argument = ordered[i];
    const value = parsed.positional[i];
    if (argument && value !== undefined) {
      parsed.addNamedArgument(argument.name, value);
    }
  }

  for (const option of definition.options) {
    if (option.shortName === undefined || !parsed.hasOption(option.shortName)) {
      continue;
    }
    // same spelling in a case-insensitive map; nothing to copy
    if (equalsIgnoreCase(option.shortName, option.name)) {
      continue;
    }
    const values = parsed.getOptionValues(option.shortName);
    if (values.length === 0) {
      parsed.addOption(option.name);
      continue;
    }
    for (const value of [...values]) {
      parsed.addOption(option.name, value);
    }
  }

  return parsed;
}
