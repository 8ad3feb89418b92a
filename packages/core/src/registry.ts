import type { CommandDefinition } from "./definitions/types";
import { equalsIgnoreCase } from "./definitions/types";
import { validateCommandDefinition } from "./definitions/schema";
import {
  CommandNotFoundError,
  DuplicateNameError,
  InvalidDefinitionError,
  RegistrySealedError,
} from "./errors";

/**
 * Catalogue of command definitions keyed by name and alias (case-insensitive).
 *
 * Written during configuration, then sealed and only read while routing.
 */
export class CommandRegistry {
  private readonly byName = new Map<string, CommandDefinition>();
  private readonly ordered: CommandDefinition[] = [];
  private sealed = false;

  /** Distinct definitions in registration order. */
  get commands(): readonly CommandDefinition[] {
    return this.ordered;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  register(definition: CommandDefinition): void {
    if (this.sealed) {
      throw new RegistrySealedError(definition.name);
    }

    const issues = validateCommandDefinition(definition);
    if (issues.length > 0) {
      throw new InvalidDefinitionError(definition.name, issues);
    }

    // check every key before inserting any of them
    const keys = [definition.name, ...definition.aliases].map((key) => key.toLowerCase());
    if (this.byName.has(keys[0] ?? "")) {
      throw new DuplicateNameError(definition.name, "Command");
    }
    const seen = new Set<string>([keys[0] ?? ""]);
    definition.aliases.forEach((alias, index) => {
      const key = keys[index + 1] ?? "";
      if (this.byName.has(key) || seen.has(key)) {
        throw new DuplicateNameError(alias, "Command alias");
      }
      seen.add(key);
    });

    for (const key of keys) {
      this.byName.set(key, definition);
    }
    this.ordered.push(definition);
  }

  /** Reject further registration. Idempotent. */
  seal(): void {
    this.sealed = true;
  }

  tryGetCommand(name: string): CommandDefinition | undefined {
    return this.byName.get(name.toLowerCase());
  }

  getCommand(name: string): CommandDefinition {
    const definition = this.tryGetCommand(name);
    if (!definition) {
      throw new CommandNotFoundError(name);
    }
    return definition;
  }

  getRootCommands(): CommandDefinition[] {
    return this.ordered.filter((definition) => !definition.parent);
  }

  /** Children whose `parent` equals the given dotted path. */
  getSubcommands(parentPath: string): CommandDefinition[] {
    return this.ordered.filter(
      (definition) => !!definition.parent && equalsIgnoreCase(definition.parent, parentPath),
    );
  }
}
