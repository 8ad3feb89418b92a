import type { CommandType } from "@argkit/cli-core";
import type { CommandContext } from "./context/command-context";

/** Executable behaviour behind a command definition. */
export interface Command {
  /** Resolves to the process exit code. */
  execute(ctx: CommandContext): Promise<number> | number;
}

/** Host-supplied instantiation, typically backed by a DI container. */
export type CommandFactory = (type: CommandType) => Command;

export function isCommand(value: unknown): value is Command {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}

export const defaultCommandFactory: CommandFactory = (type) => {
  const instance = new type();
  if (!isCommand(instance)) {
    throw new TypeError(`${type.name || "Command type"} does not implement execute(ctx)`);
  }
  return instance;
};
