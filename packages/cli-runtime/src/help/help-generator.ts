import { commandPathOf, isBooleanType, orderedArguments, plainColors } from "@argkit/cli-core";
import type {
  ArgumentDefinition,
  Colors,
  CommandDefinition,
  CommandRegistry,
  OptionDefinition,
  OutputSink,
} from "@argkit/cli-core";

const COMMAND_COLUMN = 20;
const ARGUMENT_COLUMN = 25;
const OPTION_COLUMN = 30;
const NO_DESCRIPTION = "No description";
const HELP_SPELLING = "-h, --help";
const HELP_DESCRIPTION = "Show this help message";

export interface HelpGeneratorOptions {
  /** Prefixed to every usage line, e.g. `mytool`. */
  programName?: string;
  colors?: Colors;
}

function byName(a: CommandDefinition, b: CommandDefinition): number {
  return a.name.localeCompare(b.name);
}

function hasDefault(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Renders usage text from the same definitions the router uses.
 * Rendering never mutates the registry.
 */
export class HelpGenerator {
  private readonly programName?: string;
  private readonly colors: Colors;

  constructor(private readonly registry: CommandRegistry, options: HelpGeneratorOptions = {}) {
    this.programName = options.programName || undefined;
    this.colors = options.colors ?? plainColors;
  }

  renderGlobalHelp(): string[] {
    const { bold } = this.colors;
    const program = this.programName ? `${this.programName} ` : "";
    const lines: string[] = [];

    lines.push(`Usage: ${program}[command] [options]`);
    lines.push("");
    lines.push(bold("Available commands:"));
    lines.push("");
    this.pushCommandTree(lines, this.visible(this.registry.getRootCommands()), 0);
    lines.push("");
    lines.push(bold("Options:"));
    lines.push(this.shortHelpLine());
    lines.push("");
    lines.push(`Run '${program}[command] --help' for more information on a command.`);

    return lines;
  }

  renderCommandHelp(command: CommandDefinition, commandPath: readonly string[]): string[] {
    const fullName = [this.programName, ...commandPath].filter(Boolean).join(" ");
    const children = this.visible(this.registry.getSubcommands(commandPathOf(command)));

    return children.length > 0
      ? this.renderGroupHelp(command, fullName, children)
      : this.renderLeafHelp(command, fullName);
  }

  showGlobalHelp(output: OutputSink): void {
    for (const line of this.renderGlobalHelp()) {
      output.writeLine(line);
    }
  }

  showCommandHelp(output: OutputSink, command: CommandDefinition, commandPath: readonly string[]): void {
    for (const line of this.renderCommandHelp(command, commandPath)) {
      output.writeLine(line);
    }
  }

  private renderGroupHelp(command: CommandDefinition, fullName: string, children: CommandDefinition[]): string[] {
    const { bold, cyan } = this.colors;
    const lines: string[] = [];

    lines.push(`Usage: ${fullName} <command> [options]`);
    lines.push("");
    this.pushDescription(lines, command);

    lines.push(bold("Commands:"));
    lines.push("");
    for (const child of children) {
      lines.push(`  ${cyan(child.name.padEnd(COMMAND_COLUMN))} ${child.description || NO_DESCRIPTION}`);
    }
    lines.push("");

    lines.push(bold("Options:"));
    lines.push(this.shortHelpLine());
    lines.push("");
    lines.push(`Run '${fullName} <command> --help' for more information on a command.`);

    return lines;
  }

  private renderLeafHelp(command: CommandDefinition, fullName: string): string[] {
    const { bold } = this.colors;
    const args = orderedArguments(command);
    const lines: string[] = [];

    const usage = [fullName, ...args.map((arg) => (arg.required ? `<${arg.name}>` : `[${arg.name}]`)), "[options]"];
    lines.push(`Usage: ${usage.join(" ")}`);
    lines.push("");
    this.pushDescription(lines, command);

    if (args.length > 0) {
      lines.push(bold("Arguments:"));
      for (const arg of args) {
        lines.push(this.argumentLine(arg));
      }
      lines.push("");
    }

    lines.push(bold("Options:"));
    if (command.options.length === 0) {
      lines.push(this.shortHelpLine());
      return lines;
    }
    for (const option of command.options) {
      lines.push(this.optionLine(option));
    }
    lines.push(`  ${this.colors.cyan(HELP_SPELLING.padEnd(OPTION_COLUMN))} ${HELP_DESCRIPTION}`);

    return lines;
  }

  private pushCommandTree(lines: string[], commands: CommandDefinition[], depth: number): void {
    const { cyan } = this.colors;
    const indent = " ".repeat(depth * 2);
    const width = COMMAND_COLUMN - depth * 2;

    for (const command of commands) {
      lines.push(`  ${indent}${cyan(command.name.padEnd(width))} ${command.description || NO_DESCRIPTION}`);
      const children = this.visible(this.registry.getSubcommands(commandPathOf(command)));
      this.pushCommandTree(lines, children, depth + 1);
    }
  }

  private pushDescription(lines: string[], command: CommandDefinition): void {
    if (command.description) {
      lines.push(command.description);
      lines.push("");
    }
  }

  private argumentLine(arg: ArgumentDefinition): string {
    const description = arg.description || NO_DESCRIPTION;
    const typeInfo = arg.valueType.name !== "string" ? ` [${arg.valueType.name}]` : "";
    const required = arg.required ? " (required)" : "";
    const defaultInfo = hasDefault(arg.defaultValue) ? ` (default: ${String(arg.defaultValue)})` : "";
    return `  ${this.colors.cyan(arg.name.padEnd(ARGUMENT_COLUMN))} ${description}${typeInfo}${required}${defaultInfo}`;
  }

  private optionLine(option: OptionDefinition): string {
    let display = option.shortName !== undefined ? `-${option.shortName}, --${option.name}` : `--${option.name}`;
    if (option.hasValue && !isBooleanType(option.valueType)) {
      display += ` <${option.valueType.name.toLowerCase()}>`;
    }
    const description = option.description || NO_DESCRIPTION;
    const required = option.required ? " (required)" : "";
    const defaultInfo = hasDefault(option.defaultValue) ? ` (default: ${String(option.defaultValue)})` : "";
    return `  ${this.colors.cyan(display.padEnd(OPTION_COLUMN))} ${description}${required}${defaultInfo}`;
  }

  private shortHelpLine(): string {
    return `  ${this.colors.cyan(HELP_SPELLING.padEnd(COMMAND_COLUMN))}${HELP_DESCRIPTION}`;
  }

  private visible(commands: CommandDefinition[]): CommandDefinition[] {
    return commands.filter((command) => !command.hidden).sort(byName);
  }
}
