import { ParsedArguments } from "./parsed-arguments";

export interface ArgumentParserOptions {
  /** Accept `/name` and `/name value` (default: true). */
  allowWindowsStyle?: boolean;
  /** Expand `-abc` into the flags `a`, `b` and `c` (default: true). */
  allowCombinedShortOptions?: boolean;
}

/**
 * POSIX/GNU style tokenizer with opt-in Windows options.
 *
 * Never throws: anything it does not recognise becomes a positional argument.
 */
export class ArgumentParser {
  readonly allowWindowsStyle: boolean;
  readonly allowCombinedShortOptions: boolean;

  constructor(options: ArgumentParserOptions = {}) {
    this.allowWindowsStyle = options.allowWindowsStyle ?? true;
    this.allowCombinedShortOptions = options.allowCombinedShortOptions ?? true;
  }

  parse(args: readonly string[]): ParsedArguments {
    const result = new ParsedArguments();
    let endOfOptions = false;
    let i = 0;

    while (i < args.length) {
      const arg = args[i] ?? "";

      if (endOfOptions) {
        result.addPositional(arg);
        i++;
        continue;
      }

      if (arg === "--") {
        endOfOptions = true;
        i++;
        continue;
      }

      if (arg.startsWith("--") && arg.length > 2) {
        this.parseLongOption(arg, result);
        i++;
        continue;
      }

      if (arg.startsWith("-") && arg.length > 1 && arg[1] !== "-") {
        i = this.parseShortOption(args, i, result);
        continue;
      }

      if (this.allowWindowsStyle && arg.startsWith("/") && arg.length > 1) {
        i = this.consumeValue(arg.slice(1), args, i, result);
        continue;
      }

      result.addPositional(arg);
      i++;
    }

    return result;
  }

  /** Option-like tokens are never consumed as another option's value. */
  isOptionLike(token: string): boolean {
    if (token.length === 0) {
      return false;
    }
    return token.startsWith("-") || (this.allowWindowsStyle && token.startsWith("/"));
  }

  private parseLongOption(arg: string, result: ParsedArguments): void {
    const option = arg.slice(2);
    const equalIndex = option.indexOf("=");

    if (equalIndex > 0) {
      result.addOption(option.slice(0, equalIndex), option.slice(equalIndex + 1));
      return;
    }

    // long options never take the next token as their value
    result.addOption(option);
  }

  private parseShortOption(args: readonly string[], index: number, result: ParsedArguments): number {
    const options = (args[index] ?? "").slice(1);

    if (options.length === 1) {
      return this.consumeValue(options, args, index, result);
    }

    if (this.allowCombinedShortOptions) {
      for (const flag of options) {
        result.addOption(flag);
      }
      return index + 1;
    }

    result.addOption(options);
    return index + 1;
  }

  private consumeValue(name: string, args: readonly string[], index: number, result: ParsedArguments): number {
    const next = args[index + 1];
    if (next !== undefined && !this.isOptionLike(next)) {
      result.addOption(name, next);
      return index + 2;
    }

    result.addOption(name);
    return index + 1;
  }
}

export function parseArgs(argv: readonly string[], options?: ArgumentParserOptions): ParsedArguments {
  return new ArgumentParser(options).parse(argv);
}
