import type { CommandDefinition } from "./definitions/types";
import { orderedArguments } from "./definitions/types";
import type { ParsedArguments } from "./parser/parsed-arguments";

export interface ValidationError {
  message: string;
  parameterName?: string;
}

export class ValidationResult {
  private readonly entries: ValidationError[] = [];

  get isValid(): boolean {
    return this.entries.length === 0;
  }

  get errors(): readonly ValidationError[] {
    return this.entries;
  }

  addError(message: string, parameterName?: string): void {
    this.entries.push(parameterName === undefined ? { message } : { message, parameterName });
  }

  static success(): ValidationResult {
    return new ValidationResult();
  }
}

export interface ArgumentValidator {
  validate(args: ParsedArguments, definition: CommandDefinition): ValidationResult;
}

/** Checks that required options and arguments were supplied. */
export class DefaultArgumentValidator implements ArgumentValidator {
  validate(args: ParsedArguments, definition: CommandDefinition): ValidationResult {
    const result = new ValidationResult();

    for (const option of definition.options) {
      if (!option.required) {
        continue;
      }
      const present =
        args.hasOption(option.name) ||
        (option.shortName !== undefined && args.hasOption(option.shortName));
      if (!present) {
        const display = option.shortName !== undefined
          ? `--${option.name}/-${option.shortName}`
          : `--${option.name}`;
        result.addError(`Required option '${display}' is missing.`, option.name);
      }
    }

    for (const argument of orderedArguments(definition)) {
      if (argument.required && !args.hasNamedArgument(argument.name)) {
        result.addError(`Required argument '${argument.name}' is missing.`, argument.name);
      }
    }

    return result;
  }
}
