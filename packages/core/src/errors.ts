export const CLI_ERROR_CODES = {
  E_DUPLICATE_NAME: "E_DUPLICATE_NAME",
  E_COMMAND_NOT_FOUND: "E_COMMAND_NOT_FOUND",
  E_TYPE_CONVERSION: "E_TYPE_CONVERSION",
  E_INVALID_DEFINITION: "E_INVALID_DEFINITION",
  E_REGISTRY_SEALED: "E_REGISTRY_SEALED",
  E_PIPELINE_SEALED: "E_PIPELINE_SEALED",
  E_INVALID_CONFIG: "E_INVALID_CONFIG",
} as const;

export type CliErrorCode = typeof CLI_ERROR_CODES[keyof typeof CLI_ERROR_CODES];

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERIC: 1, // no command, validation failure, any uncaught error
} as const;

const ERROR_CODE_SET: ReadonlySet<string> = new Set<string>(Object.values(CLI_ERROR_CODES));

export class CliError extends Error {
  code: CliErrorCode;
  details?: unknown;

  constructor(code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A command name or alias collides with one already in the registry. */
export class DuplicateNameError extends CliError {
  readonly duplicate: string;

  constructor(duplicate: string, kind: "Command" | "Command alias") {
    super(CLI_ERROR_CODES.E_DUPLICATE_NAME, `${kind} '${duplicate}' is already registered.`, { name: duplicate });
    this.name = "DuplicateNameError";
    this.duplicate = duplicate;
  }
}

export class CommandNotFoundError extends CliError {
  constructor(name: string) {
    super(CLI_ERROR_CODES.E_COMMAND_NOT_FOUND, `Command '${name}' not found.`, { name });
    this.name = "CommandNotFoundError";
  }
}

export class TypeConversionError extends CliError {
  readonly raw: string;
  readonly targetType: string;

  constructor(raw: string, targetType: string, reason?: string) {
    super(
      CLI_ERROR_CODES.E_TYPE_CONVERSION,
      `Cannot convert '${raw}' to ${targetType}${reason ? `: ${reason}` : ""}.`,
      { raw, targetType },
    );
    this.name = "TypeConversionError";
    this.raw = raw;
    this.targetType = targetType;
  }
}

export class InvalidDefinitionError extends CliError {
  readonly issues: string[];

  constructor(command: string, issues: string[]) {
    super(
      CLI_ERROR_CODES.E_INVALID_DEFINITION,
      `Invalid definition for command '${command}': ${issues.join("; ")}`,
      { command, issues },
    );
    this.name = "InvalidDefinitionError";
    this.issues = issues;
  }
}

export class RegistrySealedError extends CliError {
  constructor(name: string) {
    super(
      CLI_ERROR_CODES.E_REGISTRY_SEALED,
      `Cannot register command '${name}': the registry is sealed.`,
      { name },
    );
    this.name = "RegistrySealedError";
  }
}

export class PipelineSealedError extends CliError {
  constructor(middleware: string) {
    super(
      CLI_ERROR_CODES.E_PIPELINE_SEALED,
      `Cannot add middleware '${middleware}': the pipeline has already been built.`,
      { middleware },
    );
    this.name = "PipelineSealedError";
  }
}

export class ConfigurationError extends CliError {
  constructor(issues: string[]) {
    super(CLI_ERROR_CODES.E_INVALID_CONFIG, `Invalid CLI configuration: ${issues.join("; ")}`, { issues });
    this.name = "ConfigurationError";
  }
}

export function isCliError(err: unknown): err is CliError {
  if (err instanceof CliError) {
    return true;
  }
  if (!err || typeof err !== "object" || !("code" in err)) {
    return false;
  }
  return typeof err.code === "string" && ERROR_CODE_SET.has(err.code);
}

export interface SerializedCliError {
  name: string;
  message: string;
  code?: string;
  details?: unknown;
  stack?: string;
}

export function serializeCliError(
  err: unknown,
  opts: { includeStack?: boolean } = {},
): SerializedCliError {
  const includeStack = !!opts.includeStack;
  if (err instanceof CliError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      details: err.details,
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  if (err instanceof Error) {
    return {
      name: err.name || "Error",
      message: err.message,
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  return { name: "Error", message: String(err) };
}
