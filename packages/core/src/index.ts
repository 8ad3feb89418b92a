// Definitions and value types
export * from "./convert/value-types";
export * from "./convert/type-converter";
export * from "./definitions/types";
export { CommandDefinitionSchema, validateCommandDefinition } from "./definitions/schema";

// Parsing, registry and routing
export * from "./parser/parsed-arguments";
export * from "./parser/argument-parser";
export * from "./registry";
export * from "./router";
export * from "./validation";

// Error handling
export {
  CLI_ERROR_CODES,
  EXIT_CODES,
  CliError,
  CommandNotFoundError,
  ConfigurationError,
  DuplicateNameError,
  InvalidDefinitionError,
  PipelineSealedError,
  RegistrySealedError,
  TypeConversionError,
  isCliError,
  serializeCliError,
} from "./errors";
export type { CliErrorCode, SerializedCliError } from "./errors";

// Logging and output
export * from "./logger";
export * from "./presenter/types";
export * from "./presenter/text";
export * from "./presenter/colors";
