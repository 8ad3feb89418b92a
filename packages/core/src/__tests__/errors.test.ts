import { describe, it, expect } from "vitest";
import {
  CLI_ERROR_CODES,
  EXIT_CODES,
  CliError,
  ConfigurationError,
  InvalidDefinitionError,
  PipelineSealedError,
  TypeConversionError,
  isCliError,
  serializeCliError,
} from "../errors";

describe("CLI Errors", () => {
  describe("CLI_ERROR_CODES", () => {
    it("should contain expected error codes", () => {
      expect(CLI_ERROR_CODES.E_DUPLICATE_NAME).toBe("E_DUPLICATE_NAME");
      expect(CLI_ERROR_CODES.E_COMMAND_NOT_FOUND).toBe("E_COMMAND_NOT_FOUND");
      expect(CLI_ERROR_CODES.E_TYPE_CONVERSION).toBe("E_TYPE_CONVERSION");
      expect(CLI_ERROR_CODES.E_INVALID_CONFIG).toBe("E_INVALID_CONFIG");
    });
  });

  describe("EXIT_CODES", () => {
    it("should contain expected exit codes", () => {
      expect(EXIT_CODES.SUCCESS).toBe(0);
      expect(EXIT_CODES.GENERIC).toBe(1);
    });
  });

  describe("CliError", () => {
    it("should carry code and details", () => {
      const error = new CliError(CLI_ERROR_CODES.E_COMMAND_NOT_FOUND, "missing", { name: "x" });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("CliError");
      expect(error.code).toBe("E_COMMAND_NOT_FOUND");
      expect(error.details).toEqual({ name: "x" });
    });

    it("should name subclasses after themselves", () => {
      const error = new TypeConversionError("abc", "int");

      expect(error).toBeInstanceOf(CliError);
      expect(error.name).toBe("TypeConversionError");
      expect(error.message).toBe("Cannot convert 'abc' to int.");
      expect(error.details).toEqual({ raw: "abc", targetType: "int" });
    });

    it("should join definition and configuration issues", () => {
      expect(new InvalidDefinitionError("serve", ["a", "b"]).message).toBe(
        "Invalid definition for command 'serve': a; b",
      );
      expect(new ConfigurationError(["color: Expected boolean, received string"]).message).toBe(
        "Invalid CLI configuration: color: Expected boolean, received string",
      );
      expect(new PipelineSealedError("timing").message).toBe(
        "Cannot add middleware 'timing': the pipeline has already been built.",
      );
    });
  });

  describe("isCliError", () => {
    it("should identify CliError instances", () => {
      expect(isCliError(new CliError(CLI_ERROR_CODES.E_TYPE_CONVERSION, "x"))).toBe(true);
    });

    it("should identify objects with a known code", () => {
      expect(isCliError({ code: "E_DUPLICATE_NAME" })).toBe(true);
      expect(isCliError({ code: "E_UNKNOWN" })).toBe(false);
    });

    it("should reject non-error values", () => {
      expect(isCliError(new Error("x"))).toBe(false);
      expect(isCliError(null)).toBe(false);
      expect(isCliError("E_DUPLICATE_NAME")).toBe(false);
    });
  });

  describe("serializeCliError", () => {
    it("should serialize CliError without stack by default", () => {
      const serialized = serializeCliError(new TypeConversionError("x", "int"));

      expect(serialized).toEqual({
        name: "TypeConversionError",
        message: "Cannot convert 'x' to int.",
        code: "E_TYPE_CONVERSION",
        details: { raw: "x", targetType: "int" },
      });
    });

    it("should include the stack on request", () => {
      const serialized = serializeCliError(new CliError(CLI_ERROR_CODES.E_INVALID_CONFIG, "bad"), {
        includeStack: true,
      });
      expect(typeof serialized.stack).toBe("string");
    });

    it("should serialize plain errors and other values", () => {
      expect(serializeCliError(new RangeError("too big"))).toEqual({ name: "RangeError", message: "too big" });
      expect(serializeCliError(42)).toEqual({ name: "Error", message: "42" });
    });
  });
});
