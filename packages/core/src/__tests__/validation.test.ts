import { describe, it, expect } from "vitest";
import { DefaultArgumentValidator, ValidationResult } from "../validation";
import { ArgumentParser } from "../parser/argument-parser";
import { bindArguments } from "../router";
import { defineArgument, defineCommand, defineOption } from "../definitions/types";

class NoopCommand {}

const deploy = defineCommand({
  name: "deploy",
  commandType: NoopCommand,
  options: [
    defineOption({ name: "env", shortName: "e", required: true }),
    defineOption({ name: "token", required: true }),
    defineOption({ name: "dry-run" }),
  ],
  arguments: [
    defineArgument({ name: "target", position: 1, required: true }),
    defineArgument({ name: "service", position: 0, required: true }),
  ],
});

function validate(argv: string[]): ValidationResult {
  const parsed = bindArguments(new ArgumentParser().parse(argv), deploy);
  return new DefaultArgumentValidator().validate(parsed, deploy);
}

describe("DefaultArgumentValidator", () => {
  it("passes when everything required is present", () => {
    const result = validate(["api", "prod", "--env", "staging", "--token=test-secret"]);
    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("accepts a required option given by its short name", () => {
    expect(validate(["api", "prod", "-e", "staging", "--token", "test-secret"]).isValid).toBe(true);
  });

  it("reports missing options before missing arguments, arguments by position", () => {
    const result = validate([]);
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { message: "Required option '--env/-e' is missing.", parameterName: "env" },
      { message: "Required option '--token' is missing.", parameterName: "token" },
      { message: "Required argument 'service' is missing.", parameterName: "service" },
      { message: "Required argument 'target' is missing.", parameterName: "target" },
    ]);
  });
});

describe("ValidationResult", () => {
  it("starts valid", () => {
    const result = ValidationResult.success();
    expect(result.isValid).toBe(true);
    result.addError("broken");
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([{ message: "broken" }]);
  });
});
