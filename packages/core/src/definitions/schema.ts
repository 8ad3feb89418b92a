/**
 * Zod schema for command definitions, checked when a command is registered.
 */

import { z } from "zod";
import type { ValueType } from "../convert/value-types";
import type { CommandDefinition, CommandType } from "./types";

const SEGMENT = /^[^\s.]+$/;
const PARENT_PATH = /^[^\s.]+(\.[^\s.]+)*$/;
const OPTION_NAME = /^[^\s=\-/][^\s=]*$/;
const SHORT_NAME = /^[^\s=\-/]$/;

const ValueTypeSchema = z.custom<ValueType<unknown>>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "parse" in value &&
    typeof value.parse === "function",
  { message: "valueType must be a value type descriptor" },
);

const CommandTypeSchema = z.custom<CommandType>(
  (value) => typeof value === "function",
  { message: "commandType must be a constructor" },
);

const OptionDefinitionSchema = z.object({
  name: z.string().min(1).regex(OPTION_NAME, "Option name must not start with '-' or contain whitespace or '='"),
  shortName: z.string().regex(SHORT_NAME, "Short name must be a single character other than '-', '/' or '='").optional(),
  description: z.string().optional(),
  required: z.boolean(),
  valueType: ValueTypeSchema,
  defaultValue: z.unknown().optional(),
  hasValue: z.boolean(),
  allowMultiple: z.boolean(),
});

const ArgumentDefinitionSchema = z.object({
  name: z.string().min(1).regex(SEGMENT, "Argument name must not contain whitespace or '.'"),
  description: z.string().optional(),
  valueType: ValueTypeSchema,
  required: z.boolean(),
  defaultValue: z.unknown().optional(),
  position: z.number().int().min(0),
});

export const CommandDefinitionSchema = z
  .object({
    name: z.string().min(1).regex(SEGMENT, "Command name must not contain whitespace or '.'"),
    description: z.string().optional(),
    aliases: z.array(z.string().min(1).regex(SEGMENT, "Alias must not contain whitespace or '.'")),
    parent: z.string().regex(PARENT_PATH, "Parent must be a dotted command path").optional(),
    commandType: CommandTypeSchema,
    options: z.array(OptionDefinitionSchema),
    arguments: z.array(ArgumentDefinitionSchema),
    disableHelp: z.boolean(),
    hidden: z.boolean(),
  })
  .superRefine((definition, ctx) => {
    const seenNames = new Set<string>();
    const seenShort = new Set<string>();
    definition.options.forEach((option, index) => {
      const name = option.name.toLowerCase();
      if (seenNames.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["options", index, "name"],
          message: `Option '--${option.name}' is declared more than once`,
        });
      }
      seenNames.add(name);

      if (option.shortName !== undefined) {
        const short = option.shortName.toLowerCase();
        if (seenShort.has(short)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["options", index, "shortName"],
            message: `Short name '-${option.shortName}' is used by more than one option`,
          });
        }
        seenShort.add(short);
      }
    });

    const seenPositions = new Set<number>();
    const seenArguments = new Set<string>();
    definition.arguments.forEach((argument, index) => {
      if (seenPositions.has(argument.position)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["arguments", index, "position"],
          message: `Position ${argument.position} is used by more than one argument`,
        });
      }
      seenPositions.add(argument.position);

      const name = argument.name.toLowerCase();
      if (seenArguments.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["arguments", index, "name"],
          message: `Argument '${argument.name}' is declared more than once`,
        });
      }
      seenArguments.add(name);
    });
  });

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Validate a command definition.
 * Returns the list of problems; empty when the definition is usable.
 */
export function validateCommandDefinition(definition: CommandDefinition): string[] {
  const result = CommandDefinitionSchema.safeParse(definition);
  if (result.success) {
    return [];
  }
  return result.error.issues.map(formatIssue);
}
