import { z } from "zod";
import { ConfigurationError, getLogLevel } from "@argkit/cli-core";
import type { LogLevel } from "@argkit/cli-core";

const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export const CliConfigSchema = z
  .object({
    programName: z.string().min(1).optional(),
    allowWindowsStyle: z.boolean().default(true),
    allowCombinedShortOptions: z.boolean().default(true),
    logLevel: z.enum(LOG_LEVELS).optional(),
    color: z.boolean().optional(),
  })
  .strict();

export type CliConfigInput = z.input<typeof CliConfigSchema>;

export interface CliConfig {
  programName?: string;
  allowWindowsStyle: boolean;
  allowCombinedShortOptions: boolean;
  logLevel: LogLevel;
  color: boolean;
}

/**
 * Validate host configuration and fill in environment-derived defaults.
 * Color is on only when `NO_COLOR` is unset and stdout is a terminal.
 */
export function resolveCliConfig(
  input: unknown = {},
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true,
): CliConfig {
  const parsed = CliConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }

  const { programName, allowWindowsStyle, allowCombinedShortOptions, logLevel, color } = parsed.data;
  return {
    programName,
    allowWindowsStyle,
    allowCombinedShortOptions,
    logLevel: logLevel ?? getLogLevel(env),
    color: color ?? (env.NO_COLOR === undefined && isTTY),
  };
}
