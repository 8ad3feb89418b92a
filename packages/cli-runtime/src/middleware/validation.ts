import { DefaultArgumentValidator, EXIT_CODES } from "@argkit/cli-core";
import type { ArgumentValidator } from "@argkit/cli-core";
import type { MiddlewareConfig } from "./middleware-pipeline";

/** Reports missing required options/arguments and stops before the command runs. */
export function createValidationMiddleware(
  validator: ArgumentValidator = new DefaultArgumentValidator(),
): MiddlewareConfig {
  return {
    name: "validation",
    middleware: async (ctx, next) => {
      const result = validator.validate(ctx.arguments, ctx.definition);
      if (!result.isValid) {
        ctx.output.writeError("Validation errors:");
        for (const error of result.errors) {
          ctx.output.writeError(`  - ${error.message}`);
        }
        ctx.logger.debug("validation failed", {
          command: ctx.commandName,
          errors: result.errors.length,
        });
        return EXIT_CODES.GENERIC;
      }
      return next(ctx);
    },
  };
}
