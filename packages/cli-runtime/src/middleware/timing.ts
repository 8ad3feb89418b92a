import type { MiddlewareConfig } from "./middleware-pipeline";

export function formatTiming(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

export function createTimingMiddleware(now: () => number = Date.now): MiddlewareConfig {
  return {
    name: "timing",
    middleware: async (ctx, next) => {
      const started = now();
      try {
        return await next(ctx);
      } finally {
        const total = now() - started;
        ctx.diagnostics.push(`runtime: ${formatTiming(total)}`);
        ctx.logger.debug(`[runtime] ${ctx.commandName} executed in ${total}ms`, { durationMs: total });
      }
    },
  };
}
