/**
 * @module @argkit/cli-runtime/middleware/middleware-pipeline
 * Onion composition of command middlewares
 */

import { PipelineSealedError } from "@argkit/cli-core";
import type { CommandContext } from "../context/command-context";

export type CommandHandler = (ctx: CommandContext) => Promise<number>;

/**
 * Either calls `next` (before and/or after its own work) or returns an exit
 * code without calling it to short-circuit the rest of the chain.
 */
export type CommandMiddleware = (ctx: CommandContext, next: CommandHandler) => Promise<number>;

export interface MiddlewareConfig {
  name: string;
  middleware: CommandMiddleware;
}

export class MiddlewarePipeline {
  private readonly middlewares: MiddlewareConfig[] = [];
  private built = false;

  get isBuilt(): boolean {
    return this.built;
  }

  get names(): string[] {
    return this.middlewares.map((m) => m.name);
  }

  use(config: MiddlewareConfig): this {
    if (this.built) {
      throw new PipelineSealedError(config.name);
    }
    this.middlewares.push(config);
    return this;
  }

  /**
   * Wrap `finalHandler` so that the first registered middleware is outermost.
   * The pipeline accepts no further middleware afterwards.
   */
  build(finalHandler: CommandHandler): CommandHandler {
    this.built = true;

    let handler: CommandHandler = finalHandler;
    for (const { middleware } of [...this.middlewares].reverse()) {
      const next = handler;
      handler = (ctx) => middleware(ctx, next);
    }
    return handler;
  }
}
