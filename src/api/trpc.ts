import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Domain error class (PatternError, TransportError, ...) when there is one.
        errorName: error.cause instanceof Error ? error.cause.name : null,
      },
    };
  },
});

export const router = t.router;

export const publicProcedure = t.procedure;

/**
 * Calls procedures directly without HTTP transport; used by the tests.
 */
export const createCallerFactory = t.createCallerFactory;
