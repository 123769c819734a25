import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

export const router = t.router;

export const publicProcedure = t.procedure;

/**
 * Builds callers that invoke procedures without HTTP; used by tests.
 */
export const createCallerFactory = t.createCallerFactory;
