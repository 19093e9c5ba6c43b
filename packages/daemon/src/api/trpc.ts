import { initTRPC } from "@trpc/server";
import type { TRPCContext } from "./context.js";
import { toTRPCError } from "./errors.js";

const t = initTRPC.context<TRPCContext>().create();

// Domain errors reach clients with a matching code instead of INTERNAL_SERVER_ERROR
const mapDomainErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    const mapped = toTRPCError(result.error.cause);
    if (mapped) throw mapped;
  }
  return result;
});

export const router = t.router;
export const procedure = t.procedure.use(mapDomainErrors);
export const createCallerFactory = t.createCallerFactory;
