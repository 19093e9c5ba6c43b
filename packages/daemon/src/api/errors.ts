import { TRPCError } from "@trpc/server";
import {
  CapabilityIncompatibleError,
  CapabilityNotFoundError,
  ConfigurationError,
  ExecutionFailedError,
  RuleNotFoundError,
} from "../engine/errors.js";

type ErrorCode = ConstructorParameters<typeof TRPCError>[0]["code"];

export function toTRPCError(err: unknown): TRPCError | null {
  let code: ErrorCode;
  if (err instanceof RuleNotFoundError || err instanceof CapabilityNotFoundError) code = "NOT_FOUND";
  else if (err instanceof ConfigurationError) code = "BAD_REQUEST";
  else if (err instanceof CapabilityIncompatibleError) code = "PRECONDITION_FAILED";
  else if (err instanceof ExecutionFailedError) code = "INTERNAL_SERVER_ERROR";
  else return null;

  return new TRPCError({ code, message: err.message, cause: err });
}
