import { TRPCError } from "@trpc/server";
import {
  FeedConflictError,
  FeedNotFoundError,
  InvalidArgumentError,
  PatternError,
  ProtocolError,
  TransportError,
  errorMessage,
} from "../errors";

export function toTrpcError(err: unknown): TRPCError {
  if (err instanceof TRPCError) return err;

  const message = errorMessage(err);
  if (err instanceof PatternError || err instanceof InvalidArgumentError) {
    return new TRPCError({ code: "BAD_REQUEST", message, cause: err });
  }
  if (err instanceof FeedNotFoundError) {
    return new TRPCError({ code: "NOT_FOUND", message, cause: err });
  }
  if (err instanceof FeedConflictError) {
    return new TRPCError({ code: "CONFLICT", message, cause: err });
  }
  if (err instanceof TransportError || err instanceof ProtocolError) {
    return new TRPCError({ code: "BAD_GATEWAY", message, cause: err });
  }
  return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message, cause: err });
}

/** Runs a procedure body, translating domain errors into tRPC errors. */
export async function withDomainErrors<T>(
  fn: () => T | Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toTrpcError(err);
  }
}
