export type NexusErrorCode =
  | "BAD_REQUEST"
  | "INVALID_CONFIG"
  | "REASONING_SERVICE_ERROR"
  | "ALL_SPECIALISTS_FAILED"
  | "RUN_CANCELLED"
  | "INTERNAL";

export class NexusError extends Error {
  readonly code: NexusErrorCode;
  readonly details?: unknown;

  constructor(code: NexusErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "NexusError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: NexusErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function toNexusError(err: unknown): NexusError {
  if (err instanceof NexusError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError" && "issues" in err) {
      return new NexusError("BAD_REQUEST", "Validation error", { issues: err.issues });
    }
    return new NexusError("INTERNAL", err.message, { name: err.name });
  }
  return new NexusError("INTERNAL", "Unknown error", { err });
}

export type CapabilityErrorReason =
  | "unknown_capability"
  | "invalid_arguments"
  | "handler_failed"
  | "invalid_result"
  | "aborted";

/**
 * Failure of a single capability invocation. Never thrown past the registry:
 * it travels back to the specialist as data.
 */
export class CapabilityError extends Error {
  readonly reason: CapabilityErrorReason;
  readonly capability: string;

  constructor(reason: CapabilityErrorReason, capability: string, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CapabilityError";
    this.reason = reason;
    this.capability = capability;
  }

  toJSON(): { reason: CapabilityErrorReason; capability: string; message: string } {
    return { reason: this.reason, capability: this.capability, message: this.message };
  }
}

/**
 * Anything thrown while invoking a capability, as a CapabilityError.
 */
export function toCapabilityError(err: unknown, capability: string): CapabilityError {
  if (err instanceof CapabilityError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CapabilityError("handler_failed", capability, message, { cause: err });
}
