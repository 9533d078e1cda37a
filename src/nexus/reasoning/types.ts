/**
 * Reasoning service contracts.
 *
 * The orchestrator only ever calls `generate`; every provider failure is
 * normalized to a ReasoningServiceError so loops can tell it apart from
 * capability failures.
 */

import type { CapabilityDeclaration } from "../capabilities/types.js";
import type { History, Message } from "../messages.js";
import { specialistMessage } from "../messages.js";

export type ReasoningErrorType =
  | "rate_limited"      // Provider rate limit hit
  | "timeout"           // Request timed out
  | "aborted"           // Cancelled by the run (deadline or caller)
  | "auth_error"        // Invalid API key or auth failure
  | "invalid_request"   // Malformed request (terminal error)
  | "provider_error"    // Provider-side issue (5xx)
  | "context_length"    // Input too long for model
  | "malformed_response"
  | "unknown";

export class ReasoningServiceError extends Error {
  readonly type: ReasoningErrorType;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(
    type: ReasoningErrorType,
    message: string,
    options?: {
      retryable?: boolean;
      retryAfterMs?: number;
      provider?: string;
      statusCode?: number;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ReasoningServiceError";
    this.type = type;
    this.retryable = options?.retryable ?? isDefaultRetryable(type);
    if (options?.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
    if (options?.provider !== undefined) {
      this.provider = options.provider;
    }
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      ...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
      ...(this.provider !== undefined && { provider: this.provider }),
      ...(this.statusCode !== undefined && { statusCode: this.statusCode })
    };
  }
}

function isDefaultRetryable(type: ReasoningErrorType): boolean {
  switch (type) {
    case "rate_limited":
    case "timeout":
    case "provider_error":
      return true;
    default:
      return false;
  }
}

/**
 * Anything thrown by a client that is not already a ReasoningServiceError.
 */
export function toReasoningServiceError(err: unknown, provider?: string): ReasoningServiceError {
  if (err instanceof ReasoningServiceError) return err;
  const base = provider !== undefined ? { provider } : {};
  if (err instanceof Error) {
    return new ReasoningServiceError("unknown", err.message, { ...base, cause: err });
  }
  return new ReasoningServiceError("unknown", "Unknown error during reasoning call", base);
}

export type ReasoningInput = {
  /** System directive for this call (routing, specialist or synthesis) */
  directive: string;
  /** Conversation so far, oldest first */
  history: History;
  /** Capabilities the model may request; omit for plain text generation */
  capabilities?: readonly CapabilityDeclaration[];
  /** Model override (e.g. the router model) */
  model?: string;
  /** Temperature (0-2, lower = more deterministic) */
  temperature?: number;
  maxTokens?: number;
  abortSignal?: AbortSignal;
};

export interface ReasoningClient {
  /**
   * Produce the next specialist-role message. It may carry capability requests.
   * @throws ReasoningServiceError
   */
  generate(input: ReasoningInput): Promise<Message>;

  isConfigured(): boolean;

  readonly provider: string;

  readonly model: string;
}

export const STUB_NOTICE =
  "[Reasoning disabled - no REASONING_API_KEY configured. Set one to enable routing and specialist answers.]";

/**
 * Client used when no provider key is configured.
 */
export class StubReasoningClient implements ReasoningClient {
  readonly provider = "stub";
  readonly model = "none";

  generate(_input: ReasoningInput): Promise<Message> {
    return Promise.resolve(specialistMessage(STUB_NOTICE));
  }

  isConfigured(): boolean {
    return false;
  }
}
