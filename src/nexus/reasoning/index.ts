/**
 * Reasoning service module.
 *
 * Exports:
 * - Contracts and the normalized error type
 * - OpenAI-compatible client
 * - Factory choosing a client from configuration
 */

export type { ReasoningErrorType, ReasoningInput, ReasoningClient } from "./types.js";
export { ReasoningServiceError, StubReasoningClient, STUB_NOTICE, toReasoningServiceError } from "./types.js";
export { OpenAIClient, createOpenAIClient, toOpenAIMessages } from "./openai.js";
export type { OpenAIClientOptions } from "./openai.js";

import type { ReasoningConfig } from "../config.js";
import { StubReasoningClient } from "./types.js";
import { createOpenAIClient } from "./openai.js";
import type { ReasoningClient } from "./types.js";

/**
 * Stub client when no provider key is configured.
 */
export function createReasoningClient(config: ReasoningConfig): ReasoningClient {
  return createOpenAIClient(config) ?? new StubReasoningClient();
}
