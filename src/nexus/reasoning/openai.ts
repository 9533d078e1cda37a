/**
 * OpenAI-compatible reasoning client with function calling.
 *
 * Works with:
 * - OpenAI API
 * - DeepSeek (default endpoint)
 * - OpenAI-compatible servers (Ollama, LM Studio, vLLM, etc.)
 */

import { z } from "zod";
import type { ReasoningConfig } from "../config.js";
import type { CapabilityRequest, Message } from "../messages.js";
import { specialistMessage } from "../messages.js";
import type { CapabilityDeclaration } from "../capabilities/types.js";
import type { ReasoningClient, ReasoningErrorType, ReasoningInput } from "./types.js";
import { ReasoningServiceError } from "./types.js";

type OpenAIToolCall = {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
};

type OpenAIMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: OpenAIToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

type OpenAITool = {
  type: "function";
  function: CapabilityDeclaration;
};

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function"),
  function: z.object({ name: z.string(), arguments: z.string() })
});

const ResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
        tool_calls: z.array(ToolCallSchema).optional()
      })
    })
  )
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string().optional() }).optional()
});

export type OpenAIClientOptions = {
  apiKey: string;
  baseUrl?: string;
  model: string;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
};

function parseArguments(raw: string): unknown {
  if (raw.trim().length === 0) return {};
  try {
    return JSON.parse(raw);
  } catch {
    // handed on as text; the registry reports it as invalid arguments
    return raw;
  }
}

function serializeArguments(args: unknown): string {
  return typeof args === "string" ? args : JSON.stringify(args ?? {});
}

export function toOpenAIMessages(input: ReasoningInput): OpenAIMessage[] {
  const messages: OpenAIMessage[] = [{ role: "system", content: input.directive }];

  for (const message of input.history) {
    switch (message.role) {
      case "directive":
        messages.push({ role: "system", content: message.content });
        break;
      case "user":
        messages.push({ role: "user", content: message.content });
        break;
      case "specialist": {
        const calls = message.capabilityRequests ?? [];
        if (calls.length > 0) {
          messages.push({
            role: "assistant",
            content: message.content.length > 0 ? message.content : null,
            tool_calls: calls.map((c): OpenAIToolCall => ({
              id: c.id,
              type: "function",
              function: { name: c.name, arguments: serializeArguments(c.args) }
            }))
          });
        } else {
          messages.push({ role: "assistant", content: message.content });
        }
        break;
      }
      case "capability_result":
        messages.push({
          role: "tool",
          tool_call_id: message.capabilityResult?.requestId ?? "",
          content: message.content
        });
        break;
    }
  }

  return messages;
}

export class OpenAIClient implements ReasoningClient {
  readonly provider = "openai";
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIClientOptions) {
    if (!options.apiKey) {
      throw new Error("OpenAI client requires apiKey");
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 60_000;
    this.defaultMaxTokens = options.defaultMaxTokens ?? 4096;
    this.defaultTemperature = options.defaultTemperature ?? 0.1;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(input: ReasoningInput): Promise<Message> {
    if (input.abortSignal?.aborted) {
      throw new ReasoningServiceError("aborted", "Reasoning call cancelled", { provider: this.provider });
    }

    const body: Record<string, unknown> = {
      model: input.model ?? this.model,
      messages: toOpenAIMessages(input),
      max_tokens: input.maxTokens ?? this.defaultMaxTokens,
      temperature: input.temperature ?? this.defaultTemperature
    };
    if (input.capabilities && input.capabilities.length > 0) {
      const tools: OpenAITool[] = input.capabilities.map((c): OpenAITool => ({ type: "function", function: c }));
      body.tools = tools;
    }

    const controller = new AbortController();
    let timedOut = false;
    const onAbort = (): void => controller.abort();
    input.abortSignal?.addEventListener("abort", onAbort, { once: true });
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.defaultTimeoutMs);

    const fetchImpl = this.fetchImpl;
    try {
      const response = await fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });

      if (!response.ok) {
        throw await this.handleErrorResponse(response);
      }

      const parsed = ResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ReasoningServiceError("malformed_response", "Response did not match the chat completion shape", {
          provider: this.provider,
          cause: parsed.error
        });
      }
      const choice = parsed.data.choices[0];
      if (!choice) {
        throw new ReasoningServiceError("malformed_response", "Response contained no choices", {
          provider: this.provider
        });
      }

      const requests: CapabilityRequest[] = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        args: parseArguments(call.function.arguments)
      }));
      return specialistMessage(choice.message.content ?? "", requests);

    } catch (err) {
      if (err instanceof ReasoningServiceError) {
        throw err;
      }
      if (err instanceof Error && err.name === "AbortError") {
        if (timedOut) {
          throw new ReasoningServiceError("timeout", `Request timed out after ${this.defaultTimeoutMs}ms`, {
            provider: this.provider
          });
        }
        throw new ReasoningServiceError("aborted", "Reasoning call cancelled", { provider: this.provider });
      }
      if (err instanceof Error) {
        throw new ReasoningServiceError("unknown", err.message, { provider: this.provider, cause: err });
      }
      throw new ReasoningServiceError("unknown", "Unknown error during reasoning call", {
        provider: this.provider
      });
    } finally {
      clearTimeout(timeoutId);
      input.abortSignal?.removeEventListener("abort", onAbort);
    }
  }

  private async handleErrorResponse(response: Response): Promise<ReasoningServiceError> {
    const status = response.status;
    let message = `HTTP ${status}`;
    let retryAfterMs: number | undefined;

    try {
      const errorData = ErrorBodySchema.safeParse(await response.json());
      if (errorData.success) {
        message = errorData.data.error?.message ?? message;
      }
    } catch {
      // body is not JSON; keep the status line
      message = `HTTP ${status} ${response.statusText}`.trim();
    }

    const retryAfter = response.headers.get("Retry-After");
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        retryAfterMs = seconds * 1000;
      }
    }

    let errorType: ReasoningErrorType;
    switch (status) {
      case 401:
      case 403:
        errorType = "auth_error";
        break;
      case 429:
        errorType = "rate_limited";
        retryAfterMs = retryAfterMs ?? 5000;
        break;
      case 400:
        errorType = /context length|maximum context/i.test(message) ? "context_length" : "invalid_request";
        break;
      default:
        errorType = status >= 500 ? "provider_error" : "unknown";
    }

    const errorOptions: { provider: string; statusCode: number; retryAfterMs?: number } = {
      provider: this.provider,
      statusCode: status
    };
    if (retryAfterMs !== undefined) {
      errorOptions.retryAfterMs = retryAfterMs;
    }
    return new ReasoningServiceError(errorType, message, errorOptions);
  }
}

/**
 * Client for the configured endpoint, or null when no key is set.
 */
export function createOpenAIClient(config: ReasoningConfig): OpenAIClient | null {
  if (!config.apiKey) {
    return null;
  }
  return new OpenAIClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    defaultTimeoutMs: config.timeoutMs
  });
}
