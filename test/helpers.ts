import { ROUTING_DIRECTIVE } from "../src/nexus/orchestrator/router.js";
import { specialistMessage } from "../src/nexus/messages.js";
import type { CapabilityRequest, Message, SpecialistId } from "../src/nexus/messages.js";
import { ReasoningServiceError } from "../src/nexus/reasoning/types.js";
import type { ReasoningClient, ReasoningInput } from "../src/nexus/reasoning/types.js";
import { SPECIALISTS } from "../src/nexus/specialists.js";

export type Caller = "router" | "synthesis" | SpecialistId;

/** Which stage issued a reasoning call, judged by its directive. */
export function callerOf(input: ReasoningInput): Caller {
  if (input.directive === ROUTING_DIRECTIVE) return "router";
  for (const specialist of Object.values(SPECIALISTS)) {
    if (input.directive === specialist.directive) return specialist.id;
  }
  return "synthesis";
}

export type Responder = (input: ReasoningInput, caller: Caller) => Message | Promise<Message>;

/**
 * Reasoning client driven by a test-supplied function; records every call.
 */
export class ScriptedReasoningClient implements ReasoningClient {
  readonly provider = "scripted";
  readonly model = "scripted-model";
  readonly calls: Array<{ caller: Caller; input: ReasoningInput }> = [];
  private readonly responder: Responder;

  constructor(responder: Responder) {
    this.responder = responder;
  }

  async generate(input: ReasoningInput): Promise<Message> {
    const caller = callerOf(input);
    this.calls.push({ caller, input });
    return this.responder(input, caller);
  }

  isConfigured(): boolean {
    return true;
  }

  callsBy(caller: Caller): ReasoningInput[] {
    return this.calls.filter((c) => c.caller === caller).map((c) => c.input);
  }
}

export function text(content: string): Message {
  return specialistMessage(content);
}

export function requests(...calls: CapabilityRequest[]): Message {
  return specialistMessage("", calls);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Never settles on its own; rejects once the call's signal aborts. */
export function hang(input: ReasoningInput): Promise<Message> {
  return new Promise<Message>((_resolve, reject) => {
    input.abortSignal?.addEventListener(
      "abort",
      () => reject(new ReasoningServiceError("aborted", "Reasoning call cancelled")),
      { once: true }
    );
  });
}
