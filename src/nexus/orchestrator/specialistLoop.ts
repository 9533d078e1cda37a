/**
 * Per-specialist reasoning loop.
 *
 * REASON -> (CALL_TOOLS -> REASON)* -> DONE
 *
 * Each loop works on its own branch of the root history, so parallel
 * specialists never see each other's messages. The loop never throws:
 * reasoning failures end it as "degraded" and capability failures are fed
 * back to the specialist as error results.
 */

import type { CapabilityDeclaration, CapabilityInvoker, CapabilityOutcome } from "../capabilities/types.js";
import { toCapabilityError } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { HistoryBranch, capabilityResultMessage, hasCapabilityRequests } from "../messages.js";
import type { CapabilityRequest, History, Message, SpecialistId } from "../messages.js";
import { toReasoningServiceError } from "../reasoning/types.js";
import type { ReasoningClient, ReasoningInput } from "../reasoning/types.js";
import type { SpecialistDefinition } from "../specialists.js";
import { ConcurrencyLimiter } from "../utils/concurrencyLimiter.js";
import type { RunEmitter, SpecialistStatus } from "./types.js";

const log = createChildLogger({ service: "SpecialistLoop" });

/** Low but non-zero, so wording varies while tool use stays focused. */
export const SPECIALIST_TEMPERATURE = 0.1;

export type LoopState = "REASON" | "CALL_TOOLS" | "DONE";

export type SpecialistLoopParams = {
  specialist: SpecialistDefinition;
  /** Root snapshot; copied, never written */
  root: History;
  reasoning: ReasoningClient;
  capabilities: CapabilityInvoker;
  maxIterations: number;
  maxConcurrentCapabilities: number;
  signal?: AbortSignal;
  emit?: RunEmitter;
  /** Called after each REASON step is counted */
  onIteration?: (iterations: number) => void;
  /** Called with the running total after each CALL_TOOLS step */
  onCapabilityCalls?: (total: number) => void;
};

export type SpecialistLoopResult = {
  status: SpecialistStatus;
  iterations: number;
  capabilityCalls: number;
  finalMessage?: string;
  error?: { type: string; message: string };
  /** The specialist's branch as it stood when the loop ended */
  history: History;
};

function usable(text: string | undefined): text is string {
  return text !== undefined && text.trim().length > 0;
}

async function invokeRequest(
  params: SpecialistLoopParams,
  request: CapabilityRequest
): Promise<Message> {
  const { specialist, capabilities, signal, emit } = params;
  const startedAt = Date.now();
  let outcome: CapabilityOutcome;
  try {
    outcome = await capabilities.invoke(specialist.id, request.name, request.args, signal ? { signal } : {});
  } catch (err) {
    // invokers other than the registry may still throw
    outcome = { ok: false, error: toCapabilityError(err, request.name) };
  }
  const durationMs = Date.now() - startedAt;

  emit?.({
    type: "capability_invoked",
    specialist: specialist.id,
    capability: request.name,
    ok: outcome.ok,
    durationMs
  });

  if (outcome.ok) {
    log.debug({ specialist: specialist.id, capability: request.name, durationMs }, "Capability invoked");
    return capabilityResultMessage(request, true, outcome.result);
  }

  log.warn(
    { specialist: specialist.id, capability: request.name, reason: outcome.error.reason },
    outcome.error.message
  );
  return capabilityResultMessage(request, false, outcome.error.message);
}

function listCapabilities(capabilities: CapabilityInvoker, specialist: SpecialistId): CapabilityDeclaration[] {
  try {
    return capabilities.list(specialist);
  } catch (err) {
    log.warn({ specialist, err }, "Capability listing failed, reasoning without capabilities");
    return [];
  }
}

export async function runSpecialistLoop(params: SpecialistLoopParams): Promise<SpecialistLoopResult> {
  const { specialist, reasoning, capabilities, maxIterations, signal, emit, onIteration, onCapabilityCalls } = params;
  const branch = new HistoryBranch(params.root);
  const declarations = listCapabilities(capabilities, specialist.id);
  const limiter = new ConcurrencyLimiter(params.maxConcurrentCapabilities);

  let state: LoopState = "REASON";
  let iterations = 0;
  let capabilityCalls = 0;
  let status: SpecialistStatus = "completed";
  let last: Message | undefined;
  let error: { type: string; message: string } | undefined;

  while (state !== "DONE") {
    if (signal?.aborted) {
      status = "timed_out";
      break;
    }

    switch (state) {
      case "REASON": {
        iterations++;
        onIteration?.(iterations);
        emit?.({ type: "specialist_step", specialist: specialist.id, state: "REASON", iteration: iterations });

        const input: ReasoningInput = {
          directive: specialist.directive,
          history: branch.snapshot(),
          temperature: SPECIALIST_TEMPERATURE
        };
        if (declarations.length > 0) input.capabilities = declarations;
        if (signal !== undefined) input.abortSignal = signal;

        try {
          last = await reasoning.generate(input);
        } catch (err) {
          const serviceError = toReasoningServiceError(err, reasoning.provider);
          error = { type: serviceError.type, message: serviceError.message };
          status = signal?.aborted ? "timed_out" : "degraded";
          log.warn({ specialist: specialist.id, iterations, err: serviceError }, "Reasoning call failed");
          state = "DONE";
          break;
        }

        branch.append(last);
        if (!hasCapabilityRequests(last)) {
          status = "completed";
          state = "DONE";
        } else if (iterations >= maxIterations) {
          status = "bound_reached";
          log.info({ specialist: specialist.id, maxIterations }, "Iteration bound reached");
          state = "DONE";
        } else {
          state = "CALL_TOOLS";
        }
        break;
      }

      case "CALL_TOOLS": {
        const requests = last?.capabilityRequests ?? [];
        emit?.({ type: "specialist_step", specialist: specialist.id, state: "CALL_TOOLS", iteration: iterations });

        const results = await limiter.map(requests, (request) => invokeRequest(params, request));
        for (const message of results) {
          branch.append(message);
        }
        capabilityCalls += requests.length;
        onCapabilityCalls?.(capabilityCalls);
        state = "REASON";
        break;
      }
    }
  }

  const result: SpecialistLoopResult = {
    status,
    iterations,
    capabilityCalls,
    history: branch.snapshot()
  };

  if (status === "completed") {
    if (last !== undefined && usable(last.content)) result.finalMessage = last.content;
  } else if (status === "bound_reached" || status === "degraded") {
    const text = branch.lastSpecialistText();
    if (usable(text)) result.finalMessage = text;
  }
  if (error !== undefined) result.error = error;

  return result;
}
