/**
 * Orchestrator module - intent routing, specialist fan-out and synthesis.
 *
 * Exports:
 * - Orchestrator: per-query coordinator
 * - IntentRouter / Synthesizer / runSpecialistLoop: the stages it drives
 * - Types: run input, result, state and events
 */

export {
  Orchestrator,
  resolveRunConfig,
  CLARIFICATION_MESSAGE,
  ALL_FAILED_MESSAGE,
  ROUTING_FAILED_MESSAGE,
  INTERNAL_ERROR_MESSAGE
} from "./orchestrator.js";
export type { SpecialistSummary } from "./orchestrator.js";
export { IntentRouter, parseRoutingDecision, specialistsFor, ROUTING_DIRECTIVE } from "./router.js";
export type { RoutingResult } from "./router.js";
export { runSpecialistLoop } from "./specialistLoop.js";
export type { LoopState, SpecialistLoopParams, SpecialistLoopResult } from "./specialistLoop.js";
export { Synthesizer, buildSynthesisDirective, concatenateContributions } from "./synthesizer.js";
export type { Contribution } from "./synthesizer.js";

export type {
  RoutingDecision,
  SpecialistStatus,
  SpecialistOutcome,
  RunStatus,
  RunResult,
  RunConfig,
  RunInput,
  RunState,
  OrchestratorContext,
  RunEvent,
  RunEventType,
  RunEventHandler,
  RunEventOptions
} from "./types.js";
export { ROUTING_DECISIONS, DEFAULT_RUN_CONFIG } from "./types.js";

import { createFixtureRegistry } from "../capabilities/index.js";
import type { CapabilityInvoker } from "../capabilities/types.js";
import type { NexusConfig } from "../config.js";
import { createReasoningClient } from "../reasoning/index.js";
import type { ReasoningClient } from "../reasoning/types.js";
import { Orchestrator } from "./orchestrator.js";

/**
 * Orchestrator wired from process configuration. The reasoning client and
 * capability source can be replaced, e.g. by tests.
 */
export function createOrchestrator(
  config: Readonly<NexusConfig>,
  overrides: { reasoning?: ReasoningClient; capabilities?: CapabilityInvoker } = {}
): Orchestrator {
  return new Orchestrator({
    reasoning: overrides.reasoning ?? createReasoningClient(config.reasoning),
    capabilities: overrides.capabilities ?? createFixtureRegistry(),
    routerModel: config.reasoning.routerModel,
    config: {
      maxIterations: config.maxIterations,
      runTimeoutMs: config.runTimeoutMs,
      maxConcurrentCapabilities: config.maxConcurrentCapabilities
    }
  });
}
