/**
 * Orchestrator types: routing vocabulary, per-run state and the result
 * envelope handed back to the service layer.
 */

import type { CapabilityInvoker } from "../capabilities/types.js";
import type { NexusErrorCode } from "../errors.js";
import type { History, SpecialistId } from "../messages.js";
import type { ReasoningClient } from "../reasoning/types.js";
import type { SpecialistDefinition } from "../specialists.js";

export const ROUTING_DECISIONS = [
  "UPSTREAM",
  "LOGISTICS",
  "FINANCE",
  "UPSTREAM_LOGISTICS",
  "UPSTREAM_FINANCE",
  "LOGISTICS_FINANCE",
  "ALL_AGENTS",
  "CLARIFY"
] as const;

export type RoutingDecision = (typeof ROUTING_DECISIONS)[number];

/**
 * How a specialist loop ended.
 * - completed: the last reasoning output requested no capabilities
 * - bound_reached: iteration bound forced DONE
 * - degraded: the reasoning service failed during a REASON step
 * - timed_out: abandoned at the run deadline or on cancellation
 */
export type SpecialistStatus = "completed" | "bound_reached" | "degraded" | "timed_out";

export type SpecialistOutcome = {
  specialist: SpecialistId;
  status: SpecialistStatus;
  iterations: number;
  capabilityCalls: number;
  /** Contribution to the answer; absent when the loop produced no usable text */
  finalMessage?: string;
  error?: { type: string; message: string };
  durationMs: number;
};

export type RunStatus = "ok" | "degraded" | "clarify" | "failed";

export type RunResult = {
  runId: string;
  finalResponse: string;
  /** UNKNOWN only when classification itself could not be obtained */
  routingDecision: RoutingDecision | "UNKNOWN";
  /** Specialists activated by the routing decision, in precedence order */
  specialistsInvolved: SpecialistId[];
  status: RunStatus;
  synthesized: boolean;
  specialists: SpecialistOutcome[];
  error?: { code: NexusErrorCode; message: string };
  durationMs: number;
};

export type RunConfig = {
  /** Upper bound on REASON steps per specialist */
  maxIterations: number;
  /** Deadline for the whole run, routing through synthesis */
  runTimeoutMs: number;
  /** Parallel capability invocations within one CALL_TOOLS step */
  maxConcurrentCapabilities: number;
};

export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = Object.freeze({
  maxIterations: 10,
  runTimeoutMs: 300_000,
  maxConcurrentCapabilities: 5
});

export type RunInput = {
  query: string;
  userId?: string;
  userRole?: string;
  config?: Partial<RunConfig>;
  /** Caller cancellation; behaves like the deadline firing early */
  abortSignal?: AbortSignal;
  events?: RunEventOptions;
};

/**
 * Mutable record for one query. Only the orchestrator and the loops it
 * starts write to it; it is dropped once the result is returned.
 */
export type RunState = {
  readonly runId: string;
  /** Root snapshot every specialist branches from (frozen) */
  readonly history: History;
  readonly userId: string;
  readonly userRole: string;
  readonly maxIterations: number;
  routingDecision?: RoutingDecision;
  iterationsBySpecialist: Partial<Record<SpecialistId, number>>;
  completed: Partial<Record<SpecialistId, boolean>>;
  finalResponse?: string;
};

/**
 * Handles the orchestrator needs, built once at process start.
 */
export type OrchestratorContext = {
  reasoning: ReasoningClient;
  capabilities: CapabilityInvoker;
  specialists?: Readonly<Record<SpecialistId, SpecialistDefinition>>;
  config?: Partial<RunConfig>;
  /** Model used for classification; falls back to the client's default */
  routerModel?: string;
};

// ============================================================================
// Run Events
// ============================================================================

export type RunEventType =
  | "run_started"
  | "routed"
  | "specialist_started"
  | "specialist_step"
  | "capability_invoked"
  | "specialist_completed"
  | "run_completed";

export type RunEventBase = {
  type: RunEventType;
  timestamp: string;
  runId: string;
};

export type RunStartedEvent = RunEventBase & {
  type: "run_started";
  query: string;
  userId: string;
};

export type RoutedEvent = RunEventBase & {
  type: "routed";
  routingDecision: RoutingDecision;
  recognized: boolean;
  specialists: SpecialistId[];
};

export type SpecialistStartedEvent = RunEventBase & {
  type: "specialist_started";
  specialist: SpecialistId;
};

export type SpecialistStepEvent = RunEventBase & {
  type: "specialist_step";
  specialist: SpecialistId;
  state: "REASON" | "CALL_TOOLS";
  iteration: number;
};

export type CapabilityInvokedEvent = RunEventBase & {
  type: "capability_invoked";
  specialist: SpecialistId;
  capability: string;
  ok: boolean;
  durationMs: number;
};

export type SpecialistCompletedEvent = RunEventBase & {
  type: "specialist_completed";
  specialist: SpecialistId;
  status: SpecialistStatus;
  iterations: number;
};

export type RunCompletedEvent = RunEventBase & {
  type: "run_completed";
  status: RunStatus;
  routingDecision: RunResult["routingDecision"];
  durationMs: number;
};

export type RunEvent =
  | RunStartedEvent
  | RoutedEvent
  | SpecialistStartedEvent
  | SpecialistStepEvent
  | CapabilityInvokedEvent
  | SpecialistCompletedEvent
  | RunCompletedEvent;

export type RunEventHandler = (event: RunEvent) => void | Promise<void>;

export type RunEventOptions = {
  onEvent?: RunEventHandler;
  /** Emit specialist_step events (default true) */
  emitSpecialistSteps?: boolean;
  /** Emit capability_invoked events (default true) */
  emitCapabilityInvoked?: boolean;
};

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event as produced by the orchestrator, before stamping. */
export type RunEventInput = DistributiveOmit<RunEvent, "timestamp" | "runId">;

/**
 * Emitter bound to one run; fills in timestamp and runId.
 */
export type RunEmitter = (event: RunEventInput) => void;
