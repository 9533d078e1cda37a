/**
 * Coordinator for one query.
 *
 * route -> fan out to the activated specialists -> join -> synthesize
 *
 * Every run ends in exactly one run_completed event and a RunResult; only
 * invalid input is thrown.
 */

import crypto from "node:crypto";
import { z } from "zod";
import type { CapabilityInvoker } from "../capabilities/types.js";
import { NexusError, toNexusError } from "../errors.js";
import type { NexusErrorCode } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { SPECIALIST_PRECEDENCE } from "../messages.js";
import type { SpecialistId } from "../messages.js";
import { ReasoningServiceError, toReasoningServiceError } from "../reasoning/types.js";
import type { ReasoningClient } from "../reasoning/types.js";
import { SPECIALISTS } from "../specialists.js";
import type { SpecialistDefinition } from "../specialists.js";
import { Deadline, MAX_TIMEOUT_MS } from "../utils/deadline.js";
import { createRunEmitter } from "./events.js";
import { IntentRouter, specialistsFor } from "./router.js";
import { createRunState, markCompleted, recordIteration, setFinalResponse } from "./runState.js";
import type { RunStateInit } from "./runState.js";
import { runSpecialistLoop } from "./specialistLoop.js";
import { Synthesizer, concatenateContributions } from "./synthesizer.js";
import type { Contribution } from "./synthesizer.js";
import { DEFAULT_RUN_CONFIG } from "./types.js";
import type {
  OrchestratorContext,
  RunConfig,
  RunEmitter,
  RunInput,
  RunResult,
  RunState,
  RunStatus,
  SpecialistOutcome
} from "./types.js";

const log = createChildLogger({ service: "Orchestrator" });

export const CLARIFICATION_MESSAGE =
  "I need more information to help you. Could you please clarify your question? " +
  "Are you asking about production data, shipping logistics, or financial analysis?";

export const ALL_FAILED_MESSAGE =
  "I'm sorry, none of the specialists could answer your question right now. Please try again shortly.";

export const ROUTING_FAILED_MESSAGE =
  "I'm sorry, I could not work out how to handle your question right now. Please try again shortly.";

export const INTERNAL_ERROR_MESSAGE = "I'm sorry, something went wrong while answering your question.";

const RunConfigOverridesSchema = z
  .object({
    maxIterations: z.number().int().positive(),
    runTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
    maxConcurrentCapabilities: z.number().int().positive()
  })
  .partial()
  .strict();

/**
 * @throws NexusError BAD_REQUEST on a non-positive or non-integer bound
 */
export function resolveRunConfig(base: Readonly<RunConfig>, overrides?: Partial<RunConfig>): RunConfig {
  const parsed = RunConfigOverridesSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    throw new NexusError("BAD_REQUEST", "Invalid run configuration", { issues: parsed.error.issues });
  }
  const resolved: RunConfig = { ...base };
  const o = parsed.data;
  if (o.maxIterations !== undefined) resolved.maxIterations = o.maxIterations;
  if (o.runTimeoutMs !== undefined) resolved.runTimeoutMs = o.runTimeoutMs;
  if (o.maxConcurrentCapabilities !== undefined) resolved.maxConcurrentCapabilities = o.maxConcurrentCapabilities;
  return resolved;
}

export type SpecialistSummary = {
  id: SpecialistId;
  name: string;
  description: string;
  focus: readonly string[];
  capabilities: string[];
};

type RunContext = {
  state: RunState;
  input: RunInput;
  config: RunConfig;
  deadline: Deadline;
  emit: RunEmitter;
  startedAt: number;
};

type Finish = {
  status: RunStatus;
  specialists?: SpecialistOutcome[];
  synthesized?: boolean;
  error?: { code: NexusErrorCode; message: string };
};

export class Orchestrator {
  private readonly reasoning: ReasoningClient;
  private readonly capabilities: CapabilityInvoker;
  private readonly specialists: Readonly<Record<SpecialistId, SpecialistDefinition>>;
  private readonly defaults: Readonly<RunConfig>;
  private readonly router: IntentRouter;
  private readonly synthesizer: Synthesizer;

  constructor(context: OrchestratorContext) {
    this.reasoning = context.reasoning;
    this.capabilities = context.capabilities;
    this.specialists = context.specialists ?? SPECIALISTS;
    this.defaults = Object.freeze(resolveRunConfig(DEFAULT_RUN_CONFIG, context.config));
    this.router = new IntentRouter(
      context.reasoning,
      context.routerModel !== undefined ? { model: context.routerModel } : undefined
    );
    this.synthesizer = new Synthesizer(context.reasoning);
  }

  get config(): Readonly<RunConfig> {
    return this.defaults;
  }

  get reasoningStatus(): { provider: string; model: string; configured: boolean } {
    return {
      provider: this.reasoning.provider,
      model: this.reasoning.model,
      configured: this.reasoning.isConfigured()
    };
  }

  /** Specialist catalog in precedence order, with advertised capability names. */
  catalog(): SpecialistSummary[] {
    return SPECIALIST_PRECEDENCE.map((id) => {
      const definition = this.specialists[id];
      return {
        id,
        name: definition.name,
        description: definition.description,
        focus: definition.focus,
        capabilities: this.capabilities.list(id).map((c) => c.name)
      };
    });
  }

  /**
   * Answer one query.
   * @throws NexusError BAD_REQUEST for an empty query or invalid overrides
   */
  async run(input: RunInput): Promise<RunResult> {
    if (input.query.trim().length === 0) {
      throw new NexusError("BAD_REQUEST", "Query must not be empty");
    }
    const config = resolveRunConfig(this.defaults, input.config);

    const runId = crypto.randomUUID();
    const startedAt = Date.now();
    const emit = createRunEmitter(runId, input.events);
    const stateParams: RunStateInit = {
      runId,
      query: input.query,
      maxIterations: config.maxIterations
    };
    if (input.userId !== undefined) stateParams.userId = input.userId;
    if (input.userRole !== undefined) stateParams.userRole = input.userRole;
    const state = createRunState(stateParams);

    emit({ type: "run_started", query: input.query, userId: state.userId });
    log.info({ runId, userId: state.userId, userRole: state.userRole }, "Run started");

    const deadline = new Deadline(config.runTimeoutMs, input.abortSignal);
    const ctx: RunContext = { state, input, config, deadline, emit, startedAt };

    try {
      return await this.execute(ctx);
    } catch (err) {
      const error = toNexusError(err);
      log.error({ runId, err }, "Run failed unexpectedly");
      return this.finishRun(
        ctx,
        { status: "failed", error: { code: error.code, message: error.message } },
        INTERNAL_ERROR_MESSAGE
      );
    } finally {
      deadline.dispose();
    }
  }

  private async execute(ctx: RunContext): Promise<RunResult> {
    const { state, input, deadline, emit } = ctx;

    const routed = await deadline
      .race(this.router.classify(input.query, deadline.signal))
      .catch((err: unknown) => toReasoningServiceError(err, this.reasoning.provider));

    if (routed instanceof ReasoningServiceError) {
      log.error({ runId: state.runId, err: routed }, "Intent classification failed");
      setFinalResponse(state, ROUTING_FAILED_MESSAGE);
      return this.finishRun(ctx, {
        status: "failed",
        error: { code: "REASONING_SERVICE_ERROR", message: routed.message }
      });
    }
    if (routed.expired) {
      setFinalResponse(state, ROUTING_FAILED_MESSAGE);
      return this.finishRun(ctx, { status: "failed", error: this.deadlineError(deadline, "routing") });
    }

    const routing = routed.value;
    state.routingDecision = routing.decision;
    const activated = specialistsFor(routing.decision);
    emit({ type: "routed", routingDecision: routing.decision, recognized: routing.recognized, specialists: activated });

    if (activated.length === 0) {
      setFinalResponse(state, CLARIFICATION_MESSAGE);
      return this.finishRun(ctx, { status: "clarify" });
    }

    const outcomes = await Promise.all(activated.map((id) => this.runSpecialist(ctx, id)));

    const contributions: Contribution[] = [];
    for (const outcome of outcomes) {
      if (outcome.finalMessage !== undefined) {
        contributions.push({
          specialist: outcome.specialist,
          name: this.specialists[outcome.specialist].name,
          content: outcome.finalMessage
        });
      }
    }
    const allHealthy = outcomes.every(
      (o) => (o.status === "completed" || o.status === "bound_reached") && o.finalMessage !== undefined
    );

    const [first] = contributions;
    if (first === undefined) {
      setFinalResponse(state, ALL_FAILED_MESSAGE);
      const code: NexusErrorCode = deadline.reason === "cancelled" ? "RUN_CANCELLED" : "ALL_SPECIALISTS_FAILED";
      return this.finishRun(ctx, {
        status: "failed",
        specialists: outcomes,
        error: { code, message: "No specialist produced a usable answer" }
      });
    }

    if (contributions.length === 1) {
      // a lone answer is returned as the specialist wrote it
      setFinalResponse(state, first.content);
      return this.finishRun(ctx, { status: allHealthy ? "ok" : "degraded", specialists: outcomes });
    }

    const synthesis = await this.synthesize(ctx, contributions);
    setFinalResponse(state, synthesis.text);
    return this.finishRun(ctx, {
      status: allHealthy && synthesis.ok ? "ok" : "degraded",
      specialists: outcomes,
      synthesized: synthesis.ok
    });
  }

  private async runSpecialist(ctx: RunContext, id: SpecialistId): Promise<SpecialistOutcome> {
    const { state, config, deadline, emit } = ctx;
    const specialist = this.specialists[id];
    const startedAt = Date.now();
    let capabilityCalls = 0;

    emit({ type: "specialist_started", specialist: id });
    log.info({ runId: state.runId, specialist: id }, "Specialist started");

    const loop = runSpecialistLoop({
      specialist,
      root: state.history,
      reasoning: this.reasoning,
      capabilities: this.capabilities,
      maxIterations: config.maxIterations,
      maxConcurrentCapabilities: config.maxConcurrentCapabilities,
      signal: deadline.signal,
      emit,
      onIteration: (n) => {
        if (!deadline.expired) recordIteration(state, id, n);
      },
      onCapabilityCalls: (total) => {
        capabilityCalls = total;
      }
    });

    const raced = await deadline.race(loop);
    let outcome: SpecialistOutcome;
    if (raced.expired) {
      const error = this.deadlineError(deadline, id);
      outcome = {
        specialist: id,
        status: "timed_out",
        iterations: state.iterationsBySpecialist[id] ?? 0,
        capabilityCalls,
        error: { type: deadline.reason === "cancelled" ? "aborted" : "timeout", message: error.message },
        durationMs: Date.now() - startedAt
      };
      log.warn({ runId: state.runId, specialist: id }, error.message);
    } else {
      const result = raced.value;
      outcome = {
        specialist: id,
        status: result.status,
        iterations: result.iterations,
        capabilityCalls: result.capabilityCalls,
        durationMs: Date.now() - startedAt
      };
      if (result.finalMessage !== undefined) outcome.finalMessage = result.finalMessage;
      if (result.error !== undefined) outcome.error = result.error;
      if (result.status !== "timed_out") markCompleted(state, id);
    }

    emit({ type: "specialist_completed", specialist: id, status: outcome.status, iterations: outcome.iterations });
    log.info(
      { runId: state.runId, specialist: id, status: outcome.status, iterations: outcome.iterations },
      "Specialist finished"
    );
    return outcome;
  }

  private async synthesize(ctx: RunContext, contributions: Contribution[]): Promise<{ text: string; ok: boolean }> {
    const { state, input, deadline } = ctx;
    const fallback = { text: concatenateContributions(contributions), ok: false };

    if (deadline.expired) {
      log.warn({ runId: state.runId }, "Deadline passed before synthesis, joining answers");
      return fallback;
    }

    try {
      const raced = await deadline.race(this.synthesizer.synthesize(input.query, contributions, deadline.signal));
      if (raced.expired) {
        log.warn({ runId: state.runId }, "Synthesis abandoned at deadline, joining answers");
        return fallback;
      }
      if (raced.value.trim().length === 0) {
        log.warn({ runId: state.runId }, "Synthesis returned no text, joining answers");
        return fallback;
      }
      return { text: raced.value, ok: true };
    } catch (err) {
      const serviceError = toReasoningServiceError(err, this.reasoning.provider);
      log.warn({ runId: state.runId, err: serviceError }, "Synthesis failed, joining answers");
      return fallback;
    }
  }

  private deadlineError(deadline: Deadline, stage: string): { code: NexusErrorCode; message: string } {
    if (deadline.reason === "cancelled") {
      return { code: "RUN_CANCELLED", message: `Run cancelled during ${stage}` };
    }
    return { code: "REASONING_SERVICE_ERROR", message: `Run deadline exceeded during ${stage}` };
  }

  /**
   * Build the result and emit run_completed. Called once per run.
   */
  private finishRun(ctx: RunContext, finish: Finish, fallbackResponse?: string): RunResult {
    const { state, emit, startedAt } = ctx;
    const durationMs = Date.now() - startedAt;
    const routingDecision = state.routingDecision ?? "UNKNOWN";

    const result: RunResult = {
      runId: state.runId,
      finalResponse: state.finalResponse ?? fallbackResponse ?? INTERNAL_ERROR_MESSAGE,
      routingDecision,
      specialistsInvolved: state.routingDecision !== undefined ? specialistsFor(state.routingDecision) : [],
      status: finish.status,
      synthesized: finish.synthesized ?? false,
      specialists: finish.specialists ?? [],
      durationMs
    };
    if (finish.error !== undefined) result.error = finish.error;

    emit({ type: "run_completed", status: result.status, routingDecision, durationMs });
    log.info({ runId: state.runId, status: result.status, routingDecision, durationMs }, "Run completed");
    return result;
  }
}
