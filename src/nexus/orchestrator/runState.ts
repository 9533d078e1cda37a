import { NexusError } from "../errors.js";
import { rootSnapshot } from "../messages.js";
import type { SpecialistId } from "../messages.js";
import type { RunState } from "./types.js";

export const ANONYMOUS_USER = "anonymous";
export const DEFAULT_ROLE = "user";

export type RunStateInit = {
  runId: string;
  query: string;
  maxIterations: number;
  userId?: string;
  userRole?: string;
};

export function createRunState(params: RunStateInit): RunState {
  return {
    runId: params.runId,
    history: rootSnapshot(params.query),
    userId: params.userId ?? ANONYMOUS_USER,
    userRole: params.userRole ?? DEFAULT_ROLE,
    maxIterations: params.maxIterations,
    iterationsBySpecialist: {},
    completed: {}
  };
}

export function recordIteration(state: RunState, specialist: SpecialistId, count: number): void {
  state.iterationsBySpecialist[specialist] = count;
}

export function markCompleted(state: RunState, specialist: SpecialistId): void {
  state.completed[specialist] = true;
}

/**
 * The final response is written exactly once per run.
 */
export function setFinalResponse(state: RunState, text: string): void {
  if (state.finalResponse !== undefined) {
    throw new NexusError("INTERNAL", "Final response already set for run", { runId: state.runId });
  }
  state.finalResponse = text;
}
