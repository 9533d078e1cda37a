import { createChildLogger } from "../logger.js";
import type { RunEmitter, RunEvent, RunEventInput, RunEventOptions } from "./types.js";

const log = createChildLogger({ service: "RunEvents" });

const TYPE_TO_OPTION: Record<RunEvent["type"], "emitSpecialistSteps" | "emitCapabilityInvoked" | null> = {
  run_started: null,
  routed: null,
  specialist_started: null,
  specialist_step: "emitSpecialistSteps",
  capability_invoked: "emitCapabilityInvoked",
  specialist_completed: null,
  run_completed: null
};

export function isoNow(): string {
  return new Date().toISOString();
}

function reportHandlerFailure(event: RunEvent, err: unknown): void {
  log.debug({ err, runId: event.runId, eventType: event.type }, "Run event handler failed");
}

/**
 * Fire-and-forget delivery. Handlers run in a microtask so a throwing or
 * slow observer cannot affect the run.
 */
export function emitEvent(options: RunEventOptions | undefined, event: RunEvent): void {
  if (!options?.onEvent) return;

  const optionKey = TYPE_TO_OPTION[event.type];
  if (optionKey && options[optionKey] === false) return;

  const handler = options.onEvent;
  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => reportHandlerFailure(event, err));
      }
    } catch (err) {
      reportHandlerFailure(event, err);
    }
  });
}

/**
 * Emitter for one run. run_completed closes it: later events, such as
 * those of a loop abandoned at the deadline, are dropped.
 */
export function createRunEmitter(runId: string, options: RunEventOptions | undefined): RunEmitter {
  let closed = false;
  return (event: RunEventInput) => {
    if (closed) return;
    if (event.type === "run_completed") closed = true;
    const stamped: RunEvent = { ...event, timestamp: isoNow(), runId };
    emitEvent(options, stamped);
  };
}
