/**
 * Intent router: one reasoning call that maps a query onto a routing label.
 */

import { createChildLogger } from "../logger.js";
import { userMessage } from "../messages.js";
import type { SpecialistId } from "../messages.js";
import type { ReasoningClient, ReasoningInput } from "../reasoning/types.js";
import { ROUTING_DECISIONS } from "./types.js";
import type { RoutingDecision } from "./types.js";

const log = createChildLogger({ service: "IntentRouter" });

/** Routing is deterministic. */
export const ROUTING_TEMPERATURE = 0;

export const ROUTING_DIRECTIVE = `You are the Orchestrator of a multi-specialist assistant for oil and gas operations.

Your only job is to decide which specialist(s) should handle the user's query.

Available specialists:
- UPSTREAM: production data, lifting schedules, well status, field operations
- LOGISTICS: vessel tracking, weather, shipping delays, delivery status
- FINANCE: revenue calculations, cost analysis, profitability, market trends

Routing rules:
- PRODUCTION / VOLUMES / WELLS -> UPSTREAM
- SHIPPING / VESSELS / WEATHER / DELIVERY -> LOGISTICS
- REVENUE / COSTS / PROFITS / PRICES -> FINANCE
- Several domains -> name every relevant specialist
- Ambiguous or unrelated -> CLARIFY

Examples:
"What's the production in Rokan?" -> UPSTREAM
"Where is MT Sentosa Prime?" -> LOGISTICS
"How much revenue from 500k barrels?" -> FINANCE
"Status of Rokan production and its shipment to Balongan?" -> UPSTREAM_LOGISTICS
"Profitability of Rokan block considering shipping delays?" -> ALL_AGENTS

Respond with exactly one of:
UPSTREAM, LOGISTICS, FINANCE, UPSTREAM_LOGISTICS, UPSTREAM_FINANCE, LOGISTICS_FINANCE, ALL_AGENTS, CLARIFY

Respond with ONLY the label, nothing else.`;

export type RoutingResult = {
  decision: RoutingDecision;
  /** False when the service answered with something outside the label set */
  recognized: boolean;
  raw: string;
};

/**
 * Trim and upper-case; anything not exactly a label is CLARIFY.
 */
export function parseRoutingDecision(raw: string): { decision: RoutingDecision; recognized: boolean } {
  const normalized = raw.trim().toUpperCase();
  const match = ROUTING_DECISIONS.find((label) => label === normalized);
  if (match !== undefined) {
    return { decision: match, recognized: true };
  }
  return { decision: "CLARIFY", recognized: false };
}

/**
 * Specialists activated by a decision, in precedence order.
 */
export function specialistsFor(decision: RoutingDecision): SpecialistId[] {
  switch (decision) {
    case "UPSTREAM":
      return ["upstream"];
    case "LOGISTICS":
      return ["logistics"];
    case "FINANCE":
      return ["finance"];
    case "UPSTREAM_LOGISTICS":
      return ["upstream", "logistics"];
    case "UPSTREAM_FINANCE":
      return ["upstream", "finance"];
    case "LOGISTICS_FINANCE":
      return ["logistics", "finance"];
    case "ALL_AGENTS":
      return ["upstream", "logistics", "finance"];
    case "CLARIFY":
      return [];
    default: {
      const unreachable: never = decision;
      throw new Error(`Unhandled routing decision: ${String(unreachable)}`);
    }
  }
}

export class IntentRouter {
  private readonly reasoning: ReasoningClient;
  private readonly model: string | undefined;

  constructor(reasoning: ReasoningClient, options?: { model?: string }) {
    this.reasoning = reasoning;
    this.model = options?.model;
  }

  /**
   * @throws ReasoningServiceError when the classification call fails
   */
  async classify(query: string, abortSignal?: AbortSignal): Promise<RoutingResult> {
    const input: ReasoningInput = {
      directive: ROUTING_DIRECTIVE,
      history: [userMessage(`User query: ${query}`)],
      temperature: ROUTING_TEMPERATURE
    };
    if (this.model !== undefined) input.model = this.model;
    if (abortSignal !== undefined) input.abortSignal = abortSignal;

    const reply = await this.reasoning.generate(input);
    const { decision, recognized } = parseRoutingDecision(reply.content);

    if (!recognized) {
      log.warn({ raw: reply.content.slice(0, 100) }, "Unrecognized routing label, asking for clarification");
    }
    log.info({ query: query.slice(0, 100), routingDecision: decision }, "Intent classified");

    return { decision, recognized, raw: reply.content };
  }
}
