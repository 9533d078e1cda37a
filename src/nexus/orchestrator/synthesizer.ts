import { createChildLogger } from "../logger.js";
import { userMessage } from "../messages.js";
import type { SpecialistId } from "../messages.js";
import type { ReasoningClient, ReasoningInput } from "../reasoning/types.js";

const log = createChildLogger({ service: "Synthesizer" });

export const SYNTHESIS_TEMPERATURE = 0.3;

export type Contribution = {
  specialist: SpecialistId;
  /** Display name, used for fallback headers */
  name: string;
  content: string;
};

function label(specialist: SpecialistId): string {
  return specialist.toUpperCase();
}

/**
 * Directive embedding every contribution, in the order given.
 */
export function buildSynthesisDirective(contributions: readonly Contribution[]): string {
  const sections = contributions.map((c) => `[${label(c.specialist)}]\n${c.content}`).join("\n\n");
  return `You are combining answers from several specialists into one response for the user.

Specialist answers:

${sections}

Write a single cohesive answer to the user's query. Keep every figure the specialists gave, connect related facts across domains, and do not invent data they did not provide.`;
}

/**
 * Used when the synthesis call fails: the contributions under headers.
 */
export function concatenateContributions(contributions: readonly Contribution[]): string {
  return contributions.map((c) => `## ${c.name}\n\n${c.content}`).join("\n\n");
}

export class Synthesizer {
  private readonly reasoning: ReasoningClient;

  constructor(reasoning: ReasoningClient) {
    this.reasoning = reasoning;
  }

  /**
   * One reasoning call over the query and the ordered contributions.
   * @throws ReasoningServiceError
   */
  async synthesize(query: string, contributions: readonly Contribution[], abortSignal?: AbortSignal): Promise<string> {
    const input: ReasoningInput = {
      directive: buildSynthesisDirective(contributions),
      history: [userMessage(query)],
      temperature: SYNTHESIS_TEMPERATURE
    };
    if (abortSignal !== undefined) input.abortSignal = abortSignal;

    log.info({ specialists: contributions.map((c) => c.specialist) }, "Synthesizing specialist answers");
    const reply = await this.reasoning.generate(input);
    return reply.content;
  }
}
