import type { z } from "zod";
import type { CapabilityError } from "../errors.js";
import type { SpecialistId } from "../messages.js";

export type JsonSchemaProperty = {
  type: "string" | "number" | "integer" | "boolean" | "array" | "object";
  description?: string;
  enum?: string[];
  items?: JsonSchemaProperty;
  default?: unknown;
};

/**
 * JSON Schema advertised to the reasoning service for one capability.
 */
export type ParametersSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

export type CapabilityDeclaration = {
  name: string;
  description: string;
  parameters: ParametersSchema;
};

export type CapabilityContext = {
  specialist: SpecialistId;
  signal?: AbortSignal;
};

/**
 * A named operation a specialist may request. Arguments and results are
 * validated against the zod schemas on every invocation.
 */
export type CapabilityDefinition<TArgs extends z.ZodTypeAny = z.ZodTypeAny, TResult extends z.ZodTypeAny = z.ZodTypeAny> =
  CapabilityDeclaration & {
    args: TArgs;
    result: TResult;
    handler: (args: z.output<TArgs>, context: CapabilityContext) => Promise<z.input<TResult>> | z.input<TResult>;
  };

export function defineCapability<TArgs extends z.ZodTypeAny, TResult extends z.ZodTypeAny>(
  definition: CapabilityDefinition<TArgs, TResult>
): CapabilityDefinition<TArgs, TResult> {
  return definition;
}

export type CapabilityOutcome =
  | { ok: true; result: unknown }
  | { ok: false; error: CapabilityError };

export type InvokeOptions = {
  signal?: AbortSignal;
};

/**
 * What the orchestrator needs from a capability source.
 */
export interface CapabilityInvoker {
  /** Declarations to advertise for a specialist, in registration order. */
  list(specialist: SpecialistId): CapabilityDeclaration[];

  /** Failures are `{ ok: false }` outcomes; the loop also converts a rejection. */
  invoke(specialist: SpecialistId, name: string, args: unknown, options?: InvokeOptions): Promise<CapabilityOutcome>;
}
