import type { z } from "zod";
import { CapabilityError, NexusError, toCapabilityError } from "../errors.js";
import type { SpecialistId } from "../messages.js";
import type {
  CapabilityDeclaration,
  CapabilityDefinition,
  CapabilityInvoker,
  CapabilityOutcome,
  InvokeOptions
} from "./types.js";

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("; ");
}

function fail(error: CapabilityError): CapabilityOutcome {
  return { ok: false, error };
}

/**
 * In-memory registry of capabilities per specialist.
 */
export class CapabilityRegistry implements CapabilityInvoker {
  private readonly bySpecialist = new Map<SpecialistId, Map<string, CapabilityDefinition>>();

  register(specialist: SpecialistId, definition: CapabilityDefinition): this {
    let entries = this.bySpecialist.get(specialist);
    if (!entries) {
      entries = new Map();
      this.bySpecialist.set(specialist, entries);
    }
    if (entries.has(definition.name)) {
      throw new NexusError("BAD_REQUEST", `Capability "${definition.name}" is already registered for ${specialist}`);
    }
    entries.set(definition.name, definition);
    return this;
  }

  registerAll(specialist: SpecialistId, definitions: readonly CapabilityDefinition[]): this {
    for (const definition of definitions) {
      this.register(specialist, definition);
    }
    return this;
  }

  has(specialist: SpecialistId, name: string): boolean {
    return this.bySpecialist.get(specialist)?.has(name) ?? false;
  }

  names(specialist: SpecialistId): string[] {
    return Array.from(this.bySpecialist.get(specialist)?.keys() ?? []);
  }

  list(specialist: SpecialistId): CapabilityDeclaration[] {
    return Array.from(this.bySpecialist.get(specialist)?.values() ?? []).map((d) => ({
      name: d.name,
      description: d.description,
      parameters: d.parameters
    }));
  }

  async invoke(
    specialist: SpecialistId,
    name: string,
    args: unknown,
    options?: InvokeOptions
  ): Promise<CapabilityOutcome> {
    if (options?.signal?.aborted) {
      return fail(new CapabilityError("aborted", name, "Invocation cancelled before it started"));
    }

    const definition = this.bySpecialist.get(specialist)?.get(name);
    if (!definition) {
      const known = this.names(specialist);
      return fail(new CapabilityError(
        "unknown_capability",
        name,
        `Unknown capability "${name}" for ${specialist}. Available: ${known.length > 0 ? known.join(", ") : "none"}`
      ));
    }

    const parsedArgs = definition.args.safeParse(args ?? {});
    if (!parsedArgs.success) {
      return fail(new CapabilityError(
        "invalid_arguments",
        name,
        `Invalid arguments for ${name}: ${formatIssues(parsedArgs.error.issues)}`
      ));
    }

    let raw: unknown;
    try {
      const context = options?.signal !== undefined ? { specialist, signal: options.signal } : { specialist };
      raw = await definition.handler(parsedArgs.data, context);
    } catch (err) {
      return fail(toCapabilityError(err, name));
    }

    const parsedResult = definition.result.safeParse(raw);
    if (!parsedResult.success) {
      return fail(new CapabilityError(
        "invalid_result",
        name,
        `${name} returned an invalid result: ${formatIssues(parsedResult.error.issues)}`
      ));
    }

    return { ok: true, result: parsedResult.data };
  }
}
