import { describe, expect, it } from "vitest";
import { z } from "zod";
import { createFixtureRegistry } from "../src/nexus/capabilities/index.js";
import { CapabilityRegistry } from "../src/nexus/capabilities/registry.js";
import type { CapabilityInvoker } from "../src/nexus/capabilities/types.js";
import { loadConfig } from "../src/nexus/config.js";
import { CapabilityError, NexusError } from "../src/nexus/errors.js";
import { specialistMessage } from "../src/nexus/messages.js";
import type { Message } from "../src/nexus/messages.js";
import {
  ALL_FAILED_MESSAGE,
  CLARIFICATION_MESSAGE,
  Orchestrator,
  ROUTING_FAILED_MESSAGE,
  resolveRunConfig
} from "../src/nexus/orchestrator/orchestrator.js";
import { createOrchestrator } from "../src/nexus/orchestrator/index.js";
import { DEFAULT_RUN_CONFIG } from "../src/nexus/orchestrator/types.js";
import type { RunEvent } from "../src/nexus/orchestrator/types.js";
import { ReasoningServiceError } from "../src/nexus/reasoning/types.js";
import type { ReasoningInput } from "../src/nexus/reasoning/types.js";
import { MAX_TIMEOUT_MS } from "../src/nexus/utils/deadline.js";
import { ScriptedReasoningClient, delay, hang, requests, text } from "./helpers.js";
import type { Responder } from "./helpers.js";

const NOW = new Date("2026-03-01T00:00:00Z");

function orchestrator(client: ScriptedReasoningClient, config: { runTimeoutMs?: number; maxIterations?: number } = {}) {
  return new Orchestrator({
    reasoning: client,
    capabilities: createFixtureRegistry({ now: () => NOW }),
    config
  });
}

function routeTo(label: string, rest: Responder): Responder {
  return (input, caller) => (caller === "router" ? text(label) : rest(input, caller));
}

function lastMessage(input: ReasoningInput): Message | undefined {
  return input.history[input.history.length - 1];
}

describe("Orchestrator", () => {
  describe("routing", () => {
    it("answers CLARIFY with the clarification text and starts no specialist", async () => {
      const client = new ScriptedReasoningClient(routeTo("CLARIFY", () => text("unused")));
      const result = await orchestrator(client).run({ query: "Tell me something" });

      expect(result.status).toBe("clarify");
      expect(result.routingDecision).toBe("CLARIFY");
      expect(result.finalResponse).toBe(CLARIFICATION_MESSAGE);
      expect(result.specialistsInvolved).toEqual([]);
      expect(result.specialists).toEqual([]);
      expect(client.calls.map((c) => c.caller)).toEqual(["router"]);
    });

    it("treats an unrecognized label as CLARIFY", async () => {
      const client = new ScriptedReasoningClient(routeTo("MAYBE", () => text("unused")));
      const result = await orchestrator(client).run({ query: "Is it fine?" });

      expect(result.routingDecision).toBe("CLARIFY");
      expect(result.finalResponse).toBe(CLARIFICATION_MESSAGE);
      expect(client.calls).toHaveLength(1);
    });

    it("fails the run when classification itself fails", async () => {
      const client = new ScriptedReasoningClient(() => {
        throw new ReasoningServiceError("auth_error", "Invalid API key");
      });
      const result = await orchestrator(client).run({ query: "Production in Rokan?" });

      expect(result.status).toBe("failed");
      expect(result.routingDecision).toBe("UNKNOWN");
      expect(result.finalResponse).toBe(ROUTING_FAILED_MESSAGE);
      expect(result.error).toEqual({ code: "REASONING_SERVICE_ERROR", message: "Invalid API key" });
    });
  });

  describe("single specialist", () => {
    it("returns the specialist's final message verbatim without synthesis", async () => {
      const answer = "Rokan is producing 150,000 BOPD and 450 MMSCFD.";
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM", () => text(answer)));
      const result = await orchestrator(client).run({ query: "What's the production in Rokan?" });

      expect(result.status).toBe("ok");
      expect(result.finalResponse).toBe(answer);
      expect(result.synthesized).toBe(false);
      expect(result.specialistsInvolved).toEqual(["upstream"]);
      expect(client.callsBy("synthesis")).toHaveLength(0);
    });

    it("enforces the iteration bound from the run config", async () => {
      let n = 0;
      const client = new ScriptedReasoningClient(routeTo("FINANCE", () =>
        specialistMessage("Working on the numbers", [{ id: `c${++n}`, name: "get_market_price_trends", args: {} }])
      ));
      const result = await orchestrator(client).run({ query: "Oil price trend?", config: { maxIterations: 2 } });

      expect(result.status).toBe("ok");
      expect(result.finalResponse).toBe("Working on the numbers");
      expect(result.specialists).toMatchObject([
        { specialist: "finance", status: "bound_reached", iterations: 2, capabilityCalls: 1 }
      ]);
      expect(client.callsBy("finance")).toHaveLength(2);
    });
  });

  describe("fan-out and synthesis", () => {
    it("hands contributions to the synthesizer in precedence order regardless of completion order", async () => {
      const latency = { upstream: 40, logistics: 20, finance: 0 };
      const client = new ScriptedReasoningClient(routeTo("ALL_AGENTS", async (_input, caller) => {
        if (caller === "synthesis") return text("combined answer");
        if (caller === "router") return text("unused");
        await delay(latency[caller]);
        return text(`${caller} says hello`);
      }));

      const result = await orchestrator(client).run({ query: "Profitability of Rokan considering shipping delays?" });

      expect(result.status).toBe("ok");
      expect(result.synthesized).toBe(true);
      expect(result.finalResponse).toBe("combined answer");
      expect(result.specialists.map((s) => s.specialist)).toEqual(["upstream", "logistics", "finance"]);

      const [synthesis] = client.callsBy("synthesis");
      const directive = synthesis?.directive ?? "";
      const positions = ["[UPSTREAM]\nupstream says hello", "[LOGISTICS]\nlogistics says hello", "[FINANCE]\nfinance says hello"]
        .map((section) => directive.indexOf(section));
      expect(positions.every((p) => p >= 0)).toBe(true);
      expect(positions).toEqual([...positions].sort((a, b) => a - b));
      expect(synthesis?.temperature).toBe(0.3);
      expect(synthesis?.history.map((m) => m.content)).toEqual(["Profitability of Rokan considering shipping delays?"]);
    });

    it("gives every specialist its own branch of the root history", async () => {
      const client = new ScriptedReasoningClient(routeTo("ALL_AGENTS", (_input, caller) =>
        caller === "synthesis" ? text("merged") : text(`${caller} answer`)
      ));
      await orchestrator(client).run({ query: "Everything about Rokan" });

      for (const caller of ["upstream", "logistics", "finance"] as const) {
        const [first] = client.callsBy(caller);
        expect(first?.history.map((m) => m.role)).toEqual(["user"]);
        expect(first?.history[0]?.content).toBe("Everything about Rokan");
      }
    });

    it("runs the UPSTREAM_LOGISTICS scenario end to end against the fixture capabilities", async () => {
      const ProductionSchema = z.object({ block: z.string(), oil_production_bopd: z.number() });
      const VesselSchema = z.object({ vessel_name: z.string(), destination: z.string(), eta_hours: z.number() });

      const client = new ScriptedReasoningClient(routeTo("UPSTREAM_LOGISTICS", (input, caller) => {
        const last = lastMessage(input);
        switch (caller) {
          case "upstream": {
            if (last?.role !== "capability_result") {
              return requests({ id: "up_1", name: "get_production_data", args: { block_name: "Rokan" } });
            }
            const data = ProductionSchema.parse(JSON.parse(last.content));
            return text(`${data.block} is producing ${data.oil_production_bopd} BOPD.`);
          }
          case "logistics": {
            if (last?.role !== "capability_result") {
              return requests({ id: "lg_1", name: "track_vessel", args: { vessel_name: "MT Sentosa Prime" } });
            }
            const data = VesselSchema.parse(JSON.parse(last.content));
            return text(`${data.vessel_name} reaches ${data.destination} in ${data.eta_hours} hours.`);
          }
          case "synthesis":
            return text("Rokan is producing 150000 BOPD; its cargo on MT Sentosa Prime reaches Kilang Balongan in 18 hours.");
          default:
            return text("unexpected");
        }
      }));

      const result = await orchestrator(client).run({
        query: "What is the production in Rokan and the shipment status to Balongan?",
        userId: "ops-1",
        userRole: "analyst"
      });

      expect(result.routingDecision).toBe("UPSTREAM_LOGISTICS");
      expect(result.specialistsInvolved).toEqual(["upstream", "logistics"]);
      expect(result.status).toBe("ok");
      expect(result.finalResponse).toBe(
        "Rokan is producing 150000 BOPD; its cargo on MT Sentosa Prime reaches Kilang Balongan in 18 hours."
      );
      expect(result.specialists).toMatchObject([
        { specialist: "upstream", status: "completed", iterations: 2, capabilityCalls: 1, finalMessage: "Rokan is producing 150000 BOPD." },
        {
          specialist: "logistics",
          status: "completed",
          iterations: 2,
          capabilityCalls: 1,
          finalMessage: "MT Sentosa Prime reaches Kilang Balongan in 18 hours."
        }
      ]);

      const synthesisCalls = client.callsBy("synthesis");
      expect(synthesisCalls).toHaveLength(1);
      const directive = synthesisCalls[0]?.directive ?? "";
      const upstreamAt = directive.indexOf("[UPSTREAM]\nRokan is producing 150000 BOPD.");
      const logisticsAt = directive.indexOf("[LOGISTICS]\nMT Sentosa Prime reaches Kilang Balongan in 18 hours.");
      expect(upstreamAt).toBeGreaterThanOrEqual(0);
      expect(logisticsAt).toBeGreaterThan(upstreamAt);
    });

    it("joins the answers under headers when synthesis fails", async () => {
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM_FINANCE", (_input, caller) => {
        if (caller === "synthesis") throw new ReasoningServiceError("provider_error", "HTTP 503");
        return text(caller === "upstream" ? "Upstream figures" : "Finance figures");
      }));

      const result = await orchestrator(client).run({ query: "Revenue from Rokan production?" });

      expect(result.status).toBe("degraded");
      expect(result.synthesized).toBe(false);
      expect(result.finalResponse).toBe("## Upstream Agent\n\nUpstream figures\n\n## Finance Agent\n\nFinance figures");
    });
  });

  describe("degradation", () => {
    it("completes with the remaining specialist when one never returns", async () => {
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM_LOGISTICS", (input, caller) =>
        caller === "upstream" ? hang(input) : text("MT Sentosa Prime is on schedule.")
      ));

      const result = await orchestrator(client, { runTimeoutMs: 50 }).run({ query: "Rokan production and shipment?" });

      expect(result.status).toBe("degraded");
      expect(result.finalResponse).toBe("MT Sentosa Prime is on schedule.");
      expect(result.synthesized).toBe(false);
      expect(result.specialistsInvolved).toEqual(["upstream", "logistics"]);
      expect(result.specialists).toMatchObject([
        { specialist: "upstream", status: "timed_out", iterations: 1, error: { type: "timeout" } },
        { specialist: "logistics", status: "completed" }
      ]);
      expect(result.specialists[0]?.finalMessage).toBeUndefined();
      expect(client.callsBy("synthesis")).toHaveLength(0);
    });

    it("abandons a reasoning call that ignores cancellation at the deadline", async () => {
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM_LOGISTICS", (_input, caller) =>
        caller === "upstream" ? new Promise<Message>(() => undefined) : text("MT Sentosa Prime is on schedule.")
      ));

      const result = await orchestrator(client, { runTimeoutMs: 50 }).run({ query: "Rokan production and shipment?" });

      expect(result.status).toBe("degraded");
      expect(result.finalResponse).toBe("MT Sentosa Prime is on schedule.");
      expect(result.specialists).toMatchObject([
        { specialist: "upstream", status: "timed_out", iterations: 1, error: { type: "timeout" } },
        { specialist: "logistics", status: "completed" }
      ]);
    });

    it("feeds a throwing capability back to its specialist and keeps the other answer", async () => {
      const registry = createFixtureRegistry({ now: () => NOW });
      const capabilities: CapabilityInvoker = {
        list: (specialist) => registry.list(specialist),
        invoke: (specialist, name, args, options) => {
          if (name === "track_vessel") throw new CapabilityError("handler_failed", name, "boom");
          return registry.invoke(specialist, name, args, options);
        }
      };
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM_LOGISTICS", (input, caller) => {
        if (caller === "synthesis") return text("merged answer");
        if (caller === "upstream") return text("Rokan is producing 150,000 BOPD.");
        return lastMessage(input)?.role === "capability_result"
          ? text("Vessel tracking is unavailable right now.")
          : requests({ id: "lg_1", name: "track_vessel", args: { vessel_name: "MT Sentosa Prime" } });
      }));

      const result = await new Orchestrator({ reasoning: client, capabilities }).run({
        query: "Production in Rokan and shipment to Balongan?"
      });

      expect(result.status).toBe("ok");
      expect(result.synthesized).toBe(true);
      expect(result.finalResponse).toBe("merged answer");
      expect(result.specialists).toMatchObject([
        { specialist: "upstream", status: "completed", finalMessage: "Rokan is producing 150,000 BOPD." },
        { specialist: "logistics", status: "completed", capabilityCalls: 1, finalMessage: "Vessel tracking is unavailable right now." }
      ]);
      const [, second] = client.callsBy("logistics");
      expect(second === undefined ? undefined : lastMessage(second)?.content).toBe("Error from track_vessel: boom");
    });

    it("returns a lone usable answer directly when another specialist degrades", async () => {
      const client = new ScriptedReasoningClient(routeTo("LOGISTICS_FINANCE", (_input, caller) => {
        if (caller === "finance") throw new ReasoningServiceError("rate_limited", "Too many requests");
        return text("Weather in Selat Sunda is moderate.");
      }));

      const result = await orchestrator(client).run({ query: "Shipping cost impact?" });

      expect(result.status).toBe("degraded");
      expect(result.finalResponse).toBe("Weather in Selat Sunda is moderate.");
      expect(result.specialists[1]).toMatchObject({
        specialist: "finance",
        status: "degraded",
        error: { type: "rate_limited", message: "Too many requests" }
      });
    });

    it("fails with ALL_SPECIALISTS_FAILED when nobody produces text", async () => {
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM_FINANCE", () => {
        throw new ReasoningServiceError("provider_error", "HTTP 500");
      }));

      const result = await orchestrator(client).run({ query: "Rokan revenue?" });

      expect(result.status).toBe("failed");
      expect(result.finalResponse).toBe(ALL_FAILED_MESSAGE);
      expect(result.error?.code).toBe("ALL_SPECIALISTS_FAILED");
      expect(result.specialists.map((s) => s.status)).toEqual(["degraded", "degraded"]);
    });

    it("fails instead of hanging when every specialist times out", async () => {
      const client = new ScriptedReasoningClient(routeTo("ALL_AGENTS", (input) => hang(input)));

      const result = await orchestrator(client, { runTimeoutMs: 30 }).run({ query: "Everything?" });

      expect(result.status).toBe("failed");
      expect(result.error?.code).toBe("ALL_SPECIALISTS_FAILED");
      expect(result.specialists.map((s) => s.status)).toEqual(["timed_out", "timed_out", "timed_out"]);
    });

    it("stops on caller cancellation", async () => {
      const controller = new AbortController();
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM", (input) => hang(input)));
      setTimeout(() => controller.abort(), 10);

      const result = await orchestrator(client).run({ query: "Rokan production?", abortSignal: controller.signal });

      expect(result.status).toBe("failed");
      expect(result.error?.code).toBe("RUN_CANCELLED");
      expect(result.specialists[0]).toMatchObject({ status: "timed_out", error: { type: "aborted" } });
    });
  });

  describe("input validation", () => {
    it("rejects an empty query", async () => {
      const client = new ScriptedReasoningClient(() => text("unused"));
      await expect(orchestrator(client).run({ query: "   " })).rejects.toBeInstanceOf(NexusError);
      expect(client.calls).toHaveLength(0);
    });

    it("rejects a non-positive iteration bound", async () => {
      const client = new ScriptedReasoningClient(() => text("unused"));
      await expect(orchestrator(client).run({ query: "Rokan?", config: { maxIterations: 0 } }))
        .rejects.toMatchObject({ code: "BAD_REQUEST" });
    });

    it("rejects a deadline longer than a timer can hold", async () => {
      const client = new ScriptedReasoningClient(() => text("unused"));
      await expect(orchestrator(client).run({ query: "Rokan?", config: { runTimeoutMs: 3_000_000_000 } }))
        .rejects.toMatchObject({ code: "BAD_REQUEST", message: "Invalid run configuration" });
      expect(client.calls).toHaveLength(0);
      expect(resolveRunConfig(DEFAULT_RUN_CONFIG, { runTimeoutMs: MAX_TIMEOUT_MS }).runTimeoutMs).toBe(MAX_TIMEOUT_MS);
    });
  });

  describe("events", () => {
    it("delivers run_started first and exactly one run_completed last", async () => {
      const events: RunEvent[] = [];
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM", () => text("150,000 BOPD")));

      const result = await orchestrator(client).run({
        query: "Rokan production?",
        events: { onEvent: (event) => { events.push(event); } }
      });
      await delay(0);

      const types = events.map((e) => e.type);
      expect(types).toEqual([
        "run_started",
        "routed",
        "specialist_started",
        "specialist_step",
        "specialist_completed",
        "run_completed"
      ]);
      expect(events.every((e) => e.runId === result.runId)).toBe(true);
      const completed = events[events.length - 1];
      expect(completed).toMatchObject({ type: "run_completed", status: "ok", routingDecision: "UPSTREAM" });
    });

    it("honours event toggles and survives throwing handlers", async () => {
      const seen: string[] = [];
      const client = new ScriptedReasoningClient(routeTo("UPSTREAM", (input) =>
        input.history.length === 1
          ? requests({ id: "c1", name: "get_production_data", args: { block_name: "Rokan" } })
          : text("done")
      ));

      const result = await orchestrator(client).run({
        query: "Rokan production?",
        events: {
          emitSpecialistSteps: false,
          emitCapabilityInvoked: false,
          onEvent: (event) => {
            seen.push(event.type);
            throw new Error("observer bug");
          }
        }
      });
      await delay(0);

      expect(result.status).toBe("ok");
      expect(seen).toEqual(["run_started", "routed", "specialist_started", "specialist_completed", "run_completed"]);
    });
  });

  it("exposes the catalog with capability names", () => {
    const client = new ScriptedReasoningClient(() => text("unused"));
    const catalog = new Orchestrator({ reasoning: client, capabilities: new CapabilityRegistry() }).catalog();
    expect(catalog.map((s) => s.id)).toEqual(["upstream", "logistics", "finance"]);
    expect(catalog[0]?.capabilities).toEqual([]);
    expect(orchestrator(client).catalog()[2]?.capabilities).toContain("calculate_profitability");
  });

  it("falls back to clarification when wired without a reasoning key", async () => {
    const wired = createOrchestrator(loadConfig({ NEXUS_MAX_ITERATIONS: "4" }));
    expect(wired.reasoningStatus).toEqual({ provider: "stub", model: "none", configured: false });
    expect(wired.config.maxIterations).toBe(4);

    const result = await wired.run({ query: "Production in Rokan?" });
    expect(result.status).toBe("clarify");
    expect(result.finalResponse).toBe(CLARIFICATION_MESSAGE);
  });
});
