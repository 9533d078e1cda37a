import { describe, expect, it } from "vitest";
import {
  HistoryBranch,
  capabilityResultMessage,
  hasCapabilityRequests,
  rootSnapshot,
  specialistMessage,
  userMessage
} from "../src/nexus/messages.js";

describe("messages", () => {
  it("freezes messages and their requests", () => {
    const message = specialistMessage("", [{ id: "call_1", name: "track_vessel", args: { vessel_name: "X" } }]);
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.capabilityRequests)).toBe(true);
    expect(hasCapabilityRequests(message)).toBe(true);
    expect(hasCapabilityRequests(specialistMessage("done"))).toBe(false);
  });

  it("renders capability results as JSON or as an error line", () => {
    const request = { id: "call_1", name: "get_production_data", args: {} };
    expect(capabilityResultMessage(request, true, { oil: 1 }).content).toBe('{"oil":1}');
    expect(capabilityResultMessage(request, false, "Unknown block").content).toBe(
      "Error from get_production_data: Unknown block"
    );
    expect(capabilityResultMessage(request, false, "x").capabilityResult).toEqual({
      requestId: "call_1",
      name: "get_production_data",
      ok: false,
      data: "x"
    });
  });
});

describe("HistoryBranch", () => {
  it("copies the root and never writes to it", () => {
    const root = rootSnapshot("What is Rokan producing?");
    const a = new HistoryBranch(root);
    const b = new HistoryBranch(root);

    a.append(specialistMessage("from a"));

    expect(root).toHaveLength(1);
    expect(Object.isFrozen(root)).toBe(true);
    expect(a.length).toBe(2);
    expect(b.length).toBe(1);
  });

  it("returns frozen snapshots that later appends do not change", () => {
    const branch = new HistoryBranch([userMessage("q")]);
    const before = branch.snapshot();
    branch.append(specialistMessage("answer"));
    expect(before).toHaveLength(1);
    expect(Object.isFrozen(before)).toBe(true);
  });

  it("finds the last specialist message with text", () => {
    const branch = new HistoryBranch([userMessage("q")]);
    expect(branch.lastSpecialistText()).toBeUndefined();

    branch.append(specialistMessage("first draft"));
    branch.append(specialistMessage("  ", [{ id: "c1", name: "x", args: {} }]));
    expect(branch.lastSpecialistText()).toBe("first draft");
  });
});
