/**
 * Conversation history model shared by the router, the specialist loops and
 * the reasoning client. Messages are frozen on creation; a history only ever
 * grows at the end.
 */

export type SpecialistId = "upstream" | "logistics" | "finance";

/** Fixed precedence used for fan-out, synthesis input and reporting. */
export const SPECIALIST_PRECEDENCE: readonly SpecialistId[] = Object.freeze(["upstream", "logistics", "finance"]);

export type MessageRole = "user" | "specialist" | "directive" | "capability_result";

export type CapabilityRequest = Readonly<{
  /** Correlates the request with its capability_result message */
  id: string;
  name: string;
  /** Raw arguments as produced by the reasoning service; validated by the registry */
  args: unknown;
}>;

export type CapabilityResultPayload = Readonly<{
  requestId: string;
  name: string;
  ok: boolean;
  data: unknown;
}>;

export type Message = Readonly<{
  role: MessageRole;
  content: string;
  capabilityRequests?: readonly CapabilityRequest[];
  capabilityResult?: CapabilityResultPayload;
}>;

export type History = readonly Message[];

export function userMessage(content: string): Message {
  return Object.freeze({ role: "user", content });
}

export function specialistMessage(content: string, requests?: readonly CapabilityRequest[]): Message {
  if (!requests || requests.length === 0) {
    return Object.freeze({ role: "specialist", content });
  }
  return Object.freeze({
    role: "specialist",
    content,
    capabilityRequests: Object.freeze(requests.map((r) => Object.freeze({ ...r })))
  });
}

export function capabilityResultMessage(request: CapabilityRequest, ok: boolean, data: unknown): Message {
  const content = ok
    ? JSON.stringify(data)
    : `Error from ${request.name}: ${typeof data === "string" ? data : JSON.stringify(data)}`;
  return Object.freeze({
    role: "capability_result",
    content,
    capabilityResult: Object.freeze({ requestId: request.id, name: request.name, ok, data })
  });
}

export function hasCapabilityRequests(message: Message): boolean {
  return (message.capabilityRequests?.length ?? 0) > 0;
}

/**
 * The read-only starting point every specialist branches from.
 */
export function rootSnapshot(query: string): History {
  return Object.freeze([userMessage(query)]);
}

/**
 * A specialist's private, append-only view of the conversation.
 */
export class HistoryBranch {
  private readonly messages: Message[];

  constructor(root: History) {
    this.messages = [...root];
  }

  append(message: Message): void {
    this.messages.push(message);
  }

  get length(): number {
    return this.messages.length;
  }

  /** Frozen copy; later appends do not show through. */
  snapshot(): History {
    return Object.freeze([...this.messages]);
  }

  /** Most recent specialist message with non-blank text, if any. */
  lastSpecialistText(): string | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const m = this.messages[i];
      if (m && m.role === "specialist" && m.content.trim().length > 0) {
        return m.content;
      }
    }
    return undefined;
  }
}
