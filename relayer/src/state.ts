import type { EventStatus } from "./types.js";

// Forward-only; an event never returns to an earlier status.
const TRANSITIONS: Record<EventStatus, readonly EventStatus[]> = {
  new: ["proof_pending", "failed", "invalidated"],
  proof_pending: ["relayed", "failed", "invalidated"],
  relayed: ["confirmed", "failed"],
  confirmed: [],
  failed: [],
  invalidated: [],
};

export function canTransition(from: EventStatus, to: EventStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: EventStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly eventId: number,
    readonly from: EventStatus,
    readonly to: EventStatus,
  ) {
    super(`event ${eventId}: ${from} -> ${to} is not a valid transition`);
    this.name = "IllegalTransitionError";
  }
}
