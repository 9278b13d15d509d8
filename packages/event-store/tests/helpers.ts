import type { DomainEvent, EventSource } from "@ledgerline/types";

let counter = 0;

/** A settlement event with deterministic metadata. */
export function settlementEvent(
  type: string,
  entityId = "escrow-1",
  payload: Record<string, unknown> = {},
): DomainEvent {
  counter += 1;
  const source = type.split(".")[0] ?? "escrow";
  return {
    type,
    metadata: {
      eventId: `evt-${String(counter)}`,
      timestamp: "2024-01-15T10:00:00.000Z",
      actor: "alice",
      correlationId: entityId,
      source: isSource(source) ? source : "escrow",
    },
    payload,
  };
}

export function settlementEvents(count: number, action = "step"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) =>
    settlementEvent(`escrow.escrow.${action}-${String(i + 1)}`),
  );
}

function isSource(value: string): value is EventSource {
  return ["ledger", "escrow", "multisig", "auction", "payments"].includes(value);
}
