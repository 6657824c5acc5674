import { DeliveryStatus } from "@/types/global";

const RANK: Record<DeliveryStatus["kind"], number> = {
  sending: 0,
  sent: 1,
  partiallyDelivered: 2,
  delivered: 3,
  read: 4,
  failed: 5,
};

/**
 * Whether a message may move from `from` to `to`.
 *
 * Statuses only move forward: sending -> sent -> (partiallyDelivered) ->
 * delivered -> read. Failed is reachable from anywhere and is terminal.
 * A partial delivery may be replaced by one that reached more peers.
 */
export function canTransition(
  from: DeliveryStatus | null,
  to: DeliveryStatus,
): boolean {
  if (from === null) return true;
  if (from.kind === "failed") return false;
  if (to.kind === "failed") return true;

  if (from.kind === "partiallyDelivered" && to.kind === "partiallyDelivered") {
    return to.reached > from.reached;
  }

  return RANK[to.kind] > RANK[from.kind];
}

/**
 * Returns the status the message should hold after `next` is applied.
 */
export function advanceStatus(
  current: DeliveryStatus | null,
  next: DeliveryStatus,
): DeliveryStatus | null {
  return canTransition(current, next) ? next : current;
}
