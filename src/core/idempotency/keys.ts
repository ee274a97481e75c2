// src/core/idempotency/keys.ts

/**
 * Client order id sent with every submission: the local order id plus the
 * submission timestamp. The same inputs always give the same id, and two
 * attempts for one queued order stay distinguishable on the exchange side.
 *
 * @example
 * buildClientOrderId(42, 1700000000000) // '42-1700000000000'
 */
export function buildClientOrderId(orderId: number | string, timestampMs: number): string {
  return `${normalize(orderId)}-${Math.trunc(timestampMs)}`;
}

function normalize(s: unknown): string {
  return String(s ?? '').trim() || 'local';
}
