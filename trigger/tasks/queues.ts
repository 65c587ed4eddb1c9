import { queue } from "@trigger.dev/sdk";

// Shared by every task that writes request status. Triggered with a
// per-request concurrencyKey, so each request gets its own single slot.
export const requestWrites = queue({ name: "request-writes", concurrencyLimit: 1 });

export function requestConcurrencyKey(requestId: number): string {
  return `request-${requestId}`;
}
