import type { IObservability, ObservabilityEvent } from "../../shared/observability/types.js";

/**
 * Record an event; a failing sink is logged and never fails the engine
 */
export async function recordEvent(
  observability: IObservability,
  event: ObservabilityEvent
): Promise<void> {
  try {
    await observability.recordEvent({ timestamp: new Date().toISOString(), ...event });
  } catch (error) {
    observability.log("warn", "Failed to record event", {
      type: event.type,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
