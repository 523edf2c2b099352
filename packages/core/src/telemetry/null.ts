import type { TelemetryEvent } from './types.js';
import type { ITelemetry } from './types.js';

/**
 * A no-op telemetry implementation.
 * The default when a pass is run without a telemetry instance.
 */
export class NullTelemetry implements ITelemetry {
  emit(_event: TelemetryEvent): void {
    // No-op
  }

  dispose(): void {
    // No-op
  }
}
