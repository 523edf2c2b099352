/**
 * A discriminated union of all telemetry events emitted by the system.
 * Each event kind has a specific shape with relevant metadata.
 */
export type TelemetryEvent =
  | {
      kind: 'review.start';
      runId: string;
      /** Window start, ISO-8601 */
      since: string;
      timestamp: number;
    }
  | {
      kind: 'review.complete';
      runId: string;
      durationMs: number;
      commitCount: number;
      entryCount: number;
      groupCount: number;
      timestamp: number;
    }
  | {
      kind: 'review.error';
      runId: string;
      stage: string;
      error: string;
      durationMs: number;
      timestamp: number;
    }
  | {
      kind: 'diff.fallback';
      runId: string;
      groupId: string;
      /** Name of the strategy that produced the merged diff, or 'none' */
      strategy: string;
      timestamp: number;
    }
  | {
      kind: 'sync.complete';
      durationMs: number;
      timestamp: number;
    };

/**
 * Interface for telemetry emission.
 * Implementations must never throw; failures are logged internally.
 */
export interface ITelemetry {
  /**
   * Emit a telemetry event.
   * Fire-and-forget: this method must never throw.
   */
  emit(event: TelemetryEvent): void;

  /**
   * Dispose of the telemetry instance (e.g., close databases, flush buffers).
   */
  dispose(): void;
}
