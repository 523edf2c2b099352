export type { TelemetryEvent, ITelemetry } from './types.js';
export { NullTelemetry } from './null.js';
