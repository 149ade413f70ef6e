// Wire format and record shape
export { TelemetryWireSchema } from "./schema";
export type { TelemetryRecord, TelemetryWire } from "./schema";

// Per-line processing stages
export { decode } from "./decode";
export type { DecodeFailure, DecodeFailureReason, DecodeResult } from "./decode";
export { magnitude } from "./metrics";
export { ALERT_KINDS, ALERT_THRESHOLDS, describeAlert, evaluate } from "./alerts";
export type { Alert, AlertKind } from "./alerts";
