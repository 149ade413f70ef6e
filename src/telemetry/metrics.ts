import type { TelemetryRecord } from "./schema";

/** Euclidean norm of the acceleration vector, in g. */
export function magnitude(record: TelemetryRecord): number {
	// hypot avoids squaring tiny components down to zero
	return Math.hypot(record.accelX, record.accelY, record.accelZ);
}
