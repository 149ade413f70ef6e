import { z } from "zod";

// Optional numeric fields: missing or non-numeric values are treated as absent
const tolerantNumber = z.number().finite().optional().catch(undefined);

/**
 * One line of device output, e.g.
 * {"id":"M1","ts":1699999999,"tempC":27.1,"ax":-0.03,"ay":0.98,"az":0.05,"light":123,"bat":3.01}
 *
 * Only `id` and `tempC` are required. Unknown fields are stripped.
 */
export const TelemetryWireSchema = z.object({
	id: z.string().refine(s => s.trim().length > 0, { message: "deviceId must be a non-empty string" }),
	ts: tolerantNumber,
	tempC: z.number().finite(),
	ax: tolerantNumber,
	ay: tolerantNumber,
	az: tolerantNumber,
	light: tolerantNumber,
	bat: tolerantNumber
});

export type TelemetryWire = z.infer<typeof TelemetryWireSchema>;

export interface TelemetryRecord {
	readonly deviceId: string;
	readonly timestamp: number; // Unix seconds
	readonly temperatureC: number;

	// g-force
	readonly accelX: number;
	readonly accelY: number;
	readonly accelZ: number;

	readonly lightLevel?: number;
	readonly batteryVoltage?: number;
}
