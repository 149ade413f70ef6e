import { TelemetryWireSchema } from "./schema";
import type { TelemetryRecord, TelemetryWire } from "./schema";

export type DecodeFailureReason = "Malformed" | "Incomplete";

export interface DecodeFailure {
	readonly reason: DecodeFailureReason;
	readonly raw: string;
	readonly issues: readonly string[];
}

export type DecodeResult = { ok: true; value: TelemetryRecord } | { ok: false; failure: DecodeFailure };

type ZodIssueLike = {
	path: readonly (string | number)[];
	message: string;
};

function malformed(raw: string, issue: string): DecodeResult {
	return { ok: false, failure: { reason: "Malformed", raw, issues: [issue] } };
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssues(issues: readonly ZodIssueLike[]): string[] {
	return issues.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`);
}

function toRecord(wire: TelemetryWire): TelemetryRecord {
	return Object.freeze({
		deviceId: wire.id,
		timestamp: wire.ts ?? 0,
		temperatureC: wire.tempC,
		accelX: wire.ax ?? 0,
		accelY: wire.ay ?? 0,
		accelZ: wire.az ?? 0,
		lightLevel: wire.light,
		batteryVoltage: wire.bat
	});
}

/**
 * Decode one line (terminator already stripped) into a telemetry record.
 *
 * - Empty lines, invalid JSON and JSON that is not an object are `Malformed`.
 * - Objects without a non-empty `id` or a numeric `tempC` are `Incomplete`.
 */
export function decode(rawLine: string): DecodeResult {
	if (rawLine.trim() === "") {
		return malformed(rawLine, "empty line");
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(rawLine);
	} catch {
		return malformed(rawLine, "not valid JSON");
	}

	if (!isJsonObject(parsed)) {
		return malformed(rawLine, "not a JSON object");
	}

	const res = TelemetryWireSchema.safeParse(parsed);
	if (!res.success) {
		return {
			ok: false,
			failure: { reason: "Incomplete", raw: rawLine, issues: formatIssues(res.error.issues) }
		};
	}

	return { ok: true, value: toRecord(res.data) };
}
