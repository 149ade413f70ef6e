import { describeAlert } from "../telemetry";
import type { Alert, TelemetryRecord } from "../telemetry";

const LABEL_WIDTH = 13;

function row(label: string, value: string): string {
	return `  ${label.padEnd(LABEL_WIDTH)}${value}`;
}

function optional(value: number | undefined, format: (v: number) => string): string {
	return value === undefined ? "n/a" : format(value);
}

/** Human-readable block for the interactive output, terminated by a blank line. */
export function renderRecord(record: TelemetryRecord, magnitude: number, alerts: readonly Alert[]): string {
	const lines = [
		`${record.deviceId} @ ${record.timestamp}`,
		row("temperature", `${record.temperatureC.toFixed(2)} °C`),
		row(
			"accel",
			`x=${record.accelX.toFixed(3)} y=${record.accelY.toFixed(3)} z=${record.accelZ.toFixed(3)} g`
		),
		row("magnitude", `${magnitude.toFixed(3)} g`),
		row("light", optional(record.lightLevel, String)),
		row("battery", optional(record.batteryVoltage, v => `${v.toFixed(2)} V`)),
		...alerts.map(a => `  ALERT ${describeAlert(a)}`)
	];
	return `${lines.join("\n")}\n\n`;
}

/**
 * Log store entry: `<ISO time> - <raw line>`, plus an `ALERTS:` line when
 * any alert fired.
 */
export function formatLogEntry(receivedAt: Date, raw: string, alerts: readonly Alert[]): string {
	const entry = `${receivedAt.toISOString()} - ${raw}\n`;
	if (alerts.length === 0) return entry;
	return `${entry}ALERTS: ${alerts.map(a => a.kind).join(", ")}\n`;
}

export function formatMarker(at: Date, text: string): string {
	return `${at.toISOString()} - ${text}\n`;
}
