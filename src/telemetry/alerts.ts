import type { TelemetryRecord } from "./schema";

export const ALERT_KINDS = ["HighMotion", "HighTemperature", "LowLight", "LowBattery"] as const;

export type AlertKind = (typeof ALERT_KINDS)[number];

export const ALERT_THRESHOLDS = {
	HighMotion: 1.5, // g
	HighTemperature: 30.0, // °C
	LowLight: 20,
	LowBattery: 3.0 // V
} as const satisfies Record<AlertKind, number>;

export interface Alert {
	readonly kind: AlertKind;
	readonly record: TelemetryRecord;
	readonly value: number;
	readonly threshold: number;
}

type Direction = "above" | "below";

interface AlertRule {
	kind: AlertKind;
	direction: Direction;
	label: string;
	unit: string;
	digits?: number;
	select: (record: TelemetryRecord, magnitude: number) => number | undefined;
}

// Evaluation order is the order alerts are reported and logged in
const RULES: readonly AlertRule[] = [
	{
		kind: "HighMotion",
		direction: "above",
		label: "acceleration magnitude",
		unit: " g",
		digits: 3,
		select: (_record, magnitude) => magnitude
	},
	{
		kind: "HighTemperature",
		direction: "above",
		label: "temperature",
		unit: " °C",
		digits: 2,
		select: record => record.temperatureC
	},
	{
		kind: "LowLight",
		direction: "below",
		label: "light level",
		unit: "",
		select: record => record.lightLevel
	},
	{
		kind: "LowBattery",
		direction: "below",
		label: "battery voltage",
		unit: " V",
		digits: 2,
		select: record => record.batteryVoltage
	}
];

const RULES_BY_KIND = new Map<AlertKind, AlertRule>(RULES.map(r => [r.kind, r]));

function crosses(direction: Direction, value: number, threshold: number): boolean {
	return direction === "above" ? value > threshold : value < threshold;
}

/**
 * Apply the fixed threshold rules to one record. Stateless: the result depends
 * only on the arguments. Comparisons are strict, so a value equal to its
 * threshold never fires. Rules whose field is absent are skipped.
 */
export function evaluate(record: TelemetryRecord, magnitude: number): Alert[] {
	const alerts: Alert[] = [];

	for (const rule of RULES) {
		const value = rule.select(record, magnitude);
		if (value === undefined) continue;

		const threshold = ALERT_THRESHOLDS[rule.kind];
		if (crosses(rule.direction, value, threshold)) {
			alerts.push({ kind: rule.kind, record, value, threshold });
		}
	}

	return alerts;
}

/** e.g. "LowBattery: battery voltage 2.50 V below 3.00 V" */
export function describeAlert(alert: Alert): string {
	const rule = RULES_BY_KIND.get(alert.kind);
	if (!rule) {
		return `${alert.kind}: ${alert.value}`;
	}
	const format = (n: number): string => (rule.digits === undefined ? String(n) : n.toFixed(rule.digits));
	return `${alert.kind}: ${rule.label} ${format(alert.value)}${rule.unit} ${rule.direction} ${format(alert.threshold)}${rule.unit}`;
}
