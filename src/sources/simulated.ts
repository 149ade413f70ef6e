import type winston from "winston";

import type { AppConfig } from "../lib/config";
import { LineQueue } from "./line-queue";
import type { LineRead, LineSource, LineSourceModule } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;
const MOTION_SPIKE_PROBABILITY = 0.05;
const BATTERY_FULL_V = 3.3;
const BATTERY_EMPTY_V = 2.8;
const BATTERY_DRAIN_PER_SAMPLE_V = 0.001;

export interface SimulatedSourceOptions {
	deviceId: string;
	intervalMs: number;
	random?: () => number;
	now?: () => number;
}

function round(value: number, digits: number): number {
	const f = 10 ** digits;
	return Math.round(value * f) / f;
}

function jitter(random: () => number, max: number): number {
	return (random() * 2 - 1) * max;
}

function sinusoidalTemp(nowMs: number, base: number, amplitude: number): number {
	// phase 0 = midnight, shifted so the peak lands in the afternoon
	const phase = 2 * Math.PI * ((nowMs % DAY_MS) / DAY_MS - 0.25);
	return base + amplitude * Math.sin(phase);
}

/**
 * Emits wire-format lines for a device that sits mostly still (gravity on
 * the Y axis), with occasional motion spikes and a slowly draining battery.
 */
export class SimulatedLineSource implements LineSource {
	readonly openFailureHints = [] as const;

	private readonly queue = new LineQueue();
	private readonly random: () => number;
	private readonly now: () => number;
	private timer: NodeJS.Timeout | null = null;
	private samples = 0;

	constructor(
		private readonly opts: SimulatedSourceOptions,
		private readonly logger: winston.Logger
	) {
		this.random = opts.random ?? Math.random;
		this.now = opts.now ?? Date.now;
	}

	describe(): string {
		return `simulated device ${this.opts.deviceId} every ${this.opts.intervalMs} ms`;
	}

	sample(): string {
		const nowMs = this.now();
		this.samples++;

		const spread = this.random() < MOTION_SPIKE_PROBABILITY ? 1.5 : 0.05;

		return JSON.stringify({
			id: this.opts.deviceId,
			ts: Math.floor(nowMs / 1000),
			tempC: round(sinusoidalTemp(nowMs, 24, 8) + jitter(this.random, 0.2), 2),
			ax: round(jitter(this.random, spread), 3),
			ay: round(0.98 + jitter(this.random, spread), 3),
			az: round(jitter(this.random, spread), 3),
			light: Math.floor(this.random() * 256),
			bat: round(Math.max(BATTERY_EMPTY_V, BATTERY_FULL_V - BATTERY_DRAIN_PER_SAMPLE_V * this.samples), 3)
		});
	}

	async open(): Promise<void> {
		if (this.timer) return;
		this.timer = setInterval(() => this.queue.push(this.sample()), this.opts.intervalMs);
		this.logger.debug("Simulated device %s started", this.opts.deviceId);
	}

	next(timeoutMs: number): Promise<LineRead> {
		return this.queue.next(timeoutMs);
	}

	async close(): Promise<void> {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
		this.queue.end();
	}
}

const SimulatedSource: LineSourceModule = {
	type: "simulated",

	create(config: AppConfig, logger: winston.Logger): LineSource {
		return new SimulatedLineSource(
			{ deviceId: config.pipeline.transportAddress, intervalMs: config.simulated.intervalMs },
			logger
		);
	}
};

export default SimulatedSource;
