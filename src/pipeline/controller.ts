import type winston from "winston";

import type { PipelineConfig } from "../lib/config";
import { asAppError, describeError, logStoreError, transportOpenError, transportReadError } from "../lib/errors";
import type { AppError } from "../lib/errors";
import type { LineRead, LineSource } from "../sources";
import { decode, evaluate, magnitude } from "../telemetry";
import type { DecodeFailure } from "../telemetry";
import type { Sink } from "./sink";

export type PipelineState = "Idle" | "Connecting" | "Streaming" | "Draining" | "Stopped" | "Faulted";

const ALLOWED_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
	Idle: ["Connecting"],
	Connecting: ["Streaming", "Faulted"],
	Streaming: ["Draining", "Faulted"],
	Draining: ["Stopped"],
	Stopped: [],
	Faulted: []
};

export function assertTransition(from: PipelineState, to: PipelineState): void {
	const allowed = ALLOWED_TRANSITIONS[from] ?? [];
	if (!allowed.includes(to)) {
		throw new Error(`Illegal pipeline transition: ${from} → ${to}`);
	}
}

export interface PipelineStats {
	lines: number;
	records: number;
	malformed: number;
	incomplete: number;
	alerts: number;
	logFailures: number;
}

export type RunOutcome =
	| { state: "Stopped"; exitCode: 0; stats: PipelineStats }
	| { state: "Faulted"; exitCode: 1; stats: PipelineStats; error: AppError };

export interface PipelineControllerOptions {
	config: PipelineConfig;
	source: LineSource;
	sink: Sink;
	logger: winston.Logger;
	onStateChange?: (from: PipelineState, to: PipelineState) => void;
}

const PREVIEW_MAX_LEN = 256;

function previewLine(raw: string): string {
	const clipped = raw.length <= PREVIEW_MAX_LEN ? raw : `${raw.slice(0, PREVIEW_MAX_LEN)}…`;
	return JSON.stringify(clipped);
}

export function formatStats(stats: PipelineStats): string {
	return (
		`lines=${stats.lines} records=${stats.records} malformed=${stats.malformed} ` +
		`incomplete=${stats.incomplete} alerts=${stats.alerts} logFailures=${stats.logFailures}`
	);
}

/**
 * Owns the read loop: pulls one line at a time from the source and runs it
 * through decode → magnitude → evaluate → sink before pulling the next.
 *
 * Per-line problems (bad input, a dropped log entry) are reported and the
 * loop carries on. Only transport and log-store lifecycle failures end the
 * run, in `Faulted`. `stop()` is cooperative and observed between reads,
 * so it takes effect within one read timeout.
 */
export class PipelineController {
	private readonly config: PipelineConfig;
	private readonly source: LineSource;
	private readonly sink: Sink;
	private readonly logger: winston.Logger;
	private readonly onStateChange?: (from: PipelineState, to: PipelineState) => void;

	private current: PipelineState = "Idle";
	private stopRequested = false;
	private inFlight: Promise<void> | null = null;
	private readonly stats: PipelineStats = {
		lines: 0,
		records: 0,
		malformed: 0,
		incomplete: 0,
		alerts: 0,
		logFailures: 0
	};

	constructor(opts: PipelineControllerOptions) {
		this.config = opts.config;
		this.source = opts.source;
		this.sink = opts.sink;
		this.logger = opts.logger;
		this.onStateChange = opts.onStateChange;
	}

	get state(): PipelineState {
		return this.current;
	}

	/** Request a graceful stop; the loop drains after the current read. */
	stop(reason: string): void {
		if (this.stopRequested) return;
		this.stopRequested = true;
		this.logger.info("Stop requested (%s), draining pipeline", reason);
	}

	/**
	 * Release the sink and source now, without waiting for the read loop.
	 * A line already being processed is finished first, so its log entry is
	 * not cut short.
	 */
	async interrupt(reason: string): Promise<void> {
		this.stopRequested = true;
		this.logger.warn("Immediate stop requested (%s), releasing resources", reason);
		try {
			await this.inFlight;
		} finally {
			await this.release("Interrupted");
		}
	}

	async run(): Promise<RunOutcome> {
		this.transition("Connecting");
		this.logger.info(
			"Pipeline starting (transport=%s symbolRate=%d readTimeoutMs=%d log=%s)",
			this.config.transportAddress,
			this.config.symbolRate,
			this.config.readTimeoutMs,
			this.config.logPath
		);

		try {
			await this.connect();
		} catch (err) {
			return this.fault(err);
		}

		this.transition("Streaming");
		this.logger.info("Streaming from %s", this.source.describe());

		try {
			await this.stream();
		} catch (err) {
			return this.fault(err);
		}

		this.transition("Draining");
		await this.release("Stopped");
		this.transition("Stopped");
		this.logger.info("Pipeline stopped (%s)", formatStats(this.stats));

		return { state: "Stopped", exitCode: 0, stats: { ...this.stats } };
	}

	private transition(to: PipelineState): void {
		const from = this.current;
		assertTransition(from, to);
		this.current = to;
		this.logger.debug("Pipeline state %s -> %s", from, to);
		this.onStateChange?.(from, to);
	}

	private async connect(): Promise<void> {
		const transport = this.source.describe();

		try {
			await this.source.open();
		} catch (err) {
			throw transportOpenError(transport, this.source.openFailureHints, err);
		}

		try {
			await this.sink.open(transport);
		} catch (err) {
			throw logStoreError(`Could not open ${this.sink.describe()}`, err);
		}
	}

	private async stream(): Promise<void> {
		while (!this.stopRequested) {
			let read: LineRead;
			try {
				read = await this.source.next(this.config.readTimeoutMs);
			} catch (err) {
				throw transportReadError(this.source.describe(), err);
			}

			if (read.kind === "timeout") continue;
			if (read.kind === "end") {
				this.logger.info("%s reached end of stream", this.source.describe());
				return;
			}

			this.inFlight = this.processLine(read.line);
			try {
				await this.inFlight;
			} finally {
				this.inFlight = null;
			}
		}
	}

	private async processLine(raw: string): Promise<void> {
		this.stats.lines++;

		const decoded = decode(raw);
		if (!decoded.ok) {
			this.reportDecodeFailure(decoded.failure);
			return;
		}

		const record = decoded.value;
		const accelMagnitude = magnitude(record);
		const alerts = evaluate(record, accelMagnitude);

		this.stats.records++;
		this.stats.alerts += alerts.length;

		const result = await this.sink.emit(record, raw, accelMagnitude, alerts);
		if (!result.logged) {
			this.stats.logFailures++;
		}
	}

	private reportDecodeFailure(failure: DecodeFailure): void {
		if (failure.reason === "Malformed") {
			this.stats.malformed++;
			this.logger.warn("Malformed telemetry line skipped: %s", previewLine(failure.raw));
			return;
		}

		this.stats.incomplete++;
		this.logger.warn(
			"Incomplete telemetry record skipped (%s): %s",
			failure.issues.join("; "),
			previewLine(failure.raw)
		);
	}

	private async fault(err: unknown): Promise<RunOutcome> {
		const error = asAppError(err);
		this.transition("Faulted");
		this.logger.error("%s", error.message);

		await this.release("Faulted");
		this.logger.error("Pipeline faulted [%s] (%s)", error.code, formatStats(this.stats));

		return { state: "Faulted", exitCode: 1, stats: { ...this.stats }, error };
	}

	// Best-effort: a failing release is reported but never changes the outcome
	private async release(outcome: "Stopped" | "Faulted" | "Interrupted"): Promise<void> {
		try {
			await this.sink.close(`${outcome} ${formatStats(this.stats)}`);
		} catch (err) {
			this.logger.warn("Releasing %s failed: %s", this.sink.describe(), describeError(err));
		}

		try {
			await this.source.close();
		} catch (err) {
			this.logger.warn("Releasing %s failed: %s", this.source.describe(), describeError(err));
		}
	}
}
