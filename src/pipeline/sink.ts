import type winston from "winston";

import { describeError, logStoreError } from "../lib/errors";
import type { AppError } from "../lib/errors";
import type { Alert, TelemetryRecord } from "../telemetry";
import type { AppendLog } from "./append-log";
import { formatLogEntry, formatMarker, renderRecord } from "./render";

// First attempt plus one retry
const APPEND_ATTEMPTS = 2;

/** Where rendered blocks go; process.stdout in production. */
export interface OutputStream {
	write(chunk: string): unknown;
}

export type EmitResult = { logged: true } | { logged: false; error: AppError };

export interface SinkOptions {
	log: AppendLog;
	out: OutputStream;
	logger: winston.Logger;
	now?: () => Date;
}

/**
 * Renders processed records and appends them to the telemetry log.
 * The log is held open between `open` and `close`.
 */
export class Sink {
	private readonly log: AppendLog;
	private readonly out: OutputStream;
	private readonly logger: winston.Logger;
	private readonly now: () => Date;
	private opened = false;

	constructor(opts: SinkOptions) {
		this.log = opts.log;
		this.out = opts.out;
		this.logger = opts.logger;
		this.now = opts.now ?? (() => new Date());
	}

	describe(): string {
		return `telemetry log ${this.log.describe()}`;
	}

	get isOpen(): boolean {
		return this.opened;
	}

	/** Acquire the log and write the session-start marker. */
	async open(source: string): Promise<void> {
		if (this.opened) return;

		await this.log.open();
		try {
			await this.log.append(formatMarker(this.now(), `SESSION START ${source}`));
		} catch (err) {
			await this.log.close();
			throw err;
		}
		this.opened = true;
	}

	async emit(record: TelemetryRecord, raw: string, magnitude: number, alerts: readonly Alert[]): Promise<EmitResult> {
		this.out.write(renderRecord(record, magnitude, alerts));

		const entry = formatLogEntry(this.now(), raw, alerts);

		let lastErr: unknown = null;
		for (let attempt = 1; attempt <= APPEND_ATTEMPTS; attempt++) {
			try {
				await this.log.append(entry);
				return { logged: true };
			} catch (err) {
				lastErr = err;
			}
		}

		this.logger.warn(
			"Telemetry log write failed after retry, entry for %s dropped: %s",
			record.deviceId,
			describeError(lastErr)
		);
		return { logged: false, error: logStoreError(`Failed to append to ${this.describe()}`, lastErr) };
	}

	/** Write the session-end marker and release the log. Safe to call twice. */
	async close(summary: string): Promise<void> {
		if (!this.opened) return;
		this.opened = false;

		try {
			await this.log.append(formatMarker(this.now(), `SESSION END ${summary}`));
		} finally {
			await this.log.close();
		}
	}
}
