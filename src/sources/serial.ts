import type winston from "winston";
import { ReadlineParser, SerialPort } from "serialport";

import type { AppConfig } from "../lib/config";
import { configError, describeError } from "../lib/errors";
import { LineQueue } from "./line-queue";
import type { LineRead, LineSource, LineSourceModule } from "./types";

const MIN_SYMBOL_RATE = 50;

export interface SerialSourceOptions {
	path: string;
	baudRate: number;
}

export interface SerialPortOptions {
	path: string;
	baudRate: number;
	dataBits: 8;
	parity: "none";
	stopBits: 1;
	autoOpen: false;
}

/** The part of a serialport stream the line source drives. */
export interface SerialPortHandle {
	readonly isOpen: boolean;
	open(callback: (err: Error | null) => void): void;
	close(callback: (err: Error | null) => void): void;
	pipe<T extends NodeJS.WritableStream>(destination: T): T;
	on(event: "error" | "close", listener: (err?: Error) => void): unknown;
}

export type SerialPortFactory = (options: SerialPortOptions) => SerialPortHandle;

const openSerialPort: SerialPortFactory = options => new SerialPort(options);

export function chunkToLine(chunk: unknown): string {
	const text = Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk);
	return text.endsWith("\r") ? text.slice(0, -1) : text;
}

/**
 * Serial device framed into lines (8 data bits, no parity, 1 stop bit).
 * An error or unexpected close after opening is reported as a read failure:
 * the device offers no way to resume mid-stream.
 */
export class SerialLineSource implements LineSource {
	readonly openFailureHints = [
		"the device is not connected (check the USB cable and power)",
		"the port path is wrong (check --port / TELEMETRY_PORT)",
		"the port is already in use by another program (close serial monitors)"
	] as const;

	private readonly queue = new LineQueue();
	private port: SerialPortHandle | null = null;
	private closing = false;

	constructor(
		private readonly opts: SerialSourceOptions,
		private readonly logger: winston.Logger,
		private readonly createPort: SerialPortFactory = openSerialPort
	) {}

	describe(): string {
		return `serial port ${this.opts.path} at ${this.opts.baudRate} baud`;
	}

	async open(): Promise<void> {
		const port = this.createPort({
			path: this.opts.path,
			baudRate: this.opts.baudRate,
			dataBits: 8,
			parity: "none",
			stopBits: 1,
			autoOpen: false
		});

		await new Promise<void>((resolve, reject) => {
			port.open(err => {
				if (err) return reject(err);
				resolve();
			});
		});

		const parser = port.pipe(new ReadlineParser({ delimiter: "\n", encoding: "utf8" }));
		parser.on("data", (chunk: unknown) => this.queue.push(chunkToLine(chunk)));

		port.on("error", err => this.queue.fail(err ?? new Error("serial port error")));
		port.on("close", () => {
			if (!this.closing) {
				this.queue.fail(new Error("serial port closed unexpectedly"));
			}
		});

		this.port = port;
		this.logger.debug("Serial port %s opened", this.opts.path);
	}

	next(timeoutMs: number): Promise<LineRead> {
		return this.queue.next(timeoutMs);
	}

	async close(): Promise<void> {
		const port = this.port;
		if (!port) return;
		this.port = null;
		this.closing = true;
		this.queue.end();

		if (!port.isOpen) return;

		await new Promise<void>(resolve => {
			port.close(err => {
				if (err) {
					this.logger.warn("Closing serial port %s failed: %s", this.opts.path, describeError(err));
				}
				resolve();
			});
		});
	}
}

const SerialSource: LineSourceModule = {
	type: "serial",

	validate(config: AppConfig): void {
		if (config.pipeline.symbolRate < MIN_SYMBOL_RATE) {
			throw configError(`serial: symbolRate must be at least ${MIN_SYMBOL_RATE}`);
		}
	},

	create(config: AppConfig, logger: winston.Logger): LineSource {
		return new SerialLineSource(
			{ path: config.pipeline.transportAddress, baudRate: config.pipeline.symbolRate },
			logger
		);
	}
};

export default SerialSource;
