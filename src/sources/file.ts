import type { ReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import type winston from "winston";

import type { AppConfig } from "../lib/config";
import { configError } from "../lib/errors";
import { LineQueue } from "./line-queue";
import type { LineRead, LineSource, LineSourceModule } from "./types";

// Pause the reader while this many lines wait in the queue
const HIGH_WATER_LINES = 1000;
const LOW_WATER_LINES = 100;

/**
 * Replays a recorded capture, one line per record. End of file ends the
 * stream, which drains the pipeline normally.
 */
export class FileLineSource implements LineSource {
	readonly openFailureHints = [
		"the file does not exist",
		"the path is wrong (check --port / TELEMETRY_PORT)",
		"the file is not readable by this user"
	] as const;

	private readonly queue = new LineQueue();
	private reader: readline.Interface | null = null;
	private input: ReadStream | null = null;
	private paused = false;

	constructor(
		private readonly filePath: string,
		private readonly logger: winston.Logger
	) {}

	describe(): string {
		return `replay file ${this.filePath}`;
	}

	async open(): Promise<void> {
		// Open eagerly so a missing file fails here, not on the first read
		const handle = await fs.open(this.filePath, "r");
		const stream = handle.createReadStream({ encoding: "utf8" });
		stream.on("error", err => this.queue.fail(err));

		const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
		reader.on("line", line => {
			this.queue.push(line);
			if (!this.paused && this.queue.buffered >= HIGH_WATER_LINES) {
				this.paused = true;
				reader.pause();
			}
		});
		reader.on("close", () => this.queue.end());

		this.reader = reader;
		this.input = stream;
		this.logger.debug("Replaying %s", this.filePath);
	}

	async next(timeoutMs: number): Promise<LineRead> {
		const read = await this.queue.next(timeoutMs);
		if (this.paused && this.queue.buffered <= LOW_WATER_LINES) {
			this.paused = false;
			this.reader?.resume();
		}
		return read;
	}

	async close(): Promise<void> {
		const reader = this.reader;
		if (!reader) return;
		this.reader = null;
		reader.close();
		this.input?.destroy();
		this.input = null;
	}
}

const FileSource: LineSourceModule = {
	type: "file",

	validate(config: AppConfig): void {
		if (path.resolve(config.pipeline.transportAddress) === path.resolve(config.pipeline.logPath)) {
			throw configError("file: the replay file cannot also be the telemetry log");
		}
	},

	create(config: AppConfig, logger: winston.Logger): LineSource {
		return new FileLineSource(config.pipeline.transportAddress, logger);
	}
};

export default FileSource;
