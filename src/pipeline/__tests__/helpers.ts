import winston from "winston";

import type { LineRead, LineSource } from "../../sources";
import { LineQueue } from "../../sources/line-queue";
import type { AppendLog } from "../append-log";
import type { OutputStream } from "../sink";

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

export function silentLogger(): winston.Logger {
	return winston.createLogger({ silent: true });
}

export class CapturedOutput implements OutputStream {
	readonly chunks: string[] = [];

	write(chunk: string): boolean {
		this.chunks.push(chunk);
		return true;
	}

	get text(): string {
		return this.chunks.join("");
	}
}

/** In-memory append log that can be told to fail the next N appends. */
export class MemoryAppendLog implements AppendLog {
	readonly entries: string[] = [];
	appendCalls = 0;
	failNextAppends = 0;
	openError: Error | null = null;
	isOpen = false;
	closeCount = 0;

	describe(): string {
		return "memory.log";
	}

	async open(): Promise<void> {
		if (this.openError) throw this.openError;
		this.isOpen = true;
	}

	async append(text: string): Promise<void> {
		this.appendCalls++;
		if (!this.isOpen) throw new Error("not open");
		if (this.failNextAppends > 0) {
			this.failNextAppends--;
			throw new Error("ENOSPC: no space left on device");
		}
		this.entries.push(text);
	}

	async close(): Promise<void> {
		this.isOpen = false;
		this.closeCount++;
	}
}

export type ScriptStep = LineRead | Error | (() => LineRead);

/** Line source that plays back a fixed script, then reports end of stream. */
export class ScriptedLineSource implements LineSource {
	readonly openFailureHints = ["device not connected", "wrong port path", "port already in use"];
	opened = false;
	closed = false;
	reads = 0;

	constructor(
		private readonly steps: ScriptStep[],
		private readonly openError: Error | null = null
	) {}

	describe(): string {
		return "scripted source";
	}

	async open(): Promise<void> {
		if (this.openError) throw this.openError;
		this.opened = true;
	}

	async next(): Promise<LineRead> {
		this.reads++;
		const step = this.steps.shift();
		if (step === undefined) return { kind: "end" };
		if (step instanceof Error) throw step;
		if (typeof step === "function") return step();
		return step;
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

/** Line source fed by the test; a read waits until a line is pushed or the source closes. */
export class PushedLineSource implements LineSource {
	readonly openFailureHints: readonly string[] = [];
	readonly queue = new LineQueue();
	closed = false;

	describe(): string {
		return "pushed source";
	}

	async open(): Promise<void> {}

	next(timeoutMs: number): Promise<LineRead> {
		return this.queue.next(timeoutMs);
	}

	async close(): Promise<void> {
		this.closed = true;
		this.queue.end();
	}
}

export function line(text: string): LineRead {
	return { kind: "line", line: text };
}
