import type { LineRead } from "./types";

type Waiter = {
	resolve: (read: LineRead) => void;
	reject: (err: Error) => void;
	timer: NodeJS.Timeout;
};

/**
 * Buffers lines pushed by an event-driven transport and hands them out one
 * at a time through `next(timeoutMs)`. Buffered lines are delivered before a
 * failure or the end of the stream is reported.
 */
export class LineQueue {
	private readonly lines: string[] = [];
	private failure: Error | null = null;
	private ended = false;
	private waiter: Waiter | null = null;

	push(line: string): void {
		if (this.ended || this.failure) return;

		const waiter = this.takeWaiter();
		if (waiter) {
			waiter.resolve({ kind: "line", line });
			return;
		}
		this.lines.push(line);
	}

	fail(err: Error): void {
		if (this.ended || this.failure) return;
		this.failure = err;
		this.takeWaiter()?.reject(err);
	}

	end(): void {
		if (this.ended || this.failure) return;
		this.ended = true;
		this.takeWaiter()?.resolve({ kind: "end" });
	}

	get buffered(): number {
		return this.lines.length;
	}

	next(timeoutMs: number): Promise<LineRead> {
		const line = this.lines.shift();
		if (line !== undefined) return Promise.resolve({ kind: "line", line });
		if (this.failure) return Promise.reject(this.failure);
		if (this.ended) return Promise.resolve({ kind: "end" });
		if (this.waiter) return Promise.reject(new Error("LineQueue: a read is already pending"));

		return new Promise<LineRead>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.waiter = null;
				resolve({ kind: "timeout" });
			}, timeoutMs);
			this.waiter = { resolve, reject, timer };
		});
	}

	private takeWaiter(): Waiter | null {
		const waiter = this.waiter;
		if (!waiter) return null;
		this.waiter = null;
		clearTimeout(waiter.timer);
		return waiter;
	}
}
