import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

/**
 * Durable, append-only text store. `append` writes the whole text in one call;
 * the store never rewrites or truncates what is already there.
 */
export interface AppendLog {
	describe(): string;
	open(): Promise<void>;
	append(text: string): Promise<void>;
	close(): Promise<void>;
}

export class FileAppendLog implements AppendLog {
	private handle: FileHandle | null = null;

	constructor(private readonly filePath: string) {}

	describe(): string {
		return this.filePath;
	}

	async open(): Promise<void> {
		if (this.handle) return;
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		this.handle = await fs.open(this.filePath, "a");
	}

	async append(text: string): Promise<void> {
		if (!this.handle) {
			throw new Error(`telemetry log ${this.filePath} is not open`);
		}
		await this.handle.appendFile(text, "utf8");
	}

	async close(): Promise<void> {
		const handle = this.handle;
		if (!handle) return;
		this.handle = null;
		try {
			await handle.sync();
		} finally {
			await handle.close();
		}
	}
}
