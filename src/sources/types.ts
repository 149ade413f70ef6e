import type winston from "winston";

import type { AppConfig, SourceType } from "../lib/config";

export type LineRead = { kind: "line"; line: string } | { kind: "timeout" } | { kind: "end" };

/**
 * A transport that yields raw text lines, terminators already stripped.
 * - open: acquire the transport; rejects when it is unavailable
 * - next: wait at most `timeoutMs` for the next line; rejects on a read error
 * - close: release the transport; safe to call more than once
 */
export interface LineSource {
	/** Shown to the operator when opening fails. */
	readonly openFailureHints: readonly string[];

	describe(): string;
	open(): Promise<void>;
	next(timeoutMs: number): Promise<LineRead>;
	close(): Promise<void>;
}

/**
 * LineSourceModule is the contract every source implementation registers.
 * - type: source identifier used in configuration
 * - validate: optional source-specific configuration checks, throws on invalid config
 * - create: builds an unopened source
 */
export interface LineSourceModule {
	readonly type: SourceType;

	validate?(config: AppConfig): void;

	create(config: AppConfig, logger: winston.Logger): LineSource;
}
