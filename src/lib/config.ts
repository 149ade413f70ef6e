import "dotenv/config";
import fs from "node:fs";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { configError, describeError } from "./errors";

export type SourceType = "serial" | "file" | "simulated";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

/**
 * Settings the pipeline controller is constructed with.
 * `transportAddress` is the serial device path, the replay file, or the
 * simulated device id, depending on the source type.
 */
export interface PipelineConfig {
	transportAddress: string;
	symbolRate: number;
	readTimeoutMs: number;
	logPath: string;
}

export interface AppConfig {
	source: SourceType;
	pipeline: PipelineConfig;

	simulated: {
		intervalMs: number;
	};

	paths: {
		logDir: string;
	};

	logLevel: LogLevel;
}

interface CliOptions {
	config?: string;
	source?: string;
	port?: string;
	baud?: string;
	readTimeout?: string;
	log?: string;
	logDir?: string;
	logLevel?: string;
	interval?: string;
}

const FileConfigSchema = z
	.object({
		source: z.string(),
		transportAddress: z.string(),
		symbolRate: z.number(),
		readTimeoutMs: z.number(),
		logPath: z.string(),
		logDir: z.string(),
		logLevel: z.string(),
		simulatedIntervalMs: z.number()
	})
	.partial()
	.strict();

type FileConfig = z.infer<typeof FileConfigSchema>;

/* ---------- defaults ---------- */

const SOURCE_TYPES: ReadonlySet<string> = new Set(["serial", "file", "simulated"]);

const LOG_LEVELS: ReadonlySet<string> = new Set(["error", "warn", "info", "http", "verbose", "debug", "silly"]);

const DEFAULT_SOURCE: SourceType = "serial";
const DEFAULT_SERIAL_PORT = "/dev/ttyUSB0";
const DEFAULT_SIMULATED_DEVICE = "SIM1";
const DEFAULT_SYMBOL_RATE = 115200;
const DEFAULT_READ_TIMEOUT_MS = 1000;
const DEFAULT_SIMULATED_INTERVAL_MS = 500;
const DEFAULT_TELEMETRY_LOG = "telemetry.log";
const DEFAULT_LOG_DIR = "logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function parseCommandLine(argv: string[]): CliOptions {
	const program = new Command();

	program
		.name("telemetry-ingestor")
		.option("-c, --config <path>", "Path to a JSON configuration file")
		.option("-s, --source <type>", "Line source: serial, file or simulated")
		.option("-p, --port <address>", "Serial device path, replay file or simulated device id")
		.option("-b, --baud <rate>", "Serial symbol rate (8N1)")
		.option("-t, --read-timeout <ms>", "Read timeout used to observe stop requests")
		.option("-l, --log <path>", "Append-only telemetry log file")
		.option("--log-dir <dir>", "Directory for diagnostic logs")
		.option("--log-level <level>", "Diagnostic log level")
		.option("--interval <ms>", "Emit interval of the simulated source")
		.allowExcessArguments(true);

	program.parse(argv);

	return program.opts<CliOptions>();
}

function nonEmpty(value: string | undefined): string | undefined {
	if (value === undefined) return undefined;
	const trimmed = value.trim();
	return trimmed === "" ? undefined : trimmed;
}

function readConfigFile(configPath: string): FileConfig {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
	} catch (err) {
		throw configError(`Could not read config file ${configPath}: ${describeError(err)}`);
	}

	const res = FileConfigSchema.safeParse(parsed);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid config file ${configPath}: ${issues}`);
	}
	return res.data;
}

function pickNumber(name: string, ...candidates: Array<string | number | undefined>): number | undefined {
	for (const candidate of candidates) {
		if (candidate === undefined) continue;
		if (typeof candidate === "number") return candidate;
		const n = Number(candidate);
		if (Number.isNaN(n)) {
			throw configError(`${name} must be a number (got '${candidate}')`);
		}
		return n;
	}
	return undefined;
}

function isSourceType(value: string): value is SourceType {
	return SOURCE_TYPES.has(value);
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.has(value);
}

function defaultAddressFor(source: SourceType): string {
	switch (source) {
		case "serial":
			return DEFAULT_SERIAL_PORT;
		case "simulated":
			return DEFAULT_SIMULATED_DEVICE;
		case "file":
			return "";
	}
}

/* ---------- validation ---------- */

// Longest a single read may block before the loop checks for a stop
const MAX_READ_TIMEOUT_MS = 60_000;

export function validateConfig(cfg: AppConfig): void {
	const p = cfg.pipeline;

	if (!p.transportAddress.trim()) {
		throw configError(`transportAddress is required for source '${cfg.source}'`);
	}
	if (!Number.isInteger(p.symbolRate) || p.symbolRate <= 0) {
		throw configError("symbolRate must be a positive integer");
	}
	if (!Number.isFinite(p.readTimeoutMs) || p.readTimeoutMs <= 0) {
		throw configError("readTimeoutMs must be a positive number");
	}
	if (p.readTimeoutMs > MAX_READ_TIMEOUT_MS) {
		throw configError(`readTimeoutMs must be at most ${MAX_READ_TIMEOUT_MS}`);
	}
	if (!p.logPath.trim()) {
		throw configError("logPath must not be empty");
	}
	if (!Number.isFinite(cfg.simulated.intervalMs) || cfg.simulated.intervalMs <= 0) {
		throw configError("simulatedIntervalMs must be a positive number");
	}
}

/* ---------- public API ---------- */

/**
 * Resolve configuration from command line, environment, an optional JSON
 * file and defaults, in that order of precedence.
 */
export function loadConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): AppConfig {
	const cli = parseCommandLine(argv);
	const file = cli.config ? readConfigFile(cli.config) : {};

	const sourceRaw = nonEmpty(cli.source) ?? nonEmpty(env.TELEMETRY_SOURCE) ?? file.source ?? DEFAULT_SOURCE;
	if (!isSourceType(sourceRaw)) {
		throw configError(`source must be one of: ${Array.from(SOURCE_TYPES).join(", ")} (got '${sourceRaw}')`);
	}

	const logLevelRaw = (nonEmpty(cli.logLevel) ?? nonEmpty(env.LOG_LEVEL) ?? file.logLevel ?? DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevelRaw)) {
		throw configError(`logLevel must be one of: ${Array.from(LOG_LEVELS).join(", ")}`);
	}

	const cfg: AppConfig = {
		source: sourceRaw,
		pipeline: {
			transportAddress:
				nonEmpty(cli.port) ?? nonEmpty(env.TELEMETRY_PORT) ?? file.transportAddress ?? defaultAddressFor(sourceRaw),
			symbolRate:
				pickNumber("symbolRate", nonEmpty(cli.baud), nonEmpty(env.TELEMETRY_BAUD), file.symbolRate) ??
				DEFAULT_SYMBOL_RATE,
			readTimeoutMs:
				pickNumber(
					"readTimeoutMs",
					nonEmpty(cli.readTimeout),
					nonEmpty(env.TELEMETRY_READ_TIMEOUT_MS),
					file.readTimeoutMs
				) ?? DEFAULT_READ_TIMEOUT_MS,
			logPath: nonEmpty(cli.log) ?? nonEmpty(env.TELEMETRY_LOG) ?? file.logPath ?? DEFAULT_TELEMETRY_LOG
		},
		simulated: {
			intervalMs:
				pickNumber("simulatedIntervalMs", nonEmpty(cli.interval), file.simulatedIntervalMs) ??
				DEFAULT_SIMULATED_INTERVAL_MS
		},
		paths: {
			logDir: nonEmpty(cli.logDir) ?? nonEmpty(env.LOG_DIR) ?? file.logDir ?? DEFAULT_LOG_DIR
		},
		logLevel: logLevelRaw
	};

	validateConfig(cfg);

	return cfg;
}
