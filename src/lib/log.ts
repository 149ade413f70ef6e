import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	logDir?: string;
	level?: string;
	console?: boolean;
	rotate?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

interface FileTarget {
	suffix: string;
	level: string;
	keep: string;
}

function fileTransports(dir: string, serviceName: string, level: string, rotate: boolean): winston.transport[] {
	const targets: FileTarget[] = [
		{ suffix: "", level, keep: "14d" },
		{ suffix: ".error", level: "error", keep: "30d" }
	];

	return targets.map(t =>
		rotate
			? new DailyRotateFile({
					level: t.level,
					dirname: dir,
					filename: `${serviceName}${t.suffix}.%DATE%.log`,
					datePattern: "YYYY-MM-DD",
					maxFiles: t.keep,
					zippedArchive: false
				})
			: new winston.transports.File({
					level: t.level,
					filename: path.join(dir, `${serviceName}${t.suffix}.log`)
				})
	);
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);

	const baseFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const meta = typeof info.stack === "string" ? `\n${info.stack}` : "";
			return `${ts} [${opts.serviceName}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format: baseFormat
			})
		);
	}

	// Operator diagnostics only; telemetry itself goes to the append-only telemetry log
	if (opts.logDir) {
		ensureDir(opts.logDir);
		transports.push(...fileTransports(opts.logDir, opts.serviceName, level, opts.rotate ?? true));
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		transports
	});
}
