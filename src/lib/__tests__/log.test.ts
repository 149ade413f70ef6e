import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, test } from "vitest";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

import { createLogger } from "../log";

describe("createLogger", () => {
	let dir: string;

	// File transports open their files asynchronously, so the directory is left in place
	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "ingestor-log-"));
	});

	test("console only when no log directory is given", () => {
		const logger = createLogger({ serviceName: "test", level: "warn" });
		expect(logger.level).toBe("warn");
		expect(logger.transports).toHaveLength(1);
		expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
		logger.close();
	});

	test("plain file transports when rotation is off", () => {
		const logDir = path.join(dir, "nested");
		const logger = createLogger({ serviceName: "ingest", logDir, console: false, rotate: false, level: "DEBUG" });

		expect(fs.existsSync(logDir)).toBe(true);
		expect(logger.level).toBe("debug");

		const files = logger.transports.filter(
			(t): t is winston.transports.FileTransportInstance => t instanceof winston.transports.File
		);
		expect(files.map(t => t.filename)).toEqual(["ingest.log", "ingest.error.log"]);
		expect(files.map(t => t.level)).toEqual(["debug", "error"]);
		logger.close();
	});

	test("daily rotating transports by default", () => {
		const logger = createLogger({ serviceName: "ingest", logDir: dir, console: false, level: "info" });

		const rotating = logger.transports.filter((t): t is DailyRotateFile => t instanceof DailyRotateFile);
		expect(rotating).toHaveLength(2);
		expect(logger.transports).toHaveLength(2);
		expect(rotating.map(t => t.filename)).toEqual(["ingest.%DATE%.log", "ingest.error.%DATE%.log"]);
		expect(rotating.map(t => t.dirname)).toEqual([dir, dir]);
		expect(rotating.map(t => t.level)).toEqual(["info", "error"]);
		logger.close();
	});
});
