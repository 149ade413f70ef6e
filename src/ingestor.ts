#!/usr/bin/env node
import { setTimeout as delay } from "node:timers/promises";
import type winston from "winston";

import { loadConfig } from "./lib/config";
import type { AppConfig } from "./lib/config";
import { AppError, describeError } from "./lib/errors";
import { createLogger } from "./lib/log";
import { FileAppendLog } from "./pipeline/append-log";
import { PipelineController } from "./pipeline/controller";
import { Sink } from "./pipeline/sink";
import { getLineSourceModule } from "./sources";

// A second Ctrl+C gives the log this long to be closed cleanly
const INTERRUPT_RELEASE_DEADLINE_MS = 2000;

function buildController(config: AppConfig, logger: winston.Logger): PipelineController {
	const module = getLineSourceModule(config.source);
	module.validate?.(config);

	const sink = new Sink({
		log: new FileAppendLog(config.pipeline.logPath),
		out: process.stdout,
		logger
	});

	return new PipelineController({
		config: config.pipeline,
		source: module.create(config, logger),
		sink,
		logger
	});
}

async function main(): Promise<number> {
	const config = loadConfig();

	const logger = createLogger({
		serviceName: "telemetry-ingestor",
		logDir: config.paths.logDir,
		level: config.logLevel
	});

	logger.info("Telemetry ingestor starting (source=%s)", config.source);

	const controller = buildController(config, logger);

	let interrupts = 0;
	let interruptedExitCode: number | null = null;
	process.on("SIGINT", () => {
		interrupts++;
		if (interrupts === 1) {
			controller.stop("SIGINT");
			return;
		}
		if (interruptedExitCode !== null) return;

		interruptedExitCode = 130;
		void Promise.race([controller.interrupt("SIGINT"), delay(INTERRUPT_RELEASE_DEADLINE_MS)])
			.catch(err => logger.error("Releasing resources on interrupt failed: %s", describeError(err)))
			.finally(() => process.exit(130));
	});
	process.on("SIGTERM", () => controller.stop("SIGTERM"));

	const outcome = await controller.run();
	const exitCode = interruptedExitCode ?? outcome.exitCode;
	logger.info("Telemetry ingestor exiting (state=%s exitCode=%d)", outcome.state, exitCode);
	return exitCode;
}

main()
	.then(code => process.exit(code))
	.catch(err => {
		console.error(err instanceof AppError ? `${err.code}: ${err.message}` : err);
		process.exit(1);
	});
