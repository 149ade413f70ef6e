import { describe, expect, test } from "vitest";

import { AppError, asAppError, logStoreError, transportOpenError, transportReadError } from "../errors";

describe("asAppError", () => {
	test("passes AppError through", () => {
		const err = new AppError({ code: "CONFIG_ERROR", message: "bad" });
		expect(asAppError(err)).toBe(err);
	});

	test("wraps plain errors as INTERNAL_ERROR with the cause", () => {
		const cause = new Error("boom");
		const wrapped = asAppError(cause);
		expect(wrapped.code).toBe("INTERNAL_ERROR");
		expect(wrapped.message).toBe("boom");
		expect(wrapped.cause).toBe(cause);
	});

	test("wraps non-errors with details", () => {
		const wrapped = asAppError({ reason: 1 });
		expect(wrapped.message).toBe("Unknown error");
		expect(wrapped.details).toEqual({ reason: 1 });
	});
});

describe("transport errors", () => {
	test("open error lists the likely causes on one line", () => {
		const err = transportOpenError("serial port /dev/ttyUSB9 at 115200 baud", ["not connected", "wrong path", "busy"], new Error("No such file or directory"));
		expect(err.code).toBe("TRANSPORT_OPEN_ERROR");
		expect(err.message).toBe(
			"Could not open serial port /dev/ttyUSB9 at 115200 baud: No such file or directory. Likely causes: not connected; wrong path; busy"
		);
		expect(err.message).not.toContain("\n");
	});

	test("open error without hints", () => {
		expect(transportOpenError("simulated device", [], "nope").message).toBe("Could not open simulated device: nope");
	});

	test("read error", () => {
		const err = transportReadError("serial port /dev/ttyUSB0 at 115200 baud", new Error("EIO"));
		expect(err.code).toBe("TRANSPORT_READ_ERROR");
		expect(err.message).toBe(
			"Read from serial port /dev/ttyUSB0 at 115200 baud failed: EIO. Restart the ingestor once the device is back"
		);
	});

	test("log store error appends the cause message", () => {
		expect(logStoreError("Could not open telemetry log x.log", new Error("EACCES")).message).toBe(
			"Could not open telemetry log x.log: EACCES"
		);
		expect(logStoreError("disk full").message).toBe("disk full");
	});
});
