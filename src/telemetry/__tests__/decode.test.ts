import { describe, expect, test } from "vitest";

import { decode } from "../decode";

const SAMPLE = '{"id":"M1","ts":1699999999,"tempC":27.1,"ax":-0.03,"ay":0.98,"az":0.05,"light":123,"bat":3.01}';

describe("decode", () => {
	test("decodes a full wire line and maps every field", () => {
		const res = decode(SAMPLE);
		expect(res).toEqual({
			ok: true,
			value: {
				deviceId: "M1",
				timestamp: 1699999999,
				temperatureC: 27.1,
				accelX: -0.03,
				accelY: 0.98,
				accelZ: 0.05,
				lightLevel: 123,
				batteryVoltage: 3.01
			}
		});
	});

	test("numbers round-trip without precision loss", () => {
		const res = decode('{"id":"P","tempC":-12.345678901234567,"ax":1e-300,"bat":2.9999999999999996}');
		if (!res.ok) throw new Error("expected a record");
		expect(res.value.temperatureC).toBe(-12.345678901234567);
		expect(res.value.accelX).toBe(1e-300);
		expect(res.value.batteryVoltage).toBe(2.9999999999999996);
	});

	test("only id and tempC are required; other numerics default", () => {
		const res = decode('{"id":"M2","tempC":21}');
		if (!res.ok) throw new Error("expected a record");
		expect(res.value.timestamp).toBe(0);
		expect(res.value.accelX).toBe(0);
		expect(res.value.accelY).toBe(0);
		expect(res.value.accelZ).toBe(0);
		expect(res.value.lightLevel).toBeUndefined();
		expect(res.value.batteryVoltage).toBeUndefined();
	});

	test("non-numeric optional fields are treated as absent", () => {
		const res = decode('{"id":"M3","tempC":20,"ax":"fast","light":null,"bat":"low"}');
		if (!res.ok) throw new Error("expected a record");
		expect(res.value.accelX).toBe(0);
		expect(res.value.lightLevel).toBeUndefined();
		expect(res.value.batteryVoltage).toBeUndefined();
	});

	test("out-of-range values pass through", () => {
		const res = decode('{"id":"M4","tempC":250,"light":999,"bat":12,"ax":9}');
		if (!res.ok) throw new Error("expected a record");
		expect(res.value.temperatureC).toBe(250);
		expect(res.value.lightLevel).toBe(999);
		expect(res.value.batteryVoltage).toBe(12);
		expect(res.value.accelX).toBe(9);
	});

	test("unknown fields are ignored", () => {
		const res = decode('{"id":"M5","tempC":1,"firmware":"1.2.3","rssi":-60}');
		if (!res.ok) throw new Error("expected a record");
		expect(Object.keys(res.value)).not.toContain("firmware");
		expect(Object.keys(res.value)).not.toContain("rssi");
	});

	test("decoded records are frozen", () => {
		const res = decode(SAMPLE);
		if (!res.ok) throw new Error("expected a record");
		expect(Object.isFrozen(res.value)).toBe(true);
	});

	test.each([
		["", "empty line"],
		["   ", "empty line"],
		["not-json", "not valid JSON"],
		['{"id":"M1","tempC":', "not valid JSON"],
		["[1,2,3]", "not a JSON object"],
		["null", "not a JSON object"],
		["42", "not a JSON object"],
		['"text"', "not a JSON object"]
	])("%j is Malformed (%s)", (raw, issue) => {
		expect(decode(raw)).toEqual({ ok: false, failure: { reason: "Malformed", raw, issues: [issue] } });
	});

	test("missing id is Incomplete", () => {
		expect(decode('{"tempC":10}')).toEqual({
			ok: false,
			failure: { reason: "Incomplete", raw: '{"tempC":10}', issues: ["id: Required"] }
		});
	});

	test("empty or blank id is Incomplete", () => {
		for (const raw of ['{"id":"","tempC":10}', '{"id":"  ","tempC":10}']) {
			expect(decode(raw)).toEqual({
				ok: false,
				failure: { reason: "Incomplete", raw, issues: ["id: deviceId must be a non-empty string"] }
			});
		}
	});

	test("non-string id is Incomplete", () => {
		const res = decode('{"id":7,"tempC":10}');
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.failure.reason).toBe("Incomplete");
	});

	test("missing or non-numeric tempC is Incomplete", () => {
		const missing = decode('{"id":"M1"}');
		const text = decode('{"id":"M1","tempC":"27.1"}');
		expect(missing).toEqual({
			ok: false,
			failure: { reason: "Incomplete", raw: '{"id":"M1"}', issues: ["tempC: Required"] }
		});
		expect(text.ok).toBe(false);
		if (text.ok) return;
		expect(text.failure.reason).toBe("Incomplete");
		expect(text.failure.issues).toHaveLength(1);
		expect(text.failure.issues[0]).toMatch(/^tempC: /);
	});

	test("an empty object reports both required fields", () => {
		expect(decode("{}")).toEqual({
			ok: false,
			failure: { reason: "Incomplete", raw: "{}", issues: ["id: Required", "tempC: Required"] }
		});
	});
});
