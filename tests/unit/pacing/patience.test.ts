import { describe, it, expect } from "vitest";
import { bePatient, MAX_BITS } from "../../../src/pacing/patience.js";
import { ValidationError } from "../../../src/core/errors/ValidationError.js";

describe("bePatient 延迟函数", () => {
	it("默认参数下 A 等待 1.1s", () => {
		const patience = bePatient({ baseMs: 1000, stepMs: 100, bits: 3 });
		// 0x41 & 0b111 = 1
		expect(patience(0x41)).toBe(1100);
		// 0x47 & 0b111 = 7
		expect(patience(0x47)).toBe(1700);
		expect(patience(0x48)).toBe(1000);
	});

	it("每个位宽恰好产生 2^bits 个等距取值", () => {
		for (let bits = 0; bits <= MAX_BITS; bits++) {
			const patience = bePatient({ baseMs: 10, stepMs: 3, bits });
			const seen = new Set<number>();
			for (let cp = 0; cp < 0x800; cp++) seen.add(patience(cp));
			const expected = Array.from({ length: 1 << bits }, (_, k) => 10 + 3 * k);
			expect([...seen].sort((a, b) => a - b)).toEqual(expected);
		}
	});

	it("掩码作用于完整码点（大于 255 的字符）", () => {
		const patience = bePatient({ baseMs: 0, stepMs: 1, bits: 4 });
		expect(patience(0x20ac)).toBe(0xc);
		expect(patience(0x1f600)).toBe(0);
		expect(patience(0x10ffff)).toBe(15);
	});

	it("bits=0 时所有字符等待相同", () => {
		const patience = bePatient({ baseMs: 250, stepMs: 100, bits: 0 });
		expect(patience(0x41)).toBe(250);
		expect(patience(0x7f)).toBe(250);
	});

	it("同一字符多次调用结果一致", () => {
		const patience = bePatient({ baseMs: 5, stepMs: 7, bits: 5 });
		expect(patience(0x263a)).toBe(patience(0x263a));
	});

	it.each([8, 9, 32, -1, 2.5])("bits=%s 构造时即失败", (bits) => {
		expect(() => bePatient({ baseMs: 0, stepMs: 0, bits })).toThrow(ValidationError);
	});

	it("错误带上字段信息", () => {
		let caught: unknown;
		try {
			bePatient({ baseMs: 0, stepMs: 0, bits: 8 });
		} catch (err) {
			caught = err;
		}
		expect(caught).toBeInstanceOf(ValidationError);
		expect(caught).toMatchObject({ field: "bits", value: 8, expected: "0-7", code: "VALIDATION_ERROR" });
	});
});
