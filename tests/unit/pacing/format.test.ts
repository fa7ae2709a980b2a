import { describe, it, expect } from "vitest";
import { formatCodePoint, formatDuration, quoteRune } from "../../../src/pacing/format.js";

describe("quoteRune", () => {
	it("普通字符原样加引号", () => {
		expect(quoteRune(0x41)).toBe('"A"');
		expect(quoteRune(0x20ac)).toBe('"€"');
		expect(quoteRune(0x1f600)).toBe('"😀"');
	});

	it("转义换行、制表、引号和反斜杠", () => {
		expect(quoteRune(0x0a)).toBe('"\\n"');
		expect(quoteRune(0x09)).toBe('"\\t"');
		expect(quoteRune(0x22)).toBe('"\\""');
		expect(quoteRune(0x5c)).toBe('"\\\\"');
	});

	it("其他控制字符用十六进制", () => {
		expect(quoteRune(0x00)).toBe('"\\x00"');
		expect(quoteRune(0x1b)).toBe('"\\x1b"');
		expect(quoteRune(0x7f)).toBe('"\\x7f"');
		expect(quoteRune(0x85)).toBe('"\\u0085"');
	});

	it("空格原样，其他空白和格式符转义", () => {
		expect(quoteRune(0x20)).toBe('" "');
		expect(quoteRune(0xa0)).toBe('"\\u00a0"');
		expect(quoteRune(0x200b)).toBe('"\\u200b"');
		expect(quoteRune(0x2028)).toBe('"\\u2028"');
		expect(quoteRune(0x3000)).toBe('"\\u3000"');
		expect(quoteRune(0xfeff)).toBe('"\\ufeff"');
	});

	it("私用区和基本平面外的不可见字符", () => {
		expect(quoteRune(0xe000)).toBe('"\\ue000"');
		expect(quoteRune(0xe0001)).toBe('"\\U000e0001"');
		expect(quoteRune(0xf0000)).toBe('"\\U000f0000"');
	});
});

describe("formatCodePoint", () => {
	it("至少四位大写十六进制", () => {
		expect(formatCodePoint(0x41)).toBe("U+0041");
		expect(formatCodePoint(0xfffd)).toBe("U+FFFD");
		expect(formatCodePoint(0x1f600)).toBe("U+1F600");
	});
});

describe("formatDuration", () => {
	it("零与亚秒", () => {
		expect(formatDuration(0)).toBe("0s");
		expect(formatDuration(0.00075)).toBe("750ns");
		expect(formatDuration(0.5)).toBe("500µs");
		expect(formatDuration(100)).toBe("100ms");
		expect(formatDuration(1.5)).toBe("1.5ms");
	});

	it("秒、分、时", () => {
		expect(formatDuration(1000)).toBe("1s");
		expect(formatDuration(1100)).toBe("1.1s");
		expect(formatDuration(1700)).toBe("1.7s");
		expect(formatDuration(90_000)).toBe("1m30s");
		expect(formatDuration(3_600_000)).toBe("1h0m0s");
	});
});
