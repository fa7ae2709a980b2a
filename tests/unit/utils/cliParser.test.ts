import { describe, it, expect } from "vitest";
import { parseArgv } from "../../../src/utils/cliParser.js";
import { ValidationError } from "../../../src/core/errors/ValidationError.js";

const spec = { valued: ["base", "step", "bits"], booleans: ["debug", "help", "h"] };

describe("parseArgv", () => {
	it("支持 = 与空格两种写法、单双横线", () => {
		const { values } = parseArgv(["--base=2s", "-step", "50ms", "-bits=4", "--debug"], spec);
		expect(Object.fromEntries(values)).toEqual({ base: "2s", step: "50ms", bits: "4", debug: "true" });
	});

	it("值里可以含有等号", () => {
		expect(parseArgv(["--base=a=b"], spec).values.get("base")).toBe("a=b");
	});

	it("重复出现时以最后一次为准", () => {
		expect(parseArgv(["--bits=2", "--bits", "5"], spec).values.get("bits")).toBe("5");
		expect(parseArgv(["--debug", "--debug=false"], spec).values.get("debug")).toBe("false");
	});

	it("下一个参数即使以横线开头也作为取值", () => {
		const { values } = parseArgv(["--step", "--debug"], spec);
		expect(values.get("step")).toBe("--debug");
		expect(values.has("debug")).toBe(false);
	});

	it("缺少取值抛出 ValidationError", () => {
		expect(() => parseArgv(["--bits"], spec)).toThrow(ValidationError);
		expect(() => parseArgv(["--debug", "--base"], spec)).toThrow("参数需要取值：-base");
	});

	it("未知参数抛出 ValidationError", () => {
		expect(() => parseArgv(["--speed=3"], spec)).toThrow("未知参数：-speed");
	});

	it("遇到位置参数即停止解析", () => {
		const parsed = parseArgv(["--base=2s", "file.txt", "--bits=9", "--nope"], spec);
		expect(Object.fromEntries(parsed.values)).toEqual({ base: "2s" });
		expect(parsed.positionals).toEqual(["file.txt", "--bits=9", "--nope"]);
	});

	it("单独的 - 是位置参数，-- 之后全部是位置参数", () => {
		expect(parseArgv(["-", "--debug"], spec).positionals).toEqual(["-", "--debug"]);

		const parsed = parseArgv(["--debug", "--", "--bits=9"], spec);
		expect(parsed.values.get("debug")).toBe("true");
		expect(parsed.values.has("bits")).toBe(false);
		expect(parsed.positionals).toEqual(["--bits=9"]);
	});
});
