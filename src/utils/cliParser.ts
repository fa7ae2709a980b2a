/**
 * 命令行参数解析
 *
 * 支持 `-name` 与 `--name` 两种前缀，取值可写作 `--name=value` 或 `--name value`。
 * 遇到第一个位置参数（或 `--`）即停止，其后的内容原样留作位置参数。
 */
import { ValidationError } from "../core/errors/ValidationError.js";

export interface FlagSpec {
	/** 需要取值的参数名 */
	readonly valued: readonly string[];
	/** 布尔标志名；不带值时视为 "true" */
	readonly booleans: readonly string[];
}

export interface ParsedArgs {
	/** 参数名 → 取值；重复出现时以最后一次为准 */
	readonly values: ReadonlyMap<string, string>;
	/** 第一个位置参数及其后的所有内容 */
	readonly positionals: readonly string[];
}

/**
 * 一次性解析 argv
 *
 * @param argv 命令行参数（不含 node 与脚本路径）
 * @throws ValidationError 未知参数，或需要取值的参数缺少取值
 *
 * @example
 * ```typescript
 * const spec = { valued: ["base", "step"], booleans: ["debug"] };
 * parseArgv(["--base=2s", "-step", "50ms", "--debug"], spec).values;
 * // => Map { "base" => "2s", "step" => "50ms", "debug" => "true" }
 * ```
 */
export function parseArgv(argv: readonly string[], spec: FlagSpec): ParsedArgs {
	const values = new Map<string, string>();

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg === "--") return { values, positionals: argv.slice(i + 1) };

		const flag = splitFlag(arg);
		if (!flag) return { values, positionals: argv.slice(i) };

		if (spec.booleans.includes(flag.name)) {
			values.set(flag.name, flag.value ?? "true");
			continue;
		}
		if (!spec.valued.includes(flag.name)) {
			throw new ValidationError(`未知参数：-${flag.name}`, {
				field: flag.name,
				value: arg,
				expected: [...spec.valued, ...spec.booleans].map((n) => `-${n}`).join(" "),
			});
		}

		if (flag.value !== undefined) {
			values.set(flag.name, flag.value);
			continue;
		}
		// 下一个参数即取值，即使它以 "-" 开头
		const next = argv[i + 1];
		if (next === undefined) {
			throw new ValidationError(`参数需要取值：-${flag.name}`, { field: flag.name, expected: "取值" });
		}
		values.set(flag.name, next);
		i++;
	}

	return { values, positionals: [] };
}

function splitFlag(arg: string): { name: string; value?: string } | undefined {
	if (!arg.startsWith("-") || arg === "-") return undefined;
	const body = arg.replace(/^--?/, "");
	const eq = body.indexOf("=");
	if (eq < 0) return { name: body };
	return { name: body.slice(0, eq), value: body.slice(eq + 1) };
}
