/* 中文注释：启动参数 Schema；所有原始值都是字符串（来自命令行或环境变量） */
import { z } from "zod";
import { parseDuration } from "../utils/duration.js";

const Duration = (fallback: string) =>
	z
		.string()
		.default(fallback)
		.transform((s, ctx) => {
			try {
				return parseDuration(s);
			} catch (err) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
				return z.NEVER;
			}
		});

// 与常见命令行布尔写法一致
const TRUE_VALUES = ["1", "t", "T", "TRUE", "true", "True"] as const;
const FALSE_VALUES = ["0", "f", "F", "FALSE", "false", "False"] as const;
const TRUTHY = new Set<string>(TRUE_VALUES);

export const ConfigSchema = z.object({
	base: Duration("1s"),
	step: Duration("100ms"),
	bits: z
		.string()
		.regex(/^\d+$/, "bits 必须是非负整数")
		.default("3")
		.transform((s) => Number(s)),
	debug: z
		.enum([...TRUE_VALUES, ...FALSE_VALUES])
		.default("false")
		.transform((s) => TRUTHY.has(s)),
});

export type AppConfig = {
	/** 每个字符的最小等待（毫秒） */
	baseMs: number;
	/** 每个低位增量追加的等待（毫秒） */
	stepMs: number;
	/** 参与计算的码点低位位数 */
	bits: number;
	/** 调试模式：丢弃真实输出，打印每个字符的等待时长 */
	debug: boolean;
};

/** 命令行参数名 → 默认值，供帮助文本和未知参数检查使用 */
export const FLAGS = {
	base: { value: "1s", usage: "每个字符的基础等待时长" },
	step: { value: "100ms", usage: "码点低位每加 1 追加的等待时长" },
	bits: { value: "3", usage: "参与计算等待时长的码点低位位数（0-7）" },
	debug: { value: "false", usage: "不输出原文，改为打印每个字符及其等待时长" },
} as const;

export type FlagName = keyof typeof FLAGS;

/** 未经校验的原始取值 */
export type RawConfig = { [K in FlagName]?: string };
