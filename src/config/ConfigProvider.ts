import "dotenv/config";
import { ValidationError } from "../core/errors/ValidationError.js";
import { parseArgv } from "../utils/cliParser.js";
import { ConfigSchema, FLAGS, type AppConfig, type FlagName, type RawConfig } from "./schema.js";

const ENV_PREFIX = "SLOWCAT_";
const HELP_FLAGS = ["help", "h"];
const FLAG_NAMES = Object.keys(FLAGS).filter(isFlagName);

function isFlagName(name: string): name is FlagName {
	return name in FLAGS;
}

/** 解析后的命令行参数 */
export interface CliArgs {
	readonly values: ReadonlyMap<string, string>;
	/** 第一个位置参数及其后的内容，不参与配置 */
	readonly positionals: readonly string[];
	readonly help: boolean;
}

/**
 * 配置提供者
 *
 * 来源优先级：命令行参数 > 环境变量（SLOWCAT_BASE 等，支持 .env） > 默认值。
 * 加载后不可变，延迟函数与复制循环都从这里取参数。
 *
 * @example
 * ```typescript
 * const config = ConfigProvider.load(process.argv.slice(2));
 * config.baseMs; // 1000
 * config.debug;  // false
 * ```
 */
export class ConfigProvider {
	private constructor(private readonly config: Readonly<AppConfig>) {}

	/**
	 * 解析命令行参数（不校验取值）
	 *
	 * @param argv 命令行参数（不含 node 与脚本路径）
	 * @throws ValidationError 未知参数或缺少取值
	 */
	static parseArgs(argv: readonly string[]): CliArgs {
		const { values, positionals } = parseArgv(argv, {
			valued: FLAG_NAMES.filter((n) => n !== "debug"),
			booleans: ["debug", ...HELP_FLAGS],
		});
		return { values, positionals, help: HELP_FLAGS.some((n) => values.has(n)) };
	}

	/**
	 * @param argv 命令行参数（不含 node 与脚本路径）
	 * @param env 环境变量
	 * @throws ValidationError 存在未知参数、缺少取值或取值不合法
	 */
	static load(argv: readonly string[] = [], env: NodeJS.ProcessEnv = process.env): ConfigProvider {
		return ConfigProvider.fromArgs(ConfigProvider.parseArgs(argv), env);
	}

	/**
	 * 由已解析的命令行参数与环境变量构造配置
	 */
	static fromArgs(args: CliArgs, env: NodeJS.ProcessEnv = process.env): ConfigProvider {
		const raw: RawConfig = {};
		for (const name of FLAG_NAMES) {
			raw[name] = args.values.get(name) ?? env[`${ENV_PREFIX}${name.toUpperCase()}`];
		}

		const parsed = ConfigSchema.safeParse(raw);
		if (!parsed.success) {
			const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
			throw new ValidationError(`配置错误：${msg}`, {
				field: parsed.error.issues[0]?.path.join("."),
				value: parsed.error.issues.map((i) => i.message),
			});
		}

		const { base, step, bits, debug } = parsed.data;
		return new ConfigProvider(Object.freeze({ baseMs: base, stepMs: step, bits, debug }));
	}

	get baseMs(): number {
		return this.config.baseMs;
	}

	get stepMs(): number {
		return this.config.stepMs;
	}

	get bits(): number {
		return this.config.bits;
	}

	get debug(): boolean {
		return this.config.debug;
	}

	getConfig(): Readonly<AppConfig> {
		return this.config;
	}
}

/** 帮助文本：标题 + 每个参数及默认值 */
export function usage(): string {
	const lines = ["as slow as possible", ""];
	for (const [name, flag] of Object.entries(FLAGS)) {
		lines.push(`  --${name}${name === "debug" ? "" : " <value>"}`);
		lines.push(`    \t${flag.usage} (默认 ${flag.value})`);
	}
	return `${lines.join("\n")}\n`;
}
