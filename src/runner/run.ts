/* 中文注释：一次完整运行：解析配置 → 构造延迟函数 → 复制，返回退出码 */
import { ConfigProvider, usage } from "../config/ConfigProvider.js";
import type { ILogger } from "../contracts/ILogger.js";
import { isErrorEmitter, type ByteSink, type ByteSource, type TextSink } from "../contracts/IStreams.js";
import { ServiceContainer } from "../core/container.js";
import { BaseError } from "../core/errors/index.js";
import { createLogger } from "../logging/createLogger.js";
import type { Sleep } from "../pacing/delays.js";

export interface RunIO {
	stdin?: ByteSource;
	stdout?: ByteSink & TextSink;
	stderr?: TextSink;
	env?: NodeJS.ProcessEnv;
	logger?: ILogger;
	sleep?: Sleep;
}

export const EXIT_OK = 0;
export const EXIT_COPY_FAILED = 1;
export const EXIT_USAGE = 2;

/**
 * 运行 slowcat
 *
 * @returns 退出码：0 输入读完；1 复制失败；2 参数/配置错误（此时不产生任何输出）
 */
export async function run(argv: readonly string[], io: RunIO = {}): Promise<number> {
	const logger = io.logger ?? createLogger();
	const stdout = io.stdout ?? process.stdout;
	// stdout 出错（如下游管道关闭）时中止复制；调试记录写 stdout，不经过复制循环的写回调
	const output = new AbortController();

	let container: ServiceContainer;
	try {
		const args = ConfigProvider.parseArgs(argv);
		if (args.help) {
			(io.stderr ?? process.stderr).write(usage());
			return EXIT_OK;
		}
		if (args.positionals.length > 0) logger.warn({ ignored: args.positionals }, "忽略位置参数");

		const config = ConfigProvider.fromArgs(args, io.env ?? process.env);
		container = new ServiceContainer(config.getConfig(), {
			stdin: io.stdin,
			stdout,
			logger,
			sleep: io.sleep,
			signal: output.signal,
		});
		// 位宽不合法要在任何 I/O 之前失败
		container.createPatience();
	} catch (err) {
		logger.error({ err }, "启动参数不合法");
		return exitCodeFor(err);
	}

	const onOutputError = (error: Error) => output.abort(error);
	if (isErrorEmitter(stdout)) stdout.on("error", onOutputError);
	try {
		await container.copy();
		return EXIT_OK;
	} catch (err) {
		logger.error({ err, ...(err instanceof BaseError ? err.context : {}) }, "复制失败");
		return exitCodeFor(err);
	} finally {
		if (isErrorEmitter(stdout)) stdout.off("error", onOutputError);
		await container.cleanup();
	}
}

export function exitCodeFor(err: unknown): number {
	if (err instanceof BaseError && err.code === "VALIDATION_ERROR") return EXIT_USAGE;
	return EXIT_COPY_FAILED;
}
