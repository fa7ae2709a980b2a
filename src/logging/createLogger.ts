import pino from "pino";
import { PinoLogger } from "./PinoLogger.js";
import type { ILogger } from "../contracts/ILogger.js";

/**
 * 创建日志记录器
 *
 * @remarks
 * 环境变量：
 * - LOG_LEVEL：日志级别（debug、info、warn、error），默认 info
 * - LOG_PRETTY：true 时使用 pino-pretty 彩色输出
 *
 * 无论哪种格式都写 stderr（fd=2）：stdout 是字符输出通道，不能被日志污染。
 *
 * @param options.useSilent 完全禁用日志（测试用）
 */
export function createLogger(options?: { useSilent?: boolean }): ILogger {
	if (options?.useSilent) {
		return new PinoLogger(pino({ level: "silent" }));
	}

	const level = process.env.LOG_LEVEL || "info";

	if (process.env.LOG_PRETTY === "true") {
		return new PinoLogger(
			pino({
				level,
				transport: {
					target: "pino-pretty",
					options: { colorize: true, translateTime: "SYS:standard", destination: 2 },
				},
			}),
		);
	}

	return new PinoLogger(pino({ level }, pino.destination(2)));
}
