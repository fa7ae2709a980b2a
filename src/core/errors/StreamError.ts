import { BaseError } from "./BaseError.js";

/** 出错的环节：读取输入或写入输出 */
export type StreamStage = "read" | "write";

/**
 * 流复制错误
 *
 * 读输入或写输出失败时由复制循环抛出，原始错误保存在 cause 中。
 * 不可重试：写失败后没有明确的续写位置。
 *
 * @example
 * ```typescript
 * throw new StreamError("write", err, { offset: 42 });
 * ```
 */
export class StreamError extends BaseError {
	readonly code = "STREAM_ERROR";
	readonly retryable = false;

	constructor(
		readonly stage: StreamStage,
		cause: unknown,
		context?: Record<string, unknown>,
	) {
		super(`${stage === "read" ? "读取输入" : "写入输出"}失败：${describeCause(cause)}`, { stage, ...context }, { cause });
	}
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}
