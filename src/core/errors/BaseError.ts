/**
 * 错误基类
 *
 * slowcat 所有可预期错误的抽象基类，统一携带错误代码与上下文，便于日志输出。
 *
 * @remarks
 * - code：错误代码，决定进程退出码
 * - retryable：逐字符输出无法“断点续传”，目前所有子类均为 false
 * - context：附加到日志里的结构化字段
 *
 * @example
 * ```typescript
 * class MyError extends BaseError {
 *   readonly code = "MY_ERROR";
 *   readonly retryable = false;
 * }
 * ```
 */
export abstract class BaseError extends Error {
	/** 错误代码（唯一标识） */
	abstract readonly code: string;

	/** 是否可重试 */
	abstract readonly retryable: boolean;

	constructor(
		message: string,
		public readonly context?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = this.constructor.name;
		Error.captureStackTrace?.(this, this.constructor);
	}

	/**
	 * 序列化为 JSON（写日志用）
	 */
	toJSON(): object {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			retryable: this.retryable,
			context: this.context,
			stack: this.stack,
		};
	}
}
