import { BaseError } from "./BaseError.js";

/**
 * 配置校验错误
 *
 * 启动参数不合法（位宽超出 0-7、时长写法错误、未知参数等）。
 * 在任何 I/O 之前抛出，进程以退出码 2 结束且不产生输出。
 *
 * @example
 * ```typescript
 * throw new ValidationError("bits 超出范围", {
 *   field: "bits",
 *   value: 8,
 *   expected: "0-7 之间的整数",
 * });
 * ```
 */
export class ValidationError extends BaseError {
	readonly code = "VALIDATION_ERROR";
	readonly retryable = false;

	constructor(message: string, context?: ValidationContext) {
		super(message, context);
		this.field = context?.field;
		this.value = context?.value;
		this.expected = context?.expected;
	}

	/** 校验失败的字段名 */
	readonly field: string | undefined;

	/** 实际值 */
	readonly value: unknown;

	/** 期望值或格式 */
	readonly expected: string | undefined;
}

export interface ValidationContext extends Record<string, unknown> {
	field?: string;
	value?: unknown;
	expected?: string;
}
