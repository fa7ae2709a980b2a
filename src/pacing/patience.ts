/* 中文注释：字符 → 等待时长（毫秒）的纯函数 */
import { ValidationError } from "../core/errors/ValidationError.js";

/** 根据字符码点决定写出该字符后要等多久（毫秒） */
export type Patience = (codePoint: number) => number;

/** 启动时确定、之后不再变化的延迟参数 */
export interface DelayParameters {
	/** 每个字符的最小等待 */
	readonly baseMs: number;
	/** 码点低位每增加 1 追加的等待 */
	readonly stepMs: number;
	/** 参与计算的码点低位位数，0-7 */
	readonly bits: number;
}

export const MAX_BITS = 7;

/**
 * 构造延迟函数：`baseMs + stepMs * (mask & codePoint)`，`mask = (1 << bits) - 1`。
 *
 * 掩码作用于完整码点，大于 255 的字符同样只取低 bits 位，
 * 因此最多产生 2^bits 个不同的时长。
 *
 * @throws ValidationError bits 不是 0-7 之间的整数
 *
 * @example
 * ```typescript
 * const patience = bePatient({ baseMs: 1000, stepMs: 100, bits: 3 });
 * patience(0x41); // "A" → 1100
 * ```
 */
export function bePatient(params: DelayParameters): Patience {
	const { baseMs, stepMs, bits } = params;
	if (!Number.isInteger(bits) || bits < 0 || bits > MAX_BITS) {
		throw new ValidationError(`bits 必须是 0-${MAX_BITS} 之间的整数，收到 ${bits}`, {
			field: "bits",
			value: bits,
			expected: `0-${MAX_BITS}`,
		});
	}
	const mask = (1 << bits) - 1;

	return (codePoint) => baseMs + stepMs * (mask & codePoint);
}
