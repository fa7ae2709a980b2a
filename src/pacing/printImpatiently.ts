/* 中文注释：调试包装，打印每个字符实际用到的等待时长 */
import type { TextSink } from "../contracts/IStreams.js";
import type { Patience } from "./patience.js";
import { formatCodePoint, formatDuration, quoteRune } from "./format.js";

/**
 * 包装一个延迟函数：返回值不变，每次调用额外向 dst 写一行
 * `<带引号字符> <U+码点> <时长>`，例如 `"A" U+0041 1.1s`。
 */
export function printImpatiently(dst: TextSink, patience: Patience): Patience {
	return (codePoint) => {
		const ms = patience(codePoint);
		dst.write(`${quoteRune(codePoint)} ${formatCodePoint(codePoint)} ${formatDuration(ms)}\n`);
		return ms;
	};
}
