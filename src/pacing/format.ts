/* 中文注释：调试记录里字符、码点、时长的文本写法 */

const NAMED_ESCAPES: Record<number, string> = {
	0x07: "\\a",
	0x08: "\\b",
	0x09: "\\t",
	0x0a: "\\n",
	0x0b: "\\v",
	0x0c: "\\f",
	0x0d: "\\r",
	0x22: '\\"',
	0x5c: "\\\\",
};

const NON_PRINTABLE = /^[\p{C}\p{Z}]$/u;

/**
 * 把单个字符写成带双引号的字面量，不可见字符转义。
 * 基本平面内写 `\uXXXX`，之外写 `\UXXXXXXXX`。
 *
 * @example
 * ```typescript
 * quoteRune(0x41); // "\"A\""
 * quoteRune(0x0a); // "\"\\n\""
 * quoteRune(0xa0); // "\"\\u00a0\""
 * ```
 */
export function quoteRune(codePoint: number): string {
	const named = NAMED_ESCAPES[codePoint];
	if (named !== undefined) return `"${named}"`;
	if (codePoint < 0x20 || codePoint === 0x7f) return `"\\x${hex(codePoint, 2).toLowerCase()}"`;
	const char = String.fromCodePoint(codePoint);
	// 空格以外的分隔符、格式符、私用区、未分配字符都不可见
	if (codePoint !== 0x20 && NON_PRINTABLE.test(char)) {
		return codePoint > 0xffff
			? `"\\U${hex(codePoint, 8).toLowerCase()}"`
			: `"\\u${hex(codePoint, 4).toLowerCase()}"`;
	}
	return `"${char}"`;
}

/** `U+0041` 形式，至少四位大写十六进制 */
export function formatCodePoint(codePoint: number): string {
	return `U+${hex(codePoint, 4)}`;
}

const NS_PER_US = 1_000;
const NS_PER_MS = 1_000_000;
const NS_PER_S = 1_000_000_000;

/**
 * 毫秒时长的紧凑写法：`0s`、`750ns`、`500µs`、`100ms`、`1.1s`、`1m30s`、`1h0m0s`。
 * 精度到纳秒，小数部分去掉末尾的 0。
 */
export function formatDuration(ms: number): string {
	let ns = Math.round(ms * NS_PER_MS);
	if (ns === 0) return "0s";
	const sign = ns < 0 ? "-" : "";
	ns = Math.abs(ns);

	if (ns < NS_PER_US) return `${sign}${ns}ns`;
	if (ns < NS_PER_MS) return `${sign}${fixed(ns, NS_PER_US)}µs`;
	if (ns < NS_PER_S) return `${sign}${fixed(ns, NS_PER_MS)}ms`;

	const hours = Math.floor(ns / (3600 * NS_PER_S));
	ns -= hours * 3600 * NS_PER_S;
	const minutes = Math.floor(ns / (60 * NS_PER_S));
	ns -= minutes * 60 * NS_PER_S;
	const seconds = `${fixed(ns, NS_PER_S)}s`;

	if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}`;
	if (minutes > 0) return `${sign}${minutes}m${seconds}`;
	return `${sign}${seconds}`;
}

// 整数纳秒按 unit 输出，避免浮点误差
function fixed(ns: number, unit: number): string {
	const whole = Math.floor(ns / unit);
	const rest = ns - whole * unit;
	if (rest === 0) return String(whole);
	const digits = String(unit).length - 1;
	const frac = String(rest).padStart(digits, "0").replace(/0+$/, "");
	return `${whole}.${frac}`;
}

function hex(value: number, width: number): string {
	return value.toString(16).toUpperCase().padStart(width, "0");
}
