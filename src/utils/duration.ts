/* 中文注释：时长字符串解析，如 "1s"、"100ms"、"1m30s"、"-1.5h" */

// 各单位折合的纳秒数；先按纳秒累加再换算毫秒，避免小数单位的浮点误差
const UNIT_NS: Record<string, number> = {
	ns: 1,
	us: 1e3,
	"µs": 1e3,
	"μs": 1e3,
	ms: 1e6,
	s: 1e9,
	m: 60e9,
	h: 3600e9,
};

// 与 64 位纳秒计数的上限一致
const MAX_NS = 2 ** 63;

const PART = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * 解析时长，返回毫秒。
 *
 * 可带 `+`/`-` 符号，后接若干 `<数字><单位>` 连写，单位为 ns、us（µs）、ms、s、m、h；
 * 单独的 "0" 也接受。总量超出 64 位纳秒能表示的范围时报错。
 *
 * @throws Error 格式不合法或溢出
 *
 * @example
 * ```typescript
 * parseDuration("1m30s"); // 90000
 * parseDuration("250us"); // 0.25
 * parseDuration("-2s");   // -2000
 * ```
 */
export function parseDuration(text: string): number {
	let input = text.trim();
	let sign = 1;
	if (input.startsWith("-") || input.startsWith("+")) {
		sign = input.startsWith("-") ? -1 : 1;
		input = input.slice(1);
	}
	if (input === "0") return 0;
	if (input === "") throw new Error(`无法解析时长 "${text}"`);

	let totalNs = 0;
	PART.lastIndex = 0;
	while (PART.lastIndex < input.length) {
		const start = PART.lastIndex;
		const match = PART.exec(input);
		if (!match) throw new Error(`无法解析时长 "${text}"（位置 ${start}）`);
		const [, amount, unit] = match;
		const factor = unit === undefined ? undefined : UNIT_NS[unit];
		if (amount === undefined || factor === undefined) throw new Error(`无法解析时长 "${text}"`);
		totalNs += Number(amount) * factor;
	}
	if (!Number.isFinite(totalNs) || totalNs >= MAX_NS) throw new Error(`时长溢出 "${text}"`);
	return (sign * totalNs) / 1e6;
}
