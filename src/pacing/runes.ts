/* 中文注释：增量 UTF-8 解码，按字符切分字节流 */

/** 一个解码后的字符以及要原样写出的字节 */
export interface Rune {
	readonly codePoint: number;
	readonly bytes: Uint8Array;
}

export const REPLACEMENT_CHARACTER = 0xfffd;
const REPLACEMENT_BYTES = Uint8Array.of(0xef, 0xbf, 0xbd);

export type Decoded = { kind: "rune"; codePoint: number; size: number } | { kind: "invalid" } | { kind: "incomplete" };

/**
 * 逐块喂入字节，按字符吐出。
 *
 * - 合法序列（不含超长编码、代理区、超出 U+10FFFF）整段作为一个字符，bytes 为原始字节
 * - 非法字节替换为 U+FFFD，只前进一个字节
 * - 块尾不完整的合法前缀留到下一块；end() 时每个剩余字节各产出一个 U+FFFD
 *
 * @example
 * ```typescript
 * const decoder = new RuneDecoder();
 * decoder.push(Uint8Array.of(0xe2, 0x82)); // []
 * decoder.push(Uint8Array.of(0xac, 0x41)); // [€, A]
 * ```
 */
export class RuneDecoder {
	private pending: Uint8Array = new Uint8Array(0);
	private readonly encoder = new TextEncoder();

	push(chunk: Uint8Array | string): Rune[] {
		const bytes = typeof chunk === "string" ? this.encoder.encode(chunk) : chunk;
		const buf = this.pending.length > 0 ? concat(this.pending, bytes) : bytes;
		const runes: Rune[] = [];
		let offset = 0;

		while (offset < buf.length) {
			const decoded = decodeRune(buf, offset);
			if (decoded.kind === "incomplete") break;
			if (decoded.kind === "invalid") {
				runes.push({ codePoint: REPLACEMENT_CHARACTER, bytes: REPLACEMENT_BYTES });
				offset += 1;
				continue;
			}
			runes.push({ codePoint: decoded.codePoint, bytes: buf.subarray(offset, offset + decoded.size) });
			offset += decoded.size;
		}

		// 复制一份，不持有调用方的缓冲区
		this.pending = Uint8Array.from(buf.subarray(offset));
		return runes;
	}

	/** 输入结束，冲掉剩余的不完整前缀 */
	end(): Rune[] {
		const runes = Array.from(this.pending, () => ({ codePoint: REPLACEMENT_CHARACTER, bytes: REPLACEMENT_BYTES }));
		this.pending = new Uint8Array(0);
		return runes;
	}
}

/**
 * 从 offset 处解码一个字符。
 * 先看首字节确定长度和第二字节的合法区间，后续字节须为 0x80-0xBF。
 */
export function decodeRune(buf: Uint8Array, offset: number): Decoded {
	const b0 = buf[offset];
	if (b0 === undefined) return { kind: "incomplete" };
	if (b0 < 0x80) return { kind: "rune", codePoint: b0, size: 1 };

	const lead = leadInfo(b0);
	if (!lead) return { kind: "invalid" };

	let codePoint = b0 & lead.mask;
	for (let i = 1; i < lead.size; i++) {
		const b = buf[offset + i];
		if (b === undefined) return { kind: "incomplete" };
		const [lo, hi] = i === 1 ? lead.second : CONTINUATION;
		if (b < lo || b > hi) return { kind: "invalid" };
		codePoint = (codePoint << 6) | (b & 0x3f);
	}
	return { kind: "rune", codePoint, size: lead.size };
}

type Range = readonly [number, number];

const CONTINUATION: Range = [0x80, 0xbf];

interface Lead {
	size: number;
	mask: number;
	second: Range;
}

function leadInfo(b0: number): Lead | undefined {
	if (b0 >= 0xc2 && b0 <= 0xdf) return { size: 2, mask: 0x1f, second: CONTINUATION };
	if (b0 === 0xe0) return { size: 3, mask: 0x0f, second: [0xa0, 0xbf] };
	if (b0 === 0xed) return { size: 3, mask: 0x0f, second: [0x80, 0x9f] };
	if (b0 >= 0xe1 && b0 <= 0xef) return { size: 3, mask: 0x0f, second: CONTINUATION };
	if (b0 === 0xf0) return { size: 4, mask: 0x07, second: [0x90, 0xbf] };
	if (b0 >= 0xf1 && b0 <= 0xf3) return { size: 4, mask: 0x07, second: CONTINUATION };
	if (b0 === 0xf4) return { size: 4, mask: 0x07, second: [0x80, 0x8f] };
	return undefined;
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
	const out = new Uint8Array(a.length + b.length);
	out.set(a, 0);
	out.set(b, a.length);
	return out;
}
