/* 中文注释：逐字符复制：写出 → 刷新 → 等待，再处理下一个字符 */
import type { ILogger } from "../contracts/ILogger.js";
import type { ByteSink, ByteSource } from "../contracts/IStreams.js";
import { StreamError } from "../core/errors/StreamError.js";
import { sleep as defaultSleep, type Sleep } from "./delays.js";
import { makeFlush } from "./flush.js";
import type { Patience } from "./patience.js";
import { RuneDecoder, type Rune } from "./runes.js";

export interface CopyOptions {
	sleep?: Sleep;
	logger?: ILogger;
	/** 输出端在写回调之外报告的失败（如 stdout 的 error 事件），中止后以 StreamError(stage=write) 结束 */
	signal?: AbortSignal;
}

/**
 * 把 src 按字符复制到 dst，每个字符单独一次写入，写完刷新后按 patience 等待。
 *
 * @remarks
 * - 严格串行：当前字符写出、刷新、等待结束后才处理下一个
 * - 写失败立即以 StreamError(stage=write) 结束，失败字符不再等待，后续字符不再写出
 * - signal 中止同样视为写失败：不再写出新字符，正在进行的等待立即结束
 * - 读失败以 StreamError(stage=read) 结束
 * - 输入耗尽后正常返回
 *
 * @example
 * ```typescript
 * await copyRunesWithPatience(process.stdout, process.stdin, bePatient(params));
 * ```
 */
export async function copyRunesWithPatience(
	dst: ByteSink,
	src: ByteSource,
	patience: Patience,
	options: CopyOptions = {},
): Promise<void> {
	const { sleep = defaultSleep, logger, signal } = options;
	const flush = makeFlush(dst, logger);
	const decoder = new RuneDecoder();
	let written = 0;

	const checkOutput = () => {
		if (signal?.aborted) throw new StreamError("write", signal.reason, { offset: written });
	};

	const emit = async (rune: Rune) => {
		checkOutput();
		try {
			await writeChunk(dst, rune.bytes);
		} catch (err) {
			throw new StreamError("write", err, { offset: written });
		}
		written += rune.bytes.length;
		await flush();

		const ms = patience(rune.codePoint);
		if (ms > 0) {
			try {
				await sleep(ms, signal);
			} catch (err) {
				checkOutput();
				throw err;
			}
		}
		checkOutput();
	};

	try {
		for await (const chunk of src) {
			for (const rune of decoder.push(chunk)) await emit(rune);
		}
	} catch (err) {
		if (err instanceof StreamError) throw err;
		throw new StreamError("read", err, { offset: written });
	}
	for (const rune of decoder.end()) await emit(rune);

	logger?.debug({ bytes: written }, "输入已读完");
}

function writeChunk(dst: ByteSink, bytes: Uint8Array): Promise<void> {
	return new Promise((resolve, reject) => {
		try {
			dst.write(bytes, (error) => (error ? reject(error) : resolve()));
		} catch (err) {
			reject(err);
		}
	});
}
