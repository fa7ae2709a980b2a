/* 中文注释：测试用内存输入输出 */
import { EventEmitter } from "node:events";
import type { ByteSink, ByteSource, TextSink } from "../../src/contracts/IStreams.js";

/** 记录每次写入；failOnWrite.at 为第几次（从 1 开始）字节写入时回调报错 */
export class RecordingSink implements ByteSink {
	readonly chunks: Uint8Array[] = [];
	readonly text: string[] = [];
	private calls = 0;

	constructor(private readonly failOnWrite?: { at: number; error: Error }) {}

	write(chunk: Uint8Array | string, callback?: (error?: Error | null) => void): boolean {
		if (typeof chunk === "string") {
			this.text.push(chunk);
			callback?.();
			return true;
		}
		this.calls++;
		if (this.failOnWrite && this.calls === this.failOnWrite.at) {
			callback?.(this.failOnWrite.error);
			return false;
		}
		this.chunks.push(Uint8Array.from(chunk));
		callback?.();
		return true;
	}

	get bytes(): number[] {
		return this.chunks.flatMap((c) => Array.from(c));
	}

	get output(): string {
		return Buffer.concat(this.chunks).toString("utf8");
	}
}

/**
 * 像 Node 的 Writable 一样以 error 事件报告失败：第一次写入文本后，
 * 在下一个 tick 发出 error（写回调本身不报错）
 */
export class EmittingSink extends EventEmitter implements ByteSink, TextSink {
	readonly text: string[] = [];
	readonly chunks: Uint8Array[] = [];

	constructor(private readonly error: Error) {
		super();
	}

	write(chunk: Uint8Array | string, callback?: (error?: Error | null) => void): boolean {
		if (typeof chunk === "string") {
			this.text.push(chunk);
			if (this.text.length === 1) process.nextTick(() => this.emit("error", this.error));
		} else {
			this.chunks.push(Uint8Array.from(chunk));
		}
		callback?.();
		return true;
	}
}

/** 依次产出给定块 */
export async function* source(...chunks: (Uint8Array | string)[]): ByteSource {
	for (const chunk of chunks) yield chunk;
}

/** 先产出给定块，然后抛出 error */
export async function* failingSource(error: Error, ...chunks: (Uint8Array | string)[]): ByteSource {
	for (const chunk of chunks) yield chunk;
	throw error;
}
