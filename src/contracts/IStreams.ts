/**
 * 输入/输出端的最小契约
 *
 * Node 的 Readable/Writable（process.stdin、process.stdout、fs 流、PassThrough）
 * 都满足这些接口；测试里可以直接用对象字面量替身。
 */

/** 输入：按顺序产出字节块（或已解码的字符串块） */
export type ByteSource = AsyncIterable<Uint8Array | string>;

/**
 * 输出：一次写入一块字节，回调在数据被下游接受后触发，出错时带上错误。
 */
export interface ByteSink {
	write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean;
}

/** 带缓冲、可能失败的刷新（返回 Promise），或不会失败的同步刷新 */
export interface Flusher {
	flush(): Promise<void> | void;
}

/** 持有文件描述符的输出，可以 fsync */
export interface Syncer {
	readonly fd: number;
}

/** 调试记录的文本输出 */
export interface TextSink {
	write(text: string): unknown;
}

/** 以 error 事件报告异步写失败的输出（Node 的 Writable） */
export interface ErrorEmitter {
	on(event: "error", listener: (error: Error) => void): unknown;
	off(event: "error", listener: (error: Error) => void): unknown;
}

export function isErrorEmitter(sink: object): sink is ErrorEmitter {
	return "on" in sink && typeof sink.on === "function" && "off" in sink && typeof sink.off === "function";
}
