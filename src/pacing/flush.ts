/* 中文注释：启动时判定一次输出端的刷新能力，返回绑定好的刷新动作 */
import { fsync } from "node:fs";
import type { ILogger } from "../contracts/ILogger.js";
import type { ByteSink, Flusher, Syncer } from "../contracts/IStreams.js";

export type FlushAction = () => Promise<void>;

/**
 * 按优先级选择刷新方式：
 * 1. 有 flush()：调用它，抛错或 reject 只记 debug 日志
 * 2. 有数字 fd：fsync，失败同样忽略（管道、终端上 EINVAL 是常态）
 * 3. 都没有：什么也不做
 *
 * 刷新失败不影响已写出字节的正确性，只影响它们何时可见，节奏优先。
 */
export function makeFlush(sink: ByteSink, logger?: ILogger): FlushAction {
	if (isFlusher(sink)) {
		return async () => {
			try {
				await sink.flush();
			} catch (err) {
				logger?.debug({ err }, "flush 失败，已忽略");
			}
		};
	}
	if (isSyncer(sink)) {
		const { fd } = sink;
		return () =>
			new Promise<void>((resolve) => {
				fsync(fd, (err) => {
					if (err) logger?.debug({ err, fd }, "fsync 失败，已忽略");
					resolve();
				});
			});
	}
	return async () => {};
}

export function isFlusher(sink: ByteSink): sink is ByteSink & Flusher {
	return "flush" in sink && typeof sink.flush === "function";
}

export function isSyncer(sink: ByteSink): sink is ByteSink & Syncer {
	return "fd" in sink && typeof sink.fd === "number";
}
