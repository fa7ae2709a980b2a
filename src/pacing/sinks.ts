/* 中文注释：丢弃一切写入的输出端（调试模式用） */
import type { ByteSink } from "../contracts/IStreams.js";

export const discard: ByteSink = {
	write(_chunk, callback) {
		callback();
		return true;
	},
};
