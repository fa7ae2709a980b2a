/**
 * 逐字符限速输出
 *
 * - bePatient：码点 → 等待时长
 * - printImpatiently：调试包装，打印每个字符的等待时长
 * - copyRunesWithPatience：写出 → 刷新 → 等待 的复制循环
 * - RuneDecoder：增量 UTF-8 解码
 * - makeFlush：输出端刷新能力判定
 *
 * @packageDocumentation
 */

export { bePatient, MAX_BITS, type DelayParameters, type Patience } from "./patience.js";
export { printImpatiently } from "./printImpatiently.js";
export { copyRunesWithPatience, type CopyOptions } from "./copier.js";
export { RuneDecoder, decodeRune, REPLACEMENT_CHARACTER, type Rune } from "./runes.js";
export { makeFlush, isFlusher, isSyncer, type FlushAction } from "./flush.js";
export { formatCodePoint, formatDuration, quoteRune } from "./format.js";
export { sleep, MAX_TIMER_MS, type Sleep } from "./delays.js";
export { discard } from "./sinks.js";
export { BaseError, StreamError, ValidationError, type StreamStage } from "../core/errors/index.js";
export { isErrorEmitter, type ByteSink, type ByteSource, type ErrorEmitter, type Flusher, type Syncer, type TextSink } from "../contracts/IStreams.js";
