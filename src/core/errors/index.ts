/**
 * 错误体系
 *
 * - BaseError：抽象基类
 *   - ValidationError：配置/参数错误（退出码 2）
 *   - StreamError：读写失败（退出码 1）
 *
 * @packageDocumentation
 */

export { BaseError } from "./BaseError.js";
export { ValidationError, type ValidationContext } from "./ValidationError.js";
export { StreamError, type StreamStage } from "./StreamError.js";
