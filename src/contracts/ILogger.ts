/**
 * 日志记录器接口
 *
 * 日志一律写 stderr，stdout 留给被复制的字符和调试记录。
 *
 * @example
 * ```typescript
 * const logger: ILogger = createLogger();
 * logger.debug({ baseMs: 1000, stepMs: 100, bits: 3 }, "启动参数");
 * logger.error({ err }, "复制失败");
 *
 * const copyLogger = logger.child({ module: "copier" });
 * ```
 */
export interface ILogger {
	debug(obj: Record<string, unknown>, msg?: string): void;
	debug(msg: string): void;

	info(obj: Record<string, unknown>, msg?: string): void;
	info(msg: string): void;

	warn(obj: Record<string, unknown>, msg?: string): void;
	warn(msg: string): void;

	/**
	 * 错误级别日志
	 * @param obj 结构化数据（err/error 字段为 Error 时自动展开堆栈）
	 */
	error(obj: Record<string, unknown>, msg?: string): void;
	error(msg: string): void;

	/**
	 * 创建绑定上下文的子日志记录器
	 */
	child(bindings: Record<string, unknown>): ILogger;
}
