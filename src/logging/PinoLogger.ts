import type { Logger } from "pino";
import type { ILogger } from "../contracts/ILogger.js";

/**
 * 基于 pino 的 ILogger 实现
 *
 * error 级别会把 err/error 字段里的 Error 展开成 name/message/stack，
 * 其余级别原样转交 pino。
 */
export class PinoLogger implements ILogger {
	constructor(private pino: Logger) {}

	debug(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.debug(obj);
		} else {
			this.pino.debug({ ...obj }, msg);
		}
	}

	info(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.info(obj);
		} else {
			this.pino.info({ ...obj }, msg);
		}
	}

	warn(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.warn(obj);
		} else {
			this.pino.warn({ ...obj }, msg);
		}
	}

	error(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.error(obj);
			return;
		}
		const fields: Record<string, unknown> = { ...obj };
		const err = obj.err instanceof Error ? obj.err : obj.error instanceof Error ? obj.error : undefined;
		if (err) {
			delete fields.error;
			fields.err = { name: err.name, message: err.message, stack: err.stack };
		}
		this.pino.error(fields, msg);
	}

	child(bindings: Record<string, unknown>): ILogger {
		return new PinoLogger(this.pino.child(bindings));
	}
}
