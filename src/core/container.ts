/**
 * 服务容器
 *
 * - 单例管理：同一服务多次请求返回同一实例
 * - 延迟初始化：首次使用时创建
 * - 输入输出可替换（测试注入内存流）
 */
import type { AppConfig } from "../config/schema.js";
import type { ILogger } from "../contracts/ILogger.js";
import type { ByteSink, ByteSource, TextSink } from "../contracts/IStreams.js";
import { createLogger } from "../logging/createLogger.js";
import { copyRunesWithPatience } from "../pacing/copier.js";
import type { Sleep } from "../pacing/delays.js";
import { bePatient, type Patience } from "../pacing/patience.js";
import { printImpatiently } from "../pacing/printImpatiently.js";
import { discard } from "../pacing/sinks.js";

export interface ContainerOptions {
	stdin?: ByteSource;
	stdout?: ByteSink & TextSink;
	logger?: ILogger;
	sleep?: Sleep;
	/** 中止复制（输出端出错时） */
	signal?: AbortSignal;
	loggerSilent?: boolean;
}

export class ServiceContainer {
	private singletons = new Map<string, unknown>();

	constructor(
		private readonly config: Readonly<AppConfig>,
		private readonly options: ContainerOptions = {},
	) {}

	private getSingleton<T>(key: string, factory: () => T): T {
		if (!this.singletons.has(key)) this.singletons.set(key, factory());
		return this.singletons.get(key) as T;
	}

	// 日志（默认写 stderr，可静默）
	createLogger(bindings?: Record<string, unknown>): ILogger {
		const base = this.getSingleton(
			"logger",
			() => this.options.logger ?? createLogger({ useSilent: this.options.loggerSilent === true }),
		);
		return bindings ? base.child(bindings) : base;
	}

	// 延迟函数；调试模式下包一层打印，记录写到 stdout
	createPatience(): Patience {
		return this.getSingleton("patience", () => {
			const { baseMs, stepMs, bits, debug } = this.config;
			const patience = bePatient({ baseMs, stepMs, bits });
			return debug ? printImpatiently(this.stdout(), patience) : patience;
		});
	}

	// 真实输出端；调试模式下丢弃
	createOutput(): ByteSink {
		return this.config.debug ? discard : this.stdout();
	}

	getInput(): ByteSource {
		return this.options.stdin ?? process.stdin;
	}

	/**
	 * 按当前配置把输入逐字符复制到输出
	 */
	async copy(): Promise<void> {
		const logger = this.createLogger({ module: "copier" });
		logger.debug({ ...this.config }, "开始复制");
		await copyRunesWithPatience(this.createOutput(), this.getInput(), this.createPatience(), {
			logger,
			sleep: this.options.sleep,
			signal: this.options.signal,
		});
	}

	// 资源清理：清空单例缓存
	async cleanup(): Promise<void> {
		this.singletons.clear();
	}

	private stdout(): ByteSink & TextSink {
		return this.options.stdout ?? process.stdout;
	}
}
