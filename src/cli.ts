#!/usr/bin/env node
/* 中文注释：命令行入口，stdin 逐字符慢速写到 stdout */
import { createLogger } from "./logging/createLogger.js";
import { run } from "./runner/run.js";

const logger = createLogger().child({ module: "cli" });

run(process.argv.slice(2), { logger }).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		logger.error({ err }, "slowcat 执行失败");
		process.exitCode = 1;
	},
);
