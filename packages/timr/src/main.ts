/**
 * 主入口模块 - 解析命令行参数并运行倒计时
 *
 * 流程：
 * 1. 解析参数（--help、--version、时长或 profile 名称）
 * 2. 将时长参数解析为秒数（必要时从配置文件查找 profile）
 * 3. 安装 Ctrl+C 处理器
 * 4. 运行渲染循环直到完成或被取消
 *
 * 所有可预期的错误都会被记录并设置非零退出码。
 */

import { ProcessTerminal, type Terminal } from "@timr/tui";
import { getConfigPath, getPackageInfo, resolveDuration } from "./config.js";
import { type Clock, type CountdownOutcome, runCountdown } from "./countdown.js";
import { formatDuration } from "./duration.js";
import { InputError, TimrError } from "./errors.js";
import { installInterruptHandler, type SignalSource } from "./interrupt.js";
import { logDebug, logError } from "./log.js";

/** 解析后的命令行参数 */
export interface Args {
	help: boolean;
	version: boolean;
	duration?: string;
}

/**
 * 解析命令行参数
 * 按顺序处理：遇到 -v/-h 立即返回，第一个非选项参数作为时长，再出现位置参数则报错
 * @throws InputError 出现多余参数时
 */
export function parseArgs(args: string[]): Args {
	const result: Args = { help: args.length === 0, version: false };

	for (const arg of args) {
		// Flags take effect as soon as they are reached, later arguments are ignored
		if (arg === "-v" || arg === "--version") {
			return { ...result, version: true };
		} else if (arg === "-h" || arg === "--help") {
			return { ...result, help: true };
		} else if (result.duration === undefined) {
			result.duration = arg;
		} else {
			throw new InputError(`Unknown option: ${arg}`, { hint: "Use '--help' for more information" });
		}
	}

	return result;
}

export function getHelpText(name: string, version: string): string {
	return `${name} v${version}
Usage: ${name} [options] <duration|profile>

Options:
  duration       Start a timer for duration (e.g. 90, 45s, 1h30m)
  profile        Start a timer using a named profile from ${getConfigPath()}
  -v, --version  Print version information
  -h, --help     Print this help message

Environment:
  TIMR_CONFIG_DIR   Config directory (default: ~/.config)
  TIMR_PROGRESS     Force terminal progress reporting on (1) or off (0)
  TIMR_DEBUG        Log diagnostics to stderr (1)`;
}

export interface MainOptions {
	terminal?: Terminal;
	clock?: Clock;
	configPath?: string;
	signals?: SignalSource;
}

/**
 * 运行 CLI
 * @returns 倒计时结果；只打印帮助或版本时返回 undefined
 */
export async function main(args: string[], options: MainOptions = {}): Promise<CountdownOutcome | undefined> {
	const { name, version } = getPackageInfo();

	try {
		const parsed = parseArgs(args);

		if (parsed.version) {
			console.log(`${name} v${version}`);
			return undefined;
		}
		if (parsed.help || parsed.duration === undefined) {
			console.log(getHelpText(name, version));
			return undefined;
		}

		const seconds = resolveDuration(parsed.duration, options.configPath ?? getConfigPath());
		logDebug(`Starting ${formatDuration(seconds)} countdown`);

		const controller = new AbortController();
		const removeHandler = installInterruptHandler(controller, options.signals);
		try {
			return await runCountdown(seconds, {
				terminal: options.terminal ?? new ProcessTerminal(),
				signal: controller.signal,
				clock: options.clock,
			});
		} finally {
			removeHandler();
		}
	} catch (error) {
		if (error instanceof TimrError) {
			logError(error.message, error.hint);
			process.exitCode = error.exitCode;
			return undefined;
		}
		throw error;
	}
}
