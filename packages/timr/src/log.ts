/**
 * @file 控制台日志输出模块
 *
 * 使用 chalk 输出带颜色的诊断信息。倒计时画面本身通过 Terminal 写入 stdout，
 * 这里的日志全部写到 stderr，不会打乱重绘。
 *
 * 日志颜色约定：
 * - 红色：致命错误
 * - 黄色：警告
 * - 灰色：调试信息（仅在 TIMR_DEBUG=1 时输出）
 */

import chalk from "chalk";

/** 是否输出调试日志 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
	return env.TIMR_DEBUG === "1";
}

/**
 * 记录致命错误
 * @param message - 错误信息
 * @param hint - 附加提示（可选）
 */
export function logError(message: string, hint?: string): void {
	console.error(chalk.red(message));
	if (hint) {
		console.error(hint);
	}
}

export function logWarning(message: string): void {
	console.error(chalk.yellow(`⚠ ${message}`));
}

/** 记录调试信息 */
export function logDebug(message: string): void {
	if (!isDebugEnabled()) return;
	console.error(chalk.dim(`[timr] ${message}`));
}
