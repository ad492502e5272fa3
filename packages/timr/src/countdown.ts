/**
 * @file 倒计时渲染循环
 *
 * 状态机：Running → CancelledEarly | Completed。
 *
 * 每一轮按优先级依次检查：
 * 1. 取消信号（非阻塞轮询）→ 提前退出
 * 2. 已过截止时刻 → 完成
 * 3. 距上次重绘不足 16ms → 只睡眠剩余的差额，然后重新检查
 * 4. 否则重绘时钟行和进度条
 *
 * 无论从哪条路径离开循环（包括写入失败），都会恢复光标可见性；
 * 恢复时再次失败不会覆盖最初的错误。
 */

import type { Terminal } from "@timr/tui";
import { IOError } from "./errors.js";
import { logDebug } from "./log.js";
import { type ProgressSample, renderBar, renderStatusLine, sampleProgress } from "./render.js";

/** 两次重绘之间的最小间隔（毫秒），约 62.5 帧/秒 */
export const REDRAW_INTERVAL_MS = 16;

export const EARLY_EXIT_MESSAGE = "Exiting early!";
export const FINISHED_MESSAGE = "Finished!";

/**
 * 时间源抽象，便于测试时注入假时钟
 */
export interface Clock {
	/** 单调时钟的当前毫秒数 */
	now(): number;
	/** 墙上时间，用于显示时钟 */
	date(): Date;
	/** 睡眠指定毫秒数 */
	sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
	now: () => performance.now(),
	date: () => new Date(),
	sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type CountdownOutcome = "completed" | "cancelled";

export interface CountdownOptions {
	terminal: Terminal;
	/** 取消信号；处理器只写一次，循环只做非阻塞读取 */
	signal?: AbortSignal;
	clock?: Clock;
	/** 每次重绘后调用 */
	onRedraw?: (sample: ProgressSample) => void;
}

/**
 * 运行倒计时直到截止或被取消
 * @param seconds - 倒计时总秒数
 * @throws IOError 终端写入失败时
 */
export async function runCountdown(seconds: number, options: CountdownOptions): Promise<CountdownOutcome> {
	const { terminal, signal, onRedraw } = options;
	const clock = options.clock ?? systemClock;

	const start = clock.now();
	const end = start + seconds * 1000;
	let lastUpdate = start;
	let cursorRestored = false;

	terminal.hideCursor();
	// Placeholder line, the first redraw moves up and overwrites it
	terminal.write("\n");

	try {
		await flush(terminal);

		while (true) {
			if (signal?.aborted) {
				terminal.clearProgress();
				terminal.clearLine();
				terminal.showCursor();
				terminal.write(`${EARLY_EXIT_MESSAGE}\n`);
				await flush(terminal);
				cursorRestored = true;
				return "cancelled";
			}

			const now = clock.now();
			if (now > end) {
				break;
			}

			const sinceUpdate = now - lastUpdate;
			if (sinceUpdate < REDRAW_INTERVAL_MS) {
				await clock.sleep(REDRAW_INTERVAL_MS - sinceUpdate);
				continue;
			}

			const sample = sampleProgress(start, end, now, terminal.columns);

			terminal.previousLine();
			terminal.clearLine();
			terminal.write(`${renderStatusLine(clock.date(), sample.remainingMs)}\n`);
			terminal.clearLine();
			terminal.write(renderBar(sample));
			terminal.reportProgress(sample.percent);
			await flush(terminal);

			lastUpdate = now;
			onRedraw?.(sample);
		}

		terminal.previousLine();
		terminal.clearLine();
		terminal.clearProgress();
		terminal.bell();
		terminal.showCursor();
		terminal.write(`${FINISHED_MESSAGE}\n`);
		terminal.clearLine();
		await flush(terminal);
		cursorRestored = true;
		return "completed";
	} catch (error) {
		if (!cursorRestored) {
			terminal.showCursor();
			try {
				await terminal.flush();
			} catch (restoreError) {
				// The original error is the one reported
				logDebug(`Failed to restore cursor: ${restoreError instanceof Error ? restoreError.message : restoreError}`);
			}
		}
		throw error;
	}
}

async function flush(terminal: Terminal): Promise<void> {
	try {
		await terminal.flush();
	} catch (error) {
		throw new IOError(`Failed to write to terminal: ${error instanceof Error ? error.message : String(error)}`, {
			cause: error,
		});
	}
}
