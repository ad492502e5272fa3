/**
 * @file 倒计时画面格式化
 *
 * 纯函数集合：根据时间点计算进度采样，并生成时钟行和进度条文本。
 * 渲染循环负责把这些文本写入终端。
 */

import { lerp, RESET_FOREGROUND, rgb } from "@timr/tui";

/** 进度条最大宽度 */
export const MAX_BAR_WIDTH = 30;
/** 终端宽度中留给百分比等内容的列数 */
export const BAR_MARGIN = 15;
export const BAR_FULL_CHAR = "█";
export const BAR_EMPTY_CHAR = "▒";

/** 进度条渐变起止色与空白部分的颜色 */
const GRADIENT_START = [90, 105, 237] as const;
const GRADIENT_END = [123, 90, 237] as const;
const EMPTY_COLOR = [100, 100, 100] as const;

/** 每次重绘的进度采样 */
export interface ProgressSample {
	/** 已用时间占比，截止检查触发前可能略大于 1 */
	progress: number;
	/** 剩余毫秒数（不小于 0） */
	remainingMs: number;
	/** 进度条总宽度 [0, 30] */
	barWidth: number;
	/** 已填充的格数 [0, barWidth] */
	progressWidth: number;
	/** 百分比（取整） */
	percent: number;
}

/** 根据终端列数计算进度条宽度 */
export function barWidthFor(columns: number): number {
	return Math.min(MAX_BAR_WIDTH, Math.max(0, columns - BAR_MARGIN));
}

/**
 * 计算某一时刻的进度采样
 * @param start - 开始时刻（毫秒，单调时钟）
 * @param end - 截止时刻（毫秒，单调时钟）
 * @param now - 当前时刻
 * @param columns - 终端列数
 */
export function sampleProgress(start: number, end: number, now: number, columns: number): ProgressSample {
	const totalMs = end - start;
	const progress = totalMs > 0 ? (now - start) / totalMs : 1;
	const barWidth = barWidthFor(columns);
	const progressWidth = Math.min(barWidth, Math.max(0, Math.round(progress * barWidth)));

	return {
		progress,
		remainingMs: Math.max(0, end - now),
		barWidth,
		progressWidth,
		percent: Math.round(progress * 100),
	};
}

/**
 * 格式化剩余时间：小时和分钟只在非零时显示，秒始终显示。
 * @example formatRemaining(3_605_000) // "1h5s"
 */
export function formatRemaining(remainingMs: number): string {
	const seconds = remainingMs / 1000;
	const hours = Math.floor(seconds / 3600);
	const minutes = Math.floor((seconds % 3600) / 60);

	let result = "";
	if (hours > 0) result += `${hours}h`;
	if (minutes > 0) result += `${minutes}m`;
	return `${result}${Math.floor(seconds % 60)}s`;
}

/**
 * 格式化 12 小时制墙上时钟，如 `3:07pm`、`12:00am`
 */
export function formatClock(date: Date): string {
	const hours = date.getHours();
	const hour12 = hours % 12 === 0 ? 12 : hours % 12;
	const minutes = String(date.getMinutes()).padStart(2, "0");
	return `${hour12}:${minutes}${hours < 12 ? "am" : "pm"}`;
}

/** 时钟行：`<时钟> - <剩余时间>` */
export function renderStatusLine(date: Date, remainingMs: number): string {
	return `${formatClock(date)} - ${formatRemaining(remainingMs)}`;
}

/**
 * 渲染进度条行：渐变色的已完成部分、灰色的剩余部分和百分比
 */
export function renderBar(sample: ProgressSample): string {
	const { barWidth, progressWidth, percent } = sample;
	let line = "";

	for (let i = 0; i < progressWidth; i++) {
		const t = i / barWidth;
		const red = lerp(GRADIENT_START[0], GRADIENT_END[0], t);
		const green = lerp(GRADIENT_START[1], GRADIENT_END[1], t);
		line += `${rgb(red, green, GRADIENT_START[2])}${BAR_FULL_CHAR}`;
	}

	line += rgb(...EMPTY_COLOR);
	line += BAR_EMPTY_CHAR.repeat(barWidth - progressWidth);
	line += `${RESET_FOREGROUND}  ${percent}%`;
	return line;
}
