/**
 * @file 时长解析
 *
 * 将紧凑的时长写法（`1h30m`、`90s`、`45`）解析为秒数。
 * 从左到右扫描：连续数字进入缓冲区，遇到单位字母时按倍数累加并清空缓冲区，
 * 末尾没有单位的数字按秒计算。单位可以重复或乱序，结果只做加法累积。
 */

import { DurationParseError } from "./errors.js";

/** 单位字母到秒数倍率的映射 */
const UNIT_SECONDS = { h: 3600, m: 60, s: 1 } as const;

type Unit = keyof typeof UNIT_SECONDS;

const UNIT_NAMES: Record<Unit, string> = { h: "hours", m: "minutes", s: "seconds" };

function isUnit(char: string): char is Unit {
	return char === "h" || char === "m" || char === "s";
}

function isDigit(char: string): boolean {
	return char >= "0" && char <= "9";
}

/**
 * 解析时长字符串，返回总秒数。
 * @throws DurationParseError 输入为空、单位前没有数字、包含非法字符或数值溢出时
 */
export function parseDuration(input: string): number {
	if (input.length === 0) {
		throw new DurationParseError("Duration must not be empty", "empty", input);
	}

	let seconds = 0;
	let buffer = "";

	const add = (value: string, multiplier: number): void => {
		const amount = Number(value) * multiplier;
		const total = seconds + amount;
		if (!Number.isSafeInteger(amount) || !Number.isSafeInteger(total)) {
			throw new DurationParseError(`Duration '${input}' is too large`, "overflow", input);
		}
		seconds = total;
	};

	for (const char of input) {
		if (isDigit(char)) {
			buffer += char;
			continue;
		}

		if (!isUnit(char)) {
			throw new DurationParseError(`Invalid character '${char}' in duration '${input}'`, "invalid-character", input);
		}

		if (!buffer) {
			throw new DurationParseError(`No number found before ${UNIT_NAMES[char]}`, "missing-number", input);
		}

		add(buffer, UNIT_SECONDS[char]);
		buffer = "";
	}

	// Trailing digits without a unit are seconds
	if (buffer) {
		add(buffer, 1);
	}

	return seconds;
}

/**
 * 将秒数格式化为规范写法（如 `1h1m1s`），为零的单位省略，0 秒输出 `0s`。
 */
export function formatDuration(totalSeconds: number): string {
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;

	let result = "";
	if (hours > 0) result += `${hours}h`;
	if (minutes > 0) result += `${minutes}m`;
	if (seconds > 0 || !result) result += `${seconds}s`;
	return result;
}
