/**
 * @file 终端接口和实现
 *
 * 本文件定义了倒计时渲染所需的终端抽象接口（Terminal），
 * 以及基于 Node 可写 TTY 流的真实终端实现（ProcessTerminal）。
 *
 * ProcessTerminal 负责：
 * - 缓冲一帧输出并在 flush() 时一次性写入
 * - 光标移动、行清除与光标显隐
 * - 查询终端列宽（不可用时回退为 80）
 * - 通过 OSC 9;4 向宿主终端报告进度（不支持时静默忽略）
 */

import * as fs from "node:fs";
import { BEL, ESC } from "./utils.js";

/** 终端宽度不可用时的回退列数 */
export const DEFAULT_COLUMNS = 80;

/**
 * 倒计时渲染循环的最小终端接口
 *
 * 可以用不同的实现替换（如测试用的模拟终端）。
 * 写入操作只进入缓冲区，调用 flush() 后才真正输出。
 */
export interface Terminal {
	/** 向输出缓冲区追加数据 */
	write(data: string): void;

	/** 将缓冲区写入底层流；写入失败时 reject */
	flush(): Promise<void>;

	/** 获取终端列数 */
	get columns(): number;

	/** 将光标移动到上一行行首 */
	previousLine(): void;

	/** 清除当前整行并将光标移到行首 */
	clearLine(): void;

	/** 隐藏光标 */
	hideCursor(): void;
	/** 显示光标 */
	showCursor(): void;
	/** 设置光标可见性 */
	setCursorVisible(visible: boolean): void;

	/** 报告宿主终端进度（0-100），不支持时为空操作 */
	reportProgress(percent: number): void;
	/** 清除宿主终端进度指示 */
	clearProgress(): void;

	/** 响铃提示 */
	bell(): void;
}

/** ProcessTerminal 需要的输出流能力（process.stdout 满足此接口） */
export interface TerminalOutput {
	write(chunk: string, callback?: (error?: Error | null) => void): boolean;
	on?(event: "error", listener: (error: Error) => void): unknown;
	readonly columns?: number;
}

export interface ProcessTerminalOptions {
	/** 是否输出 OSC 9;4 进度序列，默认根据环境变量检测 */
	progress?: boolean;
	/** 每次 flush 的内容额外追加写入的文件路径（调试用） */
	writeLogPath?: string;
}

/**
 * 检测宿主终端是否支持 OSC 9;4 进度报告
 * （Windows Terminal、ConEmu，或通过 TIMR_PROGRESS=1 强制启用）
 */
export function detectProgressSupport(env: NodeJS.ProcessEnv = process.env): boolean {
	if (env.TIMR_PROGRESS !== undefined) {
		return env.TIMR_PROGRESS === "1";
	}
	return Boolean(env.WT_SESSION) || env.ConEmuANSI === "ON";
}

/**
 * 基于可写流的真实终端实现
 *
 * 所有序列先写入内部缓冲区，flush() 时一次写出，
 * 这样每次重绘只产生一次写系统调用。
 */
export class ProcessTerminal implements Terminal {
	/** 等待 flush 的输出 */
	private pending = "";
	/** 是否输出进度序列 */
	private readonly progressEnabled: boolean;
	/** 写入日志路径（调试用） */
	private readonly writeLogPath: string;
	/** 输出流上报的第一个错误，之后的 flush 直接失败 */
	private streamError?: Error;

	constructor(
		private readonly output: TerminalOutput = process.stdout,
		options: ProcessTerminalOptions = {},
	) {
		this.progressEnabled = options.progress ?? detectProgressSupport();
		this.writeLogPath = options.writeLogPath ?? process.env.TIMR_TUI_WRITE_LOG ?? "";
		// A failed write also emits "error"; without a listener it would crash the process
		this.output.on?.("error", (error) => {
			this.streamError ??= error;
		});
	}

	write(data: string): void {
		this.pending += data;
	}

	flush(): Promise<void> {
		const frame = this.pending;
		this.pending = "";
		if (!frame) {
			return Promise.resolve();
		}
		if (this.streamError) {
			return Promise.reject(this.streamError);
		}
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, frame, { encoding: "utf8" });
			} catch {
				// Ignore logging errors
			}
		}
		return new Promise((resolve, reject) => {
			this.output.write(frame, (error) => {
				if (error) {
					this.streamError ??= error;
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	get columns(): number {
		return this.output.columns || DEFAULT_COLUMNS;
	}

	previousLine(): void {
		this.write(`${ESC}[F`);
	}

	clearLine(): void {
		this.write(`\r${ESC}[2K`);
	}

	hideCursor(): void {
		this.write(`${ESC}[?25l`);
	}

	showCursor(): void {
		this.write(`${ESC}[?25h`);
	}

	setCursorVisible(visible: boolean): void {
		if (visible) {
			this.showCursor();
		} else {
			this.hideCursor();
		}
	}

	reportProgress(percent: number): void {
		if (!this.progressEnabled) return;
		const clamped = Math.min(100, Math.max(0, Math.round(percent)));
		// OSC 9;4;1;<percent> BEL - set progress state "normal"
		this.write(`${ESC}]9;4;1;${clamped}${BEL}`);
	}

	clearProgress(): void {
		if (!this.progressEnabled) return;
		this.write(`${ESC}]9;4;0${BEL}`);
	}

	bell(): void {
		this.write(BEL);
	}
}
