/**
 * @file 错误类型
 *
 * 倒计时程序的错误分类：
 * - InputError：时长字符串或配置文件有误（DurationParseError、ConfigError）
 * - IOError：终端输出写入失败
 * - SignalError：无法安装中断信号处理器
 *
 * 所有错误都是致命的，main() 捕获后以非零退出码结束进程。
 */

/** 所有可预期错误的基类 */
export class TimrError extends Error {
	readonly exitCode: number = 1;
	/** 附加在错误信息之后的提示 */
	readonly hint?: string;

	constructor(message: string, options?: { cause?: unknown; hint?: string }) {
		super(message, options);
		this.name = new.target.name;
		this.hint = options?.hint;
	}
}

/** 用户输入错误 */
export class InputError extends TimrError {}

/** 时长解析失败的具体原因 */
export type DurationParseReason = "empty" | "missing-number" | "invalid-character" | "overflow";

export class DurationParseError extends InputError {
	constructor(
		message: string,
		readonly reason: DurationParseReason,
		readonly input: string,
	) {
		super(message);
	}
}

/** 配置文件缺失、无法解析或找不到对应的 profile */
export class ConfigError extends InputError {}

/** 终端写入失败 */
export class IOError extends TimrError {}

/** 无法安装中断处理器 */
export class SignalError extends TimrError {}
