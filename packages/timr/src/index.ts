/**
 * @file timr 包入口
 *
 * 导出时长解析、渲染循环和配置查找，供其他程序嵌入倒计时使用。
 */

export { type Config, findProfile, getConfigPath, loadConfig, type Profile, resolveDuration } from "./config.js";
export {
	type Clock,
	type CountdownOptions,
	type CountdownOutcome,
	REDRAW_INTERVAL_MS,
	runCountdown,
	systemClock,
} from "./countdown.js";
export { formatDuration, parseDuration } from "./duration.js";
export {
	ConfigError,
	DurationParseError,
	type DurationParseReason,
	InputError,
	IOError,
	SignalError,
	TimrError,
} from "./errors.js";
export { installInterruptHandler, type SignalSource } from "./interrupt.js";
export { main, parseArgs } from "./main.js";
export { barWidthFor, formatClock, formatRemaining, type ProgressSample, renderBar, sampleProgress } from "./render.js";
