/**
 * @file 终端适配层入口文件
 *
 * 重新导出终端接口、ProcessTerminal 实现以及转义序列工具函数。
 */

// 终端接口和实现
export {
	DEFAULT_COLUMNS,
	detectProgressSupport,
	ProcessTerminal,
	type ProcessTerminalOptions,
	type Terminal,
	type TerminalOutput,
} from "./terminal.js";
// 转义序列工具函数
export { BEL, ESC, lerp, RESET_FOREGROUND, rgb } from "./utils.js";
