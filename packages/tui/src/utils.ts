/**
 * @file 终端转义序列工具
 *
 * 提供倒计时渲染所需的原始 ANSI / OSC 序列：
 * - 24 位真彩色前景色
 * - 颜色分量的线性插值（进度条渐变）
 */

/** ESC 控制字符 */
export const ESC = "\x1b";
/** BEL 控制字符（响铃，同时作为 OSC 序列终止符） */
export const BEL = "\x07";
/** 恢复默认前景色 */
export const RESET_FOREGROUND = `${ESC}[39m`;

/**
 * 生成 24 位真彩色前景色转义序列。
 * 分量会被取整并限制在 0-255 范围内。
 */
export function rgb(red: number, green: number, blue: number): string {
	return `${ESC}[38;2;${channel(red)};${channel(green)};${channel(blue)}m`;
}

function channel(value: number): number {
	return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * 在两个颜色分量之间线性插值。
 * @param t - 插值位置，0 返回 a，1 返回 b
 */
export function lerp(a: number, b: number, t: number): number {
	return Math.round((1 - t) * a + t * b);
}
