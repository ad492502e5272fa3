/**
 * @file 中断信号处理
 *
 * 将 SIGINT（Ctrl+C）转交给渲染循环。AbortController 充当单槽信箱：
 * 信号处理器是唯一的写入方，渲染循环只通过 signal.aborted 做非阻塞轮询。
 */

import { SignalError } from "./errors.js";

/** 可以注册信号监听器的进程对象（process 满足此接口） */
export interface SignalSource {
	once(event: "SIGINT", listener: () => void): unknown;
	removeListener(event: "SIGINT", listener: () => void): unknown;
}

/**
 * 安装一次性的 SIGINT 处理器，收到信号时中止 controller
 * @returns 移除处理器的函数
 * @throws SignalError 无法注册处理器时
 */
export function installInterruptHandler(controller: AbortController, source: SignalSource = process): () => void {
	const onInterrupt = () => {
		controller.abort();
	};

	try {
		source.once("SIGINT", onInterrupt);
	} catch (error) {
		throw new SignalError("Error setting Ctrl-C handler", { cause: error });
	}

	return () => {
		source.removeListener("SIGINT", onInterrupt);
	};
}
