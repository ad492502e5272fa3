import type { Terminal } from "@timr/tui";
import type { Clock } from "../src/countdown.js";

/**
 * 记录每个终端操作的模拟终端
 */
export class FakeTerminal implements Terminal {
	ops: string[] = [];
	columns: number;
	/** 前 N 次 flush 失败 */
	failFlushes = 0;
	flushCount = 0;

	constructor(columns = 80) {
		this.columns = columns;
	}

	write(data: string): void {
		this.ops.push(`write:${data}`);
	}

	async flush(): Promise<void> {
		this.flushCount++;
		if (this.failFlushes > 0) {
			this.failFlushes--;
			this.ops.push("flush:failed");
			throw new Error(`EPIPE ${this.flushCount}`);
		}
		this.ops.push("flush");
	}

	previousLine(): void {
		this.ops.push("previousLine");
	}

	clearLine(): void {
		this.ops.push("clearLine");
	}

	hideCursor(): void {
		this.ops.push("hideCursor");
	}

	showCursor(): void {
		this.ops.push("showCursor");
	}

	setCursorVisible(visible: boolean): void {
		if (visible) {
			this.showCursor();
		} else {
			this.hideCursor();
		}
	}

	reportProgress(percent: number): void {
		this.ops.push(`progress:${percent}`);
	}

	clearProgress(): void {
		this.ops.push("clearProgress");
	}

	bell(): void {
		this.ops.push("bell");
	}
}

/**
 * 假时钟：sleep 立即返回并把时间向前推进
 */
export class FakeClock implements Clock {
	current = 0;
	sleeps: number[] = [];

	constructor(private readonly wallTime: Date = new Date(2026, 0, 1, 15, 7, 0)) {}

	now(): number {
		return this.current;
	}

	date(): Date {
		return this.wallTime;
	}

	async sleep(ms: number): Promise<void> {
		this.sleeps.push(ms);
		this.current += ms;
	}
}
