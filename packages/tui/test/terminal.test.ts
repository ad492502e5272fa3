import { Writable } from "stream";
import { describe, expect, it } from "vitest";
import { DEFAULT_COLUMNS, detectProgressSupport, ProcessTerminal, type TerminalOutput } from "../src/terminal.js";
import { lerp, rgb } from "../src/utils.js";

class FakeOutput implements TerminalOutput {
	chunks: string[] = [];
	columns?: number;
	failWith?: Error;

	write(chunk: string, callback?: (error?: Error | null) => void): boolean {
		this.chunks.push(chunk);
		callback?.(this.failWith ?? null);
		return true;
	}
}

describe("ProcessTerminal", () => {
	it("buffers writes until flush", async () => {
		const output = new FakeOutput();
		const terminal = new ProcessTerminal(output, { progress: false });

		terminal.hideCursor();
		terminal.write("hello");
		expect(output.chunks).toEqual([]);

		await terminal.flush();
		expect(output.chunks).toEqual(["\x1b[?25lhello"]);
	});

	it("skips the write when nothing is pending", async () => {
		const output = new FakeOutput();
		const terminal = new ProcessTerminal(output, { progress: false });
		await terminal.flush();
		expect(output.chunks).toEqual([]);
	});

	it("rejects flush when the stream reports an error", async () => {
		const output = new FakeOutput();
		output.failWith = new Error("EPIPE");
		const terminal = new ProcessTerminal(output, { progress: false });
		terminal.write("x");
		await expect(terminal.flush()).rejects.toThrow("EPIPE");
	});

	it("keeps failing after a stream error without an unhandled error event", async () => {
		let writes = 0;
		const output = new Writable({
			write(_chunk, _encoding, callback) {
				writes++;
				callback(new Error("EPIPE"));
			},
		});
		const terminal = new ProcessTerminal(output, { progress: false });

		terminal.write("frame");
		await expect(terminal.flush()).rejects.toThrow("EPIPE");

		terminal.showCursor();
		await expect(terminal.flush()).rejects.toThrow("EPIPE");
		expect(writes).toBe(1);
	});

	it("emits cursor and line control sequences", async () => {
		const output = new FakeOutput();
		const terminal = new ProcessTerminal(output, { progress: false });
		terminal.previousLine();
		terminal.clearLine();
		terminal.setCursorVisible(true);
		terminal.setCursorVisible(false);
		terminal.bell();
		await terminal.flush();
		expect(output.chunks).toEqual(["\x1b[F\r\x1b[2K\x1b[?25h\x1b[?25l\x07"]);
	});

	it("falls back to 80 columns when the width is unknown", () => {
		const output = new FakeOutput();
		const terminal = new ProcessTerminal(output, { progress: false });
		expect(terminal.columns).toBe(DEFAULT_COLUMNS);
		output.columns = 42;
		expect(terminal.columns).toBe(42);
	});

	it("reports progress only when enabled", async () => {
		const enabled = new FakeOutput();
		const withProgress = new ProcessTerminal(enabled, { progress: true });
		withProgress.reportProgress(41.6);
		withProgress.clearProgress();
		await withProgress.flush();
		expect(enabled.chunks).toEqual(["\x1b]9;4;1;42\x07\x1b]9;4;0\x07"]);

		const disabled = new FakeOutput();
		const withoutProgress = new ProcessTerminal(disabled, { progress: false });
		withoutProgress.reportProgress(50);
		withoutProgress.clearProgress();
		await withoutProgress.flush();
		expect(disabled.chunks).toEqual([]);
	});
});

describe("detectProgressSupport", () => {
	it("detects Windows Terminal and ConEmu", () => {
		expect(detectProgressSupport({ WT_SESSION: "abc" })).toBe(true);
		expect(detectProgressSupport({ ConEmuANSI: "ON" })).toBe(true);
		expect(detectProgressSupport({ TERM: "xterm-256color" })).toBe(false);
	});

	it("honours the TIMR_PROGRESS override", () => {
		expect(detectProgressSupport({ TIMR_PROGRESS: "1" })).toBe(true);
		expect(detectProgressSupport({ TIMR_PROGRESS: "0", WT_SESSION: "abc" })).toBe(false);
	});
});

describe("rgb", () => {
	it("builds a truecolor foreground sequence", () => {
		expect(rgb(90, 105, 237)).toBe("\x1b[38;2;90;105;237m");
	});

	it("clamps and rounds channels", () => {
		expect(rgb(-4, 300, 99.6)).toBe("\x1b[38;2;0;255;100m");
	});
});

describe("lerp", () => {
	it("interpolates between endpoints", () => {
		expect(lerp(90, 123, 0)).toBe(90);
		expect(lerp(90, 123, 1)).toBe(123);
		expect(lerp(105, 90, 0.5)).toBe(98);
	});
});
