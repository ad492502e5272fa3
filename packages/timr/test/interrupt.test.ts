import { EventEmitter } from "events";
import { describe, expect, it } from "vitest";
import { SignalError } from "../src/errors.js";
import { installInterruptHandler, type SignalSource } from "../src/interrupt.js";

describe("installInterruptHandler", () => {
	it("aborts the controller on SIGINT", () => {
		const source = new EventEmitter();
		const controller = new AbortController();

		installInterruptHandler(controller, source);
		expect(controller.signal.aborted).toBe(false);

		source.emit("SIGINT");
		expect(controller.signal.aborted).toBe(true);
		expect(source.listenerCount("SIGINT")).toBe(0);
	});

	it("removes the handler when disposed", () => {
		const source = new EventEmitter();
		const controller = new AbortController();

		const dispose = installInterruptHandler(controller, source);
		expect(source.listenerCount("SIGINT")).toBe(1);

		dispose();
		expect(source.listenerCount("SIGINT")).toBe(0);
		source.emit("SIGINT");
		expect(controller.signal.aborted).toBe(false);
	});

	it("fails with a SignalError when the handler cannot be installed", () => {
		const source: SignalSource = {
			once: () => {
				throw new Error("not supported");
			},
			removeListener: () => undefined,
		};
		expect(() => installInterruptHandler(new AbortController(), source)).toThrow(SignalError);
	});
});
