import { describe, expect, it, vi } from "vitest";

import { GdbSession } from "../packages/adapter-gdb/src/index.js";
import { collect, createFakeGdb, flush } from "./helpers.js";


function createSession() {
	const gdb = createFakeGdb();
	const signalProcess = vi.fn(
		(_pid: number, _signal: NodeJS.Signals) => true,
	);
	const session = new GdbSession(gdb.child, {
		signalProcess,
		exitDrainMs: 0,
		terminateGraceMs: 10,
	});
	return { gdb, session, signalProcess };
}

describe("gdb session", () => {
	it("runs to a breakpoint and reports events in order", async () => {
		const { gdb, session, signalProcess } = createSession();
		const seen = collect(session.events);

		gdb.emit('=thread-group-started,id="i1",pid="4242"');
		await flush();
		const run = session.sendCommand("-exec-run");
		expect(gdb.written()).toEqual(["1-exec-run\n"]);

		gdb.emit(
			"1^running",
			'*running,thread-id="all"',
			"(gdb)",
			'~"hello\\n"',
			'*stopped,reason="breakpoint-hit",bkptno="1",thread-id="1",stopped-threads="all"',
		);

		await expect(run).resolves.toMatchObject({ token: 1, class: "running" });
		await flush();
		expect(session.executionState()).toEqual({ status: "stopped" });
		expect(session.debuggeePid()).toBe(4242);
		expect(session.canSendCommands()).toBe(true);

		session.terminate();
		const events = await seen;

		expect(
			events.map((event) => {
				switch (event.type) {
					case "async":
						return `async:${event.record.class}`;
					case "state":
						return `state:${event.transition.previous.status}->${event.transition.current.status}`;
					default:
						return event.type;
				}
			}),
		).toEqual([
			"async:thread-group-started",
			"state:idle->running",
			"async:running",
			"stream",
			"async:stopped",
			"state:running->stopped",
			"state:stopped->exited",
		]);
		expect(events[5]).toMatchObject({
			type: "state",
			transition: {
				cause: "async",
				stop: {
					reason: "breakpoint-hit",
					breakpointId: 1,
					threadId: 1,
					stoppedThreads: "all",
				},
			},
		});
		expect(events[6]).toMatchObject({
			type: "state",
			transition: { cause: "transport", current: { exitCode: null } },
		});
		expect(signalProcess).toHaveBeenCalledWith(4242, "SIGKILL");
		expect(gdb.kill).toHaveBeenCalledWith("SIGTERM");
	});

	it("surfaces gdb errors as error results", async () => {
		const { gdb, session } = createSession();
		const result = session.sendCommand("break-insert nowhere");
		gdb.emit('1^error,msg="Function \\"nowhere\\" not defined."');

		await expect(result).resolves.toEqual({
			type: "result",
			token: 1,
			class: "error",
			data: { msg: 'Function "nowhere" not defined.' },
		});
		expect(session.executionState()).toEqual({ status: "idle" });
	});

	it("drops the late result of a timed-out command without a diagnostic", async () => {
		const { gdb, session } = createSession();
		const seen = collect(session.events);

		await expect(
			session.sendCommand("exec-next", { timeoutMs: 10 }),
		).rejects.toMatchObject({
			code: "GDB_COMMAND_TIMEOUT",
			message: "command 'exec-next' (token 1) timed out after 10ms",
		});

		gdb.emit("1^done");
		await flush();
		session.terminate();

		const events = await seen;
		expect(events.filter((event) => event.type === "diagnostic")).toEqual([]);
	});

	it("refuses commands once the debuggee has exited", async () => {
		const { gdb, session } = createSession();
		gdb.emit(
			'=thread-group-started,id="i1",pid="4242"',
			'=thread-group-exited,id="i1",exit-code="0"',
		);
		await flush();

		expect(session.executionState()).toEqual({ status: "exited", exitCode: 0 });
		expect(session.debuggeePid()).toBeNull();
		expect(session.canSendCommands()).toBe(false);
		await expect(session.sendCommand("exec-continue")).rejects.toMatchObject({
			code: "GDB_NOT_READY",
			message: "cannot send 'exec-continue' while the debuggee is exited",
		});
		expect(gdb.written()).toEqual([]);
	});

	it("cannot be moved out of running by editing a reported state", async () => {
		const { gdb, session } = createSession();
		gdb.emit('*running,thread-id="all"');
		await flush();
		await expect(session.events.next()).resolves.toMatchObject({
			value: { type: "async" },
		});
		const { value: event } = await session.events.next();
		if (event?.type !== "state") throw new Error("expected a state event");

		Object.assign(session.executionState(), { status: "stopped" });
		Object.assign(event.transition.current, { status: "stopped" });

		expect(session.executionState()).toEqual({ status: "running" });
		expect(session.canSendCommands()).toBe(false);
		await expect(session.sendCommand("exec-next")).rejects.toMatchObject({
			code: "GDB_NOT_READY",
		});
		expect(gdb.written()).toEqual([]);
	});

	it("resolves closed when terminated", async () => {
		const { gdb, session, signalProcess } = createSession();
		const onClose = vi.fn();
		session.onClose(onClose);

		session.terminate();

		await expect(session.closed).resolves.toEqual({
			reason: "manual_close",
			exitCode: null,
			signal: null,
			stderr: "",
		});
		expect(onClose).toHaveBeenCalledTimes(1);
		expect(signalProcess).not.toHaveBeenCalled();
		expect(gdb.kill).toHaveBeenCalledWith("SIGTERM");
		expect(session.canSendCommands()).toBe(false);
		await expect(session.sendCommand("gdb-version")).rejects.toMatchObject({
			code: "GDB_TRANSPORT_CLOSED",
		});
	});

	it("ends the event stream when gdb goes away on its own", async () => {
		const { gdb, session } = createSession();
		const seen = collect(session.events);

		gdb.child.emit("close", 1, null);

		await expect(session.closed).resolves.toMatchObject({
			reason: "close",
			exitCode: 1,
		});
		await expect(seen).resolves.toEqual([
			{
				type: "state",
				transition: {
					previous: { status: "idle" },
					current: { status: "exited", exitCode: null },
					cause: "transport",
				},
			},
		]);
	});

	it("fails to start when the configured gdb is not executable", async () => {
		await expect(
			GdbSession.start({ gdbPath: "/nonexistent/dir/gdb" }),
		).rejects.toMatchObject({
			name: "GdbError",
			code: "GDB_BINARY_NOT_EXECUTABLE",
			message: "gdb is not executable: /nonexistent/dir/gdb",
		});
	});

	it("fails to start when gdb cannot be found on PATH", async () => {
		await expect(
			GdbSession.start({ gdbPath: "gdbmi-test-missing-binary" }),
		).rejects.toMatchObject({ code: "GDB_SPAWN_FAILED" });
	});
});
