import { MiParseError, parseMiLine } from "@gdbmi/mi";
import type {
	AsyncRecord,
	DiagnosticCode,
	GdbCloseEvent,
	MiRecord,
	ResultRecord,
	SessionEvent,
	StateTransition,
} from "@gdbmi/types";

import type { ChildProcessWithoutNullStreams } from "node:child_process";

import { GdbError, errorMessage } from "./errors.js";
import { type Logger, rootLogger } from "./logger.js";
import { PendingCommandTable, type PendingCommandOptions } from "./pending.js";
import { ExecutionStateMachine } from "./state.js";

export type SignalProcess = (pid: number, signal: NodeJS.Signals) => boolean;

export interface GdbTransportOptions {
	stateMachine?: ExecutionStateMachine;
	logger?: Logger;
	/** Delivers SIGINT to a known debuggee pid. Defaults to `process.kill`. */
	signalProcess?: SignalProcess;
	/** How long to keep reading stdout after gdb exits. */
	exitDrainMs?: number;
	/** Delay between SIGTERM and SIGKILL on `close()`. */
	terminateGraceMs?: number;
	/** Longest stdout or stderr line kept before it is cut off. */
	maxLineLength?: number;
}

export type SendOptions = PendingCommandOptions;

export interface IssuedCommand {
	token: number;
	command: string;
	result: Promise<ResultRecord>;
}

const DEFAULT_EXIT_DRAIN_MS = 100;
const DEFAULT_TERMINATE_GRACE_MS = 1500;
const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;
const DIAGNOSTIC_EXCERPT = 200;

const defaultSignalProcess: SignalProcess = (pid, signal) =>
	process.kill(pid, signal);

/**
 * Owns gdb's pipes. Stdout is read by a single line-oriented dispatch loop;
 * commands are written one `write` call at a time, each tagged with a fresh
 * token so its result record can be matched back to the caller.
 */
export class GdbTransport {
	private readonly child: ChildProcessWithoutNullStreams;
	private readonly stateMachine: ExecutionStateMachine;
	private readonly pending = new PendingCommandTable();
	private readonly logger: Logger;
	private readonly signalProcess: SignalProcess;
	private readonly exitDrainMs: number;
	private readonly terminateGraceMs: number;
	private readonly maxLineLength: number;
	private readonly eventHandlers: Array<(event: SessionEvent) => void> = [];
	private readonly closeHandlers: Array<(event: GdbCloseEvent) => void> = [];
	private nextToken = 1;
	private stdoutBuffer = "";
	// Set while skipping the rest of an overlong stdout line.
	private discardingLine = false;
	private stderrBuffer = "";
	private stderrTail = "";
	private closed = false;
	private exitTimer: NodeJS.Timeout | null = null;
	private static readonly STDERR_LIMIT = 2048;

	constructor(
		child: ChildProcessWithoutNullStreams,
		options: GdbTransportOptions = {},
	) {
		this.child = child;
		this.stateMachine = options.stateMachine ?? new ExecutionStateMachine();
		this.logger =
			options.logger ?? rootLogger.child({ gdbPid: child.pid ?? null });
		this.signalProcess = options.signalProcess ?? defaultSignalProcess;
		this.exitDrainMs = options.exitDrainMs ?? DEFAULT_EXIT_DRAIN_MS;
		this.terminateGraceMs =
			options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
		this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;

		this.child.stdout.setEncoding("utf8");
		this.child.stderr.setEncoding("utf8");

		this.child.stdout.on("data", (chunk: string) => {
			this.handleStdout(chunk);
		});
		this.child.stdout.on("end", () => {
			this.flushStdout();
			this.failTransport("stream_end", null, null);
		});
		this.child.stdout.on("error", (error: Error) => {
			this.failTransport("error", null, null, error);
		});
		this.child.stdin.on("error", (error: Error) => {
			this.failTransport("error", null, null, error);
		});
		this.child.stderr.on("data", (chunk: string) => {
			this.handleStderr(chunk);
		});
		this.child.on("error", (error: Error) => {
			this.failTransport("error", null, null, error);
		});
		this.child.on("exit", (code, signal) => {
			// stdout may still hold records gdb wrote just before exiting.
			if (this.closed || this.exitTimer) return;
			this.exitTimer = setTimeout(() => {
				this.exitTimer = null;
				this.flushStdout();
				this.failTransport("exit", code, signal);
			}, this.exitDrainMs);
			if (this.exitTimer.unref) this.exitTimer.unref();
		});
		this.child.on("close", (code, signal) => {
			this.flushStdout();
			this.failTransport("close", code, signal);
		});
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get pendingCount(): number {
		return this.pending.size;
	}

	get gdbPid(): number | null {
		return this.child.pid ?? null;
	}

	get executionStateMachine(): ExecutionStateMachine {
		return this.stateMachine;
	}

	onEvent(handler: (event: SessionEvent) => void): void {
		this.eventHandlers.push(handler);
	}

	onClose(handler: (event: GdbCloseEvent) => void): void {
		this.closeHandlers.push(handler);
	}

	/**
	 * Tag and write one MI command. Throws synchronously, without writing,
	 * when the transport is closed or the debuggee is not stopped.
	 */
	send(text: string, options: SendOptions = {}): IssuedCommand {
		const command = normalizeCommand(text);
		this.assertWritable(command);
		const token = this.nextToken++;
		const result = this.pending.register(token, command, options);
		this.write(`${token}-${command}\n`, { token, command });
		return { token, command, result };
	}

	/**
	 * Write a command without a token. Its result is not correlated, so
	 * gdb's reply surfaces as an `MI_UNTAGGED_RESULT` diagnostic event.
	 */
	sendUntagged(text: string): void {
		const command = normalizeCommand(text);
		this.assertWritable(command);
		this.write(`-${command}\n`, { token: null, command });
	}

	/**
	 * Ask a running debuggee to stop. Returns false when there is nothing
	 * to interrupt. The state changes only once gdb reports `*stopped`.
	 */
	interrupt(): boolean {
		const { status } = this.stateMachine.state;
		if (this.closed || status !== "running") {
			this.logger.debug({ status }, "interrupt ignored: debuggee not running");
			return false;
		}

		const pid = this.stateMachine.debuggeePid;
		try {
			if (pid !== null) {
				this.logger.debug({ pid }, "sending SIGINT to debuggee");
				return this.signalProcess(pid, "SIGINT");
			}
			this.logger.debug("debuggee pid unknown, sending SIGINT to gdb");
			return this.child.kill("SIGINT");
		} catch (error) {
			this.logger.warn({ err: error, pid }, "interrupt failed");
			return false;
		}
	}

	close(): void {
		if (this.closed) return;
		const debuggeePid = this.stateMachine.debuggeePid;
		this.failTransport("manual_close", null, null);

		if (debuggeePid !== null) {
			try {
				this.signalProcess(debuggeePid, "SIGKILL");
			} catch (error) {
				this.logger.debug({ err: error, pid: debuggeePid }, "debuggee already gone");
			}
		}
		try {
			this.child.kill("SIGTERM");
		} catch (error) {
			this.logger.debug({ err: error }, "SIGTERM to gdb failed");
		}
		const killTimer = setTimeout(() => {
			if (this.child.exitCode !== null || this.child.signalCode !== null) return;
			try {
				this.child.kill("SIGKILL");
			} catch (error) {
				this.logger.debug({ err: error }, "SIGKILL to gdb failed");
			}
		}, this.terminateGraceMs);
		if (killTimer.unref) killTimer.unref();
	}

	private assertWritable(command: string): void {
		if (this.closed) {
			throw new GdbError(
				"GDB_TRANSPORT_CLOSED",
				this.withStderrContext("gdb transport is closed"),
			);
		}
		if (this.stateMachine.canSendCommands()) return;
		const { status } = this.stateMachine.state;
		if (status === "running" && isInterruptCommand(command)) return;
		throw new GdbError(
			"GDB_NOT_READY",
			`cannot send '${command}' while the debuggee is ${status}`,
		);
	}

	private write(
		line: string,
		context: { token: number | null; command: string },
	): void {
		this.logger.debug(context, "sending command");
		try {
			this.child.stdin.write(line);
		} catch (error) {
			this.failTransport("error", null, null, error);
		}
	}

	private handleStdout(chunk: string): void {
		this.stdoutBuffer += chunk;
		let newline = this.stdoutBuffer.indexOf("\n");
		while (newline !== -1) {
			const line = this.stdoutBuffer.slice(0, newline);
			this.stdoutBuffer = this.stdoutBuffer.slice(newline + 1);
			if (this.discardingLine) {
				this.discardingLine = false;
			} else {
				this.handleLine(line);
			}
			newline = this.stdoutBuffer.indexOf("\n");
		}

		if (this.discardingLine) {
			this.stdoutBuffer = "";
		} else if (this.stdoutBuffer.length > this.maxLineLength) {
			this.diagnose(
				"MI_LINE_TOO_LONG",
				`output line exceeds ${this.maxLineLength} characters; dropping it`,
				this.stdoutBuffer.slice(0, DIAGNOSTIC_EXCERPT),
			);
			this.stdoutBuffer = "";
			this.discardingLine = true;
		}
	}

	private flushStdout(): void {
		if (this.discardingLine) {
			this.discardingLine = false;
			this.stdoutBuffer = "";
			return;
		}
		if (!this.stdoutBuffer) return;
		const rest = this.stdoutBuffer;
		this.stdoutBuffer = "";
		this.handleLine(rest);
	}

	private handleLine(raw: string): void {
		if (this.closed) return;
		const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
		if (line.trim() === "") return;
		this.logger.trace({ line }, "received line");

		let record: MiRecord;
		try {
			record = parseMiLine(line);
		} catch (error) {
			const message =
				error instanceof MiParseError
					? error.message
					: `malformed MI output: ${errorMessage(error)}`;
			this.diagnose("MI_PARSE_MALFORMED", message, line);
			return;
		}

		switch (record.type) {
			case "result":
				this.dispatchResult(record, line);
				return;
			case "async":
				this.dispatchAsync(record);
				return;
			case "stream":
				this.emit({ type: "stream", record });
				return;
			case "termination":
				return;
		}
	}

	private dispatchResult(record: ResultRecord, line: string): void {
		const transition = this.stateMachine.observe(record);
		if (transition) this.emitTransition(transition);

		if (record.token === null) {
			this.diagnose(
				"MI_UNTAGGED_RESULT",
				`result record '^${record.class}' carries no token`,
				line,
			);
			return;
		}

		const outcome = this.pending.resolve(record.token, record);
		if (outcome === "unknown") {
			this.diagnose(
				"MI_UNKNOWN_TOKEN",
				`no pending command for token ${record.token}`,
				line,
			);
		} else if (outcome === "abandoned") {
			this.logger.debug(
				{ token: record.token },
				"discarding result of abandoned command",
			);
		}
	}

	private dispatchAsync(record: AsyncRecord): void {
		const transition = this.stateMachine.observe(record);
		this.emit({ type: "async", record });
		if (transition) this.emitTransition(transition);
	}

	private handleStderr(chunk: string): void {
		const next = `${this.stderrTail}${chunk}`;
		this.stderrTail = next.slice(-GdbTransport.STDERR_LIMIT);

		this.stderrBuffer += chunk;
		let newline = this.stderrBuffer.indexOf("\n");
		while (newline !== -1) {
			const text = this.stderrBuffer.slice(0, newline).replace(/\r$/, "");
			this.stderrBuffer = this.stderrBuffer.slice(newline + 1);
			this.emit({ type: "stderr", text });
			newline = this.stderrBuffer.indexOf("\n");
		}
		// stderr is free text; an overlong line is forwarded in pieces.
		while (this.stderrBuffer.length > this.maxLineLength) {
			this.emit({
				type: "stderr",
				text: this.stderrBuffer.slice(0, this.maxLineLength),
			});
			this.stderrBuffer = this.stderrBuffer.slice(this.maxLineLength);
		}
	}

	private diagnose(code: DiagnosticCode, message: string, line: string): void {
		this.logger.warn({ code, line }, message);
		this.emit({ type: "diagnostic", diagnostic: { code, message, line } });
	}

	private emitTransition(transition: StateTransition): void {
		this.logger.info(
			{
				from: transition.previous.status,
				to: transition.current.status,
				cause: transition.cause,
			},
			"execution state changed",
		);
		this.emit({ type: "state", transition });
	}

	private emit(event: SessionEvent): void {
		for (const handler of this.eventHandlers) {
			handler(event);
		}
	}

	private withStderrContext(message: string): string {
		const tail = this.stderrTail.trim();
		if (!tail) return message;
		return `${message} (stderr: ${tail})`;
	}

	private failTransport(
		reason: GdbCloseEvent["reason"],
		exitCode: number | null,
		signal: NodeJS.Signals | null,
		cause?: unknown,
	): void {
		if (this.closed) return;

		if (this.stderrBuffer) {
			this.emit({ type: "stderr", text: this.stderrBuffer.replace(/\r$/, "") });
			this.stderrBuffer = "";
		}
		this.closed = true;
		if (this.exitTimer) {
			clearTimeout(this.exitTimer);
			this.exitTimer = null;
		}

		const detail = cause === undefined ? reason : `${reason}: ${errorMessage(cause)}`;
		const error = new GdbError(
			"GDB_TRANSPORT_CLOSED",
			this.withStderrContext(`gdb transport closed (${detail})`),
		);

		const transition = this.stateMachine.markTransportClosed();
		if (transition) this.emitTransition(transition);

		const rejected = this.pending.drainWithError(error);
		this.logger.info(
			{ reason, exitCode, signal, rejected },
			"gdb transport closed",
		);

		const closeEvent: GdbCloseEvent = {
			reason,
			exitCode,
			signal,
			stderr: this.stderrTail.trim(),
		};
		for (const handler of this.closeHandlers) {
			handler(closeEvent);
		}
	}
}

function normalizeCommand(text: string): string {
	if (/[\r\n]/.test(text)) {
		throw new GdbError(
			"GDB_INVALID_COMMAND",
			"MI commands must fit on a single line",
		);
	}
	const command = text.trim().replace(/^-/, "");
	if (!command) {
		throw new GdbError("GDB_INVALID_COMMAND", "empty MI command");
	}
	return command;
}

function isInterruptCommand(command: string): boolean {
	return command === "exec-interrupt" || command.startsWith("exec-interrupt ");
}
