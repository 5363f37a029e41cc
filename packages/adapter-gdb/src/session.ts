import type {
	ExecutionState,
	GdbCloseEvent,
	ResultRecord,
	SessionEvent,
} from "@gdbmi/types";

import type { ChildProcessWithoutNullStreams } from "node:child_process";

import { EventChannel } from "./channel.js";
import { type GdbLaunchOptions, launchGdb, waitForSpawn } from "./launch.js";
import { type Logger, rootLogger } from "./logger.js";
import { ExecutionStateMachine } from "./state.js";
import {
	GdbTransport,
	type IssuedCommand,
	type SendOptions,
	type SignalProcess,
} from "./transport.js";

export interface GdbSessionOptions {
	logger?: Logger;
	signalProcess?: SignalProcess;
	exitDrainMs?: number;
	terminateGraceMs?: number;
	maxLineLength?: number;
}

export interface StartSessionOptions extends GdbLaunchOptions, GdbSessionOptions {}

export interface StartedSession {
	session: GdbSession;
	events: EventChannel<SessionEvent>;
}

/**
 * One gdb process driven over MI.
 *
 * Results come back through `sendCommand`; everything else gdb says
 * (async records, stream text, stderr, state changes, diagnostics) is
 * pushed to `events`, which closes when the session ends.
 */
export class GdbSession {
	readonly events = new EventChannel<SessionEvent>();
	readonly closed: Promise<GdbCloseEvent>;
	private readonly stateMachine = new ExecutionStateMachine();
	private readonly transport: GdbTransport;
	private readonly logger: Logger;

	static async start(options: StartSessionOptions = {}): Promise<StartedSession> {
		const child = launchGdb(options);
		await waitForSpawn(child);
		const session = new GdbSession(child, options);
		return { session, events: session.events };
	}

	constructor(
		child: ChildProcessWithoutNullStreams,
		options: GdbSessionOptions = {},
	) {
		this.logger = (options.logger ?? rootLogger).child({
			gdbPid: child.pid ?? null,
		});
		this.transport = new GdbTransport(child, {
			stateMachine: this.stateMachine,
			logger: this.logger,
			signalProcess: options.signalProcess,
			exitDrainMs: options.exitDrainMs,
			terminateGraceMs: options.terminateGraceMs,
			maxLineLength: options.maxLineLength,
		});
		this.transport.onEvent((event) => {
			this.events.push(event);
		});
		this.closed = new Promise((resolve) => {
			this.transport.onClose((event) => {
				this.events.close();
				resolve(event);
			});
		});
		this.logger.debug("gdb session attached");
	}

	/** Send a command and wait for its result record. */
	async sendCommand(
		text: string,
		options: SendOptions = {},
	): Promise<ResultRecord> {
		return this.transport.send(text, options).result;
	}

	/** Send a command and hand back its token along with the pending result. */
	issueCommand(text: string, options: SendOptions = {}): IssuedCommand {
		return this.transport.send(text, options);
	}

	/** Its reply arrives as an `MI_UNTAGGED_RESULT` diagnostic event. */
	sendUntagged(text: string): void {
		this.transport.sendUntagged(text);
	}

	interrupt(): boolean {
		return this.transport.interrupt();
	}

	executionState(): ExecutionState {
		return this.stateMachine.state;
	}

	canSendCommands(): boolean {
		return !this.transport.isClosed && this.stateMachine.canSendCommands();
	}

	debuggeePid(): number | null {
		return this.stateMachine.debuggeePid;
	}

	gdbPid(): number | null {
		return this.transport.gdbPid;
	}

	onClose(handler: (event: GdbCloseEvent) => void): void {
		this.transport.onClose(handler);
	}

	/** Kill the debuggee and gdb. Pending commands fail with GDB_TRANSPORT_CLOSED. */
	terminate(): void {
		this.logger.debug("terminating gdb session");
		this.transport.close();
	}
}

export function start(options: StartSessionOptions = {}): Promise<StartedSession> {
	return GdbSession.start(options);
}
