import { describeStop, getInteger } from "@gdbmi/mi";
import type {
	AsyncRecord,
	ExecutionState,
	ResultRecord,
	StateTransition,
	TransitionCause,
} from "@gdbmi/types";

/**
 * Debuggee lifecycle: idle -> running <-> stopped -> exited.
 *
 * Only the dispatch loop feeds records in. Exited is final.
 */
export class ExecutionStateMachine {
	private current: ExecutionState = { status: "idle" };
	private pid: number | null = null;

	/** A copy; callers cannot move the machine by editing it. */
	get state(): ExecutionState {
		return copyState(this.current);
	}

	get debuggeePid(): number | null {
		return this.pid;
	}

	canSendCommands(): boolean {
		return this.current.status === "idle" || this.current.status === "stopped";
	}

	isExited(): boolean {
		return this.current.status === "exited";
	}

	observe(record: ResultRecord | AsyncRecord): StateTransition | null {
		if (this.isExited()) return null;

		if (record.type === "result") {
			if (record.class === "running") {
				return this.transition({ status: "running" }, "result");
			}
			if (record.class === "exit") {
				return this.exit(null, "result");
			}
			return null;
		}

		this.notePid(record);

		if (record.kind === "exec" && record.class === "running") {
			return this.transition({ status: "running" }, "async");
		}
		if (record.kind === "exec" && record.class === "stopped") {
			const previous = copyState(this.current);
			this.current = { status: "stopped" };
			return {
				previous,
				current: copyState(this.current),
				cause: "async",
				stop: describeStop(record.data),
			};
		}
		if (record.kind === "notify" && record.class === "thread-group-exited") {
			return this.exit(getInteger(record.data, "exit-code", 8), "async");
		}
		return null;
	}

	/** The pipe is gone; the exit code is unknown unless already reported. */
	markTransportClosed(): StateTransition | null {
		if (this.isExited()) return null;
		return this.exit(null, "transport");
	}

	private exit(exitCode: number | null, cause: TransitionCause): StateTransition {
		this.pid = null;
		const previous = copyState(this.current);
		this.current = { status: "exited", exitCode };
		return { previous, current: copyState(this.current), cause };
	}

	private transition(
		next: ExecutionState,
		cause: TransitionCause,
	): StateTransition | null {
		if (next.status === this.current.status) return null;
		const previous = copyState(this.current);
		this.current = copyState(next);
		return { previous, current: copyState(next), cause };
	}

	// `=thread-group-started,id="i1",pid="4242"` names the debuggee.
	private notePid(record: AsyncRecord): void {
		if (this.pid !== null || record.kind === "status") return;
		const pid = getInteger(record.data, "pid");
		if (pid !== null && pid > 0) {
			this.pid = pid;
		}
	}
}

function copyState(state: ExecutionState): ExecutionState {
	return state.status === "exited"
		? { status: "exited", exitCode: state.exitCode }
		: { status: state.status };
}
