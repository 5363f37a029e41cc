// Shared MI record, execution-state and session-event types used across packages.

// ─── Values ───

export type MiValue = string | MiTuple | MiList;

export type MiResults = Record<string, MiValue>;

export interface MiTuple {
	type: "tuple";
	results: MiResults;
}

export interface MiList {
	type: "list";
	values: MiValue[];
}

// ─── Records ───

export const RESULT_CLASSES = [
	"done",
	"running",
	"connected",
	"error",
	"exit",
] as const;

export type ResultClass = (typeof RESULT_CLASSES)[number];

export type AsyncKind = "exec" | "status" | "notify";

export type StreamKind = "console" | "target" | "log";

export interface ResultRecord {
	type: "result";
	token: number | null;
	class: ResultClass;
	data: MiResults;
}

export interface AsyncRecord {
	type: "async";
	kind: AsyncKind;
	token: number | null;
	/** MI async class, e.g. "stopped", "running", "thread-group-started". */
	class: string;
	data: MiResults;
}

export interface StreamRecord {
	type: "stream";
	kind: StreamKind;
	text: string;
}

/** The `(gdb)` prompt that closes a block of output. */
export interface TerminationRecord {
	type: "termination";
}

export type MiRecord =
	| ResultRecord
	| AsyncRecord
	| StreamRecord
	| TerminationRecord;

// ─── Execution state ───

export type ExecutionState =
	| { status: "idle" }
	| { status: "running" }
	| { status: "stopped" }
	| { status: "exited"; exitCode: number | null };

export type ExecutionStatus = ExecutionState["status"];

export interface StopFrame {
	level: number | null;
	addr: string | null;
	func: string | null;
	file: string | null;
	fullname: string | null;
	line: number | null;
}

export interface StopInfo {
	reason: string | null;
	threadId: number | null;
	/** "all" or the list of stopped thread ids. */
	stoppedThreads: "all" | number[] | null;
	breakpointId: number | null;
	signalName: string | null;
	exitCode: number | null;
	frame: StopFrame | null;
}

export type TransitionCause = "result" | "async" | "transport";

export interface StateTransition {
	previous: ExecutionState;
	current: ExecutionState;
	cause: TransitionCause;
	stop?: StopInfo;
}

// ─── Session events ───

export type DiagnosticCode =
	| "MI_PARSE_MALFORMED"
	| "MI_UNTAGGED_RESULT"
	| "MI_UNKNOWN_TOKEN"
	| "MI_LINE_TOO_LONG";

export interface Diagnostic {
	code: DiagnosticCode;
	message: string;
	line: string;
}

export type SessionEvent =
	| { type: "async"; record: AsyncRecord }
	| { type: "stream"; record: StreamRecord }
	| { type: "stderr"; text: string }
	| { type: "state"; transition: StateTransition }
	| { type: "diagnostic"; diagnostic: Diagnostic };

// ─── Errors ───

export type GdbErrorCode =
	| "GDB_NOT_READY"
	| "GDB_DUPLICATE_TOKEN"
	| "GDB_TRANSPORT_CLOSED"
	| "GDB_COMMAND_TIMEOUT"
	| "GDB_INVALID_COMMAND"
	| "GDB_SPAWN_FAILED"
	| "GDB_BINARY_NOT_EXECUTABLE";

export interface GdbCloseEvent {
	reason: "exit" | "close" | "stream_end" | "error" | "manual_close";
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	stderr: string;
}
