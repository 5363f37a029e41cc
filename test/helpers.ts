import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { type Mock, vi } from "vitest";

import { parseMiLine } from "../packages/mi/src/index.js";

import type { ChildProcessWithoutNullStreams } from "node:child_process";
import type {
	AsyncRecord,
	ResultRecord,
	SessionEvent,
} from "../packages/types/src/index.js";

export interface FakeGdb {
	child: ChildProcessWithoutNullStreams;
	stdout: PassThrough;
	stderr: PassThrough;
	kill: Mock<(signal?: NodeJS.Signals | number) => boolean>;
	/** Lines written to gdb's stdin so far. */
	written(): string[];
	/** Emit MI output lines on gdb's stdout. */
	emit(...lines: string[]): void;
}

export function createFakeGdb(): FakeGdb {
	const child = new EventEmitter() as ChildProcessWithoutNullStreams;
	const stdout = new PassThrough();
	const stderr = new PassThrough();
	const stdin = new PassThrough();
	child.stdout = stdout;
	child.stderr = stderr;
	child.stdin = stdin;
	const kill = vi.fn((_signal?: NodeJS.Signals | number) => true);
	child.kill = kill as unknown as ChildProcessWithoutNullStreams["kill"];
	const write = vi.spyOn(stdin, "write");

	return {
		child,
		stdout,
		stderr,
		kill,
		written: () => write.mock.calls.map(([chunk]) => String(chunk)),
		emit: (...lines) => {
			stdout.write(lines.map((line) => `${line}\n`).join(""));
		},
	};
}

/** Let stream callbacks scheduled by PassThrough writes run. */
export async function flush(): Promise<void> {
	await new Promise<void>((resolve) => setImmediate(resolve));
	await new Promise<void>((resolve) => setImmediate(resolve));
}

export async function collect(
	events: AsyncIterable<SessionEvent>,
): Promise<SessionEvent[]> {
	const seen: SessionEvent[] = [];
	for await (const event of events) {
		seen.push(event);
	}
	return seen;
}

export function resultRecord(line: string): ResultRecord {
	const record = parseMiLine(line);
	if (record.type !== "result") {
		throw new Error(`expected result record, got ${record.type}`);
	}
	return record;
}

export function asyncRecord(line: string): AsyncRecord {
	const record = parseMiLine(line);
	if (record.type !== "async") {
		throw new Error(`expected async record, got ${record.type}`);
	}
	return record;
}
