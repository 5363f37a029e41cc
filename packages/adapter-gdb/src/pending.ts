import type { ResultRecord } from "@gdbmi/types";

import { GdbError } from "./errors.js";

export interface PendingCommandOptions {
	/**
	 * Reject the caller after this many milliseconds. The entry stays
	 * registered and its result is discarded when it finally arrives.
	 */
	timeoutMs?: number;
}

export type ResolveOutcome = "delivered" | "abandoned" | "unknown";

interface PendingCommand {
	command: string;
	settled: boolean;
	resolve: (record: ResultRecord) => void;
	reject: (error: Error) => void;
	timer: NodeJS.Timeout | null;
}

/** Outstanding commands keyed by their correlation token. */
export class PendingCommandTable {
	private readonly entries = new Map<number, PendingCommand>();

	get size(): number {
		return this.entries.size;
	}

	has(token: number): boolean {
		return this.entries.has(token);
	}

	register(
		token: number,
		command: string,
		options: PendingCommandOptions = {},
	): Promise<ResultRecord> {
		if (this.entries.has(token)) {
			throw new GdbError(
				"GDB_DUPLICATE_TOKEN",
				`token ${token} is already pending (command '${command}')`,
			);
		}

		return new Promise<ResultRecord>((resolve, reject) => {
			const entry: PendingCommand = {
				command,
				settled: false,
				resolve,
				reject,
				timer: null,
			};
			const timeoutMs = options.timeoutMs;
			if (timeoutMs !== undefined && timeoutMs > 0) {
				entry.timer = setTimeout(() => {
					entry.timer = null;
					this.settle(
						entry,
						new GdbError(
							"GDB_COMMAND_TIMEOUT",
							`command '${command}' (token ${token}) timed out after ${timeoutMs}ms`,
						),
					);
				}, timeoutMs);
				if (entry.timer.unref) entry.timer.unref();
			}
			this.entries.set(token, entry);
		});
	}

	resolve(token: number, record: ResultRecord): ResolveOutcome {
		const entry = this.entries.get(token);
		if (!entry) return "unknown";
		this.entries.delete(token);
		if (entry.settled) return "abandoned";
		this.settle(entry, record);
		return "delivered";
	}

	/** Reject every waiting caller and empty the table. */
	drainWithError(error: Error): number {
		let rejected = 0;
		for (const entry of this.entries.values()) {
			if (entry.settled) continue;
			this.settle(entry, error);
			rejected++;
		}
		this.entries.clear();
		return rejected;
	}

	private settle(entry: PendingCommand, outcome: ResultRecord | Error): void {
		if (entry.settled) return;
		entry.settled = true;
		if (entry.timer) {
			clearTimeout(entry.timer);
			entry.timer = null;
		}
		if (outcome instanceof Error) {
			entry.reject(outcome);
		} else {
			entry.resolve(outcome);
		}
	}
}
