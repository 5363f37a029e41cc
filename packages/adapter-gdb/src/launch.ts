import { spawn } from "node:child_process";
import { constants as fsConstants } from "node:fs";
import { accessSync } from "node:fs";
import * as nodePath from "node:path";

import type { ChildProcessWithoutNullStreams } from "node:child_process";

import { GdbError } from "./errors.js";

export type MiInterpreter = "mi" | "mi2" | "mi3";

export interface GdbLaunchOptions {
	gdbPath?: string;
	interpreter?: MiInterpreter;
	args?: string[];
	cwd?: string;
	env?: NodeJS.ProcessEnv;
}

const DEFAULT_GDB_BINARY = "gdb";

export function resolveGdbBinary(
	options: GdbLaunchOptions = {},
	env: NodeJS.ProcessEnv = process.env,
): string {
	const explicit = options.gdbPath?.trim();
	if (explicit) {
		return checkBinary(explicit, "gdb is not executable");
	}

	const envPath = env.GDB_BINARY?.trim();
	if (envPath) {
		return checkBinary(envPath, "GDB_BINARY is not executable");
	}

	return DEFAULT_GDB_BINARY;
}

export function buildGdbArgs(options: GdbLaunchOptions = {}): string[] {
	return [`--interpreter=${options.interpreter ?? "mi"}`, ...(options.args ?? [])];
}

export function launchGdb(
	options: GdbLaunchOptions = {},
): ChildProcessWithoutNullStreams {
	const binary = resolveGdbBinary(options);
	return spawn(binary, buildGdbArgs(options), {
		cwd: options.cwd,
		env: { ...process.env, ...options.env },
		stdio: ["pipe", "pipe", "pipe"],
	});
}

/** Resolve once the child has spawned; reject if spawning fails. */
export function waitForSpawn(
	child: ChildProcessWithoutNullStreams,
): Promise<void> {
	return new Promise((resolve, reject) => {
		const onSpawn = () => {
			child.off("error", onError);
			resolve();
		};
		const onError = (err: Error) => {
			child.off("spawn", onSpawn);
			reject(new GdbError("GDB_SPAWN_FAILED", `failed to spawn gdb: ${err.message}`));
		};
		child.once("spawn", onSpawn);
		child.once("error", onError);
	});
}

// Bare command names are left to PATH lookup at spawn time.
function checkBinary(binary: string, message: string): string {
	if (binary.includes(nodePath.sep) && !isExecutable(binary)) {
		throw new GdbError("GDB_BINARY_NOT_EXECUTABLE", `${message}: ${binary}`);
	}
	return binary;
}

function isExecutable(filePath: string): boolean {
	try {
		accessSync(filePath, fsConstants.X_OK);
		return true;
	} catch {
		return false;
	}
}
