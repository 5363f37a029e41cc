import type {
	MiList,
	MiResults,
	MiTuple,
	MiValue,
	StopFrame,
	StopInfo,
} from "@gdbmi/types";

export function isTuple(value: MiValue | undefined): value is MiTuple {
	return typeof value === "object" && value.type === "tuple";
}

export function isList(value: MiValue | undefined): value is MiList {
	return typeof value === "object" && value.type === "list";
}

export function findResult(
	results: MiResults,
	name: string,
): MiValue | undefined {
	return Object.hasOwn(results, name) ? results[name] : undefined;
}

export function getString(results: MiResults, name: string): string | null {
	const value = findResult(results, name);
	return typeof value === "string" ? value : null;
}

export function getTuple(results: MiResults, name: string): MiTuple | null {
	const value = findResult(results, name);
	return isTuple(value) ? value : null;
}

export function getList(results: MiResults, name: string): MiList | null {
	const value = findResult(results, name);
	return isList(value) ? value : null;
}

/**
 * Read an integer field. GDB reports exit codes in octal, so callers
 * reading `exit-code` pass radix 8.
 */
export function getInteger(
	results: MiResults,
	name: string,
	radix = 10,
): number | null {
	const text = getString(results, name)?.trim();
	if (!text) return null;
	const digits = radix === 8 ? /^[0-7]+$/ : radix === 16 ? /^(0x)?[0-9a-f]+$/i : /^-?\d+$/;
	if (!digits.test(text)) return null;
	const value = Number.parseInt(text, radix);
	return Number.isSafeInteger(value) ? value : null;
}

/** Decode the payload of a `*stopped` record. */
export function describeStop(data: MiResults): StopInfo {
	const frame = getTuple(data, "frame");
	return {
		reason: getString(data, "reason"),
		threadId: getInteger(data, "thread-id"),
		stoppedThreads: describeStoppedThreads(data),
		breakpointId: getInteger(data, "bkptno"),
		signalName: getString(data, "signal-name"),
		exitCode: getInteger(data, "exit-code", 8),
		frame: frame ? describeFrame(frame) : null,
	};
}

export function describeFrame(frame: MiTuple): StopFrame {
	const { results } = frame;
	return {
		level: getInteger(results, "level"),
		addr: getString(results, "addr"),
		func: getString(results, "func"),
		file: getString(results, "file"),
		fullname: getString(results, "fullname"),
		line: getInteger(results, "line"),
	};
}

function describeStoppedThreads(data: MiResults): StopInfo["stoppedThreads"] {
	const value = findResult(data, "stopped-threads");
	if (value === "all") return "all";
	if (!isList(value)) return null;
	const ids: number[] = [];
	for (const item of value.values) {
		if (typeof item !== "string") continue;
		const id = Number.parseInt(item, 10);
		if (Number.isSafeInteger(id)) ids.push(id);
	}
	return ids;
}
