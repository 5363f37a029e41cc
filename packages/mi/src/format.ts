// Render MI records back to wire text.

import type { AsyncKind, MiRecord, MiResults, MiValue, StreamKind } from "@gdbmi/types";

const ASYNC_MARKERS: Record<AsyncKind, string> = {
	exec: "*",
	status: "+",
	notify: "=",
};

const STREAM_MARKERS: Record<StreamKind, string> = {
	console: "~",
	target: "@",
	log: "&",
};

export function quoteCString(text: string): string {
	let out = '"';
	for (const ch of text) {
		switch (ch) {
			case "\\":
				out += "\\\\";
				break;
			case '"':
				out += '\\"';
				break;
			case "\n":
				out += "\\n";
				break;
			case "\t":
				out += "\\t";
				break;
			case "\r":
				out += "\\r";
				break;
			default: {
				const code = ch.charCodeAt(0);
				out +=
					code < 0x20 || code === 0x7f
						? `\\${code.toString(8).padStart(3, "0")}`
						: ch;
			}
		}
	}
	return `${out}"`;
}

export function formatMiValue(value: MiValue): string {
	if (typeof value === "string") {
		return quoteCString(value);
	}
	if (value.type === "tuple") {
		return `{${formatMiResults(value.results)}}`;
	}
	return `[${value.values.map(formatMiValue).join(",")}]`;
}

export function formatMiResults(results: MiResults): string {
	return Object.entries(results)
		.map(([name, value]) => `${name}=${formatMiValue(value)}`)
		.join(",");
}

export function formatMiRecord(record: MiRecord): string {
	switch (record.type) {
		case "result":
			return `${record.token ?? ""}^${record.class}${formatTail(record.data)}`;
		case "async":
			return `${record.token ?? ""}${ASYNC_MARKERS[record.kind]}${record.class}${formatTail(record.data)}`;
		case "stream":
			return `${STREAM_MARKERS[record.kind]}${quoteCString(record.text)}`;
		case "termination":
			return "(gdb)";
	}
}

function formatTail(results: MiResults): string {
	const body = formatMiResults(results);
	return body ? `,${body}` : "";
}
