// GDB/MI output grammar: one line in, one typed record out.
//
//   result-record : [token] "^" result-class ("," result)*
//   async-record  : [token] ("*" | "+" | "=") async-class ("," result)*
//   stream-record : ("~" | "@" | "&") c-string
//   prompt        : "(gdb)"
//   result        : variable "=" value
//   value         : c-string | tuple | list
//   tuple         : "{}" | "{" result ("," result)* "}"
//   list          : "[]" | "[" (value | result) ("," (value | result))* "]"

import {
	type AsyncKind,
	type MiList,
	type MiRecord,
	type MiResults,
	type MiTuple,
	type MiValue,
	RESULT_CLASSES,
	type ResultClass,
	type StreamKind,
} from "@gdbmi/types";

export class MiParseError extends Error {
	readonly code = "MI_PARSE_MALFORMED";
	readonly line: string;

	constructor(line: string, reason: string) {
		super(`malformed MI output: ${reason}`);
		this.name = "MiParseError";
		this.line = line;
	}
}

const PROMPT = /^\(gdb\) *$/;
const LINE_ENDING = /\r?\n?$/;
const TOKEN = /\d+/y;
const CLASS_NAME = /[A-Za-z_][A-Za-z0-9_-]*/y;
const VARIABLE = /[A-Za-z_][A-Za-z0-9_.-]*/y;
const OCTAL_ESCAPE = /[0-7]{1,3}/y;
const MAX_DEPTH = 256;

const SIMPLE_ESCAPES = new Map<string, string>([
	["n", "\n"],
	["t", "\t"],
	["r", "\r"],
	["a", "\x07"],
	["b", "\b"],
	["f", "\f"],
	["v", "\v"],
	["e", "\x1b"],
	['"', '"'],
	["\\", "\\"],
]);

/**
 * Parse one line of MI output. A trailing newline is ignored.
 *
 * @throws {MiParseError} for any line that does not follow the MI grammar.
 */
export function parseMiLine(raw: string): MiRecord {
	const line = raw.replace(LINE_ENDING, "");
	if (PROMPT.test(line)) {
		return { type: "termination" };
	}
	return new LineParser(line).parseRecord();
}

export function isResultClass(name: string): name is ResultClass {
	return RESULT_CLASSES.some((resultClass) => resultClass === name);
}

function asyncKindOf(marker: string | undefined): AsyncKind | null {
	switch (marker) {
		case "*":
			return "exec";
		case "+":
			return "status";
		case "=":
			return "notify";
		default:
			return null;
	}
}

function streamKindOf(marker: string | undefined): StreamKind | null {
	switch (marker) {
		case "~":
			return "console";
		case "@":
			return "target";
		case "&":
			return "log";
		default:
			return null;
	}
}

class LineParser {
	private readonly line: string;
	private pos = 0;

	constructor(line: string) {
		this.line = line;
	}

	parseRecord(): MiRecord {
		const streamKind = streamKindOf(this.peek());
		if (streamKind) {
			this.pos++;
			const text = this.readCString();
			this.expectEnd();
			return { type: "stream", kind: streamKind, text };
		}

		const token = this.readToken();
		const marker = this.peek();
		if (marker === "^") {
			this.pos++;
			const name = this.readMatch(CLASS_NAME, "result class");
			if (!isResultClass(name)) {
				throw this.fail(`unknown result class '${name}'`);
			}
			return { type: "result", token, class: name, data: this.readResults() };
		}

		const kind = asyncKindOf(marker);
		if (kind) {
			this.pos++;
			const name = this.readMatch(CLASS_NAME, "async class");
			return {
				type: "async",
				kind,
				token,
				class: name,
				data: this.readResults(),
			};
		}

		throw this.fail(
			marker === undefined
				? "unexpected end of line"
				: `unexpected leading character '${marker}'`,
		);
	}

	private readToken(): number | null {
		TOKEN.lastIndex = this.pos;
		const match = TOKEN.exec(this.line);
		if (!match) return null;
		const token = Number(match[0]);
		if (!Number.isSafeInteger(token)) {
			throw this.fail(`token out of range '${match[0]}'`);
		}
		this.pos = TOKEN.lastIndex;
		return token;
	}

	private readResults(): MiResults {
		const entries = new Map<string, MiValue>();
		while (!this.atEnd()) {
			this.expect(",");
			const [name, value] = this.readResult(0);
			entries.set(name, value);
		}
		return Object.fromEntries(entries);
	}

	private readResult(depth: number): [string, MiValue] {
		const name = this.readMatch(VARIABLE, "variable name");
		this.expect("=");
		return [name, this.readValue(depth)];
	}

	private readValue(depth: number): MiValue {
		if (depth > MAX_DEPTH) {
			throw this.fail("values nested too deeply");
		}
		const ch = this.peek();
		if (ch === '"') return this.readCString();
		if (ch === "{") return this.readTuple(depth + 1);
		if (ch === "[") return this.readList(depth + 1);
		throw this.fail(
			ch === undefined
				? "expected value, got end of line"
				: `expected value, got '${ch}'`,
		);
	}

	private readTuple(depth: number): MiTuple {
		this.expect("{");
		const entries = new Map<string, MiValue>();
		if (!this.accept("}")) {
			do {
				const [name, value] = this.readResult(depth);
				entries.set(name, value);
			} while (this.accept(","));
			this.expect("}");
		}
		return { type: "tuple", results: Object.fromEntries(entries) };
	}

	private readList(depth: number): MiList {
		this.expect("[");
		const values: MiValue[] = [];
		if (!this.accept("]")) {
			do {
				values.push(this.readListElement(depth));
			} while (this.accept(","));
			this.expect("]");
		}
		return { type: "list", values };
	}

	// GDB mixes `[value,...]` and `[name=value,...]`; names are dropped.
	private readListElement(depth: number): MiValue {
		const ch = this.peek();
		if (ch === '"' || ch === "{" || ch === "[") {
			return this.readValue(depth);
		}
		return this.readResult(depth)[1];
	}

	private readCString(): string {
		this.expect('"');
		let text = "";
		let bytes: number[] = [];
		const flushBytes = () => {
			if (bytes.length === 0) return;
			text += Buffer.from(bytes).toString("utf8");
			bytes = [];
		};

		while (this.pos < this.line.length) {
			const ch = this.line[this.pos++];
			if (ch === '"') {
				flushBytes();
				return text;
			}
			if (ch !== "\\") {
				flushBytes();
				text += ch;
				continue;
			}
			if (this.pos >= this.line.length) break;

			OCTAL_ESCAPE.lastIndex = this.pos;
			const octal = OCTAL_ESCAPE.exec(this.line);
			if (octal) {
				// Non-ASCII text arrives as runs of octal-escaped UTF-8 bytes.
				bytes.push(Number.parseInt(octal[0], 8) & 0xff);
				this.pos = OCTAL_ESCAPE.lastIndex;
				continue;
			}

			const escaped = this.line[this.pos++];
			flushBytes();
			text += SIMPLE_ESCAPES.get(escaped) ?? escaped;
		}
		throw this.fail("unterminated string");
	}

	private readMatch(pattern: RegExp, what: string): string {
		pattern.lastIndex = this.pos;
		const match = pattern.exec(this.line);
		if (!match) {
			throw this.fail(`expected ${what}`);
		}
		this.pos = pattern.lastIndex;
		return match[0];
	}

	private peek(): string | undefined {
		return this.pos < this.line.length ? this.line[this.pos] : undefined;
	}

	private accept(ch: string): boolean {
		if (this.peek() !== ch) return false;
		this.pos++;
		return true;
	}

	private expect(ch: string): void {
		if (!this.accept(ch)) {
			const got = this.peek();
			throw this.fail(
				`expected '${ch}', got ${got === undefined ? "end of line" : `'${got}'`}`,
			);
		}
	}

	private expectEnd(): void {
		if (!this.atEnd()) {
			throw this.fail("unexpected trailing characters");
		}
	}

	private atEnd(): boolean {
		return this.pos >= this.line.length;
	}

	private fail(reason: string): MiParseError {
		return new MiParseError(this.line, `${reason} at column ${this.pos}`);
	}
}
