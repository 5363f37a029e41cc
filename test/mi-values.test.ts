import { describe, expect, it } from "vitest";

import {
	describeStop,
	findResult,
	getInteger,
	getList,
	getString,
	getTuple,
} from "../packages/mi/src/index.js";
import { asyncRecord, resultRecord } from "./helpers.js";

describe("mi values", () => {
	it("describes a breakpoint stop", () => {
		const record = asyncRecord(
			'*stopped,reason="breakpoint-hit",disp="keep",bkptno="1",frame={addr="0x0000000000401136",func="main",args=[],file="hello.c",fullname="/tmp/hello.c",line="5",arch="i386:x86-64"},thread-id="1",stopped-threads="all",core="3"',
		);
		expect(describeStop(record.data)).toEqual({
			reason: "breakpoint-hit",
			threadId: 1,
			stoppedThreads: "all",
			breakpointId: 1,
			signalName: null,
			exitCode: null,
			frame: {
				level: null,
				addr: "0x0000000000401136",
				func: "main",
				file: "hello.c",
				fullname: "/tmp/hello.c",
				line: 5,
			},
		});
	});

	it("reads exit codes as octal", () => {
		const record = asyncRecord('*stopped,reason="exited",exit-code="012"');
		expect(describeStop(record.data).exitCode).toBe(10);
	});

	it("lists stopped threads by id", () => {
		const record = asyncRecord(
			'*stopped,reason="signal-received",signal-name="SIGINT",stopped-threads=["1","3"]',
		);
		const stop = describeStop(record.data);
		expect(stop.stoppedThreads).toEqual([1, 3]);
		expect(stop.signalName).toBe("SIGINT");
		expect(stop.threadId).toBeNull();
	});

	it("returns null for missing or mistyped fields", () => {
		const { data } = resultRecord('^done,name="x",count="nine",octal="9",t={}');
		expect(getString(data, "missing")).toBeNull();
		expect(getTuple(data, "name")).toBeNull();
		expect(getList(data, "t")).toBeNull();
		expect(getInteger(data, "count")).toBeNull();
		expect(getInteger(data, "octal", 8)).toBeNull();
		expect(getTuple(data, "t")).toEqual({ type: "tuple", results: {} });
	});

	it("ignores inherited object properties", () => {
		const { data } = resultRecord('^done,value="1"');
		expect(findResult(data, "toString")).toBeUndefined();
		expect(findResult(data, "value")).toBe("1");
	});
});
