import type { GdbErrorCode } from "@gdbmi/types";

export class GdbError extends Error {
	readonly code: GdbErrorCode;

	constructor(code: GdbErrorCode, message: string) {
		super(message);
		this.name = "GdbError";
		this.code = code;
	}
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return "unknown error";
}
