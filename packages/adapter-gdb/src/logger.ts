import pino from "pino";

export type Logger = pino.Logger;

const FALLBACK_LEVEL = "silent";

/**
 * Map a level name from the environment onto one pino accepts.
 * Unknown names fall back to "silent" rather than throwing at import time.
 */
export function resolveLogLevel(raw: string | undefined): string {
	const level = raw?.trim().toLowerCase();
	if (!level) return FALLBACK_LEVEL;
	if (level === "silent" || Object.hasOwn(pino.levels.values, level)) {
		return level;
	}
	return FALLBACK_LEVEL;
}

export const rootLogger: Logger = pino({
	name: "gdbmi",
	level: resolveLogLevel(process.env.GDBMI_LOG_LEVEL),
	serializers: {
		err: pino.stdSerializers.err,
	},
});
