export { EventChannel } from "./channel.js";
export { GdbError, errorMessage } from "./errors.js";
export {
	type GdbLaunchOptions,
	type MiInterpreter,
	buildGdbArgs,
	launchGdb,
	resolveGdbBinary,
	waitForSpawn,
} from "./launch.js";
export { type Logger, resolveLogLevel, rootLogger } from "./logger.js";
export {
	PendingCommandTable,
	type PendingCommandOptions,
	type ResolveOutcome,
} from "./pending.js";
export {
	GdbSession,
	type GdbSessionOptions,
	type StartSessionOptions,
	type StartedSession,
	start,
} from "./session.js";
export { ExecutionStateMachine } from "./state.js";
export {
	GdbTransport,
	type GdbTransportOptions,
	type IssuedCommand,
	type SendOptions,
	type SignalProcess,
} from "./transport.js";
