import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";

/**
 * The part of a {@link Logger} the dispatcher and filters write to.
 * Any `Logger` instance satisfies it.
 */
export type LogSink = Pick<Logger, "log">;

let defaultLogger: Logger | undefined;

/**
 * Returns the shared console logger used when no logger is configured.
 * Created on first use at `Levels.INFO`, so dispatch traces (DEBUG) stay quiet by default.
 */
export function getDefaultLogger(): Logger {
	if (!defaultLogger) {
		defaultLogger = new Logger({
			level: Levels.INFO,
			transports: [new ConsoleTransport()],
		});
	}
	return defaultLogger;
}

export { Levels, Logger };
