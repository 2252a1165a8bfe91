import _ from "lodash";
import { getConfig, LOG_LEVELS, type LogLevel } from "./config.js";

/**
 * Destination for log lines.
 */
export interface LogOutputChannel {
	appendLine(message: string): void;
}

const stderrChannel: LogOutputChannel = {
	appendLine: (message) => {
		process.stderr.write(`${message}\n`);
	},
};

let output: LogOutputChannel = stderrChannel;
let cachedLogLevel: LogLevel | undefined;

/**
 * Redirect log output, e.g. to an editor output panel.
 * Passing nothing restores the default (standard error).
 *
 * @param {LogOutputChannel} [channel] - The channel receiving log lines.
 */
export function setLogOutput(channel?: LogOutputChannel): void {
	output = channel ?? stderrChannel;
}

/**
 * Forget the cached log level so the next message re-reads configuration.
 */
export function resetLogLevelCache(): void {
	cachedLogLevel = undefined;
}

function getLogLevel(): LogLevel {
	cachedLogLevel ??= getConfig().logLevel;
	return cachedLogLevel;
}

/**
 * Logs a message to the log output if the message type
 * is at or below the configured log level.
 *
 * @param {string} message - The message to log.
 * @param {LogLevel} [type="info"] - The type of log message.
 */
export function logMessage(message: string, type: LogLevel = "info"): void {
	if (LOG_LEVELS.indexOf(type) <= LOG_LEVELS.indexOf(getLogLevel())) {
		output.appendLine(message);
	}
}

/**
 * Debounced version of logMessage that limits how frequently messages are logged.
 * Waits 1000ms before logging the message to prevent excessive logging.
 */
export const logMessageDebounced = _.debounce(logMessage, 1000);
