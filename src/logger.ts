import stripAnsi from "strip-ansi";
import winston from "winston";
import type TransportStream from "winston-transport";
import DailyRotateFile from "winston-daily-rotate-file";

export enum Label {
	CLIENT = "client",
	DECODE = "decode",
	SCRAPE = "scrape",
	CLI = "cli",
}

export interface LoggerOptions {
	verbose?: boolean;
	logDir?: string;
}

const ERROR_PREFIX_REGEX = /^\s*error:\s*/i;
const SUB_SECOND_TS_REGEX = /\.\d{3,}$/;

/**
 * Silent until {@link initializeLogger} runs, so embedding the library
 * prints nothing.
 */
export let logger: winston.Logger = winston.createLogger({
	silent: true,
	transports: [new winston.transports.Console()],
});

function stripAnsiChars(message: unknown) {
	if (typeof message !== "string") {
		return message;
	}
	return stripAnsi(message);
}

function formatLine(
	{ level, message, label, timestamp, stack, cause }: winston.Logform.TransformableInfo,
	trimTimestamp: boolean,
): string {
	const ts =
		typeof timestamp === "string" && trimTimestamp
			? timestamp.replace(SUB_SECOND_TS_REGEX, "")
			: timestamp;
	const msg = !stack
		? `${message}${cause ? `\n${cause}` : ""}`
		: `${stack}${cause ? `\n${cause}` : ""}`.replace(ERROR_PREFIX_REGEX, "");
	return `${ts} ${level}: ${label ? `[${label}] ` : ""}${msg}`;
}

export function initializeLogger(options: LoggerOptions = {}): void {
	const transports: TransportStream[] = [
		new winston.transports.Console({
			level: options.verbose ? "silly" : "info",
			format: winston.format.combine(
				winston.format.errors({ stack: true }),
				winston.format.splat(),
				winston.format.colorize(),
				winston.format.printf((info) => formatLine(info, true)),
			),
		}),
	];
	if (options.logDir) {
		const fileFormat = winston.format.printf(
			(info) => `${stripAnsiChars(formatLine(info, false))}`,
		);
		transports.push(
			new DailyRotateFile({
				filename: "error.%DATE%.log",
				createSymlink: true,
				symlinkName: "error.current.log",
				dirname: options.logDir,
				maxFiles: "14d",
				level: "error",
				format: fileFormat,
			}),
			new DailyRotateFile({
				filename: "verbose.%DATE%.log",
				createSymlink: true,
				symlinkName: "verbose.current.log",
				dirname: options.logDir,
				maxFiles: "14d",
				level: "silly",
				format: fileFormat,
			}),
		);
	}
	logger = winston.createLogger({
		level: "silly",
		format: winston.format.combine(
			winston.format.timestamp({
				format: "YYYY-MM-DD HH:mm:ss.SSS",
			}),
			winston.format.errors({ stack: true }),
			winston.format.splat(),
		),
		transports,
	});
}
